import {
	Category,
	Combatant,
	EngineUtils,
	LogSink,
	RandomSource,
	Status,
	StatusId,
	StatusTag,
	TypeName,
} from "./types";

export interface StatusContext {
	rng: RandomSource;
	log: LogSink;
	utils: EngineUtils;
}

export interface StatusRule {
	id: StatusId;
	label: string; // "X is now <label>!"
	immuneTypes?: TypeName[];
	// Returns false when the combatant loses its action this turn.
	beforeAction?: (pokemon: Combatant, ctx: StatusContext) => boolean;
	onEndOfTurn?: (pokemon: Combatant, ctx: StatusContext) => void;
	onModifySpeed?: (pokemon: Combatant, speed: number) => number;
	onModifyAtk?: (pokemon: Combatant, atk: number, category: Category) => number;
}

export const PARALYSIS_SKIP_CHANCE = 0.25;
export const FREEZE_THAW_CHANCE = 0.2;
export const CONFUSION_SELF_HIT_CHANCE = 0.5;
export const SLEEP_TURNS: [number, number] = [1, 3];
export const CONFUSION_TURNS: [number, number] = [2, 5];

const residual = (pokemon: Combatant, fraction: number, message: string, ctx: StatusContext) => {
	const dmg = Math.max(1, Math.floor(pokemon.maxHP / fraction));
	const dealt = ctx.utils.dealDamage(pokemon, dmg);
	ctx.log(`${pokemon.name} ${message}! (-${dealt} HP)`);
};

export const StatusRules: Record<StatusId, StatusRule> = {
	burn: {
		id: "burn",
		label: "burned",
		immuneTypes: ["Fire"],
		onEndOfTurn: (pokemon, ctx) => residual(pokemon, 16, "is hurt by its burn", ctx),
		onModifyAtk: (_pokemon, atk, category) => (category === "Physical" ? Math.floor(atk * 0.5) : atk),
	},
	poison: {
		id: "poison",
		label: "poisoned",
		immuneTypes: ["Poison", "Steel"],
		onEndOfTurn: (pokemon, ctx) => residual(pokemon, 8, "is hurt by poison", ctx),
	},
	paralysis: {
		id: "paralysis",
		label: "paralyzed",
		immuneTypes: ["Electric"],
		beforeAction: (pokemon, { rng, log }) => {
			if (rng.next() < PARALYSIS_SKIP_CHANCE) {
				log(`${pokemon.name} is fully paralyzed!`);
				return false;
			}
			return true;
		},
		onModifySpeed: (_pokemon, speed) => Math.floor(speed * 0.5),
	},
	sleep: {
		id: "sleep",
		label: "asleep",
		// Every asleep turn is skipped; the counter only ticks on those turns so a
		// duration of N costs exactly N actions.
		beforeAction: (pokemon, { log }) => {
			if (pokemon.status.id !== "sleep") return true;
			log(`${pokemon.name} is fast asleep!`);
			const turnsLeft = pokemon.status.turnsLeft - 1;
			if (turnsLeft <= 0) {
				pokemon.status = { id: "none" };
				log(`${pokemon.name} woke up!`);
			} else {
				pokemon.status = { id: "sleep", turnsLeft };
			}
			return false;
		},
	},
	freeze: {
		id: "freeze",
		label: "frozen",
		immuneTypes: ["Ice"],
		beforeAction: (pokemon, { log }) => {
			log(`${pokemon.name} is frozen solid!`);
			return false;
		},
		onEndOfTurn: (pokemon, { rng, log }) => {
			if (rng.next() < FREEZE_THAW_CHANCE) {
				pokemon.status = { id: "none" };
				log(`${pokemon.name} thawed out!`);
			}
		},
	},
	confusion: {
		id: "confusion",
		label: "confused",
		beforeAction: (pokemon, { rng, log, utils }) => {
			if (pokemon.status.id !== "confusion") return true;
			let acts = true;
			if (rng.next() < CONFUSION_SELF_HIT_CHANCE) {
				const dealt = utils.dealDamage(pokemon, utils.confusionDamage(pokemon));
				log(`${pokemon.name} hurt itself in its confusion! (-${dealt} HP)`);
				acts = false;
				if (pokemon.currentHP <= 0) return false;
			}
			const turnsLeft = pokemon.status.turnsLeft - 1;
			if (turnsLeft <= 0) {
				pokemon.status = { id: "none" };
				log(`${pokemon.name} snapped out of its confusion!`);
			} else {
				pokemon.status = { id: "confusion", turnsLeft };
			}
			return acts;
		},
	},
};

export function statusRule(status: Status): StatusRule | undefined {
	return status.id === "none" ? undefined : StatusRules[status.id];
}

export function statusLabel(tag: StatusTag): string {
	return tag === "none" ? "healthy" : StatusRules[tag].label;
}

const rollTurns = ([min, max]: [number, number], rng: RandomSource) => min + Math.floor(rng.next() * (max - min + 1));

/** Builds the status value for a fresh infliction, drawing a duration where the status has one. */
export function createStatus(id: StatusId, rng: RandomSource): Status {
	switch (id) {
		case "sleep":
			return { id, turnsLeft: rollTurns(SLEEP_TURNS, rng) };
		case "confusion":
			return { id, turnsLeft: rollTurns(CONFUSION_TURNS, rng) };
		default:
			return { id };
	}
}

/** Whether `id` could take hold on `pokemon` right now. */
export function canInflict(pokemon: Combatant, id: StatusId): boolean {
	if (pokemon.currentHP <= 0 || pokemon.status.id !== "none") return false;
	const immune = StatusRules[id].immuneTypes ?? [];
	return !pokemon.types.some((t) => immune.includes(t));
}

export function inflictStatus(pokemon: Combatant, status: Status): boolean {
	if (status.id === "none" || !canInflict(pokemon, status.id)) return false;
	pokemon.status = status;
	return true;
}

export function runBeforeAction(pokemon: Combatant, ctx: StatusContext): boolean {
	const rule = statusRule(pokemon.status);
	return rule?.beforeAction ? rule.beforeAction(pokemon, ctx) : true;
}

export function runEndOfTurn(pokemon: Combatant, ctx: StatusContext): void {
	const rule = statusRule(pokemon.status);
	if (pokemon.currentHP > 0 && rule?.onEndOfTurn) rule.onEndOfTurn(pokemon, ctx);
}

export function getEffectiveSpeed(pokemon: Combatant): number {
	const rule = statusRule(pokemon.status);
	const speed = pokemon.stats.spe;
	return rule?.onModifySpeed ? rule.onModifySpeed(pokemon, speed) : speed;
}

export function getEffectiveAttack(pokemon: Combatant, category: Category): number {
	const base = category === "Physical" ? pokemon.stats.atk : pokemon.stats.spa;
	const rule = statusRule(pokemon.status);
	return rule?.onModifyAtk ? rule.onModifyAtk(pokemon, base, category) : base;
}
