import {
	BattleState,
	Combatant,
	CombatantSnapshot,
	EngineUtils,
	LogSink,
	Move,
	PokemonProfile,
	RandomSource,
	TurnLog,
	clamp,
} from "./types";
import { deriveCombatant } from "./combatant";
import { confusionDamage } from "./damage";
import { describeMove, resolveMove } from "./moves";
import { StatusContext, inflictStatus, runBeforeAction, runEndOfTurn } from "./status";
import { commitAction, orderActions } from "./turn-order";
import { createRandom } from "./rng";
import { InvalidArgumentError } from "./errors";

// Anti-stall guard, not a game rule: a battle still running after this many
// turns is a draw.
export const DEFAULT_MAX_TURNS = 100;

export interface EngineOptions {
	maxTurns?: number;
	seed?: number;
	rng?: RandomSource; // takes precedence over seed
}

export interface CombatantInput {
	profile: PokemonProfile;
	moves: Move[];
}

export interface TurnResult {
	state: BattleState;
	events: string[]; // descriptions emitted this turn
}

export const BATTLE_MECHANICS: readonly string[] = [
	"Type effectiveness calculations",
	"Damage formulas based on stats and move power",
	"Speed-based turn order",
	"Status effects: Burn, Poison, Paralysis, Sleep, Freeze, Confusion",
	"Critical hits and STAB bonuses",
	"Level 50 stat scaling",
];

export class Engine {
	private state?: BattleState;
	private readonly rng: RandomSource;
	readonly maxTurns: number;

	constructor(options: EngineOptions = {}) {
		const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
		if (!Number.isInteger(maxTurns) || maxTurns < 1) {
			throw new InvalidArgumentError(`maxTurns must be a positive integer, got ${maxTurns}`);
		}
		this.maxTurns = maxTurns;
		this.rng = options.rng ?? createRandom(options.seed);
	}

	initializeBattle(first: CombatantInput, second: CombatantInput): BattleState {
		this.state = {
			turn: 0,
			phase: "turn-loop",
			combatants: [deriveCombatant(first.profile, first.moves, 1), deriveCombatant(second.profile, second.moves, 2)],
			log: [],
		};
		return this.state;
	}

	getState(): BattleState {
		if (!this.state) throw new Error("Engine not initialized");
		return this.state;
	}

	processTurn(): TurnResult {
		const state = this.getState();
		if (state.phase === "resolved") throw new Error("Battle already resolved");
		state.turn += 1;
		const events: string[] = [];
		const log: LogSink = (msg) => events.push(msg);
		const ctx: StatusContext = { rng: this.rng, log, utils: this.utils() };
		const [c1, c2] = state.combatants;

		// Both sides commit before speed decides who goes first
		const ordered = orderActions(commitAction(c1, c2), commitAction(c2, c1));

		for (const { actor, target, move } of ordered) {
			if (!runBeforeAction(actor, ctx)) {
				if (actor.currentHP <= 0) {
					log(`${actor.name} fainted!`);
					break;
				}
				continue;
			}
			if (!move) {
				log(`${actor.name} has no attacking moves and struggles helplessly!`);
				continue;
			}
			const outcome = resolveMove(actor, target, move, this.rng);
			const applied = outcome.statusInflicted ? inflictStatus(target, outcome.statusInflicted) : false;
			log(describeMove(actor, target, move, outcome, applied));
			if (target.currentHP <= 0) {
				log(`${target.name} fainted!`);
				break;
			}
		}

		// Residual ticks for whoever is still standing, in slot order
		for (const c of state.combatants) {
			if (c.currentHP <= 0) continue;
			runEndOfTurn(c, ctx);
			if (c.currentHP <= 0) log(`${c.name} fainted!`);
		}

		const entry: TurnLog = {
			turn: state.turn,
			actions: events,
			combatants: [snapshot(c1), snapshot(c2)],
		};
		state.log.push(entry);
		this.checkResolution(state);
		return { state, events };
	}

	run(): BattleState {
		const state = this.getState();
		while (state.phase !== "resolved") this.processTurn();
		return state;
	}

	private checkResolution(state: BattleState) {
		const standing = state.combatants.filter((c) => c.currentHP > 0);
		if (standing.length === 0) {
			state.outcome = { winner: null, reason: "double-knockout" };
		} else if (standing.length === 1) {
			state.outcome = { winner: standing[0], reason: "knockout" };
		} else if (state.turn >= this.maxTurns) {
			state.outcome = { winner: null, reason: "turn-limit" };
		} else {
			return;
		}
		state.phase = "resolved";
	}

	private utils(): EngineUtils {
		return {
			dealDamage: (pokemon, amount) => {
				const before = pokemon.currentHP;
				pokemon.currentHP = clamp(pokemon.currentHP - Math.max(0, Math.floor(amount)), 0, pokemon.maxHP);
				return before - pokemon.currentHP;
			},
			confusionDamage: (pokemon) => confusionDamage(pokemon),
		};
	}
}

function snapshot(c: Combatant): CombatantSnapshot {
	return { name: c.name, hp: c.currentHP, maxHp: c.maxHP, status: c.status.id };
}

export function summarize(state: BattleState, maxTurns: number): string {
	const outcome = state.outcome;
	if (!outcome) return `Battle in progress after ${state.turn} turns`;
	if (outcome.winner) return `${outcome.winner.name} won in ${state.turn} turns`;
	if (outcome.reason === "double-knockout") return `Battle ended in a draw: both Pokemon fainted on turn ${state.turn}`;
	return `Battle ended in a draw after reaching the ${maxTurns}-turn limit`;
}

export default Engine;
