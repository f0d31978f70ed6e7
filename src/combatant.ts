import { Combatant, Move, PokemonProfile, STAT_NAMES, Stats, isTypeName } from "./types";
import { DataIntegrityError } from "./errors";

export const BATTLE_LEVEL = 50;
export const MAX_BATTLE_MOVES = 4;

export function scaleStat(base: number, level = BATTLE_LEVEL): number {
	return Math.floor((2 * base * level) / 100) + 5;
}

export function scaleHP(base: number, level = BATTLE_LEVEL): number {
	return Math.floor((2 * base * level) / 100) + level + 5;
}

function validateProfile(profile: PokemonProfile): void {
	for (const stat of STAT_NAMES) {
		const value = profile.baseStats[stat];
		if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
			throw new DataIntegrityError(`${profile.name} is missing base stat "${stat}"`);
		}
	}
	if (profile.types.length < 1 || profile.types.length > 2) {
		throw new DataIntegrityError(`${profile.name} must have one or two types, has ${profile.types.length}`);
	}
	for (const t of profile.types) {
		if (!isTypeName(t)) throw new DataIntegrityError(`${profile.name} has unknown type "${t}"`);
	}
}

export const isDamaging = (move: Move) => move.category !== "Status" && move.power > 0;

/** First four damage-dealing moves, in the profile's order. */
export function battleMovePool(moves: readonly Move[]): Move[] {
	return moves.filter(isDamaging).slice(0, MAX_BATTLE_MOVES);
}

export function deriveStats(base: Stats, level = BATTLE_LEVEL): Stats {
	return {
		hp: scaleHP(base.hp, level),
		atk: scaleStat(base.atk, level),
		def: scaleStat(base.def, level),
		spa: scaleStat(base.spa, level),
		spd: scaleStat(base.spd, level),
		spe: scaleStat(base.spe, level),
	};
}

export function deriveCombatant(profile: PokemonProfile, moves: readonly Move[], slot: 1 | 2 = 1): Combatant {
	validateProfile(profile);
	const stats = deriveStats(profile.baseStats);
	return {
		slot,
		name: profile.name,
		level: BATTLE_LEVEL,
		types: [...profile.types],
		stats,
		currentHP: stats.hp,
		maxHP: stats.hp,
		status: { id: "none" },
		moves: battleMovePool(moves),
		profile,
	};
}
