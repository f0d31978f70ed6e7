// Core data models and interfaces for the battle engine.

export type StatName = "hp" | "atk" | "def" | "spa" | "spd" | "spe";

export type Stats = Record<StatName, number>;

export const STAT_NAMES: readonly StatName[] = ["hp", "atk", "def", "spa", "spd", "spe"];

export const TYPE_NAMES = [
	"Normal",
	"Fire",
	"Water",
	"Electric",
	"Grass",
	"Ice",
	"Fighting",
	"Poison",
	"Ground",
	"Flying",
	"Psychic",
	"Bug",
	"Rock",
	"Ghost",
	"Dragon",
	"Dark",
	"Steel",
	"Fairy",
] as const;

export type TypeName = (typeof TYPE_NAMES)[number];

export const isTypeName = (value: string): value is TypeName =>
	(TYPE_NAMES as readonly string[]).includes(value);

export type Category = "Physical" | "Special" | "Status";

export type StatusId = "burn" | "poison" | "paralysis" | "sleep" | "freeze" | "confusion";

export interface SecondaryEffect {
	status: StatusId;
	chance: number; // percent, 1..100
}

export interface Move {
	id: string;
	name: string;
	type: TypeName;
	category: Category;
	power: number; // 0 for Status
	accuracy: number; // 0..100
	secondary?: SecondaryEffect;
}

export interface PokemonProfile {
	id: string;
	name: string;
	types: TypeName[];
	baseStats: Stats;
	moves: string[]; // ordered move ids
}

// One slot, one status: the variant makes a second concurrent status unrepresentable.
export type Status =
	| { id: "none" }
	| { id: "burn" }
	| { id: "poison" }
	| { id: "paralysis" }
	| { id: "sleep"; turnsLeft: number }
	| { id: "freeze" }
	| { id: "confusion"; turnsLeft: number };

export type StatusTag = Status["id"];

export interface Combatant {
	slot: 1 | 2;
	name: string;
	level: number;
	types: TypeName[];
	stats: Stats; // derived at battle level; stats.hp is max HP
	currentHP: number;
	maxHP: number;
	status: Status;
	moves: Move[];
	profile: PokemonProfile;
}

export type BattlePhase = "init" | "turn-loop" | "resolved";

export type OutcomeReason = "knockout" | "double-knockout" | "turn-limit";

export interface BattleOutcome {
	winner: Combatant | null; // null is a draw
	reason: OutcomeReason;
}

export interface CombatantSnapshot {
	name: string;
	hp: number;
	maxHp: number;
	status: StatusTag;
}

export interface TurnLog {
	turn: number;
	actions: string[];
	combatants: [CombatantSnapshot, CombatantSnapshot];
}

export interface BattleState {
	turn: number;
	phase: BattlePhase;
	combatants: [Combatant, Combatant];
	log: TurnLog[];
	outcome?: BattleOutcome;
}

export type EffectivenessLabel = "no effect" | "not very effective" | "effective" | "super effective";

export interface MoveOutcome {
	hit: boolean;
	damage: number;
	crit: boolean;
	effectiveness: number;
	effectivenessLabel: EffectivenessLabel;
	statusInflicted?: Status;
}

export type LogSink = (msg: string) => void;

export interface EngineUtils {
	dealDamage: (pokemon: Combatant, amount: number) => number; // returns actual damage dealt
	confusionDamage: (pokemon: Combatant) => number;
}

export interface RandomSource {
	/** Uniform draw in [0, 1). */
	next(): number;
}

export const clamp = (n: number, min: number, max: number) => Math.max(min, Math.min(max, n));
