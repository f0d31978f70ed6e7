import { Combatant, Move, PokemonProfile, Stats, Status, TypeName } from "./types";
import { ExternalDexData } from "./adapters/pokedex-adapter";
import { deriveCombatant } from "./combatant";

// Simple sample dataset shared by the tests

export const TACKLE: Move = {
	id: "tackle",
	name: "Tackle",
	type: "Normal",
	category: "Physical",
	power: 40,
	accuracy: 100,
};

export const QUICK_ATTACK: Move = {
	id: "quickattack",
	name: "Quick Attack",
	type: "Normal",
	category: "Physical",
	power: 40,
	accuracy: 100,
};

export const THUNDERBOLT: Move = {
	id: "thunderbolt",
	name: "Thunderbolt",
	type: "Electric",
	category: "Special",
	power: 90,
	accuracy: 100,
	secondary: { status: "paralysis", chance: 10 },
};

export const FLAMETHROWER: Move = {
	id: "flamethrower",
	name: "Flamethrower",
	type: "Fire",
	category: "Special",
	power: 90,
	accuracy: 100,
	secondary: { status: "burn", chance: 10 },
};

export const EMBER: Move = {
	id: "ember",
	name: "Ember",
	type: "Fire",
	category: "Special",
	power: 40,
	accuracy: 100,
	secondary: { status: "burn", chance: 10 },
};

export const ICE_BEAM: Move = {
	id: "icebeam",
	name: "Ice Beam",
	type: "Ice",
	category: "Special",
	power: 90,
	accuracy: 100,
	secondary: { status: "freeze", chance: 10 },
};

export const POISON_JAB: Move = {
	id: "poisonjab",
	name: "Poison Jab",
	type: "Poison",
	category: "Physical",
	power: 80,
	accuracy: 100,
	secondary: { status: "poison", chance: 30 },
};

export const PSYBEAM: Move = {
	id: "psybeam",
	name: "Psybeam",
	type: "Psychic",
	category: "Special",
	power: 65,
	accuracy: 100,
	secondary: { status: "confusion", chance: 10 },
};

export const SHADOW_BALL: Move = {
	id: "shadowball",
	name: "Shadow Ball",
	type: "Ghost",
	category: "Special",
	power: 80,
	accuracy: 100,
};

export const SPORE_STRIKE: Move = {
	id: "sporestrike",
	name: "Spore Strike",
	type: "Grass",
	category: "Physical",
	power: 20,
	accuracy: 100,
	secondary: { status: "sleep", chance: 100 },
};

export const HYPNOSIS: Move = {
	id: "hypnosis",
	name: "Hypnosis",
	type: "Psychic",
	category: "Status",
	power: 0,
	accuracy: 60,
	secondary: { status: "sleep", chance: 100 },
};

export function defaultStats(overrides: Partial<Stats> = {}): Stats {
	return { hp: 80, atk: 80, def: 80, spa: 80, spd: 80, spe: 80, ...overrides };
}

export function sampleProfile(name: string, types: TypeName[], baseStats: Stats, moves: Move[]): PokemonProfile {
	return { id: name.toLowerCase(), name, types, baseStats, moves: moves.map((m) => m.id) };
}

export function sampleMon(
	name: string,
	types: TypeName[],
	baseStats: Stats,
	moves: Move[],
	opts: { slot?: 1 | 2; status?: Status } = {}
): Combatant {
	const mon = deriveCombatant(sampleProfile(name, types, baseStats, moves), moves, opts.slot ?? 1);
	if (opts.status) mon.status = opts.status;
	return mon;
}

export const PIKACHU_STATS: Stats = { hp: 35, atk: 55, def: 40, spa: 50, spd: 50, spe: 90 };
export const CHARIZARD_STATS: Stats = { hp: 78, atk: 84, def: 78, spa: 109, spd: 85, spe: 100 };

// Raw custom-dex data in the on-disk shape, mixed key styles included
export const SAMPLE_DEX: ExternalDexData = {
	species: {
		pichu: {
			name: "Pichu",
			types: ["Electric"],
			baseStats: { hp: 20, atk: 40, def: 15, spa: 35, spd: 35, spe: 60 },
			moves: ["quickattack"],
		},
		pikachu: {
			name: "Pikachu",
			num: 25,
			types: ["electric"],
			baseStats: { hp: 35, attack: 55, defense: 40, "special-attack": 50, "special-defense": 50, speed: 90 },
			abilities: ["Static", { name: "Lightning Rod", hidden: true }],
			moves: ["Thunderbolt", "quick-attack"],
			evolvesFrom: "Pichu",
		},
		raichu: {
			name: "Raichu",
			types: ["Electric"],
			baseStats: { hp: 60, atk: 90, def: 55, spa: 90, spd: 80, spe: 110 },
			moves: ["thunderbolt"],
			evolvesFrom: "pikachu",
		},
		charizard: {
			name: "Charizard",
			types: ["Fire", "Flying"],
			baseStats: { ...CHARIZARD_STATS },
			moves: ["ember"],
		},
		glitch: {
			name: "Glitch",
			types: ["Normal"],
			baseStats: { hp: 10 },
			moves: [],
		},
		mimic: {
			name: "Mimic",
			types: ["Normal"],
			baseStats: defaultStats(),
			moves: ["nosuchmove"],
		},
	},
	moves: {
		thunderbolt: {
			name: "Thunderbolt",
			type: "Electric",
			category: "Special",
			basePower: 90,
			accuracy: 100,
			secondary: { status: "par", chance: 10 },
		},
		quickattack: { name: "Quick Attack", type: "Normal", category: "Physical", basePower: 40, accuracy: 100 },
		ember: {
			name: "Ember",
			type: "Fire",
			category: "Special",
			basePower: 40,
			accuracy: 100,
			secondary: { status: "brn", chance: 10 },
		},
	},
};
