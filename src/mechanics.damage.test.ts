import { describe, it, expect } from "vitest";
import { baseDamage, calcDamage, confusionDamage, stabFor } from "./damage";
import {
	CHARIZARD_STATS,
	defaultStats,
	FLAMETHROWER,
	PIKACHU_STATS,
	QUICK_ATTACK,
	sampleMon,
	TACKLE,
	THUNDERBOLT,
} from "./samples";

const pikachu = () => sampleMon("Pikachu", ["Electric"], PIKACHU_STATS, [THUNDERBOLT, QUICK_ATTACK]);
const charizard = () => sampleMon("Charizard", ["Fire", "Flying"], CHARIZARD_STATS, [FLAMETHROWER], { slot: 2 });

describe("damage formula", () => {
	it("keeps the base unfloored", () => {
		expect(baseDamage(50, 40, 60, 83)).toBeCloseTo(14.7229, 4);
	});

	it("Quick Attack from Pikachu into Charizard: no STAB, neutral, crit 1.5", () => {
		expect(calcDamage(pikachu(), charizard(), QUICK_ATTACK, { crit: true })).toEqual({ damage: 22, effectiveness: 1, stab: 1 });
		expect(calcDamage(pikachu(), charizard(), QUICK_ATTACK, { crit: false }).damage).toBe(14);
	});

	it("applies STAB and super effectiveness", () => {
		expect(calcDamage(pikachu(), charizard(), THUNDERBOLT, { crit: false })).toEqual({ damage: 78, effectiveness: 2, stab: 1.5 });
		expect(calcDamage(charizard(), pikachu(), FLAMETHROWER, { crit: false })).toEqual({ damage: 126, effectiveness: 1, stab: 1.5 });
	});

	it("immunity deals nothing", () => {
		const ghost = sampleMon("Spook", ["Ghost"], defaultStats(), []);
		expect(calcDamage(sampleMon("Mon", ["Normal"], defaultStats(), []), ghost, TACKLE, { crit: true })).toEqual({
			damage: 0,
			effectiveness: 0,
			stab: 1.5,
		});
	});

	it("a hit that lands always deals at least 1", () => {
		const weak = sampleMon("Weakling", ["Fire"], defaultStats({ atk: 5 }), [TACKLE]);
		const wall = sampleMon("Wall", ["Rock", "Steel"], defaultStats({ def: 250 }), []);
		expect(calcDamage(weak, wall, TACKLE, { crit: false })).toEqual({ damage: 1, effectiveness: 0.25, stab: 1 });
	});

	it("burn halves physical damage", () => {
		const user = sampleMon("Brawler", ["Fire"], defaultStats({ atk: 100 }), [TACKLE]);
		const target = sampleMon("Target", ["Water"], defaultStats({ def: 100 }), []);
		expect(calcDamage(user, target, TACKLE, { crit: false }).damage).toBe(19);
		user.status = { id: "burn" };
		expect(calcDamage(user, target, TACKLE, { crit: false }).damage).toBe(10);
	});

	it("STAB only for matching types", () => {
		expect(stabFor(charizard(), FLAMETHROWER)).toBe(1.5);
		expect(stabFor(pikachu(), QUICK_ATTACK)).toBe(1);
	});

	it("confusion self-hit is a typeless 40-power physical hit", () => {
		expect(confusionDamage(sampleMon("Mon", ["Normal"], defaultStats(), []))).toBe(19);
		expect(confusionDamage(sampleMon("Husk", ["Ghost"], defaultStats(), []))).toBe(19);
	});
});
