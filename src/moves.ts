import { Combatant, Move, MoveOutcome, RandomSource, clamp } from "./types";
import { effectivenessLabel, typeEffectiveness } from "./data/type-chart";
import { CRIT_CHANCE, calcDamage, chooseDefenseStat, stabFor } from "./damage";
import { StatusRules, canInflict, createStatus, getEffectiveAttack } from "./status";

/**
 * Resolves one move against `target` and applies the damage to its HP.
 *
 * Draw order is fixed (accuracy, crit, secondary chance, secondary duration) so
 * that a seeded source replays the same battle. A miss or an immunity stops
 * drawing early.
 */
export function resolveMove(user: Combatant, target: Combatant, move: Move, rng: RandomSource): MoveOutcome {
	const effectiveness = typeEffectiveness(move.type, target.types);
	const label = effectivenessLabel(effectiveness);

	const accuracyRoll = rng.next() * 100;
	if (accuracyRoll >= move.accuracy) {
		return { hit: false, damage: 0, crit: false, effectiveness, effectivenessLabel: label };
	}
	if (effectiveness === 0) {
		return { hit: true, damage: 0, crit: false, effectiveness, effectivenessLabel: label };
	}

	const crit = rng.next() < CRIT_CHANCE;
	const { damage } = calcDamage(user, target, move, { crit });
	target.currentHP = clamp(target.currentHP - damage, 0, target.maxHP);

	const outcome: MoveOutcome = { hit: true, damage, crit, effectiveness, effectivenessLabel: label };
	const secondary = move.secondary;
	if (secondary && canInflict(target, secondary.status) && rng.next() * 100 < secondary.chance) {
		outcome.statusInflicted = createStatus(secondary.status, rng);
	}
	return outcome;
}

export function expectedDamageScore(user: Combatant, target: Combatant, move: Move): number {
	const atk = getEffectiveAttack(user, move.category);
	const def = Math.max(1, chooseDefenseStat(target, move.category));
	return move.power * (move.accuracy / 100) * stabFor(user, move) * typeEffectiveness(move.type, target.types) * (atk / def);
}

/** Highest expected damage wins; ties keep the earlier move. No randomness involved. */
export function chooseMove(user: Combatant, target: Combatant): Move | undefined {
	let best: Move | undefined;
	let bestScore = -Infinity;
	for (const move of user.moves) {
		const score = expectedDamageScore(user, target, move);
		if (score > bestScore) {
			best = move;
			bestScore = score;
		}
	}
	return best;
}

export function describeMove(user: Combatant, target: Combatant, move: Move, outcome: MoveOutcome, statusApplied: boolean): string {
	if (!outcome.hit) return `${user.name} used ${move.name} but it missed!`;
	if (outcome.effectiveness === 0) return `${user.name} used ${move.name} but it had no effect on ${target.name}!`;
	let text = `${user.name} used ${move.name} and dealt ${outcome.damage} damage to ${target.name}`;
	if (outcome.crit) text += " (Critical hit!)";
	if (outcome.effectivenessLabel === "super effective") text += " It's super effective!";
	else if (outcome.effectivenessLabel === "not very effective") text += " It's not very effective...";
	if (statusApplied && outcome.statusInflicted && outcome.statusInflicted.id !== "none") {
		text += ` ${target.name} is now ${StatusRules[outcome.statusInflicted.id].label}!`;
	}
	return text;
}
