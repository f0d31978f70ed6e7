import { Combatant, Move } from "./types";
import { getEffectiveSpeed } from "./status";
import { chooseMove } from "./moves";

export interface CommittedAction {
	actor: Combatant;
	target: Combatant;
	move?: Move; // undefined when the actor has nothing to attack with
}

export function commitAction(actor: Combatant, target: Combatant): CommittedAction {
	return { actor, target, move: chooseMove(actor, target) };
}

export function compareActions(a: CommittedAction, b: CommittedAction): number {
	const speA = getEffectiveSpeed(a.actor);
	const speB = getEffectiveSpeed(b.actor);
	if (speA !== speB) return speB - speA; // faster first
	// Exact tie: slot 1 moves first
	return a.actor.slot - b.actor.slot;
}

export function orderActions(a: CommittedAction, b: CommittedAction): [CommittedAction, CommittedAction] {
	return compareActions(a, b) <= 0 ? [a, b] : [b, a];
}
