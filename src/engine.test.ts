import { describe, it, expect } from "vitest";
import Engine, { CombatantInput, summarize } from "./engine";
import { Move, Stats, TypeName } from "./types";
import { ScriptedRandom } from "./rng";
import { InvalidArgumentError } from "./errors";
import {
	CHARIZARD_STATS,
	defaultStats,
	EMBER,
	HYPNOSIS,
	PIKACHU_STATS,
	QUICK_ATTACK,
	sampleProfile,
	TACKLE,
	THUNDERBOLT,
} from "./samples";

function input(name: string, types: TypeName[], stats: Stats, moves: Move[]): CombatantInput {
	return { profile: sampleProfile(name, types, stats, moves), moves };
}

const PIKACHU = input("Pikachu", ["Electric"], PIKACHU_STATS, [THUNDERBOLT, QUICK_ATTACK]);
const CHARIZARD = input("Charizard", ["Fire", "Flying"], CHARIZARD_STATS, [EMBER]);

describe("Engine", () => {
	it("Pikachu vs Charizard: Charizard moves first and wins in two turns", () => {
		const engine = new Engine({ rng: new ScriptedRandom([]) });
		engine.initializeBattle(PIKACHU, CHARIZARD);

		const first = engine.processTurn();
		expect(first.events).toEqual([
			"Charizard used Ember and dealt 57 damage to Pikachu",
			"Pikachu used Thunderbolt and dealt 78 damage to Charizard It's super effective!",
		]);
		expect(first.state.log[0].combatants).toEqual([
			{ name: "Pikachu", hp: 33, maxHp: 90, status: "none" },
			{ name: "Charizard", hp: 55, maxHp: 133, status: "none" },
		]);
		expect(first.state.phase).toBe("turn-loop");

		const second = engine.processTurn();
		expect(second.events).toEqual(["Charizard used Ember and dealt 57 damage to Pikachu", "Pikachu fainted!"]);
		const state = second.state;
		expect(state.phase).toBe("resolved");
		expect(state.outcome?.reason).toBe("knockout");
		expect(state.outcome?.winner?.name).toBe("Charizard");
		expect(summarize(state, engine.maxTurns)).toBe("Charizard won in 2 turns");
		expect(() => engine.processTurn()).toThrow("Battle already resolved");
	});

	it("the same seed replays the same battle", () => {
		const play = () => {
			const engine = new Engine({ seed: 1234 });
			engine.initializeBattle(PIKACHU, CHARIZARD);
			return engine.run();
		};
		const a = play();
		const b = play();
		expect(a.log).toEqual(b.log);
		expect(a.outcome?.winner?.name).toBe(b.outcome?.winner?.name);
	});

	it("sleep of two turns skips two actions, then the sleeper acts", () => {
		const engine = new Engine({ rng: new ScriptedRandom([]) });
		const state = engine.initializeBattle(
			input("Sleeper", ["Normal"], defaultStats({ spe: 100 }), [TACKLE]),
			input("Waker", ["Normal"], defaultStats(), [TACKLE])
		);
		state.combatants[0].status = { id: "sleep", turnsLeft: 2 };

		expect(engine.processTurn().events).toEqual([
			"Sleeper is fast asleep!",
			"Waker used Tackle and dealt 29 damage to Sleeper",
		]);
		expect(engine.processTurn().events).toEqual([
			"Sleeper is fast asleep!",
			"Sleeper woke up!",
			"Waker used Tackle and dealt 29 damage to Sleeper",
		]);
		expect(engine.processTurn().events).toEqual([
			"Sleeper used Tackle and dealt 29 damage to Waker",
			"Waker used Tackle and dealt 29 damage to Sleeper",
		]);
		expect(state.combatants.map((c) => c.currentHP)).toEqual([135 - 87, 135 - 29]);
	});

	it("a confusion self-hit that faints ends the turn", () => {
		const engine = new Engine({ rng: new ScriptedRandom([0.1]) });
		const state = engine.initializeBattle(
			input("Dizzy", ["Normal"], defaultStats({ spe: 100 }), [TACKLE]),
			input("Steady", ["Normal"], defaultStats(), [TACKLE])
		);
		state.combatants[0].status = { id: "confusion", turnsLeft: 3 };
		state.combatants[0].currentHP = 1;

		expect(engine.processTurn().events).toEqual(["Dizzy hurt itself in its confusion! (-1 HP)", "Dizzy fainted!"]);
		expect(state.outcome).toMatchObject({ reason: "knockout", winner: { name: "Steady" } });
		expect(state.combatants[1].currentHP).toBe(135);
	});

	it("the survivor of a knock-out still takes its residual", () => {
		const engine = new Engine({ rng: new ScriptedRandom([]) });
		const state = engine.initializeBattle(
			input("Striker", ["Normal"], defaultStats({ spe: 100 }), [TACKLE]),
			input("Frail", ["Normal"], defaultStats(), [TACKLE])
		);
		state.combatants[0].status = { id: "burn" };
		state.combatants[1].currentHP = 5;

		expect(engine.processTurn().events).toEqual([
			"Striker used Tackle and dealt 16 damage to Frail",
			"Frail fainted!",
			"Striker is hurt by its burn! (-8 HP)",
		]);
		expect(state.combatants[0].currentHP).toBe(127);
		expect(state.outcome).toMatchObject({ reason: "knockout", winner: { name: "Striker" } });
	});

	it("a survivor that falls to its residual makes the knock-out a draw", () => {
		const engine = new Engine({ rng: new ScriptedRandom([]) });
		const state = engine.initializeBattle(
			input("Striker", ["Normal"], defaultStats({ spe: 100 }), [TACKLE]),
			input("Frail", ["Normal"], defaultStats(), [TACKLE])
		);
		state.combatants[0].status = { id: "burn" };
		state.combatants[0].currentHP = 3;
		state.combatants[1].currentHP = 5;

		expect(engine.processTurn().events).toEqual([
			"Striker used Tackle and dealt 16 damage to Frail",
			"Frail fainted!",
			"Striker is hurt by its burn! (-3 HP)",
			"Striker fainted!",
		]);
		expect(state.combatants.map((c) => c.currentHP)).toEqual([0, 0]);
		expect(state.outcome).toEqual({ winner: null, reason: "double-knockout" });
	});

	it("combatants without attacking moves draw at the turn limit", () => {
		const engine = new Engine({ maxTurns: 3, rng: new ScriptedRandom([]) });
		engine.initializeBattle(input("Drowsy", ["Psychic"], defaultStats(), [HYPNOSIS]), input("Idle", ["Normal"], defaultStats(), []));
		const state = engine.run();
		expect(state.turn).toBe(3);
		expect(state.log).toHaveLength(3);
		expect(state.log[2].actions).toEqual([
			"Drowsy has no attacking moves and struggles helplessly!",
			"Idle has no attacking moves and struggles helplessly!",
		]);
		expect(state.outcome).toEqual({ winner: null, reason: "turn-limit" });
		expect(summarize(state, engine.maxTurns)).toBe("Battle ended in a draw after reaching the 3-turn limit");
	});

	it("both fainting to residuals is a draw", () => {
		const engine = new Engine({ rng: new ScriptedRandom([]) });
		const state = engine.initializeBattle(input("Left", ["Normal"], defaultStats(), []), input("Right", ["Normal"], defaultStats(), []));
		for (const c of state.combatants) {
			c.status = { id: "poison" };
			c.currentHP = 10;
		}
		expect(engine.processTurn().events).toEqual([
			"Left has no attacking moves and struggles helplessly!",
			"Right has no attacking moves and struggles helplessly!",
			"Left is hurt by poison! (-10 HP)",
			"Left fainted!",
			"Right is hurt by poison! (-10 HP)",
			"Right fainted!",
		]);
		expect(state.outcome).toEqual({ winner: null, reason: "double-knockout" });
		expect(summarize(state, engine.maxTurns)).toBe("Battle ended in a draw: both Pokemon fainted on turn 1");
	});

	it("a secondary aimed at an afflicted combatant is neither rolled nor applied", () => {
		// Scorch's accuracy and crit draws, then Stiff's paralysis gate
		const rng = new ScriptedRandom([0.5, 0.5, 0.01]);
		const engine = new Engine({ rng });
		const state = engine.initializeBattle(
			input("Scorch", ["Fire"], defaultStats({ spe: 100 }), [EMBER]),
			input("Stiff", ["Normal"], defaultStats(), [TACKLE])
		);
		state.combatants[1].status = { id: "paralysis" };

		expect(engine.processTurn().events).toEqual([
			"Scorch used Ember and dealt 29 damage to Stiff",
			"Stiff is fully paralyzed!",
		]);
		expect(rng.consumed).toBe(3);
		expect(state.combatants[1].status).toEqual({ id: "paralysis" });
		expect(state.log[0].combatants[1]).toEqual({ name: "Stiff", hp: 106, maxHp: 135, status: "paralysis" });
	});

	it("rejects a non-positive turn limit", () => {
		expect(() => new Engine({ maxTurns: 0 })).toThrow(InvalidArgumentError);
	});

	it("requires initialization", () => {
		expect(() => new Engine().processTurn()).toThrow("Engine not initialized");
	});
});
