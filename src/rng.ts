import { RandomSource } from "./types";

/**
 * Linear congruential generator. The same seed always yields the same stream,
 * which is what makes a battle log reproducible.
 */
export class SeededRandom implements RandomSource {
	private seed: number;

	constructor(seed: number) {
		if (!Number.isSafeInteger(seed) || seed < 0) throw new RangeError(`Invalid seed: ${seed}`);
		this.seed = seed % 0xffffffff;
	}

	next(): number {
		this.seed = (this.seed * 1664525 + 1013904223) % 0xffffffff;
		return (this.seed & 0xfffffff) / 0x10000000;
	}
}

export const mathRandom: RandomSource = { next: () => Math.random() };

/**
 * Replays a fixed list of draws, then keeps returning `fallback`.
 * The default fallback of 0.5 hits every accurate move, never crits and never
 * triggers paralysis, confusion, thaw or low-chance secondary rolls.
 */
export class ScriptedRandom implements RandomSource {
	private index = 0;

	constructor(private readonly draws: readonly number[], private readonly fallback = 0.5) {
		for (const d of [...draws, fallback]) {
			if (!(d >= 0 && d < 1)) throw new RangeError(`Scripted draw out of range: ${d}`);
		}
	}

	next(): number {
		return this.index < this.draws.length ? this.draws[this.index++] : this.fallback;
	}

	get consumed(): number {
		return this.index;
	}
}

export function createRandom(seed?: number): RandomSource {
	return seed == null ? mathRandom : new SeededRandom(seed);
}
