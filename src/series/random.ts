/**
 * Seeded pseudo-random stream (mulberry32).
 *
 * Each generation call owns its own instance; there is no shared generator,
 * so concurrent or repeated runs with the same seed are isolated.
 */

import { randomInt } from "node:crypto";

/** Exclusive upper bound of a 32-bit seed. */
export const SEED_RANGE = 0x1_0000_0000;

/** Draw a fresh seed from system entropy. */
export function entropySeed(): number {
	return randomInt(SEED_RANGE);
}

export class SeededRandom {
	readonly seed: number;
	private state: number;

	constructor(seed: number) {
		this.seed = seed;
		this.state = seed | 0;
	}

	/** Next value, uniform in [0, 1). */
	next(): number {
		this.state = (this.state + 0x6d2b79f5) | 0;
		let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / SEED_RANGE;
	}
}
