/**
 * Pattern models: the deviation of each step from the straight trend line.
 *
 * A model is built once per run and then called for steps 0..N-1 in order.
 * Every model returns 0 at step 0. `none`, `curve`, `random` and `zigzag`
 * return exactly 0 at the last step, so those series end at endPrice;
 * `wave` ends on the trend line only within float error of sin(3π).
 */

import type { SeededRandom } from "./random.js";
import { Pattern } from "./types.js";

/** Full cycles of the `wave` sinusoid across a run. */
export const WAVE_CYCLES = 1.5;
/** Steps of each rising leg of `zigzag`. */
export const ZIGZAG_RISE_STEPS = 500;
/** Steps of each falling leg of `zigzag` per unit of volatility. */
export const ZIGZAG_FALL_STEPS_PER_VOLATILITY = 50;

/** Inputs shared by all pattern models. */
export interface PatternContext {
	/** Number of steps N in the run. */
	readonly steps: number;
	readonly startPrice: number;
	readonly endPrice: number;
	readonly volatility: number;
	/** Magnitude of the per-step trend increment, or one point for a flat trend. */
	readonly unit: number;
	/** Stream consumed by `random`, one draw per step after the first. */
	readonly random: SeededRandom;
}

/** Offset to add to the trend-line price at a step. */
export type OffsetModel = (step: number, baseline: number) => number;

const flat: OffsetModel = () => 0;

/** Build the offset model for a pattern. Stateful models must be called once per step, in order. */
export function createPatternModel(pattern: Pattern, ctx: PatternContext): OffsetModel {
	switch (pattern) {
		case Pattern.None:
			return flat;
		case Pattern.Curve:
			return curveModel(ctx);
		case Pattern.Random:
			return randomWalkModel(ctx);
		case Pattern.Wave:
			return waveModel(ctx);
		case Pattern.Zigzag:
			return zigzagModel(ctx);
		default: {
			const unreachable: never = pattern;
			throw new Error(`Unhandled pattern: ${String(unreachable)}`);
		}
	}
}

/**
 * Exponential easing from startPrice to endPrice:
 * f(i) = (e^(k i) - 1) / (e^(k c) - 1), k = volatility / N, c = N - 1.
 * Evaluated as e^(k (i - c)) (1 - e^(-k i)) / (1 - e^(-k c)) to stay finite for large k.
 */
function curveModel({ steps, startPrice, endPrice, volatility }: PatternContext): OffsetModel {
	const last = steps - 1;
	const k = volatility / steps;
	if (last <= 0 || k === 0) return flat;

	const delta = endPrice - startPrice;
	const denominator = -Math.expm1(-k * last);
	return (step) => {
		const eased = (Math.exp(k * (step - last)) * -Math.expm1(-k * step)) / denominator;
		return (eased - step / last) * delta;
	};
}

/** Random walk around the trend, pinned to the trend line at both ends. */
function randomWalkModel({ steps, unit, volatility, random }: PatternContext): OffsetModel {
	const last = steps - 1;
	let walk = 0;
	return (step) => {
		if (step === 0) return 0;
		const draw = random.next();
		if (step === last) return 0;
		walk += unit * (draw - 0.5) * volatility;
		return walk;
	};
}

/** Sinusoid with amplitude `volatility` (price units); negative prices are reflected above zero. */
function waveModel({ steps, volatility }: PatternContext): OffsetModel {
	const last = steps - 1;
	if (last <= 0) return flat;

	return (step, baseline) => {
		const offset = volatility * Math.sin((2 * Math.PI * WAVE_CYCLES * step) / last);
		const price = baseline + offset;
		return price < 0 ? -price - baseline : offset;
	};
}

/**
 * Asymmetric triangle wave riding the trend: ZIGZAG_RISE_STEPS up, then
 * trunc(volatility * ZIGZAG_FALL_STEPS_PER_VOLATILITY) down, peaking at
 * 2 * fall * unit. The last `fall` steps decay linearly back to the trend.
 */
function zigzagModel({ steps, startPrice, endPrice, volatility, unit }: PatternContext): OffsetModel {
	const last = steps - 1;
	const fall = Math.trunc(volatility * ZIGZAG_FALL_STEPS_PER_VOLATILITY);
	if (last <= 0 || fall === 0) return flat;

	const rise = ZIGZAG_RISE_STEPS;
	const cycle = rise + fall;
	const direction = endPrice < startPrice ? -1 : 1;
	const peak = 2 * fall * unit * direction;

	const body = (step: number): number => {
		const phase = step % cycle;
		return phase < rise ? (peak * phase) / rise : (peak * (cycle - phase)) / fall;
	};

	const tailStart = Math.max(0, last - fall);
	const tailFrom = body(tailStart);
	return (step) =>
		step <= tailStart ? body(step) : (tailFrom * (last - step)) / (last - tailStart);
}
