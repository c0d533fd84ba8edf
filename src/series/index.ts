export type { GenerationConfig, PriceRecord, PriceSeries } from "./types.js";
export { Pattern, PATTERNS, isPattern } from "./types.js";

export type { GenerateOptions } from "./generator.js";
export { generateSeries, countSteps, stepIntervalMs, stepOffsetMs } from "./generator.js";

export type { OffsetModel, PatternContext } from "./patterns.js";
export {
	createPatternModel,
	WAVE_CYCLES,
	ZIGZAG_RISE_STEPS,
	ZIGZAG_FALL_STEPS_PER_VOLATILITY,
} from "./patterns.js";

export { SeededRandom, SEED_RANGE, entropySeed } from "./random.js";

export type { QuoteVolumes } from "./volumes.js";
export { quoteVolumes, VOLUME_CEILING } from "./volumes.js";

export {
	validateGenerationConfig,
	generationConfigSchema,
	MAX_DIGITS,
	MAX_DENSITY_PER_MINUTE,
	MAX_PRICE,
	MAX_SPREAD_POINTS,
	MAX_VOLATILITY,
} from "./validate.js";
