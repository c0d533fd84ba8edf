/**
 * Synthetic quote volumes.
 *
 * Volumes carry no market meaning. They depend only on the timestamp and
 * the spread, so a replayed series repeats them exactly.
 */

/** Bid volumes stay below this ceiling minus the spread. */
export const VOLUME_CEILING = 1_000;

export interface QuoteVolumes {
	readonly bidVolume: number;
	readonly askVolume: number;
}

function mod(value: number, modulus: number): number {
	return ((value % modulus) + modulus) % modulus;
}

export function quoteVolumes(timestampMs: number, spreadPoints: number): QuoteVolumes {
	const seconds = timestampMs / 1_000;
	const minute = Math.trunc(seconds / 60);
	const divisor = mod(minute, 1_000) + 1;
	const modulus = Math.max(VOLUME_CEILING - spreadPoints, 1);
	const bidVolume = Math.floor(mod(seconds / divisor, modulus));
	return { bidVolume, askVolume: bidVolume + spreadPoints };
}
