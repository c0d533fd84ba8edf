/**
 * Decimal: exact fixed-point arithmetic for quoted prices.
 *
 * Immutable, backed by a BigInt scaled by 10^18. Prices are computed as
 * doubles by the pattern models and converted here exactly once, so that
 * rounding to the instrument's digits and adding the spread never pick up
 * binary float noise: `ask - bid` is always exactly `spread * point`.
 */

const PRECISION = 18;
const SCALE = 10n ** BigInt(PRECISION);

/** Largest number of decimal places a Decimal can represent exactly. */
export const MAX_DECIMAL_PLACES = PRECISION;

export class Decimal {
	/** Internal representation: value * 10^18 as BigInt */
	private readonly raw: bigint;

	private constructor(raw: bigint) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			const text = value.toString();
			// toString() switches to exponent notation below 1e-6 and above 1e21
			return Decimal.fromString(text.includes("e") ? value.toFixed(PRECISION) : text);
		}
		return Decimal.fromString(value);
	}

	static zero(): Decimal {
		return new Decimal(0n);
	}

	static one(): Decimal {
		return new Decimal(SCALE);
	}

	/**
	 * 10^exponent, exact for exponents in [-18, 18].
	 * `Decimal.pow10(-5)` is the point size of a 5-digit quote.
	 */
	static pow10(exponent: number): Decimal {
		if (!Number.isInteger(exponent) || exponent < -PRECISION || exponent > PRECISION) {
			throw new Error(`Decimal.pow10: exponent must be an integer in [-18, 18], got ${exponent}`);
		}
		return exponent >= 0
			? new Decimal(SCALE * 10n ** BigInt(exponent))
			: new Decimal(SCALE / 10n ** BigInt(-exponent));
	}

	private static fromString(s: string): Decimal {
		const trimmed = s.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		if (!/^-?(\d+\.?\d*|\.\d+)$/.test(trimmed)) {
			throw new Error(`Decimal.from: invalid decimal "${trimmed}"`);
		}

		const negative = trimmed.startsWith("-");
		const abs = negative ? trimmed.slice(1) : trimmed;
		const dotIdx = abs.indexOf(".");

		let raw: bigint;
		if (dotIdx === -1) {
			raw = BigInt(abs) * SCALE;
		} else {
			const intPart = abs.slice(0, dotIdx) || "0";
			const fracPart = abs.slice(dotIdx + 1);
			const paddedFrac = fracPart.padEnd(PRECISION, "0").slice(0, PRECISION);
			raw = BigInt(intPart) * SCALE + BigInt(paddedFrac);
		}

		return new Decimal(negative ? -raw : raw);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw + other.raw);
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw - other.raw);
	}

	mul(other: Decimal): Decimal {
		return new Decimal((this.raw * other.raw) / SCALE);
	}

	/** Round to `places` decimal places, halves away from zero. */
	round(places: number): Decimal {
		if (!Number.isInteger(places) || places < 0 || places > PRECISION) {
			throw new Error(`Decimal.round: places must be an integer in [0, 18], got ${places}`);
		}
		const factor = 10n ** BigInt(PRECISION - places);
		if (factor === 1n) {
			return this;
		}
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		let quotient = absRaw / factor;
		if ((absRaw % factor) * 2n >= factor) {
			quotient += 1n;
		}
		const rounded = quotient * factor;
		return new Decimal(negative ? -rounded : rounded);
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw === other.raw;
	}

	gt(other: Decimal): boolean {
		return this.raw > other.raw;
	}

	gte(other: Decimal): boolean {
		return this.raw >= other.raw;
	}

	lt(other: Decimal): boolean {
		return this.raw < other.raw;
	}

	lte(other: Decimal): boolean {
		return this.raw <= other.raw;
	}

	// ── Min / Max ──────────────────────────────────────────────────

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return Number(this.toString());
	}

	toString(): string {
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		const intPart = absRaw / SCALE;
		const fracPart = absRaw % SCALE;
		const fracStr = fracPart.toString().padStart(PRECISION, "0").replace(/0+$/, "");
		const prefix = negative ? "-" : "";
		return fracStr.length > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
	}

	/** Fixed-point rendering with `places` decimals, halves rounded away from zero. */
	toFixed(places: number): string {
		const rounded = this.round(places).raw;
		const negative = rounded < 0n;
		const absRaw = negative ? -rounded : rounded;
		const intPart = absRaw / SCALE;
		const fracPart = absRaw % SCALE;
		const fracStr = fracPart.toString().padStart(PRECISION, "0").slice(0, places);
		const prefix = negative ? "-" : "";
		return places > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
