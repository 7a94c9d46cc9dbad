import type { Color, Point, Rectangle } from "../schema/value-kind.js";

// ============================================================================
// Runtime guards
// ============================================================================

export const isInteger = (value: unknown): value is number =>
	typeof value === "number" && Number.isSafeInteger(value);

export const isUnsigned = (value: unknown): value is number =>
	isInteger(value) && value >= 0;

const isPoint = (value: unknown): value is Point =>
	typeof value === "object" &&
	value !== null &&
	"x" in value &&
	"y" in value &&
	isInteger(value.x) &&
	isInteger(value.y);

export const isRectangle = (value: unknown): value is Rectangle =>
	typeof value === "object" &&
	value !== null &&
	"min" in value &&
	"max" in value &&
	isPoint(value.min) &&
	isPoint(value.max);

export const isColor = (value: unknown): value is Color =>
	typeof value === "object" &&
	value !== null &&
	"r" in value &&
	"g" in value &&
	"b" in value &&
	"a" in value &&
	isInteger(value.r) &&
	isInteger(value.g) &&
	isInteger(value.b) &&
	isInteger(value.a);

// ============================================================================
// Formatters
// ============================================================================

export const formatBool = (value: boolean): string =>
	value ? "true" : "false";

/**
 * Rounds to six fractional digits, resolving exact ties to the even digit.
 * toFixed breaks ties away from zero. A tie is a double whose exact
 * expansion ends in 5 at the seventh fractional digit, which toFixed(100)
 * shows exactly.
 */
const toFixedHalfEven = (value: number): string => {
	const exact = value.toFixed(100);
	const point = exact.indexOf(".");
	const beyond = exact.slice(point + 7);
	if (/^50*$/.test(beyond) && Number(exact[point + 6]) % 2 === 0) {
		return exact.slice(0, point + 7);
	}
	return value.toFixed(6);
};

/**
 * Fixed-point with six fractional digits, never exponential. Negative zero
 * keeps its sign.
 *
 * @example
 * ```typescript
 * formatFloat64(1.5)     // "1.500000"
 * formatFloat64(0.0078125) // "0.007812"
 * formatFloat64(1e21)    // "1000000000000000000000.000000"
 * formatFloat64(-Infinity) // "-Inf"
 * ```
 */
export const formatFloat64 = (value: number): string => {
	if (Number.isNaN(value)) {
		return "NaN";
	}
	if (value === Number.POSITIVE_INFINITY) {
		return "+Inf";
	}
	if (value === Number.NEGATIVE_INFINITY) {
		return "-Inf";
	}
	// toFixed switches to exponent notation from 1e21 on; such doubles are
	// integral, so BigInt prints them exactly.
	if (Math.abs(value) >= 1e21) {
		return `${BigInt(value).toString()}.000000`;
	}
	if (Object.is(value, -0)) {
		return "-0.000000";
	}
	return toFixedHalfEven(value);
};

export const formatRectangle = ({ min, max }: Rectangle): string =>
	`${min.x},${min.y},${max.x},${max.y}`;

/**
 * Channels are written as given; the 0-255 range is not checked.
 */
export const formatColor = ({ r, g, b, a }: Color): string =>
	`${r},${g},${b},${a}`;
