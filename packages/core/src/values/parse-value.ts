import { Either } from "effect";
import { ValueParseError } from "../errors/codec-errors.js";
import {
	type Color,
	type Complex,
	type Rectangle,
	ValueKind,
} from "../schema/value-kind.js";

// ============================================================================
// Value Parsers
// ============================================================================
//
// Each parser takes the trimmed (or untrimmed, for composite parts) text of
// a value and returns Either the typed value or a ValueParseError carrying
// the reason. Callers wrap the error with key/line context.

export type UintKind =
	| typeof ValueKind.Uint
	| typeof ValueKind.Uint8
	| typeof ValueKind.Uint16
	| typeof ValueKind.Uint32;

export type FloatKind = typeof ValueKind.Float32 | typeof ValueKind.Float64;

export type ComplexKind =
	| typeof ValueKind.Complex64
	| typeof ValueKind.Complex128;

const reasonMessages: Record<ValueParseError["reason"], string> = {
	syntax: "invalid syntax",
	range: "value out of range",
	parts: "invalid number of parts",
};

const fail = (
	input: string,
	kind: ValueKind,
	reason: ValueParseError["reason"],
): Either.Either<never, ValueParseError> =>
	Either.left(
		new ValueParseError({
			input,
			kind,
			reason,
			message: reasonMessages[reason],
		}),
	);

const SIGNED_DECIMAL = /^[+-]?\d+$/;
const UNSIGNED_DECIMAL = /^\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const HEX_FLOAT_LITERAL =
	/^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)$/;
const INFINITY_LITERAL = /^([+-]?)(inf|infinity)$/i;
const NAN_LITERAL = /^nan$/i;

const uintMax: Record<UintKind, number> = {
	uint: Number.MAX_SAFE_INTEGER,
	uint8: 0xff,
	uint16: 0xffff,
	uint32: 0xffffffff,
};

const UINT64_MAX = 2n ** 64n - 1n;

/**
 * Base-10 signed integer with an optional sign. Bounded by the safe-integer
 * range; anything wider is a range error.
 */
export const parseInteger = (
	input: string,
	kind: ValueKind = ValueKind.Int,
): Either.Either<number, ValueParseError> => {
	if (!SIGNED_DECIMAL.test(input)) {
		return fail(input, kind, "syntax");
	}
	const value = Number(input);
	if (!Number.isSafeInteger(value)) {
		return fail(input, kind, "range");
	}
	return Either.right(value);
};

/**
 * Base-10 unsigned integer sized to the kind's bit width. No sign is
 * accepted, not even `+`.
 */
export const parseUnsigned = (
	input: string,
	kind: UintKind,
): Either.Either<number, ValueParseError> => {
	if (!UNSIGNED_DECIMAL.test(input)) {
		return fail(input, kind, "syntax");
	}
	const value = Number(input);
	if (value > uintMax[kind]) {
		return fail(input, kind, "range");
	}
	return Either.right(value);
};

export const parseUnsigned64 = (
	input: string,
): Either.Either<bigint, ValueParseError> => {
	if (!UNSIGNED_DECIMAL.test(input)) {
		return fail(input, ValueKind.Uint64, "syntax");
	}
	const value = BigInt(input);
	if (value > UINT64_MAX) {
		return fail(input, ValueKind.Uint64, "range");
	}
	return Either.right(value);
};

const trueLiterals = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const falseLiterals = new Set(["0", "f", "F", "FALSE", "false", "False"]);

export const parseBool = (
	input: string,
): Either.Either<boolean, ValueParseError> => {
	if (trueLiterals.has(input)) {
		return Either.right(true);
	}
	if (falseLiterals.has(input)) {
		return Either.right(false);
	}
	return fail(input, ValueKind.Bool, "syntax");
};

/**
 * Multiplies by 2^exponent in steps, so a large mantissa with a very
 * negative exponent does not underflow before it is scaled.
 */
const scaleByPowerOfTwo = (value: number, exponent: number): number => {
	let result = value;
	let remaining = exponent;
	while (remaining !== 0 && result !== 0 && Number.isFinite(result)) {
		const step = Math.max(-1000, Math.min(1000, remaining));
		result *= 2 ** step;
		remaining -= step;
	}
	return result;
};

/**
 * Hexadecimal mantissa with a mandatory binary exponent, as in `0x1.8p3`.
 */
const parseHexFloat = (match: RegExpExecArray): number => {
	const [, sign, whole, fraction = "", exponent] = match;
	const digits = `${whole}${fraction}`;
	const mantissa = Number(BigInt(`0x${digits}`));
	const value = scaleByPowerOfTwo(
		mantissa,
		Number(exponent) - 4 * fraction.length,
	);
	return sign === "-" ? -value : value;
};

/**
 * Decimal, exponential or hexadecimal (`0x1p-2`) float, plus `inf`,
 * `infinity` and `nan` in any case. A finite literal that overflows the
 * kind's precision is a range error; float32 values are rounded to single
 * precision.
 */
export const parseFloating = (
	input: string,
	kind: FloatKind,
): Either.Either<number, ValueParseError> => {
	const infinity = INFINITY_LITERAL.exec(input);
	if (infinity !== null) {
		return Either.right(
			infinity[1] === "-"
				? Number.NEGATIVE_INFINITY
				: Number.POSITIVE_INFINITY,
		);
	}
	if (NAN_LITERAL.test(input)) {
		return Either.right(Number.NaN);
	}
	const hex = HEX_FLOAT_LITERAL.exec(input);
	if (hex !== null && `${hex[2]}${hex[3] ?? ""}`.length === 0) {
		return fail(input, kind, "syntax");
	}
	if (hex === null && !FLOAT_LITERAL.test(input)) {
		return fail(input, kind, "syntax");
	}

	const parsed = hex === null ? Number(input) : parseHexFloat(hex);
	const value = kind === ValueKind.Float32 ? Math.fround(parsed) : parsed;
	if (!Number.isFinite(value)) {
		return fail(input, kind, "range");
	}
	return Either.right(value);
};

/**
 * Finds where the imaginary part starts: the last sign that is neither the
 * first character nor part of a decimal or binary exponent.
 */
const findImaginaryStart = (body: string): number => {
	for (let i = body.length - 1; i > 0; i--) {
		const char = body[i];
		if ((char === "+" || char === "-") && !/[eEpP]/.test(body[i - 1])) {
			return i;
		}
	}
	return -1;
};

const parseImaginary = (
	text: string,
	kind: FloatKind,
): Either.Either<number, ValueParseError> => {
	if (text === "" || text === "+") {
		return Either.right(1);
	}
	if (text === "-") {
		return Either.right(-1);
	}
	return parseFloating(text, kind);
};

/**
 * Complex number in `a`, `bi` or `a±bi` form, optionally parenthesised.
 * Each part has half the complex kind's width.
 */
export const parseComplex = (
	input: string,
	kind: ComplexKind,
): Either.Either<Complex, ValueParseError> => {
	const partKind: FloatKind =
		kind === ValueKind.Complex64 ? ValueKind.Float32 : ValueKind.Float64;
	const text =
		input.length >= 2 && input.startsWith("(") && input.endsWith(")")
			? input.slice(1, -1)
			: input;

	const retag = (error: ValueParseError) => fail(input, kind, error.reason);

	if (!text.endsWith("i")) {
		return Either.match(parseFloating(text, partKind), {
			onLeft: retag,
			onRight: (real) => Either.right({ real, imag: 0 }),
		});
	}

	const body = text.slice(0, -1);
	const split = findImaginaryStart(body);
	const realText = split === -1 ? "0" : body.slice(0, split);
	const imagText = split === -1 ? body : body.slice(split);

	return Either.match(parseFloating(realText, partKind), {
		onLeft: retag,
		onRight: (real) =>
			Either.match(parseImaginary(imagText, partKind), {
				onLeft: retag,
				onRight: (imag) => Either.right({ real, imag }),
			}),
	});
};

/**
 * Splits a composite value into exactly four integers. Parts are not
 * trimmed, so `1, 2, 3, 4` is a syntax error.
 */
const parseQuad = (
	input: string,
	kind: ValueKind,
): Either.Either<[number, number, number, number], ValueParseError> => {
	const parts = input.split(",");
	if (parts.length !== 4) {
		return fail(input, kind, "parts");
	}

	const values: Array<number> = [];
	for (const part of parts) {
		const parsed = parseInteger(part, kind);
		if (Either.isLeft(parsed)) {
			return fail(input, kind, parsed.left.reason);
		}
		values.push(parsed.right);
	}
	const [a, b, c, d] = values;
	const quad: [number, number, number, number] = [a, b, c, d];
	return Either.right(quad);
};

export const parseRectangle = (
	input: string,
): Either.Either<Rectangle, ValueParseError> =>
	Either.map(
		parseQuad(input, ValueKind.Rectangle),
		([minX, minY, maxX, maxY]) => ({
			min: { x: minX, y: minY },
			max: { x: maxX, y: maxY },
		}),
	);

/**
 * Channels keep their low 8 bits, so `256` wraps to `0` and `-1` to `255`.
 */
export const parseColor = (
	input: string,
): Either.Either<Color, ValueParseError> =>
	Either.map(parseQuad(input, ValueKind.Color), ([r, g, b, a]) => ({
		r: r & 0xff,
		g: g & 0xff,
		b: b & 0xff,
		a: a & 0xff,
	}));
