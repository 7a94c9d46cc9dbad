import { Effect, Option } from "effect";
import { InvalidValueError } from "../errors/codec-errors.js";
import type { EncodeError } from "../errors/index.js";
import { WriteError } from "../errors/io-errors.js";
import { type ConfigSink, makeMemorySink } from "../io/sink-source.js";
import {
	type ConfigRecord,
	type ConfigSchema,
	extractFields,
	type FieldDescriptor,
	type Fields,
	readField,
} from "../schema/config-schema.js";
import { ValueKind } from "../schema/value-kind.js";
import {
	formatBool,
	formatColor,
	formatFloat64,
	formatRectangle,
	isColor,
	isInteger,
	isRectangle,
	isUnsigned,
} from "../values/format-value.js";
import { type FallbackHook, rejectKind } from "./fallback.js";

// ============================================================================
// Encode capability table
// ============================================================================

/**
 * Formats a record value, or yields none when its runtime type does not
 * fit the kind.
 */
type Formatter = (value: unknown) => Option.Option<string>;

/**
 * Kinds the encoder can write. float32, the complex kinds and the sized
 * unsigned kinds are deliberately absent.
 */
const encodeFormatters: Partial<Record<ValueKind, Formatter>> = {
	[ValueKind.Int]: (value) =>
		isInteger(value) ? Option.some(String(value)) : Option.none(),
	[ValueKind.Uint]: (value) =>
		isUnsigned(value) ? Option.some(String(value)) : Option.none(),
	[ValueKind.String]: (value) =>
		typeof value === "string" ? Option.some(value) : Option.none(),
	[ValueKind.Bool]: (value) =>
		typeof value === "boolean" ? Option.some(formatBool(value)) : Option.none(),
	[ValueKind.Float64]: (value) =>
		typeof value === "number" ? Option.some(formatFloat64(value)) : Option.none(),
	[ValueKind.Rectangle]: (value) =>
		isRectangle(value) ? Option.some(formatRectangle(value)) : Option.none(),
	[ValueKind.Color]: (value) =>
		isColor(value) ? Option.some(formatColor(value)) : Option.none(),
};

export const canEncode = (kind: ValueKind): boolean =>
	encodeFormatters[kind] !== undefined;

// ============================================================================
// Encoder
// ============================================================================

export interface EncoderOptions {
	/** Observes values of kinds the encoder cannot write */
	readonly fallback?: FallbackHook;
}

export interface Encoder {
	/**
	 * Writes one `key = value` line per schema field, in declaration order.
	 * Stops at the first failure; lines already written stay written.
	 */
	readonly encode: <F extends Fields>(
		schema: ConfigSchema<F>,
		record: ConfigRecord<F>,
	) => Effect.Effect<void, EncodeError>;
}

const encodeField = (
	sink: ConfigSink,
	field: FieldDescriptor,
	value: unknown,
	fallback: FallbackHook | undefined,
): Effect.Effect<void, EncodeError> => {
	const format = encodeFormatters[field.kind];
	if (format === undefined) {
		return rejectKind(field, value, "encode", fallback);
	}

	return Option.match(format(value), {
		onNone: () =>
			Effect.fail(
				new InvalidValueError({
					key: field.externalKey,
					kind: field.kind,
					message: `value of ${field.externalKey} is not a valid ${field.kind}`,
				}),
			),
		onSome: (text) =>
			sink.write(`${field.externalKey} = ${text}\n`).pipe(
				Effect.mapError(
					(cause) =>
						new WriteError({
							key: field.externalKey,
							kind: field.kind,
							message: `write ${field.externalKey} ${field.kind}: ${cause.message}`,
							cause,
						}),
				),
			),
	});
};

export const makeEncoder = (
	sink: ConfigSink,
	options: EncoderOptions = {},
): Encoder => ({
	encode: (schema, record) =>
		Effect.forEach(
			extractFields(schema),
			(field) =>
				encodeField(sink, field, readField(record, field), options.fallback),
			{ discard: true },
		),
});

/**
 * Encodes a record into a string through an in-memory sink.
 */
export const encodeToString = <F extends Fields>(
	schema: ConfigSchema<F>,
	record: ConfigRecord<F>,
	options?: EncoderOptions,
): Effect.Effect<string, EncodeError> => {
	const sink = makeMemorySink();
	return makeEncoder(sink, options)
		.encode(schema, record)
		.pipe(Effect.map(() => sink.contents()));
};
