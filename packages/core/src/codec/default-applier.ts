import { Effect, Either, Option } from "effect";
import {
	DefaultParseError,
	type ValueParseError,
} from "../errors/codec-errors.js";
import type { DefaultError } from "../errors/index.js";
import {
	type ConfigSchema,
	extractFields,
	type FieldDescriptor,
	type Fields,
	readField,
	writeField,
} from "../schema/config-schema.js";
import { ValueKind } from "../schema/value-kind.js";
import {
	parseBool,
	parseColor,
	parseComplex,
	parseFloating,
	parseInteger,
	parseRectangle,
	parseUnsigned,
	parseUnsigned64,
} from "../values/parse-value.js";
import { type FallbackHook, rejectKind } from "./fallback.js";

// ============================================================================
// Default capability table
// ============================================================================

type DefaultParser = (raw: string) => Either.Either<unknown, ValueParseError>;

/**
 * The widest of the three tables: every kind except opaque.
 */
const defaultParsers: Partial<Record<ValueKind, DefaultParser>> = {
	[ValueKind.Int]: (raw) => parseInteger(raw),
	[ValueKind.Uint]: (raw) => parseUnsigned(raw, ValueKind.Uint),
	[ValueKind.Uint8]: (raw) => parseUnsigned(raw, ValueKind.Uint8),
	[ValueKind.Uint16]: (raw) => parseUnsigned(raw, ValueKind.Uint16),
	[ValueKind.Uint32]: (raw) => parseUnsigned(raw, ValueKind.Uint32),
	[ValueKind.Uint64]: parseUnsigned64,
	[ValueKind.Bool]: parseBool,
	[ValueKind.String]: (raw) => Either.right(raw),
	[ValueKind.Float32]: (raw) => parseFloating(raw, ValueKind.Float32),
	[ValueKind.Float64]: (raw) => parseFloating(raw, ValueKind.Float64),
	[ValueKind.Complex64]: (raw) => parseComplex(raw, ValueKind.Complex64),
	[ValueKind.Complex128]: (raw) => parseComplex(raw, ValueKind.Complex128),
	[ValueKind.Rectangle]: parseRectangle,
	[ValueKind.Color]: parseColor,
};

export const canApplyDefault = (kind: ValueKind): boolean =>
	defaultParsers[kind] !== undefined;

// ============================================================================
// Default Applier
// ============================================================================

const applyDefault = (
	record: object,
	field: FieldDescriptor,
	raw: string,
	fallback: FallbackHook | undefined,
): Effect.Effect<void, DefaultError> => {
	const parse = defaultParsers[field.kind];
	if (parse === undefined) {
		return rejectKind(field, readField(record, field), "default", fallback);
	}

	return Either.match(parse(raw), {
		onLeft: (cause) =>
			Effect.fail(
				new DefaultParseError({
					key: field.externalKey,
					kind: field.kind,
					raw,
					message: `parse default "${raw}" for ${field.externalKey} to ${field.kind}: ${cause.message}`,
					cause,
				}),
			),
		onRight: (value) =>
			Effect.sync(() => writeField(record, field, value)).pipe(
				Effect.tap(() =>
					Effect.logDebug("applied default").pipe(
						Effect.annotateLogs({ key: field.externalKey, kind: field.kind, raw }),
					),
				),
			),
	});
};

/**
 * Parses every non-empty declared default into its field's kind and assigns
 * it. The first failure aborts the pass; fields handled before it keep
 * their new values.
 */
export const applyDefaults = <F extends Fields>(
	schema: ConfigSchema<F>,
	record: object,
	fallback?: FallbackHook,
): Effect.Effect<void, DefaultError> =>
	Effect.forEach(
		extractFields(schema),
		(field) =>
			Option.match(field.rawDefault, {
				onNone: () => Effect.void,
				onSome: (raw) => applyDefault(record, field, raw, fallback),
			}),
		{ discard: true },
	);
