/**
 * Main entry point for the keyline codec.
 *
 * Exports the schema builder, the Effect-based encoder and decoder, the
 * value parsers and formatters they are built on, and the tagged errors.
 */

// ============================================================================
// Schema
// ============================================================================

export {
	ConfigSchema,
	extractFields,
} from "./schema/config-schema.js";

export type {
	ConfigRecord,
	ConfigValues,
	FieldDescriptor,
	FieldOptions,
	FieldSpec,
	Fields,
} from "./schema/config-schema.js";

export { color, isValueKind, rectangle, ValueKind } from "./schema/value-kind.js";

export type {
	Color,
	Complex,
	KindValue,
	KindValueMap,
	Point,
	Rectangle,
} from "./schema/value-kind.js";

// ============================================================================
// Codec
// ============================================================================

export { canEncode, encodeToString, makeEncoder } from "./codec/encoder.js";
export type { Encoder, EncoderOptions } from "./codec/encoder.js";

export { decodeString, makeDecoder } from "./codec/decoder.js";
export type { Decoder, DecoderOptions } from "./codec/decoder.js";

export { applyDefaults, canApplyDefault } from "./codec/default-applier.js";
export {
	canDecode,
	classifyLine,
	parseDocument,
} from "./codec/document-parser.js";
export type { KeyPolicy, LineClass } from "./codec/document-parser.js";
export { validateKeys } from "./codec/key-validator.js";
export type { FallbackHook } from "./codec/fallback.js";

// ============================================================================
// Values
// ============================================================================

export {
	parseBool,
	parseColor,
	parseComplex,
	parseFloating,
	parseInteger,
	parseRectangle,
	parseUnsigned,
	parseUnsigned64,
} from "./values/parse-value.js";

export type {
	ComplexKind,
	FloatKind,
	UintKind,
} from "./values/parse-value.js";

export {
	formatBool,
	formatColor,
	formatFloat64,
	formatRectangle,
} from "./values/format-value.js";

// ============================================================================
// Sink / Source
// ============================================================================

export { makeMemorySink, stringSource } from "./io/sink-source.js";
export type {
	ConfigSink,
	ConfigSource,
	MemorySink,
} from "./io/sink-source.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	DefaultParseError,
	FallbackError,
	InvalidValueError,
	LineParseError,
	MissingKeyError,
	ReadError,
	SchemaError,
	SinkError,
	SourceError,
	UnknownKeyError,
	UnsupportedKindError,
	ValueParseError,
	WriteError,
} from "./errors/index.js";

export type {
	CodecPath,
	DecodeError,
	DefaultError,
	EncodeError,
	ParseDocumentError,
} from "./errors/index.js";
