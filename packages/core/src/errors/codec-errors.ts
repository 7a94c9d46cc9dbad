import { Data } from "effect";
import type { ValueKind } from "../schema/value-kind.js";

// ============================================================================
// Effect TaggedError Codec Error Types
// ============================================================================

/**
 * Raised while a schema is being defined. Thrown rather than returned:
 * a malformed schema is a programming error.
 */
export class SchemaError extends Data.TaggedError("SchemaError")<{
	readonly property: string;
	readonly message: string;
}> {}

export class ValueParseError extends Data.TaggedError("ValueParseError")<{
	readonly input: string;
	readonly kind: ValueKind;
	readonly reason: "syntax" | "range" | "parts";
	readonly message: string;
}> {}

export class InvalidValueError extends Data.TaggedError("InvalidValueError")<{
	readonly key: string;
	readonly kind: ValueKind;
	readonly message: string;
}> {}

export class DefaultParseError extends Data.TaggedError("DefaultParseError")<{
	readonly key: string;
	readonly kind: ValueKind;
	readonly raw: string;
	readonly message: string;
	readonly cause: ValueParseError;
}> {}

export class LineParseError extends Data.TaggedError("LineParseError")<{
	readonly line: number;
	readonly key: string;
	readonly kind: ValueKind;
	readonly raw: string;
	readonly message: string;
	readonly cause: ValueParseError;
}> {}

/**
 * The codec path a kind was rejected on.
 */
export type CodecPath = "encode" | "default" | "decode";

export class UnsupportedKindError extends Data.TaggedError(
	"UnsupportedKindError",
)<{
	readonly key: string;
	readonly kind: ValueKind;
	readonly path: CodecPath;
	readonly line?: number;
	readonly message: string;
}> {}

export class FallbackError extends Data.TaggedError("FallbackError")<{
	readonly key: string;
	readonly kind: ValueKind;
	readonly path: CodecPath;
	readonly message: string;
	readonly cause: unknown;
}> {}

export class UnknownKeyError extends Data.TaggedError("UnknownKeyError")<{
	readonly line: number;
	readonly key: string;
	readonly message: string;
}> {}

export class MissingKeyError extends Data.TaggedError("MissingKeyError")<{
	readonly key: string;
	readonly message: string;
}> {}
