// ============================================================================
// Codec Errors (re-exported from codec-errors.ts)
// ============================================================================

export type { CodecPath } from "./codec-errors.js";
export {
	DefaultParseError,
	FallbackError,
	InvalidValueError,
	LineParseError,
	MissingKeyError,
	SchemaError,
	UnknownKeyError,
	UnsupportedKindError,
	ValueParseError,
} from "./codec-errors.js";

// ============================================================================
// I/O Errors (re-exported from io-errors.ts)
// ============================================================================

export { ReadError, SinkError, SourceError, WriteError } from "./io-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type {
	DefaultParseError,
	FallbackError,
	InvalidValueError,
	LineParseError,
	MissingKeyError,
	UnknownKeyError,
	UnsupportedKindError,
} from "./codec-errors.js";
import type { ReadError, WriteError } from "./io-errors.js";

export type EncodeError =
	| InvalidValueError
	| UnsupportedKindError
	| FallbackError
	| WriteError;

export type DefaultError =
	| DefaultParseError
	| UnsupportedKindError
	| FallbackError;

export type ParseDocumentError =
	| LineParseError
	| UnsupportedKindError
	| UnknownKeyError
	| ReadError;

export type DecodeError = DefaultError | ParseDocumentError | MissingKeyError;
