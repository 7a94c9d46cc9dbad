import { Data } from "effect";
import type { ValueKind } from "../schema/value-kind.js";

// ============================================================================
// Effect TaggedError I/O Error Types
// ============================================================================

export class SinkError extends Data.TaggedError("SinkError")<{
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class SourceError extends Data.TaggedError("SourceError")<{
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * A sink failure, tagged with the field whose line was being written.
 */
export class WriteError extends Data.TaggedError("WriteError")<{
	readonly key: string;
	readonly kind: ValueKind;
	readonly message: string;
	readonly cause: SinkError;
}> {}

/**
 * A source failure, tagged with how many lines had been scanned.
 */
export class ReadError extends Data.TaggedError("ReadError")<{
	readonly linesRead: number;
	readonly message: string;
	readonly cause: SourceError;
}> {}
