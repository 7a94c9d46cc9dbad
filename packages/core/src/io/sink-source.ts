import { Effect, Stream } from "effect";
import type { SinkError, SourceError } from "../errors/io-errors.js";

// ============================================================================
// Sink / Source contracts
// ============================================================================

/**
 * Where encoded lines go. The encoder issues one write per line and never
 * closes the sink.
 */
export interface ConfigSink {
	readonly write: (chunk: string) => Effect.Effect<void, SinkError>;
}

/**
 * Where a document comes from: text chunks in order, split into lines by
 * the decoder.
 */
export type ConfigSource = Stream.Stream<string, SourceError>;

// ============================================================================
// In-memory implementations
// ============================================================================

export interface MemorySink extends ConfigSink {
	/** Everything written so far, concatenated */
	readonly contents: () => string;
}

export const makeMemorySink = (): MemorySink => {
	const chunks: Array<string> = [];
	return {
		write: (chunk: string) =>
			Effect.sync(() => {
				chunks.push(chunk);
			}),
		contents: () => chunks.join(""),
	};
};

export const stringSource = (text: string): ConfigSource =>
	Stream.make(text);
