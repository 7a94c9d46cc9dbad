/**
 * Node.js filesystem implementations of ConfigSource and ConfigSink.
 * Sources stream the file in chunks; sinks hold an open file handle for the
 * lifetime of a Scope.
 */

import { createReadStream, promises as fs } from "node:fs";
import { dirname } from "node:path";
import {
	type ConfigSink,
	type ConfigSource,
	SinkError,
	SourceError,
} from "@keyline/core";
import { Effect, Stream, type Scope } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface FileSourceOptions {
	readonly encoding?: BufferEncoding;
	/** Chunk size in bytes */
	readonly highWaterMark?: number;
}

export interface FileSinkOptions {
	readonly encoding?: BufferEncoding;
	readonly createMissingDirectories?: boolean;
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultSourceOptions: Required<FileSourceOptions> = {
	encoding: "utf-8",
	highWaterMark: 64 * 1024,
};

const defaultSinkOptions: Required<FileSinkOptions> = {
	encoding: "utf-8",
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// Helpers
// ============================================================================

const errorMessage = (error: unknown, fallback: string): string =>
	error instanceof Error ? error.message : fallback;

const toSourceError = (path: string, error: unknown): SourceError =>
	new SourceError({
		message: `${path}: ${errorMessage(error, "Unknown read error")}`,
		cause: error,
	});

const toSinkError = (path: string, error: unknown): SinkError =>
	new SinkError({
		message: `${path}: ${errorMessage(error, "Unknown write error")}`,
		cause: error,
	});

async function* readChunks(
	path: string,
	options: Required<FileSourceOptions>,
): AsyncGenerator<string> {
	const stream = createReadStream(path, {
		encoding: options.encoding,
		highWaterMark: options.highWaterMark,
	});
	for await (const chunk of stream) {
		yield typeof chunk === "string" ? chunk : String(chunk);
	}
}

// ============================================================================
// Source
// ============================================================================

/**
 * Streams a file as text chunks. Each run reopens the file; opening and
 * reading failures surface as SourceError.
 */
export const fileSource = (
	path: string,
	options: FileSourceOptions = {},
): ConfigSource => {
	const resolved = { ...defaultSourceOptions, ...options };
	return Stream.suspend(() =>
		Stream.fromAsyncIterable(readChunks(path, resolved), (error) =>
			toSourceError(path, error),
		),
	);
};

// ============================================================================
// Sink
// ============================================================================

/**
 * Opens (and truncates) a file for writing. The handle is closed when the
 * surrounding Scope closes.
 */
export const fileSink = (
	path: string,
	options: FileSinkOptions = {},
): Effect.Effect<ConfigSink, SinkError, Scope.Scope> => {
	const resolved = { ...defaultSinkOptions, ...options };

	const ensureParentDir = resolved.createMissingDirectories
		? Effect.tryPromise({
				try: () =>
					fs.mkdir(dirname(path), { recursive: true, mode: resolved.dirMode }),
				catch: (error) => toSinkError(dirname(path), error),
			}).pipe(Effect.asVoid)
		: Effect.void;

	const open = Effect.acquireRelease(
		Effect.tryPromise({
			try: () => fs.open(path, "w", resolved.fileMode),
			catch: (error) => toSinkError(path, error),
		}),
		(handle) =>
			Effect.tryPromise({
				try: () => handle.close(),
				catch: (error) => toSinkError(path, error),
			}).pipe(
				Effect.catchAll((error) =>
					Effect.logWarning("failed to close config file").pipe(
						Effect.annotateLogs({ path, error: error.message }),
					),
				),
			),
	);

	return ensureParentDir.pipe(
		Effect.andThen(open),
		Effect.map(
			(handle): ConfigSink => ({
				// writeFile loops until the whole chunk is written at the
				// current position.
				write: (chunk: string) =>
					Effect.tryPromise({
						try: () => handle.writeFile(chunk, resolved.encoding),
						catch: (error) => toSinkError(path, error),
					}).pipe(Effect.asVoid),
			}),
		),
	);
};
