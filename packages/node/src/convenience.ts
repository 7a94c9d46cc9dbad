/**
 * Convenience wrappers that pair the codec with file I/O, so callers do not
 * wire sinks, sources and scopes by hand.
 */

import {
	type ConfigRecord,
	type ConfigSchema,
	type DecodeError,
	type DecoderOptions,
	type EncodeError,
	type EncoderOptions,
	type Fields,
	makeDecoder,
	makeEncoder,
	type SinkError,
} from "@keyline/core";
import { Effect } from "effect";
import {
	type FileSinkOptions,
	type FileSourceOptions,
	fileSink,
	fileSource,
} from "./file-io.js";

/**
 * Encode a record into a file, replacing its contents.
 *
 * @param path - Target file; parent directories are created by default
 * @param schema - Schema describing the participating fields
 * @param record - Record to read values from
 * @param options - Encoder fallback plus file sink settings
 * @returns Effect that fails on the first encode or I/O error
 */
export const encodeToFile = <F extends Fields>(
	path: string,
	schema: ConfigSchema<F>,
	record: ConfigRecord<F>,
	options: EncoderOptions & FileSinkOptions = {},
): Effect.Effect<void, EncodeError | SinkError> =>
	Effect.scoped(
		fileSink(path, options).pipe(
			Effect.flatMap((sink) => makeEncoder(sink, options).encode(schema, record)),
		),
	);

/**
 * Decode a file into a record: defaults first, then the file's lines, then
 * the key policy.
 */
export const decodeFromFile = <F extends Fields>(
	path: string,
	schema: ConfigSchema<F>,
	record: ConfigRecord<F>,
	options: DecoderOptions & FileSourceOptions = {},
): Effect.Effect<void, DecodeError> =>
	makeDecoder(fileSource(path, options), options).decode(schema, record);
