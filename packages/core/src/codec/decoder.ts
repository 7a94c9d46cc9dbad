import { Effect } from "effect";
import type { DecodeError } from "../errors/index.js";
import { type ConfigSource, stringSource } from "../io/sink-source.js";
import type {
	ConfigRecord,
	ConfigSchema,
	Fields,
} from "../schema/config-schema.js";
import { applyDefaults } from "./default-applier.js";
import { type KeyPolicy, parseDocument } from "./document-parser.js";
import type { FallbackHook } from "./fallback.js";
import { validateKeys } from "./key-validator.js";

// ============================================================================
// Configuration
// ============================================================================

export interface DecoderOptions extends Partial<KeyPolicy> {
	/** Observes current values of fields whose default kind is unsupported */
	readonly defaultFallback?: FallbackHook;
}

interface ResolvedDecoderOptions extends KeyPolicy {
	readonly defaultFallback: FallbackHook | undefined;
}

const defaultOptions: ResolvedDecoderOptions = {
	defaultFallback: undefined,
	failOnUnknownKey: false,
	failOnMissingKey: false,
};

// ============================================================================
// Decoder
// ============================================================================

export interface Decoder {
	/**
	 * Applies declared defaults, scans the document into the record, then
	 * enforces the key policy. On failure the record keeps every assignment
	 * made before it.
	 */
	readonly decode: <F extends Fields>(
		schema: ConfigSchema<F>,
		record: ConfigRecord<F>,
	) => Effect.Effect<void, DecodeError>;
}

export const makeDecoder = (
	source: ConfigSource,
	options: DecoderOptions = {},
): Decoder => {
	const resolved: ResolvedDecoderOptions = { ...defaultOptions, ...options };

	return {
		decode: (schema, record) =>
			applyDefaults(schema, record, resolved.defaultFallback).pipe(
				Effect.andThen(parseDocument(schema, record, source, resolved)),
				Effect.flatMap((found) => validateKeys(schema, found, resolved)),
			),
	};
};

/**
 * Decodes a document held in a string.
 */
export const decodeString = <F extends Fields>(
	schema: ConfigSchema<F>,
	text: string,
	record: ConfigRecord<F>,
	options?: DecoderOptions,
): Effect.Effect<void, DecodeError> =>
	makeDecoder(stringSource(text), options).decode(schema, record);
