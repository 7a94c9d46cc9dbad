import { Effect, Either, Stream } from "effect";
import {
	LineParseError,
	UnknownKeyError,
	type UnsupportedKindError,
	type ValueParseError,
} from "../errors/codec-errors.js";
import type { ParseDocumentError } from "../errors/index.js";
import { ReadError } from "../errors/io-errors.js";
import type { ConfigSource } from "../io/sink-source.js";
import {
	type ConfigSchema,
	extractFields,
	type FieldDescriptor,
	type Fields,
	writeField,
} from "../schema/config-schema.js";
import { ValueKind } from "../schema/value-kind.js";
import {
	parseBool,
	parseInteger,
	parseRectangle,
} from "../values/parse-value.js";
import { unsupportedKind } from "./fallback.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Decoder switches controlling whether unknown or missing keys are fatal.
 */
export interface KeyPolicy {
	readonly failOnUnknownKey: boolean;
	readonly failOnMissingKey: boolean;
}

/**
 * How a single input line is treated.
 */
export type LineClass =
	| { readonly type: "comment" }
	| { readonly type: "other" }
	| { readonly type: "malformed"; readonly separators: number }
	| {
			readonly type: "assignment";
			readonly key: string;
			readonly value: string;
	  };

// ============================================================================
// Decode capability table
// ============================================================================

type LineParser = (raw: string) => Either.Either<unknown, ValueParseError>;

/**
 * The narrowest of the three tables. Assignment lines for any other kind
 * fail, and this path has no fallback hook.
 */
const lineParsers: Partial<Record<ValueKind, LineParser>> = {
	[ValueKind.Bool]: parseBool,
	[ValueKind.Int]: (raw) => parseInteger(raw),
	[ValueKind.String]: (raw) => Either.right(raw),
	[ValueKind.Rectangle]: parseRectangle,
};

export const canDecode = (kind: ValueKind): boolean =>
	lineParsers[kind] !== undefined;

// ============================================================================
// Line scanning
// ============================================================================

/**
 * Classifies a raw line. Only a `#` in the very first column makes a
 * comment. An assignment needs exactly one `=`; its key is trimmed and
 * lowercased, its value only trimmed.
 *
 * @example
 * ```typescript
 * classifyLine("  Port = 8080 ")  // { type: "assignment", key: "port", value: "8080" }
 * classifyLine("a = b = c")       // { type: "malformed", separators: 2 }
 * classifyLine("# port = 1")      // { type: "comment" }
 * ```
 */
export const classifyLine = (line: string): LineClass => {
	if (line.startsWith("#")) {
		return { type: "comment" };
	}
	if (!line.includes("=")) {
		return { type: "other" };
	}

	const parts = line.split("=");
	if (parts.length !== 2) {
		return { type: "malformed", separators: parts.length - 1 };
	}

	return {
		type: "assignment",
		key: parts[0].trim().toLowerCase(),
		value: parts[1].trim(),
	};
};

const assignValue = (
	record: object,
	field: FieldDescriptor,
	raw: string,
	line: number,
): Effect.Effect<void, LineParseError | UnsupportedKindError> => {
	const parse = lineParsers[field.kind];
	if (parse === undefined) {
		return Effect.fail(unsupportedKind(field, "decode", line));
	}

	return Either.match(parse(raw), {
		onLeft: (cause) =>
			Effect.fail(
				new LineParseError({
					line,
					key: field.externalKey,
					kind: field.kind,
					raw,
					message: `line ${line} parse ${field.externalKey}=${raw} to ${field.kind}: ${cause.message}`,
					cause,
				}),
			),
		onRight: (value) => Effect.sync(() => writeField(record, field, value)),
	});
};

// ============================================================================
// Document Parser
// ============================================================================

/**
 * Scans the source line by line and assigns every recognised key into the
 * record. Keys are compared verbatim against the declared keys, so a key
 * declared with uppercase letters never matches.
 *
 * @returns the set of declared keys that were assigned
 */
export const parseDocument = <F extends Fields>(
	schema: ConfigSchema<F>,
	record: object,
	source: ConfigSource,
	policy: Pick<KeyPolicy, "failOnUnknownKey">,
): Effect.Effect<ReadonlySet<string>, ParseDocumentError> =>
	Effect.suspend(() => {
		const fields = extractFields(schema);
		const found = new Set<string>();
		let lineNumber = 0;

		const handleLine = (
			text: string,
			line: number,
		): Effect.Effect<void, ParseDocumentError> => {
			const parsed = classifyLine(text);

			switch (parsed.type) {
				case "comment":
				case "other":
					return Effect.void;
				case "malformed":
					return Effect.logDebug("skipped malformed line").pipe(
						Effect.annotateLogs({ line, separators: parsed.separators }),
					);
				case "assignment": {
					const matches = fields.filter(
						(field) => field.externalKey === parsed.key,
					);

					if (matches.length === 0) {
						if (policy.failOnUnknownKey) {
							return Effect.fail(
								new UnknownKeyError({
									line,
									key: parsed.key,
									message: `line ${line} unknown key ${parsed.key}`,
								}),
							);
						}
						return Effect.logDebug("ignored unknown key").pipe(
							Effect.annotateLogs({ line, key: parsed.key }),
						);
					}

					return Effect.forEach(
						matches,
						(field) => assignValue(record, field, parsed.value, line),
						{ discard: true },
					).pipe(
						Effect.tap(() =>
							Effect.sync(() => {
								found.add(parsed.key);
							}),
						),
					);
				}
			}
		};

		return source.pipe(
			Stream.mapError(
				(cause) =>
					new ReadError({
						linesRead: lineNumber,
						message: `read after line ${lineNumber}: ${cause.message}`,
						cause,
					}),
			),
			Stream.splitLines,
			Stream.runForEach((text) => {
				lineNumber++;
				return handleLine(text, lineNumber);
			}),
			Effect.as(found),
		);
	});
