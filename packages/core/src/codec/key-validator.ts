import { Effect } from "effect";
import { MissingKeyError } from "../errors/codec-errors.js";
import {
	type ConfigSchema,
	extractFields,
	type Fields,
} from "../schema/config-schema.js";
import type { KeyPolicy } from "./document-parser.js";

/**
 * Checks every declared key against the keys the document assigned. With
 * `failOnMissingKey` the first absent key (in declaration order) fails;
 * otherwise absent fields keep whatever value they already had.
 */
export const validateKeys = <F extends Fields>(
	schema: ConfigSchema<F>,
	found: ReadonlySet<string>,
	policy: Pick<KeyPolicy, "failOnMissingKey">,
): Effect.Effect<void, MissingKeyError> =>
	Effect.forEach(
		extractFields(schema),
		(field) => {
			if (found.has(field.externalKey)) {
				return Effect.void;
			}
			if (policy.failOnMissingKey) {
				return Effect.fail(
					new MissingKeyError({
						key: field.externalKey,
						message: `missing key ${field.externalKey}`,
					}),
				);
			}
			return Effect.logDebug("missing key left unchanged").pipe(
				Effect.annotateLogs({ key: field.externalKey }),
			);
		},
		{ discard: true },
	);
