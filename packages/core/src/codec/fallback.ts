import { Effect } from "effect";
import {
	type CodecPath,
	FallbackError,
	UnsupportedKindError,
} from "../errors/codec-errors.js";
import type { FieldDescriptor } from "../schema/config-schema.js";

// ============================================================================
// Fallback hooks
// ============================================================================

/**
 * Caller-supplied observer for values whose kind a path does not support.
 * It runs before the codec fails with UnsupportedKindError and cannot turn
 * that failure into success; a hook that fails replaces it with a
 * FallbackError instead.
 */
export type FallbackHook = (
	value: unknown,
	field: FieldDescriptor,
) => Effect.Effect<void, unknown>;

export const unsupportedKind = (
	field: FieldDescriptor,
	path: CodecPath,
	line?: number,
): UnsupportedKindError =>
	new UnsupportedKindError({
		key: field.externalKey,
		kind: field.kind,
		path,
		line,
		message:
			line === undefined
				? `unknown type ${field.kind} for ${field.externalKey}`
				: `line ${line} unknown type ${field.kind} for ${field.externalKey}`,
	});

/**
 * Gives the hook (if any) first refusal, then fails.
 */
export const rejectKind = (
	field: FieldDescriptor,
	value: unknown,
	path: CodecPath,
	hook: FallbackHook | undefined,
): Effect.Effect<never, UnsupportedKindError | FallbackError> => {
	const observe =
		hook === undefined
			? Effect.void
			: hook(value, field).pipe(
					Effect.mapError(
						(cause) =>
							new FallbackError({
								key: field.externalKey,
								kind: field.kind,
								path,
								message: `fallback for ${field.externalKey} (${field.kind}): ${
									cause instanceof Error ? cause.message : String(cause)
								}`,
								cause,
							}),
					),
				);

	return observe.pipe(Effect.andThen(Effect.fail(unsupportedKind(field, path))));
};
