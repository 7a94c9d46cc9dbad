import { Option } from "effect";
import { SchemaError } from "../errors/codec-errors.js";
import { isValueKind, type KindValue, ValueKind } from "./value-kind.js";

// ============================================================================
// Types
// ============================================================================

export interface FieldOptions {
	/** Raw default, parsed into the field's kind before a document is read */
	readonly default?: string;
}

/**
 * Declaration of one participating record property.
 */
export interface FieldSpec<K extends ValueKind = ValueKind> {
	readonly key: string;
	readonly kind: K;
	readonly default?: string;
}

export type Fields = Readonly<Record<string, FieldSpec>>;

/**
 * Extracted metadata for one participating property, in declaration order.
 */
export interface FieldDescriptor {
	readonly property: string;
	readonly externalKey: string;
	readonly kind: ValueKind;
	readonly rawDefault: Option.Option<string>;
}

export interface ConfigSchema<F extends Fields> {
	readonly fields: F;
	readonly descriptors: ReadonlyArray<FieldDescriptor>;
}

/**
 * The record shape a set of field specs describes. Records may carry other
 * properties; those do not participate.
 */
export type ConfigRecord<F extends Fields> = {
	-readonly [P in keyof F]: KindValue<F[P]["kind"]>;
};

export type ConfigValues<S extends ConfigSchema<Fields>> =
	S extends ConfigSchema<infer F> ? ConfigRecord<F> : never;

// ============================================================================
// Schema construction
// ============================================================================

const field = <K extends ValueKind>(
	key: string,
	kind: K,
	options: FieldOptions = {},
): FieldSpec<K> => ({ key, kind, default: options.default });

const toDescriptor = (property: string, spec: FieldSpec): FieldDescriptor => {
	if (spec.key.length === 0) {
		throw new SchemaError({
			property,
			message: `Field '${property}' declares an empty config key`,
		});
	}
	if (!isValueKind(spec.kind)) {
		throw new SchemaError({
			property,
			message: `Field '${property}' declares unknown kind '${String(spec.kind)}'`,
		});
	}
	return {
		property,
		externalKey: spec.key,
		kind: spec.kind,
		rawDefault: Option.fromNullable(spec.default).pipe(
			Option.filter((raw) => raw.length > 0),
		),
	};
};

/**
 * Builds a schema from an object of field specs. Descriptor order follows
 * property declaration order.
 *
 * @throws SchemaError when a field has an empty key or an unknown kind
 *
 * @example
 * ```typescript
 * const ServerConfig = ConfigSchema.make({
 *   port: ConfigSchema.int("port", { default: "8080" }),
 *   host: ConfigSchema.string("host"),
 *   bounds: ConfigSchema.rectangle("bounds"),
 * })
 * type ServerConfig = ConfigValues<typeof ServerConfig>
 * ```
 */
const make = <F extends Fields>(fields: F): ConfigSchema<F> => {
	const descriptors: Array<FieldDescriptor> = [];
	const seen = new Map<string, string>();

	for (const [property, spec] of Object.entries(fields)) {
		const descriptor = toDescriptor(property, spec);
		const previous = seen.get(descriptor.externalKey);
		if (previous !== undefined) {
			console.warn(
				`Duplicate config key '${descriptor.externalKey}': '${previous}' and '${property}' both receive its value`,
			);
		}
		seen.set(descriptor.externalKey, property);
		descriptors.push(descriptor);
	}

	return { fields, descriptors };
};

export const ConfigSchema = {
	make,
	field,
	int: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Int, options),
	uint: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Uint, options),
	uint8: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Uint8, options),
	uint16: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Uint16, options),
	uint32: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Uint32, options),
	uint64: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Uint64, options),
	bool: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Bool, options),
	string: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.String, options),
	float32: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Float32, options),
	float64: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Float64, options),
	complex64: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Complex64, options),
	complex128: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Complex128, options),
	rectangle: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Rectangle, options),
	color: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Color, options),
	opaque: (key: string, options?: FieldOptions) =>
		field(key, ValueKind.Opaque, options),
} as const;

// ============================================================================
// Field access
// ============================================================================

export const extractFields = <F extends Fields>(
	schema: ConfigSchema<F>,
): ReadonlyArray<FieldDescriptor> => schema.descriptors;

export const readField = (
	record: object,
	descriptor: FieldDescriptor,
): unknown => Reflect.get(record, descriptor.property);

export const writeField = (
	record: object,
	descriptor: FieldDescriptor,
	value: unknown,
): void => {
	Reflect.set(record, descriptor.property, value);
};
