// ============================================================================
// Value Kinds
// ============================================================================

/**
 * The closed set of value kinds a config field can declare.
 *
 * Support differs per path: defaults understand the widest set, encoding a
 * narrower one, and assignment lines the narrowest. See the capability
 * tables in the codec modules.
 */
export const ValueKind = {
	Int: "int",
	Uint: "uint",
	Uint8: "uint8",
	Uint16: "uint16",
	Uint32: "uint32",
	Uint64: "uint64",
	Bool: "bool",
	String: "string",
	Float32: "float32",
	Float64: "float64",
	Complex64: "complex64",
	Complex128: "complex128",
	Rectangle: "rectangle",
	Color: "color",
	Opaque: "opaque",
} as const;

export type ValueKind = (typeof ValueKind)[keyof typeof ValueKind];

const allKinds: ReadonlySet<string> = new Set(Object.values(ValueKind));

export const isValueKind = (value: string): value is ValueKind =>
	allKinds.has(value);

// ============================================================================
// Composite Values
// ============================================================================

export interface Point {
	readonly x: number;
	readonly y: number;
}

/**
 * Axis-aligned rectangle, written as `minX,minY,maxX,maxY`.
 */
export interface Rectangle {
	readonly min: Point;
	readonly max: Point;
}

/**
 * 8-bit RGBA color, written as `R,G,B,A`.
 */
export interface Color {
	readonly r: number;
	readonly g: number;
	readonly b: number;
	readonly a: number;
}

export interface Complex {
	readonly real: number;
	readonly imag: number;
}

export const rectangle = (
	minX: number,
	minY: number,
	maxX: number,
	maxY: number,
): Rectangle => ({
	min: { x: minX, y: minY },
	max: { x: maxX, y: maxY },
});

export const color = (r: number, g: number, b: number, a: number): Color => ({
	r,
	g,
	b,
	a,
});

// ============================================================================
// Kind → TypeScript type mapping
// ============================================================================

export interface KindValueMap {
	readonly int: number;
	readonly uint: number;
	readonly uint8: number;
	readonly uint16: number;
	readonly uint32: number;
	readonly uint64: bigint;
	readonly bool: boolean;
	readonly string: string;
	readonly float32: number;
	readonly float64: number;
	readonly complex64: Complex;
	readonly complex128: Complex;
	readonly rectangle: Rectangle;
	readonly color: Color;
	readonly opaque: unknown;
}

export type KindValue<K extends ValueKind> = KindValueMap[K];
