import { Option } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SchemaError } from "../src/errors/codec-errors.js";
import {
	ConfigSchema,
	type ConfigValues,
	extractFields,
	readField,
	writeField,
} from "../src/schema/config-schema.js";
import { isValueKind, rectangle } from "../src/schema/value-kind.js";

const ServerConfig = ConfigSchema.make({
	port: ConfigSchema.int("port", { default: "8080" }),
	host: ConfigSchema.string("host"),
	debug: ConfigSchema.bool("debug", { default: "" }),
	area: ConfigSchema.rectangle("area", { default: "0,0,10,10" }),
});

describe("ConfigSchema.make", () => {
	it("extracts descriptors in declaration order", () => {
		const fields = extractFields(ServerConfig);
		expect(fields.map((field) => field.property)).toEqual([
			"port",
			"host",
			"debug",
			"area",
		]);
		expect(fields.map((field) => field.externalKey)).toEqual([
			"port",
			"host",
			"debug",
			"area",
		]);
		expect(fields.map((field) => field.kind)).toEqual([
			"int",
			"string",
			"bool",
			"rectangle",
		]);
	});

	it("keeps non-empty defaults and drops empty ones", () => {
		const [port, host, debug, area] = extractFields(ServerConfig);
		expect(port.rawDefault).toEqual(Option.some("8080"));
		expect(Option.isNone(host.rawDefault)).toBe(true);
		expect(Option.isNone(debug.rawDefault)).toBe(true);
		expect(area.rawDefault).toEqual(Option.some("0,0,10,10"));
	});

	it("maps properties to external keys", () => {
		const schema = ConfigSchema.make({
			listenPort: ConfigSchema.int("listen_port"),
		});
		const [field] = extractFields(schema);
		expect(field.property).toBe("listenPort");
		expect(field.externalKey).toBe("listen_port");
	});

	it("throws SchemaError for an empty key", () => {
		expect(() =>
			ConfigSchema.make({ broken: ConfigSchema.int("") }),
		).toThrow(SchemaError);
		expect(() =>
			ConfigSchema.make({ broken: ConfigSchema.int("") }),
		).toThrow("Field 'broken' declares an empty config key");
	});

	describe("duplicate keys", () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		it("warns and keeps both descriptors", () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
			const schema = ConfigSchema.make({
				port: ConfigSchema.int("port"),
				listenPort: ConfigSchema.int("port"),
			});

			expect(extractFields(schema)).toHaveLength(2);
			expect(warn).toHaveBeenCalledWith(
				"Duplicate config key 'port': 'port' and 'listenPort' both receive its value",
			);
		});
	});
});

describe("field access", () => {
	it("reads and writes the declared property", () => {
		const record: ConfigValues<typeof ServerConfig> = {
			port: 1,
			host: "localhost",
			debug: false,
			area: rectangle(0, 0, 1, 1),
		};
		const [port] = extractFields(ServerConfig);

		expect(readField(record, port)).toBe(1);
		writeField(record, port, 2);
		expect(record.port).toBe(2);
	});
});

describe("isValueKind", () => {
	it("recognises only the declared kinds", () => {
		expect(isValueKind("complex64")).toBe(true);
		expect(isValueKind("opaque")).toBe(true);
		expect(isValueKind("int8")).toBe(false);
		expect(isValueKind("Int")).toBe(false);
	});
});
