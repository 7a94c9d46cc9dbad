import { Effect, Stream } from "effect";
import { describe, expect, it } from "vitest";
import { classifyLine, parseDocument } from "../src/codec/document-parser.js";
import { validateKeys } from "../src/codec/key-validator.js";
import { SourceError } from "../src/errors/io-errors.js";
import { stringSource } from "../src/io/sink-source.js";
import { ConfigSchema } from "../src/schema/config-schema.js";
import { rectangle } from "../src/schema/value-kind.js";

describe("classifyLine", () => {
	it("normalises keys and trims values", () => {
		expect(classifyLine("  Port = 8080 ")).toEqual({
			type: "assignment",
			key: "port",
			value: "8080",
		});
		expect(classifyLine("Title = Mixed Case")).toEqual({
			type: "assignment",
			key: "title",
			value: "Mixed Case",
		});
		expect(classifyLine("key=")).toEqual({
			type: "assignment",
			key: "key",
			value: "",
		});
	});

	it("treats only a first-column # as a comment", () => {
		expect(classifyLine("# port = 1")).toEqual({ type: "comment" });
		expect(classifyLine("#")).toEqual({ type: "comment" });
		expect(classifyLine("  # port = 1")).toEqual({
			type: "assignment",
			key: "# port",
			value: "1",
		});
	});

	it("marks lines with several = as malformed", () => {
		expect(classifyLine("a = b = c")).toEqual({
			type: "malformed",
			separators: 2,
		});
		expect(classifyLine("url = http://x?a=b")).toEqual({
			type: "malformed",
			separators: 2,
		});
	});

	it("ignores lines without =", () => {
		expect(classifyLine("")).toEqual({ type: "other" });
		expect(classifyLine("just some text")).toEqual({ type: "other" });
	});
});

describe("parseDocument", () => {
	const Layout = ConfigSchema.make({
		title: ConfigSchema.string("title"),
		columns: ConfigSchema.int("columns"),
		wrap: ConfigSchema.bool("wrap"),
		frame: ConfigSchema.rectangle("frame"),
	});

	const makeLayout = () => ({
		title: "",
		columns: 0,
		wrap: false,
		frame: rectangle(0, 0, 0, 0),
	});

	const lenient = { failOnUnknownKey: false };

	it("assigns recognised keys and reports which were found", () => {
		const record = makeLayout();
		const found = Effect.runSync(
			parseDocument(
				Layout,
				record,
				stringSource("title = Report\nCOLUMNS = 3\n# wrap = true\n"),
				lenient,
			),
		);

		expect(record.title).toBe("Report");
		expect(record.columns).toBe(3);
		expect(record.wrap).toBe(false);
		expect([...found]).toEqual(["title", "columns"]);
	});

	it("reassembles lines split across chunks", () => {
		const record = makeLayout();
		Effect.runSync(
			parseDocument(
				Layout,
				record,
				Stream.make("tit", "le = split\ncolu", "mns = 7"),
				lenient,
			),
		);

		expect(record.title).toBe("split");
		expect(record.columns).toBe(7);
	});

	it("handles CRLF line endings", () => {
		const record = makeLayout();
		Effect.runSync(
			parseDocument(
				Layout,
				record,
				stringSource("title = dos\r\nwrap = 1\r\n"),
				lenient,
			),
		);

		expect(record.title).toBe("dos");
		expect(record.wrap).toBe(true);
	});

	it("fails with the line number when a value does not parse", () => {
		const error = Effect.runSync(
			Effect.flip(
				parseDocument(
					Layout,
					makeLayout(),
					stringSource("title = ok\n\nframe = 1,2,3\n"),
					lenient,
				),
			),
		);

		expect(error._tag).toBe("LineParseError");
		if (error._tag === "LineParseError") {
			expect(error.line).toBe(3);
			expect(error.key).toBe("frame");
			expect(error.kind).toBe("rectangle");
			expect(error.raw).toBe("1,2,3");
		}
		expect(error.message).toBe(
			"line 3 parse frame=1,2,3 to rectangle: invalid number of parts",
		);
	});

	it("wraps source failures with the number of lines read", () => {
		const record = makeLayout();
		const source = Stream.concat(
			Stream.make("title = partial\n"),
			Stream.fail(new SourceError({ message: "connection reset" })),
		);

		const error = Effect.runSync(
			Effect.flip(parseDocument(Layout, record, source, lenient)),
		);

		expect(error._tag).toBe("ReadError");
		if (error._tag === "ReadError") {
			expect(error.linesRead).toBe(1);
			expect(error.cause.message).toBe("connection reset");
		}
		expect(error.message).toBe("read after line 1: connection reset");
		expect(record.title).toBe("partial");
	});
});

describe("validateKeys", () => {
	const Pair = ConfigSchema.make({
		left: ConfigSchema.int("left"),
		right: ConfigSchema.int("right"),
	});

	it("accepts missing keys unless told otherwise", () => {
		Effect.runSync(
			validateKeys(Pair, new Set(["left"]), { failOnMissingKey: false }),
		);
	});

	it("names the first missing key in declaration order", () => {
		const error = Effect.runSync(
			Effect.flip(validateKeys(Pair, new Set(), { failOnMissingKey: true })),
		);
		expect(error.key).toBe("left");
		expect(error.message).toBe("missing key left");
	});

	it("passes when every key was found", () => {
		Effect.runSync(
			validateKeys(Pair, new Set(["left", "right"]), {
				failOnMissingKey: true,
			}),
		);
	});
});
