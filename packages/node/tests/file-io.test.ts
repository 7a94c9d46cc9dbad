import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Stream } from "effect";
import { afterEach, describe, expect, it } from "vitest";
import { fileSink, fileSource } from "../src/file-io.js";

const makeTempDir = () =>
	join(tmpdir(), `keyline-file-io-${randomBytes(8).toString("hex")}`);

describe("file-io", () => {
	let tempDir: string;

	afterEach(async () => {
		if (tempDir) {
			await fs.rm(tempDir, { recursive: true, force: true });
		}
	});

	describe("fileSink", () => {
		it("writes chunks in order and closes the file with the scope", async () => {
			tempDir = makeTempDir();
			const path = join(tempDir, "app.conf");

			await Effect.runPromise(
				Effect.scoped(
					Effect.gen(function* () {
						const sink = yield* fileSink(path);
						yield* sink.write("a = 1\n");
						yield* sink.write("b = 2\n");
					}),
				),
			);

			expect(await fs.readFile(path, "utf-8")).toBe("a = 1\nb = 2\n");
		});

		it("writes every byte of multi-byte chunks", async () => {
			tempDir = makeTempDir();
			const path = join(tempDir, "app.conf");
			const title = `title = ${"café ☕ ".repeat(4096)}\n`;

			await Effect.runPromise(
				Effect.scoped(
					Effect.gen(function* () {
						const sink = yield* fileSink(path);
						yield* sink.write(title);
						yield* sink.write("tail = end\n");
					}),
				),
			);

			expect(await fs.readFile(path, "utf-8")).toBe(`${title}tail = end\n`);
		});

		it("creates missing parent directories", async () => {
			tempDir = makeTempDir();
			const path = join(tempDir, "nested", "deeper", "app.conf");

			await Effect.runPromise(
				Effect.scoped(
					fileSink(path).pipe(Effect.flatMap((sink) => sink.write("x = y\n"))),
				),
			);

			expect(await fs.readFile(path, "utf-8")).toBe("x = y\n");
		});

		it("truncates an existing file", async () => {
			tempDir = makeTempDir();
			await fs.mkdir(tempDir, { recursive: true });
			const path = join(tempDir, "app.conf");
			await fs.writeFile(path, "old = contents that are longer\n");

			await Effect.runPromise(
				Effect.scoped(
					fileSink(path).pipe(Effect.flatMap((sink) => sink.write("n = 1\n"))),
				),
			);

			expect(await fs.readFile(path, "utf-8")).toBe("n = 1\n");
		});

		it("fails with SinkError when the directory may not be created", async () => {
			tempDir = makeTempDir();
			const path = join(tempDir, "missing", "app.conf");

			const error = await Effect.runPromise(
				Effect.flip(
					Effect.scoped(fileSink(path, { createMissingDirectories: false })),
				),
			);

			expect(error._tag).toBe("SinkError");
			expect(error.message.startsWith(`${path}: `)).toBe(true);
		});
	});

	describe("fileSource", () => {
		it("streams the file contents as text", async () => {
			tempDir = makeTempDir();
			await fs.mkdir(tempDir, { recursive: true });
			const path = join(tempDir, "app.conf");
			await fs.writeFile(path, "one = 1\ntwo = 2\n");

			const lines = await Effect.runPromise(
				fileSource(path, { highWaterMark: 4 }).pipe(
					Stream.splitLines,
					Stream.runCollect,
				),
			);

			expect(Array.from(lines)).toEqual(["one = 1", "two = 2"]);
		});

		it("can be run more than once", async () => {
			tempDir = makeTempDir();
			await fs.mkdir(tempDir, { recursive: true });
			const path = join(tempDir, "app.conf");
			await fs.writeFile(path, "k = v");

			const source = fileSource(path);
			const first = await Effect.runPromise(Stream.mkString(source));
			const second = await Effect.runPromise(Stream.mkString(source));

			expect(first).toBe("k = v");
			expect(second).toBe("k = v");
		});

		it("fails with SourceError for a missing file", async () => {
			tempDir = makeTempDir();
			const path = join(tempDir, "absent.conf");

			const error = await Effect.runPromise(
				Effect.flip(Stream.runDrain(fileSource(path))),
			);

			expect(error._tag).toBe("SourceError");
			expect(error.message.startsWith(`${path}: `)).toBe(true);
		});
	});
});
