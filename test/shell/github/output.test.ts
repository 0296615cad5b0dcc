import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
	formatOutputLine,
	publishOutput,
} from "../../../src/shell/github/output.js";

let dir = "";

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "commit-range-output-"));
});

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true });
});

describe("formatOutputLine", () => {
	it("formats name=value with a trailing newline", () => {
		expect(Either.getOrThrow(formatOutputLine("commit-range", "a...b"))).toBe(
			"commit-range=a...b\n",
		);
	});

	it.each([
		["commit-range", "a...b\ninjected=evil", "value contains a line break"],
		["commit-range", "a...b\r", "value contains a line break"],
		["name=x", "a...b", "invalid output name"],
		["", "a...b", "invalid output name"],
	])("rejects name %j with value %j", (name, value, detail) => {
		const result = formatOutputLine(name, value);
		expect(Either.isLeft(result) ? result.left.detail : "accepted").toBe(
			detail,
		);
	});
});

describe("publishOutput", () => {
	it("appends to the GITHUB_OUTPUT file, keeping earlier entries", async () => {
		const file = path.join(dir, "output");
		fs.writeFileSync(file, "wheel-path=dist/x.whl\n", "utf8");
		const target = await Effect.runPromise(
			publishOutput("commit-range", "a^1...b", file),
		);
		await Effect.runPromise(publishOutput("empty", "", file));
		expect(target).toBe("github-output");
		expect(fs.readFileSync(file, "utf8")).toBe(
			"wheel-path=dist/x.whl\ncommit-range=a^1...b\nempty=\n",
		);
	});

	it("prints the value when no output file is configured", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const target = await Effect.runPromise(
			publishOutput("commit-range", "x...y", undefined),
		);
		expect(target).toBe("stdout");
		expect(log).toHaveBeenCalledWith("x...y");
	});

	it("writes nothing when the value spans several lines", async () => {
		const file = path.join(dir, "output");
		const error = await Effect.runPromise(
			Effect.flip(publishOutput("commit-range", "a\nb=c", file)),
		);
		expect(error._tag).toBe("OutputValueError");
		expect(fs.existsSync(file)).toBe(false);
	});

	it("fails with FSError when the file cannot be written", async () => {
		const file = path.join(dir, "missing", "output");
		const error = await Effect.runPromise(
			Effect.flip(publishOutput("commit-range", "x...y", file)),
		);
		expect(error._tag).toBe("FS");
		expect(error.path).toBe(file);
	});
});
