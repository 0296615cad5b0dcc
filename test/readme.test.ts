// CHANGE: README must contain the exact --help output
// WHY: Keeps documented usage and the CLI in sync

import * as fs from "node:fs";

import { describe, expect, it } from "vitest";

import { USAGE } from "../src/shell/config/index.js";

describe("README", () => {
	it("contains the output of commit-range --help", () => {
		const readme = fs.readFileSync(new URL("../README.md", import.meta.url), "utf8");
		expect(readme).toContain(USAGE);
	});
});
