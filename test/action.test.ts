// CHANGE: action.yml must build the CLI before running it
// WHY: dist/ is not committed, so the action runs only what its own build step produced

import * as fs from "node:fs";

import { describe, expect, it } from "vitest";

const read = (file: string): string =>
	fs.readFileSync(new URL(`../${file}`, import.meta.url), "utf8");

describe("action.yml", () => {
	const action = read("action.yml");

	it("is a composite action that builds before it runs", () => {
		expect(action).toContain("using: 'composite'");
		const build = action.indexOf("npm run build");
		const run = action.indexOf(
			'node "${{ github.action_path }}/dist/bin/commit-range.js"',
		);
		expect(build).toBeGreaterThan(-1);
		expect(run).toBeGreaterThan(build);
	});

	it("runs the same entry point the package declares as its bin", () => {
		expect(read("package.json")).toContain(
			'"commit-range": "dist/bin/commit-range.js"',
		);
	});

	it("passes the push commits and pull request shas", () => {
		expect(action).toContain(
			"COMMIT_LIST: ${{ toJson(github.event.commits) }}",
		);
		expect(action).toContain(
			"PR_BASE_SHA: ${{ github.event.pull_request.base.sha }}",
		);
		expect(action).toContain(
			"PR_HEAD_SHA: ${{ github.event.pull_request.head.sha }}",
		);
	});
});
