import { describe, expect, it } from "vitest";

import { parseBooleanFlag, readEnv } from "../../../src/shell/config/index.js";

describe("readEnv", () => {
	it("returns an empty snapshot for an empty environment", () => {
		expect(readEnv({})).toEqual({ strict: false });
	});

	it("maps GitHub variables and drops blank values", () => {
		const env = readEnv({
			GITHUB_EVENT_NAME: "push",
			GITHUB_EVENT_PATH: "/github/workflow/event.json",
			COMMIT_LIST: "  ",
			PR_BASE_SHA: "",
			GITHUB_OUTPUT: "/github/output",
			COMMIT_RANGE_STRICT: "TRUE",
		});
		expect(env.eventName).toBe("push");
		expect(env.eventPath).toBe("/github/workflow/event.json");
		expect(env.commitList).toBeUndefined();
		expect(env.prBaseSha).toBeUndefined();
		expect(env.outputFile).toBe("/github/output");
		expect(env.strict).toBe(true);
	});
});

describe("parseBooleanFlag", () => {
	it("accepts true, 1 and yes in any case", () => {
		expect(parseBooleanFlag(" True ")).toBe(true);
		expect(parseBooleanFlag("1")).toBe(true);
		expect(parseBooleanFlag("YES")).toBe(true);
	});

	it("treats anything else as false", () => {
		expect(parseBooleanFlag("false")).toBe(false);
		expect(parseBooleanFlag("0")).toBe(false);
		expect(parseBooleanFlag(undefined)).toBe(false);
	});
});

describe("readEnv: action input", () => {
	it("enables strict mode from the action input", () => {
		expect(readEnv({ INPUT_STRICT: "true" }).strict).toBe(true);
	});
});
