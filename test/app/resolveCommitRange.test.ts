// CHANGE: Specs for the resolver against a fake parent lookup
// FORMAT THEOREM: ∀e, ∀g: resolve(e, g) = resolve(e, g) (no hidden state)
// INVARIANT: git is queried only for pushes with ≥ 2 commits

import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { resolveCommitRange } from "../../src/app/resolveCommitRange.js";
import type { TriggerEvent } from "../../src/core/models.js";
import { fakeGit } from "../utils/fake-git.js";

const push = (...ids: string[]): TriggerEvent => ({
	kind: "push",
	commits: ids.map((id) => ({ id })),
});

describe("resolveCommitRange: push", () => {
	it("yields an empty range for a push without commits", () => {
		const git = fakeGit({});
		const result = Effect.runSync(resolveCommitRange(push(), git));
		expect(result).toEqual({
			status: "undetermined",
			range: "",
			reason: "no-commits",
			eventName: "push",
		});
		expect(git.parentCalls).toEqual([]);
	});

	it("yields an empty range for a single commit", () => {
		const git = fakeGit({ a: ["p"] });
		const result = Effect.runSync(resolveCommitRange(push("a"), git));
		expect(result.range).toBe("");
		expect(git.parentCalls).toEqual([]);
	});

	it("uses the first parent of a regular oldest commit", () => {
		const git = fakeGit({ a: ["p"] });
		const result = Effect.runSync(resolveCommitRange(push("a", "b"), git));
		expect(result).toEqual({ status: "resolved", range: "a^1...b" });
		expect(git.parentCalls).toEqual(["a"]);
	});

	it("uses the second parent when the oldest commit is a merge", () => {
		const git = fakeGit({ a: ["p1", "p2"] });
		const result = Effect.runSync(resolveCommitRange(push("a", "b", "c"), git));
		expect(result).toEqual({ status: "resolved", range: "a^2...c" });
	});

	it("emits ^0 for a root oldest commit", () => {
		const git = fakeGit({ a: [] });
		const result = Effect.runSync(resolveCommitRange(push("a", "b"), git));
		expect(result.range).toBe("a^0...b");
	});

	it("propagates a failed parent lookup", async () => {
		const error = await Effect.runPromise(
			Effect.flip(resolveCommitRange(push("a", "b"), fakeGit({}))),
		);
		expect(error._tag).toBe("Exec");
		expect(error.detail).toBe("fatal: bad revision 'a'");
	});
});

describe("resolveCommitRange: other events", () => {
	it("uses base...head for a pull request without querying git", () => {
		const git = fakeGit({});
		const result = Effect.runSync(
			resolveCommitRange({ kind: "pull_request", baseSha: "x", headSha: "y" }, git),
		);
		expect(result).toEqual({ status: "resolved", range: "x...y" });
		expect(git.parentCalls).toEqual([]);
	});

	it("yields an undetermined result for unknown events", () => {
		const result = Effect.runSync(
			resolveCommitRange({ kind: "other", eventName: "release" }, fakeGit({})),
		);
		expect(result).toEqual({
			status: "undetermined",
			range: "",
			reason: "unsupported-event",
			eventName: "release",
		});
	});
});

describe("resolveCommitRange: properties", () => {
	const revision = fc.hexaString({ minLength: 7, maxLength: 40 });

	it("is deterministic and follows oldest^k...newest", () => {
		fc.assert(
			fc.property(
				fc.array(revision, { maxLength: 8 }),
				fc.array(revision, { maxLength: 3 }),
				(ids, parents) => {
					const first = ids[0];
					const table: Record<string, readonly string[]> =
						first === undefined ? {} : { [first]: parents };
					const event = push(...ids);
					const once = Effect.runSync(resolveCommitRange(event, fakeGit(table)));
					const twice = Effect.runSync(resolveCommitRange(event, fakeGit(table)));
					expect(twice).toEqual(once);
					const expected =
						ids.length <= 1
							? ""
							: `${ids[0]}^${parents.length}...${ids[ids.length - 1]}`;
					expect(once.range).toBe(expected);
				},
			),
		);
	});
});
