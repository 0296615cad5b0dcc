// CHANGE: Single execFile + Effect wrapper for every external command
// WHY: git is the only external tool; arguments are passed as an argv array so revision ids never reach a shell
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError, never>
// INVARIANT: ∀ command: execCommand(command) → stdout ∨ ExecError
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

export interface ExecOptions {
	readonly cwd?: string;
	readonly maxBuffer?: number;
}

/**
 * Extract a readable reason from a failed child process.
 *
 * Prefers stderr, since git reports "bad revision" and friends there.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeExecFailure(error: unknown): string {
	if (typeof error === "object" && error !== null) {
		if ("stderr" in error && typeof error.stderr === "string") {
			const stderr = error.stderr.trim();
			if (stderr.length > 0) return stderr;
		}
		if (error instanceof Error) return error.message;
	}
	return String(error);
}

/**
 * Execute a command with Effect pattern.
 *
 * @param file - Executable name
 * @param args - Arguments, passed without shell interpretation
 * @returns Effect with stdout or ExecError
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 */
export function execCommand(
	file: string,
	args: readonly string[],
	options: ExecOptions = {},
): Effect.Effect<string, ExecError> {
	const command = [file, ...args].join(" ");
	return Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				cwd: options.cwd,
				maxBuffer: options.maxBuffer ?? 10 * 1024 * 1024,
				encoding: "utf8",
			}),
		catch: (error) =>
			new ExecError({ command, detail: describeExecFailure(error) }),
	}).pipe(Effect.map(({ stdout }) => stdout));
}
