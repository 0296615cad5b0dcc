// CHANGE: CLI argument parsing for commit-range
// WHY: Flags override the environment snapshot; parsing is a fold over argv with a handler lookup table
// PURITY: SHELL (pure when argv and env are passed explicitly)
// INVARIANT: Unknown flags are ignored; a value flag without a value is ignored
// COMPLEXITY: O(n) where n = |argv|

import type { CLIOptions, EnvSnapshot } from "../../core/types/index.js";
import { readEnv } from "./env.js";

type ValueKey =
	| "eventName"
	| "eventPath"
	| "commitsJson"
	| "baseSha"
	| "headSha"
	| "cwd"
	| "outputName";

type BooleanKey = "listCommits" | "strict" | "help";

interface ArgProcessResult {
	readonly state: CLIOptions;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (
	args: readonly string[],
	index: number,
	current: CLIOptions,
) => ArgProcessResult | null;

// CHANGE: Created handlers for value flags
// WHY: Eliminates branching in processArgument
function createValueFlagHandler(key: ValueKey): ValueFlagHandler {
	return (args, index, current) => {
		const value = args[index + 1];
		if (value === undefined) return null;
		return { state: { ...current, [key]: value }, skipNext: true };
	};
}

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--event-name": createValueFlagHandler("eventName"),
	"--event-path": createValueFlagHandler("eventPath"),
	"--commits": createValueFlagHandler("commitsJson"),
	"--base": createValueFlagHandler("baseSha"),
	"--head": createValueFlagHandler("headSha"),
	"--cwd": createValueFlagHandler("cwd"),
	"--output-name": createValueFlagHandler("outputName"),
};

const booleanFlags: Readonly<Record<string, BooleanKey | undefined>> = {
	"--list": "listCommits",
	"--strict": "strict",
	"--help": "help",
	"-h": "help",
};

/**
 * Every flag the parser recognises, in table order.
 *
 * @pure true
 */
export const knownFlags = (): readonly string[] => [
	...Object.keys(valueHandlers),
	...Object.keys(booleanFlags),
];

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: CLIOptions,
): ArgProcessResult {
	const handler = valueHandlers[arg];
	if (handler !== undefined) {
		const result = handler(args, index, current);
		if (result !== null) return result;
	}

	const booleanKey = booleanFlags[arg];
	if (booleanKey !== undefined) {
		return { state: { ...current, [booleanKey]: true }, skipNext: false };
	}

	return { state: current, skipNext: false };
}

/**
 * Defaults derived from the environment snapshot.
 *
 * @pure true
 */
export function defaultsFromEnv(env: EnvSnapshot, cwd: string): CLIOptions {
	return {
		eventName: env.eventName,
		eventPath: env.eventPath,
		commitsJson: env.commitList,
		baseSha: env.prBaseSha,
		headSha: env.prHeadSha,
		outputFile: env.outputFile,
		cwd,
		outputName: "commit-range",
		listCommits: false,
		strict: env.strict,
		help: false,
	};
}

/**
 * Парсит аргументы командной строки поверх значений из окружения.
 *
 * @param argv Аргументы без `node` и имени скрипта
 * @param env Снимок окружения
 * @returns Опции командной строки
 *
 * @example
 * ```ts
 * // Command: commit-range --event-name pull_request --base abc --head def
 * const options = parseCLIArgs();
 * // Returns: { eventName: "pull_request", baseSha: "abc", headSha: "def", ... }
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[] = process.argv.slice(2),
	env: EnvSnapshot = readEnv(),
	cwd: string = process.cwd(),
): CLIOptions {
	let state = defaultsFromEnv(env, cwd);

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, argv, i, state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
