// CHANGE: Read the GitHub Actions environment once into an immutable snapshot
// WHY: Parsing and resolution take the snapshot as a value, so tests never mutate process.env
// PURITY: SHELL (reads process.env only when no source is given)
// INVARIANT: "" → undefined for every optional field
// COMPLEXITY: O(1)

import type { EnvSnapshot } from "../../core/types/index.js";

type EnvSource = Readonly<Record<string, string | undefined>>;

const nonEmpty = (value: string | undefined): string | undefined =>
	value === undefined || value.trim().length === 0 ? undefined : value;

/**
 * Интерпретирует булеву переменную окружения ("true"/"1"/"yes", без учёта регистра).
 *
 * @pure true
 */
export function parseBooleanFlag(value: string | undefined): boolean {
	const normalized = (value ?? "").trim().toLowerCase();
	return normalized === "true" || normalized === "1" || normalized === "yes";
}

/**
 * Читает снимок окружения.
 *
 * @param source Источник переменных (по умолчанию process.env)
 * @returns Неизменяемый EnvSnapshot
 */
export function readEnv(source: EnvSource = process.env): EnvSnapshot {
	return {
		eventName: nonEmpty(source["GITHUB_EVENT_NAME"]),
		eventPath: nonEmpty(source["GITHUB_EVENT_PATH"]),
		commitList: nonEmpty(source["COMMIT_LIST"]),
		prBaseSha: nonEmpty(source["PR_BASE_SHA"]),
		prHeadSha: nonEmpty(source["PR_HEAD_SHA"]),
		outputFile: nonEmpty(source["GITHUB_OUTPUT"]),
		strict:
			parseBooleanFlag(source["COMMIT_RANGE_STRICT"]) ||
			parseBooleanFlag(source["INPUT_STRICT"]),
	};
}
