// CHANGE: Publish the computed range as a step output
// WHY: Downstream steps read `steps.<id>.outputs.commit-range`; outside Actions the value goes to stdout
// PURITY: SHELL (appends to GITHUB_OUTPUT or writes stdout)
// EFFECT: Effect<OutputTarget, FSError | OutputValueError>
// INVARIANT: An empty range is published as an empty value, never omitted; line breaks are rejected
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { FSError, OutputValueError } from "../../core/errors.js";
import { fs } from "../utils/node-mods.js";

export type OutputTarget = "github-output" | "stdout";

const LINE_BREAK = /[\r\n]/u;

/**
 * Formats one `name=value` line of the GITHUB_OUTPUT file.
 *
 * @pure true
 * @invariant Right(line) → line contains exactly one "\n", at the end
 * @example formatOutputLine("commit-range", "a...b") // Right("commit-range=a...b\n")
 */
export const formatOutputLine = (
	name: string,
	value: string,
): Either.Either<string, OutputValueError> => {
	if (name.length === 0 || name.includes("=") || LINE_BREAK.test(name)) {
		return Either.left(
			new OutputValueError({ name, detail: "invalid output name" }),
		);
	}
	if (LINE_BREAK.test(value)) {
		return Either.left(
			new OutputValueError({ name, detail: "value contains a line break" }),
		);
	}
	return Either.right(`${name}=${value}\n`);
};

/**
 * Публикует значение output.
 *
 * @param name Имя output (например, "commit-range")
 * @param value Значение; пустая строка допустима
 * @param outputFile Путь к файлу GITHUB_OUTPUT; без него значение печатается в stdout
 * @returns Куда было опубликовано значение
 */
export function publishOutput(
	name: string,
	value: string,
	outputFile: string | undefined,
): Effect.Effect<OutputTarget, FSError | OutputValueError> {
	return Effect.gen(function* () {
		const line = yield* formatOutputLine(name, value);
		if (outputFile === undefined) {
			console.log(value);
			return "stdout" as const;
		}
		yield* Effect.tryPromise({
			try: () => fs.promises.appendFile(outputFile, line, "utf8"),
			catch: (error) =>
				new FSError({
					path: outputFile,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		return "github-output" as const;
	});
}
