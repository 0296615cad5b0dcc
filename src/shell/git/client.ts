// CHANGE: Narrow git boundary for the resolver
// WHY: The resolver needs exactly one query (parents of a revision); tests replace it with a fake
// PURITY: SHELL
// INVARIANT: getParents returns parents in the order git reports them
// INVARIANT: revisions follow --end-of-options, so git never reads them as flags
// COMPLEXITY: O(1) process spawn per call

import { Effect } from "effect";

import type { ExecError } from "../../core/errors.js";
import type { CommitRange, ParentSet, RevisionId } from "../../core/models.js";
import { splitRevisionList } from "../../core/range.js";
import { execCommand } from "../utils/exec.js";

/**
 * Git-операции, необходимые для вычисления диапазона.
 *
 * @property getParents Родители ревизии в порядке, который сообщает git
 * @property listCommits Коммиты, выбранные выражением диапазона (новые первыми)
 */
export interface GitClient {
	readonly getParents: (
		revision: RevisionId,
	) => Effect.Effect<ParentSet, ExecError>;
	readonly listCommits: (
		range: CommitRange,
	) => Effect.Effect<readonly RevisionId[], ExecError>;
}

/**
 * Создаёт GitClient поверх системного `git`.
 *
 * @param cwd Рабочая директория репозитория
 * @returns GitClient, выполняющий команды через execFile
 */
export function createGitClient(cwd?: string): GitClient {
	const options = cwd === undefined ? {} : { cwd };
	return {
		getParents: (revision) =>
			execCommand(
				"git",
				["show", "--no-patch", "--format=%P", "--end-of-options", revision],
				options,
			).pipe(Effect.map(splitRevisionList)),
		listCommits: (range) =>
			execCommand("git", ["rev-list", "--end-of-options", range], options).pipe(
				Effect.map(splitRevisionList),
			),
	};
}
