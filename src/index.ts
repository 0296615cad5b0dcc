// CHANGE: Public library surface of commit-range
// WHY: Callers can resolve a range from their own event objects and git boundary

export { resolveCommitRange } from "./app/resolveCommitRange.js";
export {
	computeAndPublish,
	type RunDependencies,
	runCommitRange,
} from "./app/runCommitRange.js";
export { computeExitCode, type RunOutcome } from "./core/decision.js";
export {
	type AppError,
	describeError,
	EventPayloadError,
	ExecError,
	FSError,
	MissingEventData,
	OutputValueError,
	UnknownEventKind,
} from "./core/errors.js";
export type {
	CommitRange,
	CommitRef,
	ExitCode,
	ParentSet,
	PullRequestPayload,
	PushPayload,
	RangeResolution,
	RevisionId,
	TriggerEvent,
	UndeterminedReason,
} from "./core/models.js";
export {
	parentRange,
	planRange,
	type RangePlan,
	splitRevisionList,
	threeDotRange,
} from "./core/range.js";
export type { CLIOptions, EnvSnapshot } from "./core/types/index.js";
export { main } from "./main.js";
export { parseCLIArgs, readEnv, USAGE } from "./shell/config/index.js";
export { createGitClient, type GitClient } from "./shell/git/index.js";
export {
	decodeCommitList,
	decodeRevision,
	loadTriggerEvent,
} from "./shell/github/event.js";
export { formatOutputLine, publishOutput } from "./shell/github/output.js";
