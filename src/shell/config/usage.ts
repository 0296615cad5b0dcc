// CHANGE: Usage text shared by --help and README.md
// WHY: README must contain the exact --help output; a test compares them
// PURITY: CORE-like constant (no effects)

export const USAGE = [
	"Usage: commit-range [options]",
	"",
	"Compute the commit range introduced by a push or pull request and publish",
	"it as the step output `commit-range`.",
	"",
	"Options:",
	"  --event-name <name>    event kind (default: $GITHUB_EVENT_NAME)",
	"  --event-path <file>    event payload JSON (default: $GITHUB_EVENT_PATH)",
	"  --commits <json>       push commits, oldest first (default: $COMMIT_LIST)",
	"  --base <sha>           pull request base (default: $PR_BASE_SHA)",
	"  --head <sha>           pull request head (default: $PR_HEAD_SHA)",
	"  --cwd <dir>            git working directory (default: current directory)",
	"  --output-name <name>   output name (default: commit-range)",
	"  --list                 also print the commits selected by the range",
	"  --strict               fail on events without a range rule",
	"                         (default: $COMMIT_RANGE_STRICT)",
	"  -h, --help             print this help and exit",
].join("\n");
