export { defaultsFromEnv, knownFlags, parseCLIArgs } from "./cli.js";
export { parseBooleanFlag, readEnv } from "./env.js";
export { USAGE } from "./usage.js";
