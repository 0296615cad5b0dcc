// CHANGE: Central export file for type definitions
// WHY: Provides a single import point for all types used across modules

export type { CLIOptions, EnvSnapshot } from "./config.js";
