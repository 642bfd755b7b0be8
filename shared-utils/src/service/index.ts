export { JobLifecycle } from "./lifecycle";
export { ConsoleLogger, createLogger, parseLogLevel } from "./logger";
export { JobState } from "./types";
export type { Logger, LogLevel } from "./types";
