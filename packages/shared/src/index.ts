export { logger, getNamedLogger, hasNamedLogger } from "./logger";
export type { NamedLoggerOptions } from "./logger";
export { onShutdown, sleep, isAbortError } from "./runtime";
export type { Sleep } from "./runtime";
