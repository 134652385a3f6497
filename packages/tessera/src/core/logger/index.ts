export { type ConsoleHandlerOptions, createConsoleHandler, formatEntry } from "./console-handler";
export { createSilentLogger, Logger } from "./logger";
export type { LogEntry, LogHandler, LoggerContext, LogLevel, LogThreshold } from "./types";
