export type LogLevel = "debug" | "info" | "warn" | "error";

/** Threshold accepted by {@link Logger}; `"silent"` drops every entry. */
export type LogThreshold = LogLevel | "silent";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

/** The logging surface handed to handlers, scenes and the frame loop. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    info(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}
