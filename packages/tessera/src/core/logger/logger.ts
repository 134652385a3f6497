import type { LogEntry, LogHandler, LoggerContext, LogLevel, LogThreshold } from "./types";

const LEVEL_RANK: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    constructor(private threshold: LogThreshold = "debug") {}

    get level(): LogThreshold {
        return this.threshold;
    }

    setLevel(level: LogThreshold): void {
        this.threshold = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}

/** Logger with no handlers, used where the caller supplies none. */
export function createSilentLogger(): Logger {
    return new Logger("silent");
}
