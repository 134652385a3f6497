import { CLI_LOG_LEVELS, type CliLogLevel } from "./terminal/logger";

/** cac hands numeric flags over as numbers and everything else as strings. */
export function parseCount(flag: string, value: unknown, options: { min: number }): number {
    const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < options.min) {
        throw new Error(`--${flag} must be an integer ≥ ${options.min}, got ${String(value)}`);
    }
    return parsed;
}

export function parseLogLevel(value: unknown): CliLogLevel {
    const level = CLI_LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new Error(`--log-level must be one of ${CLI_LOG_LEVELS.join(" | ")}, got ${String(value)}`);
    }
    return level;
}
