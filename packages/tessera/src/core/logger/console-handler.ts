import type { LogEntry, LogHandler, LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

const TAG_COLOR: Record<LogLevel, string> = { debug: dim, info: cyan, warn: yellow, error: red };

export type ConsoleHandlerOptions = {
    /** Emit ANSI colours. Defaults to `true`. */
    colors?: boolean;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, paint: (color: string, text: string) => string): string {
    if (value === null) return paint(magenta, "null");
    if (value === undefined) return paint(dim, "undefined");
    if (typeof value === "string") return paint(green, `"${value}"`);
    if (typeof value === "number" || typeof value === "boolean") return paint(yellow, String(value));
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((v) => formatValue(v, paint)).join(`${paint(dim, ",")} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${paint(cyan, k)}${paint(dim, ":")} ${formatValue(v, paint)}`);
        return `${paint(dim, "{")} ${pairs.join(`${paint(dim, ",")} `)} ${paint(dim, "}")}`;
    }
    return String(value);
}

/** Formats one entry as `HH:MM:SS [tag] code → message {details}`. */
export function formatEntry(entry: LogEntry, options?: ConsoleHandlerOptions): string {
    const colors = options?.colors ?? true;
    const paint = (color: string, text: string) => (colors ? `${color}${text}${reset}` : text);

    const tag = entry.level === "warn" || entry.level === "error" ? entry.level : "tessera";
    const detailsPart = entry.details ? ` ${formatValue(entry.details, paint)}` : "";
    return `${paint(dim, formatTime(entry.timestamp))} ${paint(TAG_COLOR[entry.level], `[${tag}]`)} ${entry.code} → ${entry.message}${detailsPart}`;
}

export function createConsoleHandler(options?: ConsoleHandlerOptions): LogHandler {
    return (entry: LogEntry) => {
        const line = formatEntry(entry, options);
        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
