const yellow = "\x1b[33m";
const green = "\x1b[32m";
const cyan = "\x1b[36m";
const red = "\x1b[31m";
const dim = "\x1b[90m";
const bold = "\x1b[1m";
const reset = "\x1b[0m";

// ── Level gating ────────────────────────────────────────────────────

export type CliLogLevel = "info" | "warn" | "error" | "silent";

export const CLI_LOG_LEVELS: readonly CliLogLevel[] = ["info", "warn", "error", "silent"];

const rank: Record<CliLogLevel, number> = { info: 0, warn: 1, error: 2, silent: 3 };

let currentLevel: CliLogLevel = "info";

export function setLogLevel(level: CliLogLevel): void {
    currentLevel = level;
}

function enabled(level: Exclude<CliLogLevel, "silent">): boolean {
    return rank[currentLevel] <= rank[level];
}

// ── Lines ───────────────────────────────────────────────────────────

export function info(msg: string): void {
    if (!enabled("info")) return;
    console.log(`  ${dim}▸${reset} ${msg}`);
}

export function warn(msg: string): void {
    if (!enabled("warn")) return;
    console.log(`  ${yellow}⚠ ${msg}${reset}`);
}

export function banner(command: string, detail: string): void {
    if (!enabled("info")) return;
    console.log(`\n${bold}${yellow}◆ tessera ${command}${reset} → ${cyan}${detail}${reset}\n`);
}

// ── Timing ──────────────────────────────────────────────────────────

export function startTimer(): () => string {
    const startedAt = performance.now();
    return () => formatDuration(Math.round(performance.now() - startedAt));
}

export function formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    const seconds = ms / 1000;
    if (seconds < 60) return `${seconds.toFixed(1)}s`;
    const minutes = Math.floor(seconds / 60);
    const rest = String(Math.round(seconds % 60)).padStart(2, "0");
    return `${minutes}m${rest}s`;
}

// ── Steps ───────────────────────────────────────────────────────────

const STEP_WIDTH = 22;

function leader(label: string): string {
    return "·".repeat(Math.max(2, STEP_WIDTH - label.length - 1));
}

/** `  label ······ ✓  12ms  extra` */
export function step(label: string, duration: string, extra?: string): void {
    if (!enabled("info")) return;
    const suffix = extra ? `  ${dim}${extra}${reset}` : "";
    console.log(`  ${label} ${dim}${leader(label)}${reset} ${green}✓ ${duration.padStart(5)}${reset}${suffix}`);
}

export function stepFail(label: string, message: string): void {
    console.error(`  ${label} ${dim}${leader(label)}${reset} ${red}✗ ${message}${reset}`);
}

export function footer(message: string, details: string[] = []): void {
    if (!enabled("info")) return;
    console.log(`\n  ${bold}${green}✓ ${message}${reset}`);
    for (const line of details) {
        console.log(`    ${dim}${line}${reset}`);
    }
    console.log("");
}
