// ── Config ──────────────────────────────────────────────────────────
export * from "./config";
// ── Logger ──────────────────────────────────────────────────────────
export * from "./core/logger";
// ── Shared cells ────────────────────────────────────────────────────
export * from "./core/shared";
// ── Event handler ───────────────────────────────────────────────────
export * from "./core/event";
// ── Capability locks ────────────────────────────────────────────────
export * from "./core/lock-data";
// ── Built-in events ─────────────────────────────────────────────────
export * from "./core/events";
// ── Scene ───────────────────────────────────────────────────────────
export * from "./core/scene";
// ── Frame loop ──────────────────────────────────────────────────────
export * from "./core/loop";
// ── Lifecycle primitive ─────────────────────────────────────────────
export * from "./core/state-machine";
