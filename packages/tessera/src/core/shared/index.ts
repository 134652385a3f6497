export { LockMode } from "./enums";
export { createShared, withRead, withWrite } from "./helpers";
export { Shared, WeakShared } from "./shared";
export type { Guard, ReadGuard, SharedOptions, WriteGuard } from "./types";
