import type { LoggerContext } from "../logger/types";
import type { ListenOutcome, RetryStrategy } from "./enums";

export type ListenerId = number;

/**
 * A registered reaction to one event type.
 *
 * Built by {@link defineLockData} rather than by hand; `execute` must not block and
 * must report contention as {@link ListenOutcome.LockUnavailable}.
 */
export interface Listener<E> {
    readonly id: ListenerId;
    execute(event: E): ListenOutcome | Promise<ListenOutcome>;
    /** Runs once when the listener leaves its handler, by eviction or explicit removal. */
    dispose?(): void;
}

/**
 * Bounds the retry rounds of one dispatch. `attempts` counts the first attempt,
 * so `attempts: 1` never retries.
 */
export type RetryPolicy = {
    attempts: number;
    strategy: RetryStrategy;
    delayMs: number;
    maxDelayMs: number;
};

export type DispatchOptions = {
    /** Number of workers attempting listeners at once. */
    concurrency?: number;
    retry?: Partial<RetryPolicy>;
};

export type EventHandlerOptions = DispatchOptions & {
    /** Used in log entries and error messages. */
    name?: string;
    logger?: LoggerContext;
};

/** What one call to `handle` did. */
export type DispatchSummary = {
    rounds: number;
    /** Listener attempts across all rounds. */
    attempts: number;
    succeeded: ListenerId[];
    evicted: ListenerId[];
    /** Still contended when the retry policy ran out; kept for the next dispatch. */
    starved: ListenerId[];
};
