import { delay } from "es-toolkit";
import { createSilentLogger } from "../logger/logger";
import type { LoggerContext } from "../logger/types";
import { ListenOutcome } from "./enums";
import { fanOut } from "./fan-out";
import { computeRetryDelay, resolveConcurrency, resolveRetryPolicy } from "./retry";
import type { DispatchSummary, EventHandlerOptions, Listener, ListenerId, RetryPolicy } from "./types";

const noop = () => {};

type AttemptResult<E> = {
    listener: Listener<E>;
    outcome: ListenOutcome;
    error?: Error;
    /** Removed from the handler before its turn came; never executed. */
    skipped?: boolean;
};

/**
 * Owns the listeners for one event type and dispatches events to them.
 *
 * A dispatch attempts every listener over a fixed-size worker pool and partitions the
 * results: successes are done, {@link ListenOutcome.LockUnavailable} listeners are retried
 * after a back-off, {@link ListenOutcome.RequirementDeleted} listeners are evicted once all
 * rounds finish. Contention never evicts; a listener still contended when the retry
 * policy runs out is reported as starved and kept.
 */
export class EventHandler<E> {
    readonly name: string;
    private nextId: ListenerId = 0;
    private readonly listeners = new Map<ListenerId, Listener<E>>();
    private readonly concurrency: number;
    private readonly retry: RetryPolicy;
    private readonly logger: LoggerContext;
    private tail: Promise<unknown> = Promise.resolve();

    constructor(options?: EventHandlerOptions) {
        this.name = options?.name ?? "event";
        this.concurrency = resolveConcurrency(options?.concurrency, "EventHandler");
        this.retry = resolveRetryPolicy(options?.retry, "EventHandler");
        this.logger = options?.logger ?? createSilentLogger();
    }

    get size(): number {
        return this.listeners.size;
    }

    // ── Registration ─────────────────────────────────────────────────────

    /** Allocate the next listener id. Ids increase monotonically and are never reused. */
    newId(): ListenerId {
        return this.nextId++;
    }

    insert(listener: Listener<E>): void {
        if (this.listeners.has(listener.id)) {
            throw new Error(`[tessera] EventHandler "${this.name}": duplicate listener id ${listener.id}`);
        }
        this.listeners.set(listener.id, listener);
    }

    /** Remove a listener and dispose it. Returns `false` for unknown ids. */
    remove(id: ListenerId): boolean {
        const listener = this.listeners.get(id);
        if (!listener) return false;
        this.listeners.delete(id);
        listener.dispose?.();
        return true;
    }

    has(id: ListenerId): boolean {
        return this.listeners.has(id);
    }

    ids(): ListenerId[] {
        return [...this.listeners.keys()];
    }

    // ── Dispatch ─────────────────────────────────────────────────────────

    /**
     * Deliver `event` to every listener registered when the dispatch starts.
     *
     * Resolves once each listener has succeeded, been evicted, or run out of retries.
     * Overlapping calls are queued. Rejects only when a reaction itself throws, and
     * only after evictions have been applied.
     */
    handle(event: E): Promise<DispatchSummary> {
        const run = this.tail.then(() => this.dispatch(event));
        this.tail = run.catch(noop);
        return run;
    }

    private async dispatch(event: E): Promise<DispatchSummary> {
        let pending = [...this.listeners.values()];
        const succeeded: ListenerId[] = [];
        const deleted: ListenerId[] = [];
        const failures: Error[] = [];
        let rounds = 0;
        let attempts = 0;

        while (pending.length > 0) {
            rounds++;

            const results = await fanOut(pending, this.concurrency, (listener) => this.attempt(listener, event));
            const retry: Listener<E>[] = [];

            for (const { listener, outcome, error, skipped } of results) {
                if (skipped) continue;
                attempts++;
                if (error) {
                    failures.push(error);
                    this.logger.error("dispatch", "listener threw", {
                        handler: this.name,
                        listener: listener.id,
                        message: error.message,
                    });
                } else if (outcome === ListenOutcome.Success) {
                    succeeded.push(listener.id);
                } else if (outcome === ListenOutcome.LockUnavailable) {
                    retry.push(listener);
                } else {
                    deleted.push(listener.id);
                }
            }

            // Listeners removed explicitly while this round ran are not retried.
            pending = retry.filter((listener) => this.listeners.get(listener.id) === listener);
            if (pending.length === 0 || rounds >= this.retry.attempts) break;
            await delay(computeRetryDelay(this.retry, rounds));
        }

        const starved = pending.map((listener) => listener.id);
        if (starved.length > 0) {
            this.logger.warn("dispatch", `listeners still locked out after ${rounds} rounds`, {
                handler: this.name,
                listeners: starved,
            });
        }

        // An id removed explicitly in the meantime is not reported as evicted.
        const evicted = deleted.filter((id) => this.remove(id));
        if (evicted.length > 0) {
            this.logger.debug("dispatch", "evicted listeners with deleted requirements", {
                handler: this.name,
                listeners: evicted,
            });
        }

        if (failures.length === 1 && failures[0]) throw failures[0];
        if (failures.length > 1) {
            throw new AggregateError(failures, `[tessera] ${failures.length} listeners threw while handling "${this.name}"`);
        }

        return { rounds, attempts, succeeded, evicted, starved };
    }

    private async attempt(listener: Listener<E>, event: E): Promise<AttemptResult<E>> {
        if (this.listeners.get(listener.id) !== listener) {
            return { listener, outcome: ListenOutcome.Success, skipped: true };
        }
        try {
            return { listener, outcome: await listener.execute(event) };
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            return { listener, outcome: ListenOutcome.Success, error };
        }
    }
}
