import { Shared, SharedCell } from "./shared";
import type { SharedOptions } from "./types";

/**
 * Wraps `value` in a reader/writer lock and returns the first strong handle to it.
 *
 * @example
 * const counter = createShared({ ticks: 0 });
 * const weak = counter.downgrade();
 * counter.release(); // weak.upgrade() now returns null
 */
export function createShared<T>(value: T, options?: SharedOptions<T>): Shared<T> {
    return new Shared(new SharedCell({ value }, options));
}

/** Run `fn` under a shared lock, waiting for it if necessary. */
export async function withRead<T, R>(shared: Shared<T>, fn: (value: Readonly<T>) => R | Promise<R>): Promise<R> {
    const guard = await shared.read();
    try {
        return await fn(guard.value);
    } finally {
        guard.release();
    }
}

/** Run `fn` under the exclusive lock, waiting for it if necessary. */
export async function withWrite<T, R>(shared: Shared<T>, fn: (value: T) => R | Promise<R>): Promise<R> {
    const guard = await shared.write();
    try {
        return await fn(guard.value);
    } finally {
        guard.release();
    }
}
