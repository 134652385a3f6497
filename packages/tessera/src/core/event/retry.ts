import { availableParallelism } from "node:os";
import { RetryStrategy } from "./enums";
import type { RetryPolicy } from "./types";

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
    attempts: 32,
    strategy: RetryStrategy.Exponential,
    delayMs: 1,
    maxDelayMs: 16,
};

export function defaultConcurrency(): number {
    return availableParallelism();
}

/** Fills `input` from {@link DEFAULT_RETRY_POLICY} and rejects values no dispatch could honour. */
export function resolveRetryPolicy(input: Partial<RetryPolicy> | undefined, source: string): RetryPolicy {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...input };
    if (input?.maxDelayMs === undefined && policy.maxDelayMs < policy.delayMs) {
        policy.maxDelayMs = policy.delayMs;
    }

    if (!Number.isInteger(policy.attempts) || policy.attempts < 1) {
        throw new Error(`[tessera] ${source}: retry.attempts must be a positive integer`);
    }
    if (!Object.values(RetryStrategy).includes(policy.strategy)) {
        throw new Error(`[tessera] ${source}: unknown retry.strategy "${policy.strategy}"`);
    }
    if (!Number.isFinite(policy.delayMs) || policy.delayMs < 0) {
        throw new Error(`[tessera] ${source}: retry.delayMs must be a non-negative number`);
    }
    if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.delayMs) {
        throw new Error(`[tessera] ${source}: retry.maxDelayMs must be at least retry.delayMs`);
    }
    return policy;
}

export function resolveConcurrency(input: number | undefined, source: string): number {
    const concurrency = input ?? defaultConcurrency();
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new Error(`[tessera] ${source}: concurrency must be a positive integer`);
    }
    return concurrency;
}

/** Back-off before retry round `round + 1`, where `round` is the round that just finished. */
export function computeRetryDelay(policy: RetryPolicy, round: number): number {
    if (policy.strategy === RetryStrategy.Exponential) {
        return Math.min(policy.delayMs * 2 ** (round - 1), policy.maxDelayMs);
    }
    return policy.delayMs;
}
