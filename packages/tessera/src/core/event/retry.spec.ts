import { describe, expect, it } from "vitest";
import { RetryStrategy } from "./enums";
import { computeRetryDelay, DEFAULT_RETRY_POLICY, resolveRetryPolicy } from "./retry";

describe("resolveRetryPolicy", () => {
    it("falls back to the defaults", () => {
        expect(resolveRetryPolicy(undefined, "test")).toEqual(DEFAULT_RETRY_POLICY);
    });

    it("raises maxDelayMs to delayMs when only delayMs is given", () => {
        const policy = resolveRetryPolicy({ delayMs: 50 }, "test");
        expect(policy.maxDelayMs).toBe(50);
    });

    it("rejects maxDelayMs below delayMs when both are given", () => {
        expect(() => resolveRetryPolicy({ delayMs: 10, maxDelayMs: 5 }, "test")).toThrow(
            "[tessera] test: retry.maxDelayMs must be at least retry.delayMs",
        );
    });

    it("rejects fractional attempts", () => {
        expect(() => resolveRetryPolicy({ attempts: 1.5 }, "test")).toThrow(
            "[tessera] test: retry.attempts must be a positive integer",
        );
    });

    it("rejects a negative delay", () => {
        expect(() => resolveRetryPolicy({ delayMs: -1 }, "test")).toThrow(
            "[tessera] test: retry.delayMs must be a non-negative number",
        );
    });
});

describe("computeRetryDelay", () => {
    it("keeps a fixed delay", () => {
        const policy = { attempts: 5, strategy: RetryStrategy.Fixed, delayMs: 4, maxDelayMs: 4 };
        expect([1, 2, 3].map((round) => computeRetryDelay(policy, round))).toEqual([4, 4, 4]);
    });

    it("doubles an exponential delay up to the cap", () => {
        const policy = { attempts: 10, strategy: RetryStrategy.Exponential, delayMs: 1, maxDelayMs: 16 };
        expect([1, 2, 3, 4, 5, 6, 7].map((round) => computeRetryDelay(policy, round))).toEqual([1, 2, 4, 8, 16, 16, 16]);
    });
});
