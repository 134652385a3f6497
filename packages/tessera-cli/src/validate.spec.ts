import { describe, expect, it } from "vitest";
import { formatDuration } from "./terminal/logger";
import { parseCount, parseLogLevel } from "./validate";

describe("parseCount()", () => {
    it("accepts numbers and numeric strings", () => {
        expect(parseCount("frames", 12, { min: 0 })).toBe(12);
        expect(parseCount("frames", "7", { min: 0 })).toBe(7);
    });

    it("rejects values below the minimum or non-integers", () => {
        expect(() => parseCount("concurrency", 0, { min: 1 })).toThrow("--concurrency must be an integer ≥ 1, got 0");
        expect(() => parseCount("nodes", "2.5", { min: 0 })).toThrow("--nodes must be an integer ≥ 0, got 2.5");
        expect(() => parseCount("nodes", "", { min: 0 })).toThrow("--nodes must be an integer ≥ 0, got ");
    });
});

describe("parseLogLevel()", () => {
    it("accepts the terminal levels", () => {
        expect(parseLogLevel("warn")).toBe("warn");
    });

    it("rejects anything else", () => {
        expect(() => parseLogLevel("debug")).toThrow("--log-level must be one of info | warn | error | silent, got debug");
    });
});

describe("formatDuration()", () => {
    it("scales the unit with the duration", () => {
        expect(formatDuration(42)).toBe("42ms");
        expect(formatDuration(1500)).toBe("1.5s");
        expect(formatDuration(125_000)).toBe("2m05s");
    });
});
