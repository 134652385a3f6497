import { afterEach, describe, expect, it, vi } from "vitest";
import { setLogLevel } from "../terminal/logger";
import { demo, runDemo } from "./demo";

afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
});

describe("runDemo()", () => {
    it("evicts the listeners of removed nodes and keeps ticking the rest", async () => {
        const summary = await runDemo({
            frames: 4,
            nodes: 3,
            dropEvery: 2,
            concurrency: 2,
            logLevel: "silent",
            engineConsole: false,
        });

        expect(summary).toEqual({
            frames: 4,
            nodesCreated: 3,
            nodesRemaining: 1,
            ticksDelivered: 8,
            evicted: 2,
            starved: 0,
            tickListeners: 1,
            componentTicks: [4],
        });
    });

    it("ticks every component on every frame when nothing is removed", async () => {
        const summary = await runDemo({ frames: 5, nodes: 2, dropEvery: 0, logLevel: "silent", engineConsole: false });
        expect(summary.componentTicks).toEqual([5, 5]);
        expect(summary.ticksDelivered).toBe(10);
        expect(summary.evicted).toBe(0);
    });

    it("prints nothing when silent", async () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        await runDemo({ frames: 1, nodes: 1, dropEvery: 0, logLevel: "silent", engineConsole: false });
        expect(log).not.toHaveBeenCalled();
    });

    it("prints a footer at info level", async () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        await runDemo({ frames: 1, nodes: 1, dropEvery: 0, logLevel: "info", engineConsole: false });
        const lines = log.mock.calls.map((call) => String(call[0]));
        expect(lines.some((line) => line.includes("✓ demo finished"))).toBe(true);
        expect(lines).toContain("    \x1b[90mticks delivered  1\x1b[0m");
    });
});

describe("demo()", () => {
    it("exits with status 1 on an invalid flag", async () => {
        const exit = vi.spyOn(process, "exit").mockImplementation(() => {
            throw new Error("process.exit");
        });
        const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

        await expect(demo({ frames: -3 })).rejects.toThrow("process.exit");
        expect(exit).toHaveBeenCalledWith(1);
        expect(String(stderr.mock.calls[0]?.[0])).toContain("--frames must be an integer ≥ 0, got -3");
    });
});
