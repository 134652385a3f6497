import { describe, expect, it, vi } from "vitest";
import { RetryStrategy } from "../core/event/enums";
import { createEngineLogger, defineEngineConfig, sceneOptionsFrom } from "./define-engine";

describe("defineEngineConfig()", () => {
    it("fills every default", () => {
        const config = defineEngineConfig({ dispatch: { concurrency: 3 } });
        expect(config).toEqual({
            dispatch: {
                concurrency: 3,
                retry: { attempts: 32, strategy: RetryStrategy.Exponential, delayMs: 1, maxDelayMs: 16 },
            },
            logger: { level: "info", console: true, handlers: [] },
        });
    });

    it("defaults concurrency to a positive integer", () => {
        const { dispatch } = defineEngineConfig();
        expect(Number.isInteger(dispatch.concurrency)).toBe(true);
        expect(dispatch.concurrency).toBeGreaterThan(0);
    });

    it("merges a partial retry policy", () => {
        const config = defineEngineConfig({ dispatch: { retry: { strategy: RetryStrategy.Fixed, delayMs: 20 } } });
        expect(config.dispatch.retry).toEqual({ attempts: 32, strategy: "fixed", delayMs: 20, maxDelayMs: 20 });
    });

    it("rejects invalid dispatch settings", () => {
        expect(() => defineEngineConfig({ dispatch: { concurrency: 1.5 } })).toThrow(
            "[tessera] defineEngineConfig: concurrency must be a positive integer",
        );
        expect(() => defineEngineConfig({ dispatch: { retry: { delayMs: 8, maxDelayMs: 4 } } })).toThrow(
            "[tessera] defineEngineConfig: retry.maxDelayMs must be at least retry.delayMs",
        );
    });

    it("rejects an unknown log level", () => {
        const logger = JSON.parse('{ "level": "verbose" }');
        expect(() => defineEngineConfig({ logger })).toThrow(
            '[tessera] defineEngineConfig: logger.level must be one of debug, info, warn, error, silent, got "verbose"',
        );
    });

    it("copies the handler list", () => {
        const handlers = [vi.fn()];
        const config = defineEngineConfig({ logger: { handlers } });
        handlers.push(vi.fn());
        expect(config.logger.handlers).toHaveLength(1);
    });
});

describe("createEngineLogger()", () => {
    it("applies the level and extra handlers", () => {
        const handler = vi.fn();
        const logger = createEngineLogger(defineEngineConfig({ logger: { level: "warn", console: false, handlers: [handler] } }));

        logger.info("scene", "ignored");
        logger.warn("dispatch", "kept", { listeners: [1] });

        expect(logger.level).toBe("warn");
        expect(handler).toHaveBeenCalledOnce();
        expect(handler.mock.calls[0]?.[0]).toMatchObject({ level: "warn", code: "dispatch", message: "kept" });
    });
});

describe("sceneOptionsFrom()", () => {
    it("carries dispatch settings and a configured logger", () => {
        const options = sceneOptionsFrom(defineEngineConfig({ dispatch: { concurrency: 2 }, logger: { console: false } }));
        expect(options.dispatch).toMatchObject({ concurrency: 2, retry: { attempts: 32 } });
        expect(options.logger).toBeDefined();
    });
});
