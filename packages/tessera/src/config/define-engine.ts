import { resolveConcurrency, resolveRetryPolicy } from "../core/event/retry";
import { createConsoleHandler } from "../core/logger/console-handler";
import { Logger } from "../core/logger/logger";
import type { LogThreshold } from "../core/logger/types";
import type { SceneOptions } from "../core/scene/types";
import type { DefineEngineInput, EngineConfig } from "./types";

const SOURCE = "defineEngineConfig";
const THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

export function defineEngineConfig(input: DefineEngineInput = {}): EngineConfig {
    const level = input.logger?.level ?? "info";
    if (!THRESHOLDS.includes(level)) {
        throw new Error(`[tessera] ${SOURCE}: logger.level must be one of ${THRESHOLDS.join(", ")}, got "${level}"`);
    }
    const handlers = input.logger?.handlers ?? [];
    for (const handler of handlers) {
        if (typeof handler !== "function") {
            throw new Error(`[tessera] ${SOURCE}: logger.handlers must contain functions`);
        }
    }

    return {
        dispatch: {
            concurrency: resolveConcurrency(input.dispatch?.concurrency, SOURCE),
            retry: resolveRetryPolicy(input.dispatch?.retry, SOURCE),
        },
        logger: {
            level,
            console: input.logger?.console ?? true,
            handlers: [...handlers],
        },
    };
}

/** Build the logger described by `config.logger`. */
export function createEngineLogger(config: EngineConfig): Logger {
    const logger = new Logger(config.logger.level);
    if (config.logger.console) {
        logger.addHandler(createConsoleHandler());
    }
    for (const handler of config.logger.handlers) {
        logger.addHandler(handler);
    }
    return logger;
}

/** Scene options carrying the config's dispatch settings and a fresh logger. */
export function sceneOptionsFrom(config: EngineConfig): SceneOptions {
    return {
        dispatch: { concurrency: config.dispatch.concurrency, retry: { ...config.dispatch.retry } },
        logger: createEngineLogger(config),
    };
}
