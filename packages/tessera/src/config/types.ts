import type { DispatchOptions, RetryPolicy } from "../core/event/types";
import type { LogHandler, LogThreshold } from "../core/logger/types";

export type LoggerConfigInput = {
    /** Minimum level written. Defaults to `"info"`. */
    level?: LogThreshold;
    /** Write to the console. Defaults to `true`. */
    console?: boolean;
    /** Extra handlers, called after the console one. */
    handlers?: LogHandler[];
};

export type DefineEngineInput = {
    dispatch?: DispatchOptions;
    logger?: LoggerConfigInput;
};

export type EngineConfig = {
    readonly dispatch: {
        readonly concurrency: number;
        readonly retry: Readonly<RetryPolicy>;
    };
    readonly logger: {
        readonly level: LogThreshold;
        readonly console: boolean;
        readonly handlers: readonly LogHandler[];
    };
};
