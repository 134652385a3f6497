import type { DispatchSummary } from "../event/types";
import type { Size } from "../events/types";
import type { LoggerContext } from "../logger/types";

export type FrameLoopOptions = {
    /** Monotonic time in seconds. Defaults to `performance.now() / 1000`. */
    clock?: () => number;
    /** Size announced by the resize event raised on start. Defaults to 1280×720. */
    initialSize?: Size;
    /** Defaults to the scene's logger. */
    logger?: LoggerContext;
};

export type FrameReport = {
    /** 1-based index of the frame just run. */
    frame: number;
    delta: number;
    /** Input events drained and raised before the tick. */
    input: number;
    tick: DispatchSummary;
};
