import { EventHandler } from "../event/event-handler";
import type { DispatchSummary, EventHandlerOptions } from "../event/types";
import type { InputEvent, KeyboardEvent, MouseDeltaEvent, TickEvent, WindowResizeEvent } from "./types";

/** One handler per built-in event type, as owned by a scene. */
export class EventHandlers {
    readonly tick: EventHandler<TickEvent>;
    readonly key: EventHandler<KeyboardEvent>;
    readonly mouseDelta: EventHandler<MouseDeltaEvent>;
    readonly windowResize: EventHandler<WindowResizeEvent>;

    constructor(options: Omit<EventHandlerOptions, "name"> = {}) {
        this.tick = new EventHandler({ ...options, name: "tick" });
        this.key = new EventHandler({ ...options, name: "key" });
        this.mouseDelta = new EventHandler({ ...options, name: "mouse-delta" });
        this.windowResize = new EventHandler({ ...options, name: "window-resize" });
    }

    /** Total listeners across every handler. */
    get size(): number {
        return this.tick.size + this.key.size + this.mouseDelta.size + this.windowResize.size;
    }

    /** Route queued input to the handler for its kind. */
    raise(input: InputEvent): Promise<DispatchSummary> {
        switch (input.kind) {
            case "key":
                return this.key.handle({
                    scanCode: input.scanCode,
                    state: input.state,
                    virtualKeyCode: input.virtualKeyCode,
                });
            case "mouse-delta":
                return this.mouseDelta.handle({ delta: input.delta });
            case "resize":
                return this.windowResize.handle({ newSize: input.newSize });
        }
    }
}
