import type { ElementState } from "./enums";

export type Vector2 = { x: number; y: number };

export type Size = { width: number; height: number };

/** Raised once per frame. */
export type TickEvent = {
    /** Seconds since the previous tick. */
    delta: number;
};

/** A key changed state. */
export type KeyboardEvent = {
    /** Physical key; unaffected by the host's keyboard map. */
    scanCode: number;
    state: ElementState;
    /** Semantic key name such as `"Space"` or `"PageUp"`, when the host reports one. */
    virtualKeyCode: string | null;
};

/** Mouse movement since the previous frame, in pixels. */
export type MouseDeltaEvent = {
    delta: Vector2;
};

/** The output surface changed size. Also raised once when a frame loop starts. */
export type WindowResizeEvent = {
    newSize: Size;
};

/** Raw input queued on a frame loop and raised on the matching handler at the next frame. */
export type InputEvent =
    | ({ kind: "key" } & KeyboardEvent)
    | ({ kind: "mouse-delta" } & MouseDeltaEvent)
    | ({ kind: "resize" } & WindowResizeEvent);
