export { ElementState } from "./enums";
export { EventHandlers } from "./handlers";
export type {
    InputEvent,
    KeyboardEvent,
    MouseDeltaEvent,
    Size,
    TickEvent,
    Vector2,
    WindowResizeEvent,
} from "./types";
