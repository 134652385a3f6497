export { LoopState } from "./enums";
export { FrameLoop } from "./frame-loop";
export type { FrameLoopOptions, FrameReport } from "./types";
