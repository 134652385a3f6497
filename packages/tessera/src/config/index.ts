export { createEngineLogger, defineEngineConfig, sceneOptionsFrom } from "./define-engine";
export type { DefineEngineInput, EngineConfig, LoggerConfigInput } from "./types";
