export { attachComponent } from "./component";
export { SceneNode } from "./node";
export { createScene, Scene } from "./scene";
export { attachTickDebug, TickDebugComponent, TickDebugData } from "./tick-debug";
export type { Component, NodeId, Quaternion, SceneOptions, Vector3 } from "./types";
