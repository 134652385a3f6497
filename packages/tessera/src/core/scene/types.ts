import type { DispatchOptions } from "../event/types";
import type { LoggerContext } from "../logger/types";

export type Vector3 = { x: number; y: number; z: number };

/** Unit quaternion; the identity is `{ w: 1, x: 0, y: 0, z: 0 }`. */
export type Quaternion = { w: number; x: number; y: number; z: number };

export type NodeId = number;

/** Anything attached to a node. `kind` names the component type in logs. */
export interface Component {
    readonly kind: string;
}

export type SceneOptions = {
    /** Applied to every built-in event handler of the scene. */
    dispatch?: DispatchOptions;
    logger?: LoggerContext;
};
