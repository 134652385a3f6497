import type { Shared, WeakShared } from "../shared/shared";
import type { Scene } from "./scene";
import type { Component, NodeId, Quaternion, Vector3 } from "./types";

/**
 * A point in the scene that components hang off.
 *
 * The node owns its components: each is held by a strong handle that is released when the node
 * is destroyed, which in turn evicts the listeners that depended on them.
 */
export class SceneNode {
    position: Vector3 = { x: 0, y: 0, z: 0 };
    rotation: Quaternion = { w: 1, x: 0, y: 0, z: 0 };
    scale: Vector3 = { x: 1, y: 1, z: 1 };

    private readonly owned: { kind: string; handle: Shared<Component> }[] = [];
    private destroyed = false;

    constructor(
        readonly id: NodeId,
        /** Back-reference; never keeps the scene alive. */
        readonly scene: WeakShared<Scene>,
    ) {}

    get componentCount(): number {
        return this.owned.length;
    }

    /** Kinds of the attached components, in attachment order. */
    get componentKinds(): string[] {
        return this.owned.map(({ kind }) => kind);
    }

    /** Take ownership of a component's strong handle. */
    adopt(handle: Shared<Component>, kind: string): void {
        if (this.destroyed) {
            handle.release();
            throw new Error(`[tessera] SceneNode ${this.id}: cannot attach "${kind}" to a destroyed node`);
        }
        this.owned.push({ kind, handle });
    }

    /** Release every component. Runs once, when the last strong handle to the node goes. */
    destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        for (const { handle } of this.owned.splice(0).reverse()) {
            handle.release();
        }
    }
}
