import { EventHandlers } from "../events/handlers";
import { createSilentLogger } from "../logger/logger";
import type { LoggerContext } from "../logger/types";
import { createShared } from "../shared/helpers";
import { type Shared, WeakShared } from "../shared/shared";
import { SceneNode } from "./node";
import type { NodeId, SceneOptions } from "./types";

/**
 * Root of a node graph and owner of the built-in event handlers.
 *
 * Create one with {@link createScene}. The scene holds a strong handle to every node it created;
 * dropping the scene releases them all.
 */
export class Scene {
    readonly events: EventHandlers;
    readonly logger: LoggerContext;

    private self: WeakShared<Scene> = WeakShared.empty();
    private readonly owned = new Map<NodeId, Shared<SceneNode>>();
    private nextNodeId: NodeId = 0;

    constructor(options: SceneOptions = {}) {
        this.logger = options.logger ?? createSilentLogger();
        this.events = new EventHandlers({ ...options.dispatch, logger: this.logger });
    }

    get nodeCount(): number {
        return this.owned.size;
    }

    /**
     * Create a node owned by this scene.
     * The returned handle is the caller's own; release it once the caller no longer needs the node.
     */
    newNode(): Shared<SceneNode> {
        if (this.self.expired) {
            throw new Error("[tessera] Scene.newNode: scene was not created with createScene() or has been dropped");
        }
        const id = this.nextNodeId++;
        const node = createShared(new SceneNode(id, this.self), { onDrop: (value) => value.destroy() });
        this.owned.set(id, node);
        this.logger.debug("scene", "node added", { node: id });
        return node.clone();
    }

    /** Release the scene's own handle to `node`. Returns `false` if the scene does not own it. */
    removeNode(node: Shared<SceneNode>): boolean {
        for (const [id, owned] of this.owned) {
            if (!owned.is(node)) continue;
            this.owned.delete(id);
            owned.release();
            this.logger.debug("scene", "node removed", { node: id });
            return true;
        }
        return false;
    }

    /** Weak handles to the current nodes, in creation order. */
    nodes(): WeakShared<SceneNode>[] {
        return [...this.owned.values()].map((node) => node.downgrade());
    }

    /** @internal Called once by {@link createScene}. */
    bind(self: WeakShared<Scene>): void {
        this.self = self;
    }

    /** @internal Runs when the last strong handle to the scene is released. */
    dispose(): void {
        const nodes = [...this.owned.values()];
        this.owned.clear();
        for (const node of nodes) {
            node.release();
        }
        this.logger.debug("scene", "dropped", { nodes: nodes.length });
    }
}

/** Create a scene and return the first strong handle to it. */
export function createScene(options?: SceneOptions): Shared<Scene> {
    const scene = new Scene(options);
    const handle = createShared(scene, { onDrop: (value) => value.dispose() });
    scene.bind(handle.downgrade());
    return handle;
}
