import { defineLockData } from "../lock-data/lock-data";
import { withRead } from "../shared/helpers";
import type { Shared, WeakShared } from "../shared/shared";
import { attachComponent } from "./component";
import type { SceneNode } from "./node";
import type { Component } from "./types";

/** Counts ticks and reports key events for the node it is attached to. */
export class TickDebugComponent implements Component {
    readonly kind = "tick-debug";
    ticks = 0;
    keys = 0;
    /** Seconds accumulated from tick deltas. */
    elapsed = 0;

    constructor(readonly node: WeakShared<SceneNode>) {}
}

export const TickDebugData = defineLockData<{ component: TickDebugComponent }>()("TickDebugData", [
    "component",
    "write",
]);

/**
 * Attach a {@link TickDebugComponent} to `node` and subscribe it to the scene's tick and key
 * events. Throws if the node's scene has already been dropped.
 */
export async function attachTickDebug(node: Shared<SceneNode>): Promise<WeakShared<TickDebugComponent>> {
    const { id, scene: sceneRef } = await withRead(node, (value) => ({ id: value.id, scene: value.scene }));
    const scene = sceneRef.upgrade();
    if (!scene) {
        throw new Error(`[tessera] attachTickDebug: node ${id} no longer belongs to a live scene`);
    }

    try {
        const { events, logger } = await withRead(scene, (value) => ({ events: value.events, logger: value.logger }));
        const component = await attachComponent(node, new TickDebugComponent(node.downgrade()));
        const data = TickDebugData.create({ component });

        TickDebugData.listen(data, events.tick, (event, debug) => {
            debug.ticks++;
            debug.elapsed += event.delta;
        });
        TickDebugData.listen(data, events.key, (event, debug) => {
            debug.keys++;
            logger.debug("tick-debug", "key", {
                node: id,
                scanCode: event.scanCode,
                state: event.state,
                virtualKeyCode: event.virtualKeyCode,
            });
        });
        data.release();

        return component;
    } finally {
        scene.release();
    }
}
