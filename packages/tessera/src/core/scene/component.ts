import { createShared, withWrite } from "../shared/helpers";
import type { Shared, WeakShared } from "../shared/shared";
import type { SceneNode } from "./node";
import type { Component } from "./types";

/**
 * Hand `component` to `node`, which becomes its only strong owner.
 *
 * Returns a weak handle: the component lives exactly as long as the node keeps it, so listeners
 * bound to it are evicted once the node is destroyed.
 */
export async function attachComponent<C extends Component>(node: Shared<SceneNode>, component: C): Promise<WeakShared<C>> {
    const handle = createShared(component);
    const weak = handle.downgrade();
    await withWrite(node, (value) => value.adopt(handle, component.kind));
    return weak;
}
