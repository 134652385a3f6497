import { isPromise, once } from "es-toolkit";
import { ListenOutcome } from "../event/enums";
import type { EventHandler } from "../event/event-handler";
import { LockMode } from "../shared/enums";
import { createShared } from "../shared/helpers";
import { type Shared, WeakShared } from "../shared/shared";
import type { Guard } from "../shared/types";
import type {
    AccessMode,
    Acquisition,
    Borrowed,
    FieldDecl,
    LockBindings,
    LockDataCallback,
    LockDataDefinition,
} from "./types";

const LOCK_MODES: Record<AccessMode, LockMode> = {
    read: LockMode.Read,
    write: LockMode.Write,
};

type Held = {
    strong: Shared<unknown>;
    guard: Guard<unknown>;
};

/**
 * Upgrade and try-lock every field of `bundle` in declaration order.
 *
 * Stops at the first field that fails: a failed upgrade means the field's value is gone
 * ({@link ListenOutcome.RequirementDeleted}), a failed lock means it is busy
 * ({@link ListenOutcome.LockUnavailable}). Either way everything taken so far is released
 * before returning, so no lock outlives a failed attempt.
 */
function acquireFields<TShape>(
    bundle: Shared<LockBindings<TShape>>,
    fields: readonly FieldDecl<TShape>[],
): Acquisition<readonly unknown[]> {
    const bundleGuard = bundle.tryRead();
    if (!bundleGuard) return { ok: false, outcome: ListenOutcome.LockUnavailable };

    const held: Held[] = [];
    const release = once(() => {
        for (const { strong, guard } of held.reverse()) {
            guard.release();
            strong.release();
        }
        bundleGuard.release();
    });

    for (const [name, mode] of fields) {
        const strong: Shared<unknown> | null = bundleGuard.value[name].upgrade();
        if (!strong) {
            release();
            return { ok: false, outcome: ListenOutcome.RequirementDeleted };
        }
        const guard = strong.tryLock(LOCK_MODES[mode]);
        if (!guard) {
            strong.release();
            release();
            return { ok: false, outcome: ListenOutcome.LockUnavailable };
        }
        held.push({ strong, guard });
    }

    return { ok: true, values: held.map(({ guard }) => guard.value), release };
}

function validateFields(name: string, fields: readonly (readonly [string, string])[]): void {
    if (!name || name.trim().length === 0) {
        throw new Error("[tessera] defineLockData: name is required");
    }
    if (fields.length === 0) {
        throw new Error(`[tessera] defineLockData "${name}": at least one field is required`);
    }
    const seen = new Set<string>();
    for (const [field, mode] of fields) {
        if (!field || field.trim().length === 0) {
            throw new Error(`[tessera] defineLockData "${name}": field names must be non-empty`);
        }
        if (seen.has(field)) {
            throw new Error(`[tessera] defineLockData "${name}": duplicate field "${field}"`);
        }
        if (!(mode in LOCK_MODES)) {
            throw new Error(`[tessera] defineLockData "${name}": field "${field}" must be "read" or "write", got "${mode}"`);
        }
        seen.add(field);
    }
}

/**
 * Declares a named bundle of lockable capabilities.
 *
 * `TShape` maps each field to the type of the value behind it; the field list fixes the
 * order fields are acquired in and the order the callback receives them.
 *
 * @example
 * const HelloWorldData = defineLockData<{ helloWorld: Greeting; output: Output }>()(
 *     "HelloWorldData",
 *     ["helloWorld", "read"],
 *     ["output", "write"],
 * );
 * const data = HelloWorldData.create({ helloWorld: greeting.downgrade(), output: output.downgrade() });
 * HelloWorldData.listen(data, handler, (_event, helloWorld, output) => {
 *     output.message = helloWorld.message;
 * });
 */
export function defineLockData<TShape>() {
    return <const TFields extends readonly FieldDecl<TShape>[]>(
        name: string,
        ...fields: TFields
    ): LockDataDefinition<TShape, TFields> => {
        validateFields(name, fields);

        const acquire = (bundle: Shared<LockBindings<TShape>>): Acquisition<Borrowed<TShape, TFields>> => {
            const acquired = acquireFields(bundle, fields);
            if (!acquired.ok) return acquired;
            // type-erased — `acquireFields` yields one value per entry of `fields`, in order
            return { ok: true, values: acquired.values as Borrowed<TShape, TFields>, release: acquired.release };
        };

        const register = <E>(
            handler: EventHandler<E>,
            bundle: WeakShared<LockBindings<TShape>>,
            callback: LockDataCallback<E, Borrowed<TShape, TFields>>,
            dispose?: () => void,
        ): void => {
            handler.insert({
                id: handler.newId(),
                async execute(event: E): Promise<ListenOutcome> {
                    const strong = bundle.upgrade();
                    if (!strong) return ListenOutcome.RequirementDeleted;
                    try {
                        const acquired = acquire(strong);
                        if (!acquired.ok) return acquired.outcome;
                        try {
                            const result = callback(event, ...acquired.values);
                            if (isPromise(result)) await result;
                        } finally {
                            acquired.release();
                        }
                        return ListenOutcome.Success;
                    } finally {
                        strong.release();
                    }
                },
                dispose,
            });
        };

        return {
            name,
            fields,
            create(bindings: LockBindings<TShape>) {
                for (const [field] of fields) {
                    if (!(bindings[field] instanceof WeakShared)) {
                        throw new Error(`[tessera] ${name}.create: field "${field}" must be a WeakShared handle`);
                    }
                }
                return createShared(bindings);
            },
            acquire,
            listen<E>(
                bundle: Shared<LockBindings<TShape>>,
                handler: EventHandler<E>,
                callback: LockDataCallback<E, Borrowed<TShape, TFields>>,
            ) {
                const owned = bundle.clone();
                register(handler, owned.downgrade(), callback, once(() => owned.release()));
            },
            listenWeak<E>(
                bundle: WeakShared<LockBindings<TShape>>,
                handler: EventHandler<E>,
                callback: LockDataCallback<E, Borrowed<TShape, TFields>>,
            ) {
                register(handler, bundle, callback);
            },
        };
    };
}
