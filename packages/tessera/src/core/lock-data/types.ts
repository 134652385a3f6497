import type { EventHandler } from "../event/event-handler";
import type { ListenOutcome } from "../event/enums";
import type { LockMode } from "../shared/enums";
import type { Shared, WeakShared } from "../shared/shared";

/** `"read"` borrows a field immutably, `"write"` mutably. */
export type AccessMode = `${LockMode}`;

/** One declared capability: a field of `TShape` and the mode it is locked in. */
export type FieldDecl<TShape> = readonly [name: keyof TShape & string, mode: AccessMode];

/** The bundle itself: one weak handle per field of `TShape`. */
export type LockBindings<TShape> = { readonly [K in keyof TShape]: WeakShared<TShape[K]> };

type Borrow<TShape, F> = F extends readonly [infer K, infer M]
    ? K extends keyof TShape
        ? M extends "read"
            ? Readonly<TShape[K]>
            : TShape[K]
        : never
    : never;

/** The values a callback receives, in declaration order. */
export type Borrowed<TShape, TFields extends readonly FieldDecl<TShape>[]> = {
    readonly [I in keyof TFields]: Borrow<TShape, TFields[I]>;
};

export type LockDataCallback<E, TValues extends readonly unknown[]> = (
    event: E,
    ...values: TValues
) => void | Promise<void>;

export type Acquisition<TValues> =
    | { ok: true; values: TValues; release: () => void }
    | { ok: false; outcome: ListenOutcome.LockUnavailable | ListenOutcome.RequirementDeleted };

export interface LockDataDefinition<TShape, TFields extends readonly FieldDecl<TShape>[]> {
    readonly name: string;
    readonly fields: TFields;

    /** Wrap a set of weak handles in a bundle. */
    create(bindings: LockBindings<TShape>): Shared<LockBindings<TShape>>;

    /**
     * All-or-nothing acquisition of every declared field, in declaration order.
     * On success the caller owns the guards until it calls `release`.
     */
    acquire(bundle: Shared<LockBindings<TShape>>): Acquisition<Borrowed<TShape, TFields>>;

    /** Register a listener that keeps `bundle` alive until the listener is removed. */
    listen<E>(
        bundle: Shared<LockBindings<TShape>>,
        handler: EventHandler<E>,
        callback: LockDataCallback<E, Borrowed<TShape, TFields>>,
    ): void;

    /** Register a listener that is evicted once every strong handle to `bundle` is gone. */
    listenWeak<E>(
        bundle: WeakShared<LockBindings<TShape>>,
        handler: EventHandler<E>,
        callback: LockDataCallback<E, Borrowed<TShape, TFields>>,
    ): void;
}
