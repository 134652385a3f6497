import type { LockMode } from "./enums";

export type SharedOptions<T> = {
    /** Runs once, when the last strong handle is released. */
    onDrop?: (value: T) => void;
};

export interface ReadGuard<T> {
    readonly mode: LockMode.Read;
    readonly value: Readonly<T>;
    release(): void;
}

export interface WriteGuard<T> {
    readonly mode: LockMode.Write;
    readonly value: T;
    /** Replace the guarded value. */
    set(next: T): void;
    release(): void;
}

export type Guard<T> = ReadGuard<T> | WriteGuard<T>;
