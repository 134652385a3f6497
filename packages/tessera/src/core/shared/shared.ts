import { LockMode } from "./enums";
import type { Guard, ReadGuard, WriteGuard } from "./types";

type DropHooks<T> = {
    onDrop?(value: T): void;
};

type Waiter = {
    mode: LockMode;
    grant: () => void;
};

/**
 * Lock and ownership state behind every {@link Shared} and {@link WeakShared} handle.
 *
 * The value lives as long as the strong count is above zero. Guards count as strong
 * holders, so a value cannot be dropped underneath a live guard.
 */
export class SharedCell<T> {
    private slot: { value: T } | null;
    private strong = 0;
    private readers = 0;
    private writer = false;
    private readonly waiters: Waiter[] = [];

    constructor(
        value: { value: T } | null,
        private readonly hooks: DropHooks<T> = {},
    ) {
        this.slot = value;
    }

    get alive(): boolean {
        return this.slot !== null;
    }

    get strongCount(): number {
        return this.strong;
    }

    get value(): T {
        if (!this.slot) throw new Error("[tessera] shared value has been dropped");
        return this.slot.value;
    }

    replace(next: T): void {
        if (!this.slot) throw new Error("[tessera] shared value has been dropped");
        this.slot.value = next;
    }

    retain(): void {
        if (!this.slot) throw new Error("[tessera] cannot retain a dropped shared value");
        this.strong++;
    }

    releaseStrong(): void {
        this.strong--;
        if (this.strong > 0 || !this.slot) return;
        const { value } = this.slot;
        this.slot = null;
        this.hooks.onDrop?.(value);
    }

    // ── Locking ─────────────────────────────────────────────────────────

    /** Queued waiters take precedence over try-locks, so a waiting writer is never starved. */
    canLock(mode: LockMode): boolean {
        return this.waiters.length === 0 && this.isFree(mode);
    }

    lock(mode: LockMode): void {
        if (mode === LockMode.Read) {
            this.readers++;
        } else {
            this.writer = true;
        }
    }

    unlock(mode: LockMode): void {
        if (mode === LockMode.Read) {
            this.readers--;
        } else {
            this.writer = false;
        }
        this.drain();
    }

    enqueue(mode: LockMode, grant: () => void): void {
        this.waiters.push({ mode, grant });
    }

    private isFree(mode: LockMode): boolean {
        if (this.writer) return false;
        return mode === LockMode.Read || this.readers === 0;
    }

    private drain(): void {
        let next = this.waiters[0];
        while (next && this.isFree(next.mode)) {
            this.waiters.shift();
            this.lock(next.mode);
            next.grant();
            next = this.waiters[0];
        }
    }
}

// ── Guards ──────────────────────────────────────────────────────────────

/** Caller must already hold the lock and one strong count on `cell`. */
function readGuard<T>(cell: SharedCell<T>): ReadGuard<T> {
    let held = true;
    return {
        mode: LockMode.Read,
        get value(): Readonly<T> {
            if (!held) throw new Error("[tessera] read guard used after release");
            return cell.value;
        },
        release() {
            if (!held) throw new Error("[tessera] read guard already released");
            held = false;
            cell.unlock(LockMode.Read);
            cell.releaseStrong();
        },
    };
}

/** Caller must already hold the lock and one strong count on `cell`. */
function writeGuard<T>(cell: SharedCell<T>): WriteGuard<T> {
    let held = true;
    const assertHeld = () => {
        if (!held) throw new Error("[tessera] write guard used after release");
    };
    return {
        mode: LockMode.Write,
        get value(): T {
            assertHeld();
            return cell.value;
        },
        set(next: T) {
            assertHeld();
            cell.replace(next);
        },
        release() {
            if (!held) throw new Error("[tessera] write guard already released");
            held = false;
            cell.unlock(LockMode.Write);
            cell.releaseStrong();
        },
    };
}

// ── Handles ─────────────────────────────────────────────────────────────

/**
 * Strong, owning handle to a lock-protected value.
 *
 * Every handle counts once toward the value's strong count until {@link release} is called.
 * Handles are never tied to garbage collection: a handle that is not released keeps its value alive.
 */
export class Shared<T> {
    private released = false;

    constructor(private readonly cell: SharedCell<T>) {
        cell.retain();
    }

    /** `false` once this handle has been released. */
    get alive(): boolean {
        return !this.released;
    }

    get strongCount(): number {
        return this.cell.strongCount;
    }

    clone(): Shared<T> {
        this.assertLive("clone");
        return new Shared(this.cell);
    }

    downgrade(): WeakShared<T> {
        this.assertLive("downgrade");
        return new WeakShared(this.cell);
    }

    /** Whether both handles point at the same value. */
    is(other: Shared<T>): boolean {
        return this.cell === other.cell;
    }

    /** Drop this strong handle. Releasing the last one destroys the value. */
    release(): void {
        this.assertLive("release");
        this.released = true;
        this.cell.releaseStrong();
    }

    // ── Non-blocking acquisition ────────────────────────────────────────

    tryRead(): ReadGuard<T> | null {
        if (!this.tryAcquire(LockMode.Read)) return null;
        return readGuard(this.cell);
    }

    tryWrite(): WriteGuard<T> | null {
        if (!this.tryAcquire(LockMode.Write)) return null;
        return writeGuard(this.cell);
    }

    tryLock(mode: LockMode.Read): ReadGuard<T> | null;
    tryLock(mode: LockMode.Write): WriteGuard<T> | null;
    tryLock(mode: LockMode): Guard<T> | null;
    tryLock(mode: LockMode): Guard<T> | null {
        return mode === LockMode.Read ? this.tryRead() : this.tryWrite();
    }

    // ── Waiting acquisition ─────────────────────────────────────────────

    /** Resolves once a shared lock is granted. Waiters are served in arrival order. */
    read(): Promise<ReadGuard<T>> {
        return this.acquire(LockMode.Read, () => readGuard(this.cell));
    }

    /** Resolves once the exclusive lock is granted. Waiters are served in arrival order. */
    write(): Promise<WriteGuard<T>> {
        return this.acquire(LockMode.Write, () => writeGuard(this.cell));
    }

    // ── Private ─────────────────────────────────────────────────────────

    private tryAcquire(mode: LockMode): boolean {
        this.assertLive(mode === LockMode.Read ? "tryRead" : "tryWrite");
        if (!this.cell.canLock(mode)) return false;
        this.cell.lock(mode);
        this.cell.retain();
        return true;
    }

    private acquire<G>(mode: LockMode, makeGuard: () => G): Promise<G> {
        this.assertLive(mode);
        this.cell.retain();
        if (this.cell.canLock(mode)) {
            this.cell.lock(mode);
            return Promise.resolve(makeGuard());
        }
        return new Promise<G>((resolve) => {
            this.cell.enqueue(mode, () => resolve(makeGuard()));
        });
    }

    private assertLive(operation: string): void {
        if (this.released) {
            throw new Error(`[tessera] Shared.${operation}: handle has already been released`);
        }
    }
}

/**
 * Non-owning handle. {@link upgrade} is the only way to reach the value and fails
 * once every strong handle has been released.
 */
export class WeakShared<T> {
    constructor(private readonly cell: SharedCell<T>) {}

    /** A weak handle that never upgrades. */
    static empty<T>(): WeakShared<T> {
        return new WeakShared(new SharedCell<T>(null));
    }

    get expired(): boolean {
        return !this.cell.alive;
    }

    upgrade(): Shared<T> | null {
        return this.cell.alive ? new Shared(this.cell) : null;
    }
}
