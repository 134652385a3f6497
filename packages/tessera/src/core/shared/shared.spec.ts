/**
 * Contract: Shared / WeakShared -- reference-counted reader/writer cells.
 *
 * Sections:
 *   1. Ownership (clone / release / downgrade / upgrade)
 *   2. Non-blocking locks
 *   3. Waiting locks
 *   4. Misuse
 */
import { describe, expect, it, vi } from "vitest";
import { LockMode } from "./enums";
import { createShared } from "./helpers";
import { WeakShared } from "./shared";

describe("Shared", () => {
    // -- 1. Ownership --
    describe("Ownership", () => {
        it("counts every strong handle", () => {
            const a = createShared({ hp: 10 });
            const b = a.clone();
            expect(a.strongCount).toBe(2);
            b.release();
            expect(a.strongCount).toBe(1);
        });

        it("weak handles upgrade while a strong handle lives", () => {
            const owner = createShared("mesh");
            const weak = owner.downgrade();
            const upgraded = weak.upgrade();
            expect(upgraded?.tryRead()?.value).toBe("mesh");
            expect(owner.strongCount).toBe(2);
        });

        it("releasing the last strong handle drops the value exactly once", () => {
            const onDrop = vi.fn();
            const owner = createShared({ id: 7 }, { onDrop });
            const weak = owner.downgrade();
            const extra = owner.clone();

            owner.release();
            expect(onDrop).not.toHaveBeenCalled();
            expect(weak.expired).toBe(false);

            extra.release();
            expect(onDrop).toHaveBeenCalledOnce();
            expect(onDrop).toHaveBeenCalledWith({ id: 7 });
            expect(weak.expired).toBe(true);
            expect(weak.upgrade()).toBeNull();
        });

        it("a live guard keeps the value alive after its owner is released", () => {
            const onDrop = vi.fn();
            const owner = createShared({ n: 1 }, { onDrop });
            const weak = owner.downgrade();
            const guard = owner.tryWrite();
            owner.release();

            expect(onDrop).not.toHaveBeenCalled();
            expect(guard?.value).toEqual({ n: 1 });

            guard?.release();
            expect(onDrop).toHaveBeenCalledOnce();
            expect(weak.upgrade()).toBeNull();
        });

        it("is() compares the underlying cell", () => {
            const a = createShared(1);
            const b = createShared(1);
            expect(a.is(a.clone())).toBe(true);
            expect(a.is(b)).toBe(false);
        });

        it("WeakShared.empty() never upgrades", () => {
            const weak = WeakShared.empty<number>();
            expect(weak.expired).toBe(true);
            expect(weak.upgrade()).toBeNull();
        });
    });

    // -- 2. Non-blocking locks --
    describe("Non-blocking locks", () => {
        it("allows any number of readers", () => {
            const cell = createShared({ x: 1 });
            const r1 = cell.tryRead();
            const r2 = cell.tryRead();
            expect(r1?.value.x).toBe(1);
            expect(r2?.value.x).toBe(1);
        });

        it("refuses a writer while a reader is held", () => {
            const cell = createShared({ x: 1 });
            const reader = cell.tryRead();
            expect(cell.tryWrite()).toBeNull();
            reader?.release();
            expect(cell.tryWrite()).not.toBeNull();
        });

        it("refuses readers and writers while a writer is held", () => {
            const cell = createShared({ x: 1 });
            const writer = cell.tryWrite();
            expect(cell.tryRead()).toBeNull();
            expect(cell.tryWrite()).toBeNull();
            writer?.release();
            expect(cell.tryRead()).not.toBeNull();
        });

        it("write guards mutate and replace the value", () => {
            const cell = createShared({ x: 1 });
            const writer = cell.tryWrite();
            if (!writer) throw new Error("expected write guard");
            writer.value.x = 2;
            expect(writer.value.x).toBe(2);
            writer.set({ x: 5 });
            writer.release();
            expect(cell.tryRead()?.value).toEqual({ x: 5 });
        });

        it("tryLock dispatches on the lock mode", () => {
            const cell = createShared(0);
            expect(cell.tryLock(LockMode.Read)?.mode).toBe(LockMode.Read);
            expect(cell.tryLock(LockMode.Write)).toBeNull();
        });
    });

    // -- 3. Waiting locks --
    describe("Waiting locks", () => {
        it("write() resolves once the last reader releases", async () => {
            const cell = createShared({ x: 1 });
            const reader = cell.tryRead();
            let granted = false;
            const pending = cell.write().then((guard) => {
                granted = true;
                return guard;
            });

            await Promise.resolve();
            expect(granted).toBe(false);

            reader?.release();
            const writer = await pending;
            expect(granted).toBe(true);
            expect(writer.mode).toBe(LockMode.Write);
        });

        it("try-locks fail while a waiter is queued", async () => {
            const cell = createShared(0);
            const reader = cell.tryRead();
            const pending = cell.write();
            expect(cell.tryRead()).toBeNull();
            reader?.release();
            const writer = await pending;
            writer.release();
            expect(cell.tryRead()).not.toBeNull();
        });

        it("serves waiters in arrival order", async () => {
            const cell = createShared<string[]>([]);
            const first = cell.tryWrite();
            const order: string[] = [];

            const a = cell.write().then((g) => {
                order.push("writer");
                g.release();
            });
            const b = cell.read().then((g) => {
                order.push("reader");
                g.release();
            });

            first?.release();
            await Promise.all([a, b]);
            expect(order).toEqual(["writer", "reader"]);
        });

        it("read() resolves immediately when the cell is free", async () => {
            const cell = createShared(3);
            const guard = await cell.read();
            expect(guard.value).toBe(3);
        });
    });

    // -- 4. Misuse --
    describe("Misuse", () => {
        it("throws when a released handle is used", () => {
            const cell = createShared(1);
            const keep = cell.clone();
            cell.release();
            expect(() => cell.tryRead()).toThrow("[tessera] Shared.tryRead: handle has already been released");
            expect(() => cell.release()).toThrow("[tessera] Shared.release: handle has already been released");
            expect(keep.tryRead()?.value).toBe(1);
        });

        it("throws when a guard is released twice", () => {
            const cell = createShared(1);
            const guard = cell.tryRead();
            guard?.release();
            expect(() => guard?.release()).toThrow("[tessera] read guard already released");
        });

        it("throws when a guard is read after release", () => {
            const cell = createShared(1);
            const guard = cell.tryWrite();
            guard?.release();
            expect(() => guard?.value).toThrow("[tessera] write guard used after release");
        });
    });
});
