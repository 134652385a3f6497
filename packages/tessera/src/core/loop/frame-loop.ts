import type { EventHandlers } from "../events/handlers";
import type { InputEvent, Size } from "../events/types";
import type { DispatchSummary } from "../event/types";
import type { LoggerContext } from "../logger/types";
import type { Shared } from "../shared/shared";
import type { Scene } from "../scene/scene";
import { StateMachine } from "../state-machine/state-machine";
import { LoopState } from "./enums";
import type { FrameLoopOptions, FrameReport } from "./types";

const LOOP_TRANSITIONS: Record<LoopState, LoopState[]> = {
    [LoopState.Created]: [LoopState.Running, LoopState.Stopped],
    [LoopState.Running]: [LoopState.Stopped],
    [LoopState.Stopped]: [],
};

const DEFAULT_SIZE: Size = { width: 1280, height: 720 };

const monotonicSeconds = () => performance.now() / 1000;

/**
 * Headless driver that raises a scene's per-frame events.
 *
 * Each {@link frame} raises queued input first, in arrival order, then one tick. The loop keeps
 * its scene alive until {@link stop}.
 */
export class FrameLoop {
    private readonly machine = new StateMachine<LoopState>({
        transitions: LOOP_TRANSITIONS,
        initial: LoopState.Created,
        name: "FrameLoop",
    });
    private readonly scene: Shared<Scene>;
    private readonly events: EventHandlers;
    private readonly clock: () => number;
    private readonly initialSize: Size;
    private readonly logger: LoggerContext;
    private readonly queue: InputEvent[] = [];
    private lastTime = 0;
    private frames = 0;

    /** Throws if `scene` is write-locked at construction. */
    constructor(scene: Shared<Scene>, options: FrameLoopOptions = {}) {
        const guard = scene.tryRead();
        if (!guard) {
            throw new Error("[tessera] FrameLoop: scene is locked for writing");
        }
        this.events = guard.value.events;
        this.logger = options.logger ?? guard.value.logger;
        guard.release();

        this.scene = scene.clone();
        this.clock = options.clock ?? monotonicSeconds;
        this.initialSize = options.initialSize ?? DEFAULT_SIZE;
        this.machine.onTransition((from, to) => {
            this.logger.debug("loop", `${from} → ${to}`, { frames: this.frames });
        });
    }

    get state(): LoopState {
        return this.machine.current;
    }

    get frameCount(): number {
        return this.frames;
    }

    get pendingInput(): number {
        return this.queue.length;
    }

    /** Start the clock and announce the initial size. */
    start(): Promise<DispatchSummary> {
        this.machine.transition(LoopState.Running);
        this.lastTime = this.clock();
        return this.events.windowResize.handle({ newSize: { ...this.initialSize } });
    }

    /** Queue input for the next frame. */
    pushInput(event: InputEvent): void {
        this.machine.assertState("pushInput", LoopState.Created, LoopState.Running);
        this.queue.push(event);
    }

    /**
     * Raise the input queued before this call, then one tick.
     *
     * A reaction that throws does not stop the frame: the remaining input and the tick are still
     * raised, and the frame then rejects with the error (an `AggregateError` when several threw).
     */
    async frame(): Promise<FrameReport> {
        this.machine.assertState("frame", LoopState.Running);

        const failures: unknown[] = [];
        const input = this.queue.length;
        for (let i = 0; i < input; i++) {
            const event = this.queue.shift();
            if (!event) break;
            await this.events.raise(event).catch((err: unknown) => failures.push(err));
        }

        const now = this.clock();
        const delta = now - this.lastTime;
        this.lastTime = now;
        const tick = await this.events.tick.handle({ delta }).catch((err: unknown) => {
            failures.push(err);
            return null;
        });

        this.frames++;
        if (failures.length === 1) throw failures[0];
        if (failures.length > 1 || !tick) {
            throw new AggregateError(failures, `[tessera] FrameLoop.frame: ${failures.length} dispatches failed in frame ${this.frames}`);
        }
        return { frame: this.frames, delta, input, tick };
    }

    /** Run `count` frames back to back. */
    async run(count: number): Promise<FrameReport[]> {
        if (!Number.isInteger(count) || count < 0) {
            throw new Error(`[tessera] FrameLoop.run: frame count must be a non-negative integer, got ${count}`);
        }
        const reports: FrameReport[] = [];
        for (let i = 0; i < count; i++) {
            reports.push(await this.frame());
        }
        return reports;
    }

    /** Stop the loop and release its handle to the scene. Queued input is discarded. */
    stop(): void {
        this.machine.transition(LoopState.Stopped);
        this.queue.length = 0;
        this.scene.release();
    }
}
