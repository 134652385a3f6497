import {
    attachTickDebug,
    createScene,
    defineEngineConfig,
    ElementState,
    FrameLoop,
    type Scene,
    type Shared,
    sceneOptionsFrom,
    type TickDebugComponent,
    type WeakShared,
    withRead,
    withWrite,
} from "@tessera/engine";
import { parseCount, parseLogLevel } from "../validate";
import { banner, type CliLogLevel, footer, info, setLogLevel, startTimer, step, stepFail, warn } from "../terminal/logger";

const FRAME_SECONDS = 1 / 60;

export interface DemoOptions {
    frames: number;
    nodes: number;
    /** Remove the oldest node before every n-th frame; 0 never removes. */
    dropEvery: number;
    concurrency?: number;
    logLevel: CliLogLevel;
    /** Mirror engine log entries to the console. Defaults to `true`. */
    engineConsole?: boolean;
}

export interface DemoSummary {
    frames: number;
    nodesCreated: number;
    nodesRemaining: number;
    /** Successful tick deliveries across all frames. */
    ticksDelivered: number;
    evicted: number;
    starved: number;
    tickListeners: number;
    /** Tick count of each surviving component, oldest node first. */
    componentTicks: number[];
}

async function populate(scene: Shared<Scene>, count: number): Promise<WeakShared<TickDebugComponent>[]> {
    const components: WeakShared<TickDebugComponent>[] = [];
    for (let i = 0; i < count; i++) {
        const node = await withWrite(scene, (s) => s.newNode());
        try {
            components.push(await attachTickDebug(node));
        } finally {
            node.release();
        }
    }
    return components;
}

/** Remove the oldest node. Returns `false` once the scene is empty. */
async function dropOldest(scene: Shared<Scene>): Promise<boolean> {
    return withWrite(scene, (s) => {
        const [oldest] = s.nodes();
        const node = oldest?.upgrade();
        if (!node) return false;
        try {
            return s.removeNode(node);
        } finally {
            node.release();
        }
    });
}

async function readTicks(component: WeakShared<TickDebugComponent>): Promise<number | null> {
    const strong = component.upgrade();
    if (!strong) return null;
    try {
        return await withRead(strong, (value) => value.ticks);
    } finally {
        strong.release();
    }
}

/** Drive a headless scene of tick-debug nodes at a fixed 60 Hz and report what the dispatcher did. */
export async function runDemo(options: DemoOptions): Promise<DemoSummary> {
    setLogLevel(options.logLevel);
    const config = defineEngineConfig({
        dispatch: { concurrency: options.concurrency },
        logger: { level: options.logLevel, console: options.engineConsole ?? true },
    });

    banner("demo", `${options.nodes} nodes × ${options.frames} frames`);

    const sceneTimer = startTimer();
    const scene = createScene(sceneOptionsFrom(config));
    const components = await populate(scene, options.nodes);
    step("scene", sceneTimer(), `${options.nodes} nodes, concurrency ${config.dispatch.concurrency}`);

    let time = 0;
    const loop = new FrameLoop(scene, { clock: () => time });
    const totals = { ticksDelivered: 0, evicted: 0, starved: 0 };

    const runTimer = startTimer();
    await loop.start();
    loop.pushInput({ kind: "key", scanCode: 57, state: ElementState.Pressed, virtualKeyCode: "Space" });
    for (let frame = 1; frame <= options.frames; frame++) {
        if (options.dropEvery > 0 && frame % options.dropEvery === 0 && (await dropOldest(scene))) {
            info(`frame ${frame}: removed oldest node`);
        }
        loop.pushInput({ kind: "mouse-delta", delta: { x: 1, y: 0 } });
        time += FRAME_SECONDS;
        const report = await loop.frame();
        totals.ticksDelivered += report.tick.succeeded.length;
        totals.evicted += report.tick.evicted.length;
        totals.starved += report.tick.starved.length;
        if (report.tick.starved.length > 0) {
            warn(`frame ${frame}: ${report.tick.starved.length} listener(s) starved`);
        }
    }
    loop.stop();
    step("frames", runTimer(), `${loop.frameCount} frames`);

    const { nodesRemaining, tickListeners } = await withRead(scene, (s) => ({
        nodesRemaining: s.nodeCount,
        tickListeners: s.events.tick.size,
    }));
    const componentTicks: number[] = [];
    for (const component of components) {
        const ticks = await readTicks(component);
        if (ticks !== null) componentTicks.push(ticks);
    }
    scene.release();

    const summary: DemoSummary = {
        frames: loop.frameCount,
        nodesCreated: options.nodes,
        nodesRemaining,
        ...totals,
        tickListeners,
        componentTicks,
    };
    footer("demo finished", [
        `ticks delivered  ${summary.ticksDelivered}`,
        `evicted          ${summary.evicted}`,
        `starved          ${summary.starved}`,
        `nodes remaining  ${summary.nodesRemaining}/${summary.nodesCreated}`,
        `tick listeners   ${summary.tickListeners}`,
    ]);
    return summary;
}

interface DemoFlags {
    frames?: unknown;
    nodes?: unknown;
    dropEvery?: unknown;
    concurrency?: unknown;
    logLevel?: unknown;
}

export async function demo(flags: DemoFlags): Promise<void> {
    let options: DemoOptions;
    try {
        options = {
            frames: parseCount("frames", flags.frames ?? 120, { min: 0 }),
            nodes: parseCount("nodes", flags.nodes ?? 8, { min: 0 }),
            dropEvery: parseCount("drop-every", flags.dropEvery ?? 0, { min: 0 }),
            concurrency: flags.concurrency === undefined ? undefined : parseCount("concurrency", flags.concurrency, { min: 1 }),
            logLevel: parseLogLevel(flags.logLevel ?? "info"),
        };
    } catch (err) {
        stepFail("options", err instanceof Error ? err.message : String(err));
        process.exit(1);
    }

    try {
        await runDemo(options);
    } catch (err) {
        stepFail("demo", err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
