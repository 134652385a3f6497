#!/usr/bin/env -S node --import tsx
import cac from "cac";
import { version } from "../package.json";
import { demo } from "./commands/demo";

const cli = cac("tessera");

cli.command("demo", "Drive a headless scene and report dispatch results")
    .option("--frames <n>", "Frames to run", { default: 120 })
    .option("--nodes <n>", "Nodes carrying a tick-debug component", { default: 8 })
    .option("--drop-every <n>", "Remove the oldest node before every n-th frame (0 = never)", { default: 0 })
    .option("--concurrency <n>", "Dispatch workers (default: available parallelism)")
    .option("-l, --log-level <level>", "Log level (info | warn | error | silent)", { default: "info" })
    .action(demo);

cli.help();
cli.version(version);
cli.parse();
