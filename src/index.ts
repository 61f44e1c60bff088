#!/usr/bin/env tsx
import {loadConfig} from "./config.ts";
import {runExperiment} from "./Experiment.ts";

try {
    let config = loadConfig({argv: process.argv.slice(2)});
    await runExperiment(config);
} catch (e) {
    console.error(`[traffic] ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
}
