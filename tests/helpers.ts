import {promises as fs} from "fs";
import os from "os";
import path from "path";
import type {Logger} from "../src/config.ts";

export type RecordingLogger = Logger & {
    lines: string[],
    warnings: string[]
};

export function recordingLogger(): RecordingLogger {
    let lines: string[] = [];
    let warnings: string[] = [];
    return {
        lines,
        warnings,
        log: (message: string) => lines.push(message),
        warn: (message: string) => warnings.push(message),
        error: (message: string) => warnings.push(message)
    };
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), "flow-traffic-sim-"));
}

export function removeDir(dir: string): Promise<void> {
    return fs.rm(dir, {recursive: true, force: true});
}
