import {after, before, test} from "node:test";
import assert from "node:assert/strict";
import {spawnSync} from "child_process";
import {promises as fs} from "fs";
import path from "path";
import {fileURLToPath} from "url";
import {REPORT_HEADER} from "../src/Metrics/ReportWriter.ts";
import {makeTempDir, removeDir} from "./helpers.ts";

const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const entry = path.join(root, "src", "index.ts");

let dir = "";

before(async () => {
    dir = await makeTempDir();
});

after(async () => {
    await removeDir(dir);
});

function runCli(overrides: Record<string, string>) {
    let env: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(process.env))
        if (!key.startsWith("TRAFFIC_") && key != "NODE_TEST_CONTEXT")
            env[key] = value;

    let result = spawnSync(process.execPath, ["--import", "tsx", entry], {
        cwd: root,
        env: {...env, TRAFFIC_NUM_NODES: "3", TRAFFIC_NUM_FLOWS: "5", ...overrides},
        encoding: "utf8",
        timeout: 60_000
    });

    return {
        status: result.status,
        stdout: result.stdout.split("\n"),
        stderr: result.stderr.split("\n")
    };
}

test("a successful run exits with 0 and writes the report", async () => {
    let target = path.join(dir, "report.csv");
    let result = runCli({TRAFFIC_OUTPUT_PATH: target});

    assert.equal(result.status, 0);
    assert.ok(result.stdout.includes(`[metrics] wrote 5 flow record(s) to ${target}`));

    let lines = (await fs.readFile(target, "utf8")).split("\n");
    assert.equal(lines[0], REPORT_HEADER);
    assert.equal(lines.length, 7);
});

test("an invalid configuration exits with 1 before running", () => {
    let target = path.join(dir, "never.csv");
    let result = runCli({TRAFFIC_NUM_NODES: "1", TRAFFIC_OUTPUT_PATH: target});

    assert.equal(result.status, 1);
    assert.ok(result.stderr.some(line => line.startsWith("[traffic] Invalid configuration field numNodes: ")));
    assert.ok(!result.stdout.some(line => line.startsWith("[traffic] ran ")));
});

test("an unwritable report path exits with 1", () => {
    let target = path.join(dir, "missing", "report.csv");
    let result = runCli({TRAFFIC_OUTPUT_PATH: target});

    assert.equal(result.status, 1);
    assert.ok(result.stderr.some(line => line.startsWith(`[traffic] Cannot write report to ${target}: `)));
});
