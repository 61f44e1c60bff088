import {after, before, test} from "node:test";
import assert from "node:assert/strict";
import {promises as fs} from "fs";
import path from "path";
import ExcelJS from "exceljs";
import type {FlowReport} from "../src/Metrics/MetricsAggregator.ts";
import {
    formatReport,
    REPORT_HEADER,
    ReportWriteException,
    writeReport,
    writeReportXlsx
} from "../src/Metrics/ReportWriter.ts";
import {makeTempDir, removeDir} from "./helpers.ts";

const reports: FlowReport[] = [{
    flowId: 1,
    sourceAddress: "10.1.1.3",
    destAddress: "10.1.1.1",
    txPackets: 10,
    rxPackets: 8,
    txBytes: 1000,
    rxBytes: 800,
    lostPackets: 2,
    sendTimestamp: 1,
    receiveTimestamp: 3.25,
    bandwidth: 3555.5555555555557,
    delay: 2.25,
    lossRate: 0.2,
    queueSize: 1
}, {
    flowId: 2,
    sourceAddress: "10.1.1.1",
    destAddress: "10.1.1.2",
    txPackets: 0,
    rxPackets: 0,
    txBytes: 0,
    rxBytes: 0,
    lostPackets: 0,
    sendTimestamp: 1,
    receiveTimestamp: 0,
    bandwidth: 0,
    delay: 0,
    lossRate: 0,
    queueSize: 0
}];

let dir = "";

before(async () => {
    dir = await makeTempDir();
});

after(async () => {
    await removeDir(dir);
});

test("header matches the report schema", () => {
    assert.equal(REPORT_HEADER, "FlowID,SourceAddress,DestinationAddress,PacketsSent,PacketsReceived,BytesSent,"
        + "BytesReceived,SendTimestamp,ReceiveTimestamp,Bandwidth,Delay,PacketLossRate,QueueSize");
});

test("one row per flow in default number formatting", () => {
    assert.equal(formatReport(reports), REPORT_HEADER + "\n"
        + "1,10.1.1.3,10.1.1.1,10,8,1000,800,1,3.25,3555.5555555555557,2.25,0.2,1\n"
        + "2,10.1.1.1,10.1.1.2,0,0,0,0,1,0,0,0,0,0\n");
    assert.equal(formatReport([]), REPORT_HEADER + "\n");
});

test("writes the report and leaves no temporary file behind", async () => {
    let target = path.join(dir, "report.csv");
    await writeReport(target, reports);

    assert.equal(await fs.readFile(target, "utf8"), formatReport(reports));
    assert.deepEqual(await fs.readdir(dir), ["report.csv"]);
});

test("rewriting the same input is byte-identical", async () => {
    let first = path.join(dir, "first.csv");
    let second = path.join(dir, "second.csv");
    await writeReport(first, reports);
    await writeReport(second, reports);

    assert.deepEqual(await fs.readFile(first), await fs.readFile(second));
});

test("an unwritable destination is reported with its path", async () => {
    let target = path.join(dir, "missing", "report.csv");
    await assert.rejects(writeReport(target, reports),
        (e: unknown) => e instanceof ReportWriteException && e.path == target);
    await assert.rejects(fs.access(target));
});

test("a failed rename keeps the temporary file out of the directory", async () => {
    let target = path.join(dir, "occupied");
    await fs.mkdir(target);
    await fs.writeFile(path.join(target, "child"), "x");

    await assert.rejects(writeReport(target, reports),
        (e: unknown) => e instanceof ReportWriteException && e.path == target);
    assert.deepEqual((await fs.readdir(dir)).filter(name => name.endsWith(".tmp")), []);
});

test("spreadsheet export carries the same columns and rows", async () => {
    let target = path.join(dir, "report.xlsx");
    await writeReportXlsx(target, reports);

    let workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(target);
    let sheet = workbook.getWorksheet("Flow Report");
    if (!sheet)
        throw new Error("worksheet missing");

    assert.equal(sheet.rowCount, 3);
    assert.equal(sheet.getRow(1).getCell(3).value, "DestinationAddress");
    assert.equal(sheet.getRow(2).getCell(1).value, 1);
    assert.equal(sheet.getRow(2).getCell(2).value, "10.1.1.3");
    assert.equal(sheet.getRow(3).getCell(12).value, 0);
});

test("a temporary file that cannot be removed still reports the target", async () => {
    let target = path.join(dir, "stuck.csv");
    let tmp = path.join(dir, `.stuck.csv.${process.pid}.tmp`);
    await fs.mkdir(tmp);
    await fs.writeFile(path.join(tmp, "child"), "x");

    try {
        await assert.rejects(writeReport(target, reports),
            (e: unknown) => e instanceof ReportWriteException && e.path == target
                && e.message.startsWith(`Cannot write report to ${target}: `)
                && e.cleanupError instanceof Error);
        await assert.rejects(fs.access(target));
    } finally {
        await fs.rm(tmp, {recursive: true, force: true});
    }
});
