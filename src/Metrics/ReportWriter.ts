import {promises as fs} from "fs";
import path from "path";
import ExcelJS from "exceljs";
import type {FlowReport} from "./MetricsAggregator.ts";

export const REPORT_COLUMNS = [
    {header: "FlowID", key: "flowId", width: 8},
    {header: "SourceAddress", key: "sourceAddress", width: 15},
    {header: "DestinationAddress", key: "destAddress", width: 18},
    {header: "PacketsSent", key: "txPackets", width: 12},
    {header: "PacketsReceived", key: "rxPackets", width: 16},
    {header: "BytesSent", key: "txBytes", width: 12},
    {header: "BytesReceived", key: "rxBytes", width: 14},
    {header: "SendTimestamp", key: "sendTimestamp", width: 14},
    {header: "ReceiveTimestamp", key: "receiveTimestamp", width: 17},
    {header: "Bandwidth", key: "bandwidth", width: 14},
    {header: "Delay", key: "delay", width: 12},
    {header: "PacketLossRate", key: "lossRate", width: 15},
    {header: "QueueSize", key: "queueSize", width: 10},
] as const satisfies ReadonlyArray<{header: string, key: keyof FlowReport, width: number}>;

export const REPORT_HEADER = REPORT_COLUMNS.map(c => c.header).join(",");

export class ReportWriteException extends Error {
    public path: string;
    // set when the temporary file could not be removed either
    public cleanupError: unknown;

    constructor(target: string, cause: unknown, cleanupError: unknown = null) {
        super(`Cannot write report to ${target}: ${cause instanceof Error ? cause.message : String(cause)}`,
            {cause});
        this.path = target;
        this.cleanupError = cleanupError;
    }
}

function csvField(value: string | number): string {
    let text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatReport(reports: ReadonlyArray<FlowReport>): string {
    let lines = [REPORT_HEADER];
    reports.forEach(report => lines.push(REPORT_COLUMNS.map(c => csvField(report[c.key])).join(",")));

    return lines.join("\n") + "\n";
}

function temporaryPathFor(target: string): string {
    return path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
}

// The target only ever holds a complete file: write beside it, then rename over it
async function writeAtomically(target: string, write: (tmp: string) => Promise<void>): Promise<void> {
    let tmp = temporaryPathFor(target);
    try {
        await write(tmp);
        await fs.rename(tmp, target);
    } catch (e) {
        let cleanupError: unknown = null;
        try {
            await fs.rm(tmp, {force: true});
        } catch (rmError) {
            cleanupError = rmError;
        }

        throw new ReportWriteException(target, e, cleanupError);
    }
}

export async function writeReport(target: string, reports: ReadonlyArray<FlowReport>): Promise<void> {
    let text = formatReport(reports);
    await writeAtomically(target, tmp => fs.writeFile(tmp, text, "utf8"));
}

export async function writeReportXlsx(target: string, reports: ReadonlyArray<FlowReport>): Promise<void> {
    let workbook = new ExcelJS.Workbook();
    let worksheet = workbook.addWorksheet("Flow Report");
    worksheet.columns = REPORT_COLUMNS.map(c => ({header: c.header, key: c.key, width: c.width}));

    reports.forEach(report => worksheet.addRow({...report}));

    await writeAtomically(target, tmp => workbook.xlsx.writeFile(tmp));
}
