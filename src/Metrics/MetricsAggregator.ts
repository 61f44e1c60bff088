import {mean} from "../algorithms.ts";
import type {Logger} from "../config.ts";
import type {RawFlowStats} from "../Networking/FlowMonitor.ts";
import type {FlowAssignment} from "../Planning/FlowPlanner.ts";
import type {QueueSnapshot} from "./QueueSampler.ts";

export type FlowReport = Readonly<{
    flowId: number,
    sourceAddress: string,
    destAddress: string,
    txPackets: number,
    rxPackets: number,
    txBytes: number,
    rxBytes: number,
    lostPackets: number,
    sendTimestamp: number,
    receiveTimestamp: number,
    // bits per second, 0 when the flow has no receive window
    bandwidth: number,
    delay: number,
    lossRate: number,
    queueSize: number
}>;

/**
 * How a flow is tied back to addresses and a queue sample.
 *  - "assignment": join on the flow's destination port/address to the plan.
 *  - "modulo": interface `flowId mod n` as source and queue, `(flowId + 1) mod n`
 *    as destination, regardless of where the flow really ran.
 */
export type Provenance = "assignment" | "modulo";

export type Addressing = {
    // indexed by node id, one interface per node
    addresses: ReadonlyArray<string>,
    assignments: ReadonlyArray<FlowAssignment>
};

export type AggregateOptions = {
    provenance?: Provenance,
    logger?: Logger
};

export class FlowProvenanceException extends Error {
    public flowId: number;

    constructor(flowId: number, message: string) {
        super(`Flow ${flowId}: ${message}`);
        this.flowId = flowId;
    }
}

export const BANDWIDTH_UNDEFINED = 0;

export function computeBandwidth(txBytes: number, firstTxTime: number, lastRxTime: number,
                                 rxPackets: number): number | null {
    let span = lastRxTime - firstTxTime;
    if (rxPackets < 1 || !(span > 0))
        return null;

    let bandwidth = txBytes * 8 / span;
    return Number.isFinite(bandwidth) ? bandwidth : null;
}

export function computeDelay(firstTxTime: number, lastRxTime: number, rxPackets: number): number {
    return rxPackets > 0 ? lastRxTime - firstTxTime : 0;
}

export function computeLossRate(lostPackets: number, txPackets: number): number {
    if (!(txPackets > 0))
        return 0;

    return Math.min(1, Math.max(0, lostPackets / txPackets));
}

// Several records for one flow id collapse into one observation window
function mergeByFlowId(stats: ReadonlyArray<Readonly<RawFlowStats>>): RawFlowStats[] {
    let byId = new Map<number, RawFlowStats>();
    for (const s of stats) {
        let existing = byId.get(s.flowId);
        if (!existing) {
            byId.set(s.flowId, {...s});
            continue;
        }

        existing.txPackets += s.txPackets;
        existing.rxPackets += s.rxPackets;
        existing.txBytes += s.txBytes;
        existing.rxBytes += s.rxBytes;
        existing.lostPackets += s.lostPackets;
        existing.firstTxTime = Math.min(existing.firstTxTime, s.firstTxTime);
        existing.lastRxTime = Math.max(existing.lastRxTime, s.lastRxTime);
    }

    return [...byId.values()].sort((a, b) => a.flowId - b.flowId);
}

type Endpoints = {
    sourceAddress: string,
    destAddress: string,
    queueSize: number
};

function lookupQueue(queues: QueueSnapshot, node: number, flowId: number): number {
    let depth = queues.get(node);
    if (depth === undefined)
        throw new FlowProvenanceException(flowId, `no queue sample for node ${node}`);

    return depth;
}

function lookupAddress(addressing: Addressing, node: number, flowId: number): string {
    let address = addressing.addresses[node];
    if (address === undefined)
        throw new FlowProvenanceException(flowId, `node ${node} has no address`);

    return address;
}

function resolveByModulo(stats: RawFlowStats, queues: QueueSnapshot, addressing: Addressing): Endpoints {
    let n = addressing.addresses.length;
    if (n < 1)
        throw new FlowProvenanceException(stats.flowId, "no interfaces to map flows onto");

    return {
        sourceAddress: lookupAddress(addressing, stats.flowId % n, stats.flowId),
        destAddress: lookupAddress(addressing, (stats.flowId + 1) % n, stats.flowId),
        queueSize: lookupQueue(queues, stats.flowId % n, stats.flowId)
    };
}

function resolveByAssignment(stats: RawFlowStats, queues: QueueSnapshot, addressing: Addressing): Endpoints {
    let tuple = stats.tuple;
    let assignment = addressing.assignments.find(a => a.port == tuple.destPort
        && addressing.addresses[a.destNode] == tuple.destAddress);
    if (!assignment)
        throw new FlowProvenanceException(stats.flowId,
            `no planned flow targets ${tuple.destAddress}:${tuple.destPort}`);

    return {
        sourceAddress: lookupAddress(addressing, assignment.sourceNode, stats.flowId),
        destAddress: lookupAddress(addressing, assignment.destNode, stats.flowId),
        queueSize: lookupQueue(queues, assignment.sourceNode, stats.flowId)
    };
}

/**
 * One report per distinct flow id, ascending.
 */
export function aggregateFlows(stats: ReadonlyArray<Readonly<RawFlowStats>>, queues: QueueSnapshot,
                               addressing: Addressing, options: AggregateOptions = {}): FlowReport[] {
    let provenance = options.provenance ?? "assignment";
    let resolve = provenance == "modulo" ? resolveByModulo : resolveByAssignment;

    return mergeByFlowId(stats).map(flow => {
        let endpoints = resolve(flow, queues, addressing);

        let bandwidth = computeBandwidth(flow.txBytes, flow.firstTxTime, flow.lastRxTime, flow.rxPackets);
        if (bandwidth === null) {
            options.logger?.warn(`[metrics] flow ${flow.flowId}: empty receive window `
                + `(first tx ${flow.firstTxTime}, last rx ${flow.lastRxTime}, ${flow.rxPackets} received), `
                + `bandwidth reported as ${BANDWIDTH_UNDEFINED}`);
            bandwidth = BANDWIDTH_UNDEFINED;
        }

        return Object.freeze({
            flowId: flow.flowId,
            sourceAddress: endpoints.sourceAddress,
            destAddress: endpoints.destAddress,
            txPackets: flow.txPackets,
            rxPackets: flow.rxPackets,
            txBytes: flow.txBytes,
            rxBytes: flow.rxBytes,
            lostPackets: flow.lostPackets,
            sendTimestamp: flow.firstTxTime,
            receiveTimestamp: flow.lastRxTime,
            bandwidth,
            delay: computeDelay(flow.firstTxTime, flow.lastRxTime, flow.rxPackets),
            lossRate: computeLossRate(flow.lostPackets, flow.txPackets),
            queueSize: endpoints.queueSize
        });
    });
}

export type RunSummary = {
    flows: number,
    txPackets: number,
    rxPackets: number,
    lostPackets: number,
    meanBandwidth: number,
    meanDelay: number,
    // lost over sent across all flows
    lossRate: number
};

export function summarize(reports: ReadonlyArray<FlowReport>): RunSummary {
    let txPackets = reports.reduce((sum, r) => sum + r.txPackets, 0);
    let lostPackets = reports.reduce((sum, r) => sum + r.lostPackets, 0);

    return {
        flows: reports.length,
        txPackets,
        rxPackets: reports.reduce((sum, r) => sum + r.rxPackets, 0),
        lostPackets,
        meanBandwidth: mean(reports.map(r => r.bandwidth)),
        meanDelay: mean(reports.map(r => r.delay)),
        lossRate: computeLossRate(lostPackets, txPackets)
    };
}
