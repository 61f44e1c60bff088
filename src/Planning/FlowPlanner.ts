import {uniformIndex} from "../algorithms.ts";
import type {RandomSource} from "../algorithms.ts";
import {ConfigurationException} from "../config.ts";
import type {Logger} from "../config.ts";
import type {TopologyModel} from "../Model/TopologyModel.ts";
import type {CsmaChannel} from "../Networking/CsmaChannel.ts";
import type {Scheduler} from "../Networking/Scheduler.ts";
import {UdpSink, UdpSource} from "../Networking/UdpRunner.ts";

export const MAX_PORT = 65535;
export const EPHEMERAL_PORT_BASE = 49153;

export type FlowAssignment = Readonly<{
    flowId: number,
    sourceNode: number,
    destNode: number,
    port: number
}>;

export type PlanOptions = {
    rng: RandomSource,
    basePort: number,
    // Redraws of the destination before falling back to a draw that skips the source
    maxRedraws?: number
};

function drawDestination(rng: RandomSource, numNodes: number, source: number, maxRedraws: number): number {
    for (let i = 0; i <= maxRedraws; i++) {
        let dest = uniformIndex(rng, numNodes);
        if (dest != source)
            return dest;
    }

    let dest = uniformIndex(rng, numNodes - 1);
    return dest >= source ? dest + 1 : dest;
}

/**
 * Draws `numFlows` source/destination pairs uniformly from `[0, numNodes)`.
 * Pairs may repeat across flows; a flow never targets its own source. Flow i
 * listens on `basePort + i`.
 */
export function planFlows(numNodes: number, numFlows: number, options: PlanOptions): FlowAssignment[] {
    if (!Number.isInteger(numNodes) || numNodes < 2)
        throw new ConfigurationException("numNodes", `at least 2 nodes are needed to pair flows, got ${numNodes}`);

    if (!Number.isInteger(numFlows) || numFlows < 0)
        throw new ConfigurationException("numFlows", `must be a non-negative integer, got ${numFlows}`);

    if (!Number.isInteger(options.basePort) || options.basePort < 1 || options.basePort > MAX_PORT)
        throw new ConfigurationException("basePort", `must be a port number, got ${options.basePort}`);

    if (numFlows > 0 && options.basePort + numFlows - 1 > MAX_PORT)
        throw new ConfigurationException("numFlows",
            `${numFlows} ports starting at ${options.basePort} exceed ${MAX_PORT}`);

    let maxRedraws = options.maxRedraws ?? 64;
    let plan: FlowAssignment[] = [];
    for (let i = 0; i < numFlows; i++) {
        let sourceNode = uniformIndex(options.rng, numNodes);
        let destNode = drawDestination(options.rng, numNodes, sourceNode, maxRedraws);

        plan.push(Object.freeze({
            flowId: i,
            sourceNode,
            destNode,
            port: options.basePort + (i % numFlows)
        }));
    }

    return plan;
}

export type InstallOptions = {
    // bits per second per flow
    dataRate: number,
    packetSize: number,
    start: number,
    stop: number,
    logger?: Logger
};

export type InstalledFlow = {
    assignment: FlowAssignment,
    source: UdpSource,
    sink: UdpSink
};

/**
 * Starts a CBR source on each assignment's source node aimed at
 * destination:port, and a sink on the destination node listening on that port.
 */
export function installFlows(plan: ReadonlyArray<FlowAssignment>, topology: TopologyModel, channel: CsmaChannel,
                             scheduler: Scheduler, options: InstallOptions): InstalledFlow[] {
    return plan.map(assignment => {
        let sourceDevice = channel.getDevice(assignment.sourceNode);
        let destDevice = channel.getDevice(assignment.destNode);
        if (!sourceDevice || !destDevice)
            throw new ConfigurationException("numNodes",
                `flow ${assignment.flowId} references node ${sourceDevice ? assignment.destNode : assignment.sourceNode} which has no device`);

        let sink = new UdpSink(destDevice, assignment.port);
        let source = new UdpSource(sourceDevice, {
            destAddress: topology.addressOf(assignment.destNode),
            destPort: assignment.port,
            sourcePort: EPHEMERAL_PORT_BASE + assignment.flowId % (MAX_PORT - EPHEMERAL_PORT_BASE + 1),
            dataRate: options.dataRate,
            packetSize: options.packetSize
        });

        sink.install(scheduler, options.start, options.stop);
        source.install(scheduler, options.start, options.stop);

        options.logger?.log(`[planner] flow ${assignment.flowId}: node${assignment.sourceNode} -> `
            + `${source.tuple.destAddress}:${assignment.port}`);

        return {assignment, source, sink};
    });
}
