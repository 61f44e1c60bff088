import {mulberry32} from "./algorithms.ts";
import type {Config, Logger} from "./config.ts";
import {TopologyModel} from "./Model/TopologyModel.ts";
import {CsmaChannel, NetDevice} from "./Networking/CsmaChannel.ts";
import {FlowMonitor} from "./Networking/FlowMonitor.ts";
import type {RawFlowStats} from "./Networking/FlowMonitor.ts";
import {Scheduler} from "./Networking/Scheduler.ts";
import {installFlows, planFlows} from "./Planning/FlowPlanner.ts";
import type {FlowAssignment} from "./Planning/FlowPlanner.ts";
import {QueueSampler} from "./Metrics/QueueSampler.ts";
import type {QueueSnapshot} from "./Metrics/QueueSampler.ts";
import {aggregateFlows, summarize} from "./Metrics/MetricsAggregator.ts";
import type {FlowReport, RunSummary} from "./Metrics/MetricsAggregator.ts";
import {writeReport, writeReportXlsx} from "./Metrics/ReportWriter.ts";

export type SimulationResult = {
    topology: TopologyModel,
    plan: ReadonlyArray<FlowAssignment>,
    stats: ReadonlyArray<Readonly<RawFlowStats>>,
    queues: QueueSnapshot,
    events: number
};

export type ExperimentResult = SimulationResult & {
    reports: FlowReport[],
    summary: RunSummary
};

/**
 * Builds the shared segment, installs the planned flows and runs the epoch.
 * Everything that can be rejected up front (plan, sample time) is rejected
 * before the event loop starts.
 */
export function simulate(config: Config, logger: Logger = console): SimulationResult {
    // Wire errors draw from their own stream so they don't shift the flow plan
    let planRng = mulberry32(config.seed);
    let wireRng = mulberry32((config.seed ^ 0x9e3779b9) >>> 0);

    let plan = planFlows(config.numNodes, config.numFlows, {
        rng: planRng,
        basePort: config.basePort,
        maxRedraws: config.maxRedraws
    });

    let topology = new TopologyModel();
    topology.createNodes(config.numNodes);
    topology.assignAddresses(config.network, config.prefixLength);

    let scheduler = new Scheduler();
    let channel = new CsmaChannel(scheduler, {
        dataRate: config.linkDataRate,
        delay: config.linkDelay,
        errorRate: config.linkErrorRate,
        rng: wireRng
    });

    let devices = topology.nodes.map(node => {
        let device = new NetDevice(node.id, topology.addressOf(node.id), config.queueCapacity);
        channel.attach(device);
        return device;
    });

    let monitor = new FlowMonitor();
    channel.addObserver(monitor);

    let sampler = new QueueSampler(scheduler, devices);
    sampler.schedule(config.epochDuration);

    installFlows(plan, topology, channel, scheduler, {
        dataRate: config.flowDataRate,
        packetSize: config.packetSize,
        start: config.appStartTime,
        stop: config.epochDuration,
        logger
    });

    scheduler.stop(config.epochDuration);

    logger.log(`[traffic] ${config.numNodes} nodes on ${topology.network}, ${plan.length} flow(s), `
        + `epoch ${config.epochDuration}s`);
    scheduler.run();

    let stats = monitor.collect();
    let drops = monitor.drops;
    logger.log(`[traffic] ran ${scheduler.executed} events, ${stats.length} flow(s) observed, `
        + `drops: ${drops.queue} queue / ${drops.wire} wire / ${drops.unreachable} unreachable`);

    return {topology, plan, stats, queues: sampler.takeSnapshot(), events: scheduler.executed};
}

export async function runExperiment(config: Config, logger: Logger = console): Promise<ExperimentResult> {
    let result = simulate(config, logger);

    let reports = aggregateFlows(result.stats, result.queues, {
        addresses: result.topology.addresses,
        assignments: result.plan
    }, {provenance: config.provenance, logger});

    await writeReport(config.outputPath, reports);
    logger.log(`[metrics] wrote ${reports.length} flow record(s) to ${config.outputPath}`);

    if (config.xlsxPath) {
        await writeReportXlsx(config.xlsxPath, reports);
        logger.log(`[metrics] wrote spreadsheet to ${config.xlsxPath}`);
    }

    let summary = summarize(reports);
    logger.log(`[metrics] ${summary.rxPackets}/${summary.txPackets} packets delivered, ${summary.lostPackets} lost, `
        + `mean bandwidth ${summary.meanBandwidth} bps, mean delay ${summary.meanDelay} s, `
        + `loss rate ${summary.lossRate}`);

    return {...result, reports, summary};
}
