import {tupleKey} from "./NetRunner.ts";
import type {DropReason, FiveTuple, Packet, PacketObserver} from "./NetRunner.ts";

export type RawFlowStats = {
    flowId: number,
    tuple: FiveTuple,
    txPackets: number,
    rxPackets: number,
    txBytes: number,
    rxBytes: number,
    lostPackets: number,
    firstTxTime: number,
    lastRxTime: number
};

/**
 * Classifies packets by five-tuple and keeps per-flow counters. Flow ids are
 * handed out from 1 in the order flows first transmit.
 */
export class FlowMonitor implements PacketObserver {
    protected flows: Map<string, RawFlowStats> = new Map();
    protected drops_: Record<DropReason, number> = {queue: 0, wire: 0, unreachable: 0};

    public get drops(): Readonly<Record<DropReason, number>> {
        return this.drops_;
    }

    protected classify(tuple: FiveTuple, now: number): RawFlowStats {
        let key = tupleKey(tuple);
        let flow = this.flows.get(key);
        if (!flow) {
            flow = {
                flowId: this.flows.size + 1,
                tuple: tuple,
                txPackets: 0,
                rxPackets: 0,
                txBytes: 0,
                rxBytes: 0,
                lostPackets: 0,
                firstTxTime: now,
                lastRxTime: 0
            };
            this.flows.set(key, flow);
        }

        return flow;
    }

    public onSend(packet: Packet, now: number): void {
        let flow = this.classify(packet.tuple, now);
        flow.txPackets++;
        flow.txBytes += packet.size;
    }

    public onReceive(packet: Packet, now: number): void {
        let flow = this.classify(packet.tuple, now);
        flow.rxPackets++;
        flow.rxBytes += packet.size;
        flow.lastRxTime = now;
    }

    public onDrop(packet: Packet, reason: DropReason, now: number): void {
        this.classify(packet.tuple, now).lostPackets++;
        this.drops_[reason]++;
    }

    public collect(): ReadonlyArray<Readonly<RawFlowStats>> {
        return Object.freeze([...this.flows.values()]
            .sort((a, b) => a.flowId - b.flowId)
            .map(flow => Object.freeze({...flow, tuple: Object.freeze({...flow.tuple})})));
    }
}
