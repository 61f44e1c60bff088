import type {Scheduler} from "./Scheduler.ts";

export const IP_HEADER_SIZE = 20;
export const UDP_HEADER_SIZE = 8;
export const ETHERNET_OVERHEAD = 14 + 4;

export enum ProtocolType {
    UDP = 17
}

export type FiveTuple = {
    sourceAddress: string,
    destAddress: string,
    sourcePort: number,
    destPort: number,
    protocol: ProtocolType
};

export type Packet = {
    seq: number,
    tuple: FiveTuple,
    // IP datagram size: payload plus IP and transport headers
    size: number,
    sentAt: number
};

export function packetSizeFor(payload: number): number {
    return payload + IP_HEADER_SIZE + UDP_HEADER_SIZE;
}

export function tupleKey(tuple: FiveTuple): string {
    return `${tuple.protocol}|${tuple.sourceAddress}:${tuple.sourcePort}|${tuple.destAddress}:${tuple.destPort}`;
}

export class NetRunnerUninitializedException extends Error {}
export class NetRunnerNoRouteException extends Error {}

export type DropReason = "queue" | "wire" | "unreachable";

/**
 * Hooks an observer (such as the flow monitor) attaches to the devices and the
 * channel to watch every packet that enters, leaves or is dropped.
 */
export interface PacketObserver {
    onSend(packet: Packet, now: number): void;
    onReceive(packet: Packet, now: number): void;
    onDrop(packet: Packet, reason: DropReason, now: number): void;
}

export interface NetApplication {
    readonly nodeId: number;
    install(scheduler: Scheduler, start: number, stop: number): void;
}
