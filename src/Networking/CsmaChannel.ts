import type {Scheduler} from "./Scheduler.ts";
import {ETHERNET_OVERHEAD, NetRunnerUninitializedException} from "./NetRunner.ts";
import type {DropReason, Packet, PacketObserver} from "./NetRunner.ts";
import type {RandomSource} from "../algorithms.ts";

export class DropTailQueue {
    public readonly capacity: number;
    protected items: Packet[] = [];

    constructor(capacity: number) {
        this.capacity = capacity;
    }

    public get length(): number {
        return this.items.length;
    }

    public enqueue(packet: Packet): boolean {
        if (this.items.length >= this.capacity)
            return false;

        this.items.push(packet);
        return true;
    }

    public dequeue(): Packet | null {
        return this.items.shift() ?? null;
    }
}

export type ReceiveHandler = (packet: Packet) => void;

export class NetDevice {
    public readonly nodeId: number;
    public readonly address: string;
    public readonly queue: DropTailQueue;

    protected channel_: CsmaChannel | null = null;
    protected handlers: Map<number, ReceiveHandler> = new Map();

    constructor(nodeId: number, address: string, queueCapacity: number) {
        this.nodeId = nodeId;
        this.address = address;
        this.queue = new DropTailQueue(queueCapacity);
    }

    public get channel(): CsmaChannel | null {
        return this.channel_;
    }

    public attach(channel: CsmaChannel): void {
        this.channel_ = channel;
    }

    public bind(port: number, handler: ReceiveHandler): void {
        this.handlers.set(port, handler);
    }

    public unbind(port: number): void {
        this.handlers.delete(port);
    }

    public send(packet: Packet): boolean {
        if (!this.channel_)
            throw new NetRunnerUninitializedException(`Device of node ${this.nodeId} is not attached to a channel`);

        this.channel_.notifySend(packet);
        if (!this.queue.enqueue(packet)) {
            this.channel_.notifyDrop(packet, "queue");
            return false;
        }

        this.channel_.requestMedium(this);
        return true;
    }

    public receive(packet: Packet): void {
        this.handlers.get(packet.tuple.destPort)?.(packet);
    }
}

export type CsmaChannelOptions = {
    // bits per second
    dataRate: number,
    // seconds
    delay: number,
    // percent of frames corrupted on the wire
    errorRate?: number,
    rng?: RandomSource
};

/**
 * Shared broadcast segment: one frame on the wire at a time, devices waiting
 * for the medium are served round-robin.
 */
export class CsmaChannel {
    public readonly dataRate: number;
    public readonly delay: number;
    public readonly errorRate: number;

    protected scheduler: Scheduler;
    protected rng: RandomSource;
    protected devices: NetDevice[] = [];
    protected observers: PacketObserver[] = [];
    protected waiting: NetDevice[] = [];
    protected busy: boolean = false;

    constructor(scheduler: Scheduler, options: CsmaChannelOptions) {
        this.scheduler = scheduler;
        this.dataRate = options.dataRate;
        this.delay = options.delay;
        this.errorRate = options.errorRate ?? 0;
        this.rng = options.rng ?? Math.random;
    }

    public get deviceCount(): number {
        return this.devices.length;
    }

    public attach(device: NetDevice): void {
        this.devices.push(device);
        device.attach(this);
    }

    public addObserver(observer: PacketObserver): void {
        this.observers.push(observer);
    }

    public getDevice(nodeId: number): NetDevice | null {
        for (let i = 0; i < this.devices.length; i++)
            if (this.devices[i].nodeId == nodeId)
                return this.devices[i];

        return null;
    }

    public getDeviceByAddress(address: string): NetDevice | null {
        for (let i = 0; i < this.devices.length; i++)
            if (this.devices[i].address == address)
                return this.devices[i];

        return null;
    }

    public transmissionTime(packet: Packet): number {
        return (packet.size + ETHERNET_OVERHEAD) * 8 / this.dataRate;
    }

    public notifySend(packet: Packet): void {
        this.observers.forEach(o => o.onSend(packet, this.scheduler.now));
    }

    public notifyDrop(packet: Packet, reason: DropReason): void {
        this.observers.forEach(o => o.onDrop(packet, reason, this.scheduler.now));
    }

    public requestMedium(device: NetDevice): void {
        if (!this.waiting.includes(device))
            this.waiting.push(device);

        if (!this.busy)
            this.transmitNext();
    }

    protected transmitNext(): void {
        let device = this.waiting.shift();
        if (!device)
            return;

        let packet = device.queue.dequeue();
        if (!packet) {
            this.transmitNext();
            return;
        }

        let sender = device;
        let frame = packet;
        this.busy = true;
        this.scheduler.schedule(this.transmissionTime(frame), () => {
            this.busy = false;
            this.scheduler.schedule(this.delay, () => this.deliver(frame));

            if (sender.queue.length && !this.waiting.includes(sender))
                this.waiting.push(sender);

            this.transmitNext();
        });
    }

    protected deliver(packet: Packet): void {
        if (this.errorRate > 0 && this.rng() < this.errorRate / 100) {
            this.notifyDrop(packet, "wire");
            return;
        }

        let target = this.getDeviceByAddress(packet.tuple.destAddress);
        if (!target) {
            this.notifyDrop(packet, "unreachable");
            return;
        }

        this.observers.forEach(o => o.onReceive(packet, this.scheduler.now));
        target.receive(packet);
    }
}
