import {NetRunnerNoRouteException, NetRunnerUninitializedException, packetSizeFor, ProtocolType} from "./NetRunner.ts";
import type {FiveTuple, NetApplication, Packet} from "./NetRunner.ts";
import type {NetDevice} from "./CsmaChannel.ts";
import type {Scheduler} from "./Scheduler.ts";

export type UdpSourceOptions = {
    destAddress: string,
    destPort: number,
    sourcePort: number,
    // bits per second
    dataRate: number,
    // payload bytes per datagram
    packetSize: number
};

/**
 * Constant bit rate UDP source: one datagram every packetSize * 8 / dataRate
 * seconds between start (inclusive) and stop (exclusive).
 */
export class UdpSource implements NetApplication {
    public readonly tuple: FiveTuple;

    protected device: NetDevice;
    protected options: UdpSourceOptions;
    protected sent_: number = 0;

    constructor(device: NetDevice, options: UdpSourceOptions) {
        this.device = device;
        this.options = options;
        this.tuple = {
            sourceAddress: device.address,
            destAddress: options.destAddress,
            sourcePort: options.sourcePort,
            destPort: options.destPort,
            protocol: ProtocolType.UDP
        };
    }

    public get nodeId(): number {
        return this.device.nodeId;
    }

    public get sent(): number {
        return this.sent_;
    }

    public get interval(): number {
        return this.options.packetSize * 8 / this.options.dataRate;
    }

    public install(scheduler: Scheduler, start: number, stop: number): void {
        let channel = this.device.channel;
        if (!channel)
            throw new NetRunnerUninitializedException(`Node ${this.nodeId} has no network device attached`);

        if (!channel.getDeviceByAddress(this.options.destAddress))
            throw new NetRunnerNoRouteException(`No host with address ${this.options.destAddress} on the channel`);

        let interval = this.interval;
        let sendNext = () => {
            if (scheduler.now >= stop)
                return;

            this.sendPacket(scheduler.now);
            scheduler.schedule(interval, sendNext);
        };

        scheduler.scheduleAt(start, sendNext);
    }

    protected sendPacket(now: number): void {
        let packet: Packet = {
            seq: this.sent_++,
            tuple: this.tuple,
            size: packetSizeFor(this.options.packetSize),
            sentAt: now
        };

        this.device.send(packet);
    }
}

export class UdpSink implements NetApplication {
    public readonly port: number;

    protected device: NetDevice;
    protected received_: number = 0;
    protected receivedBytes_: number = 0;

    constructor(device: NetDevice, port: number) {
        this.device = device;
        this.port = port;
    }

    public get nodeId(): number {
        return this.device.nodeId;
    }

    public get received(): number {
        return this.received_;
    }

    public get receivedBytes(): number {
        return this.receivedBytes_;
    }

    public install(scheduler: Scheduler, start: number, stop: number): void {
        scheduler.scheduleAt(start, () => this.device.bind(this.port, packet => this.onReceive(packet)));
        scheduler.scheduleAt(stop, () => this.device.unbind(this.port));
    }

    protected onReceive(packet: Packet): void {
        this.received_++;
        this.receivedBytes_ += packet.size;
    }
}
