import {SchedulingException} from "../Networking/Scheduler.ts";
import type {Scheduler} from "../Networking/Scheduler.ts";
import type {NetDevice} from "../Networking/CsmaChannel.ts";

export type QueueSnapshot = ReadonlyMap<number, number>;

export const SAMPLE_LEAD_TIME = 1;

/**
 * Takes one queue depth reading per device, SAMPLE_LEAD_TIME before the end
 * of the epoch. Bursts after the reading are not seen.
 */
export class QueueSampler {
    protected scheduler: Scheduler;
    protected devices: ReadonlyArray<NetDevice>;
    protected samples: Map<number, number> = new Map();
    protected sampleTime_: number | null = null;

    constructor(scheduler: Scheduler, devices: ReadonlyArray<NetDevice>) {
        this.scheduler = scheduler;
        this.devices = devices;
    }

    public get sampleTime(): number | null {
        return this.sampleTime_;
    }

    public schedule(epochEnd: number): number {
        let at = epochEnd - SAMPLE_LEAD_TIME;
        if (!Number.isFinite(at) || at < 0)
            throw new SchedulingException(at,
                `Queue sample time ${at} is negative, the epoch must last at least ${SAMPLE_LEAD_TIME} time unit(s)`);

        this.devices.forEach(device => this.scheduler.scheduleAt(at, () => {
            this.samples.set(device.nodeId, device.queue.length);
        }));

        this.sampleTime_ = at;
        return at;
    }

    public takeSnapshot(): QueueSnapshot {
        if (this.samples.size < this.devices.length)
            throw new SchedulingException(this.scheduler.now,
                `Only ${this.samples.size} of ${this.devices.length} queues were sampled at ${this.scheduler.now}`);

        let snapshot = new Map([...this.samples.entries()].sort((a, b) => a[0] - b[0]));
        this.samples = new Map();

        return snapshot;
    }
}
