import {MinHeap} from "../algorithms.ts";

export type ScheduledCallback = () => void;

type ScheduledEvent = {
    key: number,
    seq: number,
    callback: ScheduledCallback
};

export class SchedulingException extends Error {
    public time: number;

    constructor(time: number, message: string) {
        super(message);
        this.time = time;
    }
}

/**
 * Discrete-event loop on a single simulated timeline. Callbacks due at the same
 * instant run in the order they were registered.
 */
export class Scheduler {
    protected queue = new MinHeap<ScheduledEvent>();
    protected now_: number = 0;
    protected seq: number = 0;
    protected running: boolean = false;
    protected stopped: boolean = false;
    protected executed_: number = 0;

    public get now(): number {
        return this.now_;
    }

    public get pending(): number {
        return this.queue.size;
    }

    public get executed(): number {
        return this.executed_;
    }

    public scheduleAt(time: number, callback: ScheduledCallback): void {
        if (!Number.isFinite(time))
            throw new SchedulingException(time, `Cannot schedule an event at non-finite time ${time}`);

        if (time < 0)
            throw new SchedulingException(time, `Cannot schedule an event at negative time ${time}`);

        if (time < this.now_)
            throw new SchedulingException(time, `Cannot schedule an event at ${time}, simulation is already at ${this.now_}`);

        this.queue.push({key: time, seq: this.seq++, callback});
    }

    public schedule(delay: number, callback: ScheduledCallback): void {
        this.scheduleAt(this.now_ + delay, callback);
    }

    public stop(at: number): void {
        this.scheduleAt(at, () => {
            this.stopped = true;
        });
    }

    public run(): void {
        if (this.running)
            throw new SchedulingException(this.now_, "Scheduler is already running");

        this.running = true;
        this.stopped = false;
        try {
            while (!this.stopped) {
                let event = this.queue.pop();
                if (!event)
                    break;

                this.now_ = event.key;
                event.callback();
                this.executed_++;
            }
        } finally {
            this.running = false;
        }
    }

    public reset(): void {
        this.queue.clear();
        this.now_ = 0;
        this.seq = 0;
        this.executed_ = 0;
        this.stopped = false;
    }
}
