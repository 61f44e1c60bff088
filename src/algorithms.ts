export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

// Continuous uniform draw in [0, maxExclusive) truncated to an integer
export function uniformIndex(rng: RandomSource, maxExclusive: number): number {
    return Math.floor(rng() * maxExclusive);
}

export function mean(values: number[]): number {
    if (values.length < 1)
        return 0;

    let sum = 0;
    for (let i = 0; i < values.length; i++)
        sum += values[i];

    return sum / values.length;
}

type HeapEntry = {
    key: number,
    seq: number
};

/**
 * Binary min-heap ordered by `key`, ties broken by `seq` (insertion order).
 */
export class MinHeap<T extends HeapEntry> {
    protected items: T[] = [];

    public get size(): number {
        return this.items.length;
    }

    public push(item: T): void {
        this.items.push(item);
        let i = this.items.length - 1;
        while (i > 0) {
            let parent = (i - 1) >> 1;
            if (!this.less(this.items[i], this.items[parent]))
                break;

            this.swap(i, parent);
            i = parent;
        }
    }

    public pop(): T | null {
        let top = this.items[0];
        let last = this.items.pop();
        if (last === undefined)
            return null;

        if (this.items.length) {
            this.items[0] = last;
            let i = 0;
            for (;;) {
                let l = 2 * i + 1, r = l + 1, smallest = i;
                if (l < this.items.length && this.less(this.items[l], this.items[smallest]))
                    smallest = l;
                if (r < this.items.length && this.less(this.items[r], this.items[smallest]))
                    smallest = r;
                if (smallest == i)
                    break;

                this.swap(i, smallest);
                i = smallest;
            }
        }

        return top;
    }

    public clear(): void {
        this.items = [];
    }

    protected less(a: T, b: T): boolean {
        return a.key < b.key || (a.key == b.key && a.seq < b.seq);
    }

    protected swap(a: number, b: number): void {
        let tmp = this.items[a];
        this.items[a] = this.items[b];
        this.items[b] = tmp;
    }
}
