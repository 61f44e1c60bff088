import {test} from "node:test";
import assert from "node:assert/strict";
import {mean, MinHeap, mulberry32, uniformIndex} from "../src/algorithms.ts";

test("mulberry32 repeats its sequence for the same seed", () => {
    let a = mulberry32(42);
    let b = mulberry32(42);
    for (let i = 0; i < 10; i++)
        assert.equal(a(), b());
});

test("mulberry32 stays within [0, 1)", () => {
    let rng = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
        let v = rng();
        assert.ok(v >= 0 && v < 1, `value ${v} out of range`);
    }
});

test("uniformIndex truncates the draw to an integer index", () => {
    assert.equal(uniformIndex(() => 0, 5), 0);
    assert.equal(uniformIndex(() => 0.999, 5), 4);
    assert.equal(uniformIndex(() => 0.5, 4), 2);
});

test("mean of no values is 0", () => {
    assert.equal(mean([]), 0);
    assert.equal(mean([1, 2, 3]), 2);
});

test("MinHeap pops by key, then by insertion sequence", () => {
    let heap = new MinHeap<{key: number, seq: number, label: string}>();
    heap.push({key: 2, seq: 0, label: "c"});
    heap.push({key: 1, seq: 1, label: "a"});
    heap.push({key: 2, seq: 2, label: "d"});
    heap.push({key: 1, seq: 3, label: "b"});
    heap.push({key: 0, seq: 4, label: "start"});

    let order: string[] = [];
    for (let item = heap.pop(); item; item = heap.pop())
        order.push(item.label);

    assert.deepEqual(order, ["start", "a", "b", "c", "d"]);
    assert.equal(heap.size, 0);
    assert.equal(heap.pop(), null);
});
