import { describe, expect, it } from "vitest";
import {
  CoordSet,
  coordKey,
  FastQueue,
} from "../src/core/data-structures/fast-queue";

describe("FastQueue", () => {
  it("should enqueue and dequeue in FIFO order", () => {
    const queue = new FastQueue<number>();

    queue.enqueue(1);
    queue.enqueue(2);
    queue.enqueue(3);

    expect(queue.dequeue()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBe(3);
  });

  it("should return undefined when dequeuing from empty queue", () => {
    const queue = new FastQueue<number>();
    expect(queue.dequeue()).toBeUndefined();
  });

  it("should track isEmpty and length", () => {
    const queue = new FastQueue<number>();
    expect(queue.isEmpty).toBe(true);
    expect(queue.length).toBe(0);

    queue.enqueue(1);
    queue.enqueue(2);
    expect(queue.isEmpty).toBe(false);
    expect(queue.length).toBe(2);

    queue.dequeue();
    queue.dequeue();
    expect(queue.isEmpty).toBe(true);
  });

  it("should compact internal array after many dequeues", () => {
    const queue = new FastQueue<number>();

    for (let i = 0; i < 2000; i++) {
      queue.enqueue(i);
    }
    // Past the compaction threshold of 1000
    for (let i = 0; i < 1500; i++) {
      queue.dequeue();
    }

    expect(queue.length).toBe(500);
    expect(queue.dequeue()).toBe(1500);
    expect(queue.dequeue()).toBe(1501);
  });

  it("should handle mixed enqueue/dequeue operations", () => {
    const queue = new FastQueue<string>();

    queue.enqueue("a");
    queue.enqueue("b");
    expect(queue.dequeue()).toBe("a");

    queue.enqueue("c");
    expect(queue.dequeue()).toBe("b");
    expect(queue.dequeue()).toBe("c");
    expect(queue.isEmpty).toBe(true);
  });

  it("should create queue from an iterable", () => {
    const queue = FastQueue.from(new Set(["apple", "banana"]));

    expect(queue.length).toBe(2);
    expect(queue.dequeue()).toBe("apple");
    expect(queue.dequeue()).toBe("banana");
  });
});

describe("coordKey", () => {
  it("flattens row-major", () => {
    expect(coordKey(10, 5, 100)).toBe(1005);
    expect(coordKey(3, 0, 4)).toBe(12);
  });
});

describe("CoordSet", () => {
  it("should add and check coordinates", () => {
    const set = new CoordSet(10, 10);

    expect(set.has(0, 0)).toBe(false);
    set.add(0, 0);
    set.add(9, 9);
    expect(set.has(0, 0)).toBe(true);
    expect(set.has(9, 9)).toBe(true);
    expect(set.has(9, 8)).toBe(false);
  });

  it("should count distinct coordinates", () => {
    const set = new CoordSet(4, 4);
    set.add(1, 1);
    set.add(1, 1);
    set.add(2, 3);
    expect(set.size).toBe(2);
  });

  it("should ignore coordinates past the end of the grid", () => {
    const set = new CoordSet(2, 2);
    set.add(40, 0);
    expect(set.has(40, 0)).toBe(false);
    expect(set.size).toBe(0);
  });
});
