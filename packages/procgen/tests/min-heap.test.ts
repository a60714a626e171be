import { describe, expect, it } from "vitest";
import { MinHeap } from "../src/core/data-structures/min-heap";

describe("MinHeap", () => {
  it("pops in ascending order", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const value of [5, 1, 4, 2, 3, 0]) heap.push(value);

    const out: number[] = [];
    let value = heap.pop();
    while (value !== undefined) {
      out.push(value);
      value = heap.pop();
    }

    expect(out).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("breaks ties with the comparator", () => {
    const heap = new MinHeap<{ count: number; cell: number }>(
      (a, b) => a.count - b.count || a.cell - b.cell,
    );
    heap.push({ count: 2, cell: 9 });
    heap.push({ count: 1, cell: 7 });
    heap.push({ count: 1, cell: 3 });

    expect(heap.pop()).toEqual({ count: 1, cell: 3 });
    expect(heap.pop()).toEqual({ count: 1, cell: 7 });
    expect(heap.peek()).toEqual({ count: 2, cell: 9 });
  });

  it("tracks size and clears", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    expect(heap.isEmpty).toBe(true);
    expect(heap.pop()).toBeUndefined();

    heap.push(1);
    heap.push(2);
    expect(heap.size).toBe(2);

    heap.clear();
    expect(heap.isEmpty).toBe(true);
  });
});
