import { describe, expect, it } from "vitest";
import {
  countBits32,
  fullMask,
  lowestBitIndex,
  Wave,
  wordCount,
} from "../src/wfc/wave";

describe("bit helpers", () => {
  it("counts set bits", () => {
    expect(countBits32(0)).toBe(0);
    expect(countBits32(0b1011)).toBe(3);
    expect(countBits32(0xffffffff)).toBe(32);
  });

  it("finds the lowest set bit", () => {
    expect(lowestBitIndex(0b1000)).toBe(3);
    expect(lowestBitIndex(0b1010)).toBe(1);
    expect(lowestBitIndex(0x80000000)).toBe(31);
  });

  it("sizes full masks to the universe", () => {
    expect(wordCount(32)).toBe(1);
    expect(wordCount(33)).toBe(2);
    expect(Array.from(fullMask(3))).toEqual([7]);
    expect(Array.from(fullMask(32))).toEqual([0xffffffff]);
    expect(Array.from(fullMask(33))).toEqual([0xffffffff, 1]);
  });
});

describe("Wave", () => {
  it("starts every cell with the full universe", () => {
    const wave = new Wave(2, 1, [10, 20, 30]);
    expect(wave.remainingCount).toBe(2);
    expect(wave.count(1)).toBe(3);
    expect(wave.entropy(1)).toBe(2);
    expect(wave.candidates(0)).toEqual([10, 20, 30]);
  });

  it("restricts and collapses cells", () => {
    const wave = new Wave(2, 1, [10, 20, 30]);

    expect(wave.intersectionCount(0, new Uint32Array([0b110]))).toBe(2);
    expect(wave.count(0)).toBe(3);

    expect(wave.restrict(0, new Uint32Array([0b101]))).toBe(2);
    expect(wave.candidates(0)).toEqual([10, 30]);

    wave.collapseTo(0, 2);
    expect(wave.resolvedTile(0)).toBe(30);
    expect(wave.entropy(0)).toBe(0);
  });

  it("counts each collapse once", () => {
    const wave = new Wave(2, 1, [1, 2]);
    wave.markCollapsed(0);
    wave.markCollapsed(0);
    expect(wave.remainingCount).toBe(1);
    expect(wave.isUncollapsed(0)).toBe(false);
    expect(wave.isUncollapsed(1)).toBe(true);
  });

  it("unions per-candidate masks", () => {
    const wave = new Wave(1, 1, [1, 2, 3]);
    const masks = [
      new Uint32Array([0b001]),
      new Uint32Array([0b010]),
      new Uint32Array([0b100]),
    ];
    const out = new Uint32Array(1);

    wave.restrict(0, new Uint32Array([0b101]));
    wave.unionInto(0, masks, out);

    expect(Array.from(out)).toEqual([0b101]);
  });

  it("handles universes wider than one word", () => {
    const tiles = Array.from({ length: 40 }, (_, i) => i + 100);
    const wave = new Wave(1, 1, tiles);
    expect(wave.count(0)).toBe(40);

    wave.collapseTo(0, 35);
    expect(wave.candidateIndices(0)).toEqual([35]);
    expect(wave.resolvedTile(0)).toBe(135);
  });
});
