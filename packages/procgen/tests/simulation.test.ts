import {
  type AdjacencyRuleSet,
  SeededRandom,
  TerrainError,
} from "@terrain-sim/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CaRuleEngine } from "../src/automata/engine";
import { exactTile } from "../src/automata/rules";
import { calculateFramesChecksum } from "../src/core/hash/checksum";
import { hashSeedString } from "../src/seed";
import {
  COLLAPSE_WAVE_PASS_ID,
  EVOLVE_PASS_ID,
} from "../src/simulation/passes";
import { runSimulation, TerrainSimulation } from "../src/simulation/simulation";
import { assertDeterministic, testDeterminism } from "../src/testing";
import { BASE_TILE_UNIVERSE, BaseTile } from "../src/tiles/base-tiles";
import { AdjacencyRuleTable, DEFAULT_ADJACENCY_RULES } from "../src/wfc/adjacency";
import { WfcSolver } from "../src/wfc/solver";
import { thrown } from "./helpers";

const { WATER, FOREST } = BaseTile;

describe("TerrainSimulation", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("gives identical histories for the same seed", () => {
    const a = new TerrainSimulation().run(5, 5, 3, { seed: 7 });
    const b = new TerrainSimulation().run(5, 5, 3, { seed: 7 });

    expect(a.frames).toHaveLength(4);
    expect(a.checksum).toBe(b.checksum);
    a.frames.forEach((frame, i) => {
      const other = b.frames[i];
      expect(other && frame.equals(other)).toBe(true);
    });
    expect(a.wave).toEqual(b.wave);
  });

  it("starts from the wave output and steps the automaton", () => {
    const history = new TerrainSimulation().run(6, 4, 2, { seed: 21 });

    const wave = new WfcSolver().generate(
      6,
      4,
      BASE_TILE_UNIVERSE,
      new AdjacencyRuleTable(),
      new SeededRandom(21),
    );
    const engine = new CaRuleEngine();
    const [first, second, third] = history.frames;

    expect(first?.equals(wave)).toBe(true);
    expect(second && first && second.equals(engine.step(first))).toBe(true);
    expect(third && second && third.equals(engine.step(second))).toBe(true);
    expect(history.checksum).toBe(calculateFramesChecksum(history.frames));
    expect(history).toMatchObject({ seed: 21, width: 6, height: 4, steps: 2 });
  });

  it("returns only the wave output for zero steps", () => {
    expect(new TerrainSimulation().run(3, 3, 0, { seed: 1 }).frames).toHaveLength(1);
  });

  it("hashes string seeds", () => {
    const history = new TerrainSimulation().run(3, 3, 1, { seed: "meadow" });
    expect(history.seed).toBe(hashSeedString("meadow"));
    expect(history.checksum).toBe(
      new TerrainSimulation().run(3, 3, 1, { seed: hashSeedString("meadow") }).checksum,
    );
  });

  it("continues the random stream when no seed is given", () => {
    const simulation = new TerrainSimulation({ random: new SeededRandom(7) });
    const first = simulation.run(5, 5, 1);
    const second = simulation.run(5, 5, 1);

    expect(first.seed).toBe(7);
    expect(first.checksum).toBe(new TerrainSimulation().run(5, 5, 1, { seed: 7 }).checksum);
    expect(second.checksum).not.toBe(first.checksum);
  });

  it.each([
    [0, 5, 1],
    [5, -2, 1],
    [5, 5, -1],
    [5, 5, 1.5],
  ])("rejects %s x %s with %s steps", (width, height, steps) => {
    const error = thrown(() => new TerrainSimulation().run(width, height, steps));
    expect(error).toBeInstanceOf(TerrainError);
    expect(error).toMatchObject({ code: "INVALID_ARGUMENT" });
  });

  it("rejects bad seeds before touching the random stream", () => {
    const simulation = new TerrainSimulation({ random: new SeededRandom(3) });
    expect(thrown(() => simulation.run(4, 4, 1, { seed: -5 }))).toMatchObject({
      code: "INVALID_ARGUMENT",
    });
    expect(simulation.seed).toBe(3);
  });

  it("rejects invalid evolution rules before running", () => {
    const simulation = new TerrainSimulation({ random: new SeededRandom(3) });
    const result = simulation.tryRun(4, 4, 1, {
      seed: 11,
      evolutionRules: [{ tile: WATER, clauses: [{ neighbor: 1, atLeast: 12, becomes: 2 }] }],
    });

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("INVALID_ARGUMENT");
    expect(simulation.seed).toBe(3);
  });

  it("keeps overrides installed on the instance only", () => {
    const rules: AdjacencyRuleSet = { [WATER]: { right: [WATER] } };
    const simulation = new TerrainSimulation();

    simulation.run(4, 4, 1, {
      seed: 1,
      adjacencyRules: rules,
      evolutionRules: [{ tile: "*", clauses: [] }],
    });
    simulation.run(4, 4, 1, { seed: 2 });

    expect(simulation.adjacency.entries()).toEqual(rules);
    expect(simulation.automata.getRules()).toHaveLength(5);
    expect(new TerrainSimulation().adjacency.entries()).toEqual(DEFAULT_ADJACENCY_RULES);
  });

  it("applies evolution rule overrides", () => {
    const history = new TerrainSimulation().run(4, 4, 1, {
      seed: 5,
      evolutionRules: BASE_TILE_UNIVERSE.map((tile) => ({
        selector: exactTile(tile),
        transform: () => FOREST,
      })),
    });

    expect(history.frames[1]?.countCells(FOREST)).toBe(16);
  });

  it("restricts the wave to a given universe", () => {
    const history = new TerrainSimulation().run(4, 4, 2, {
      seed: 8,
      universe: [WATER],
    });

    for (const frame of history.frames) {
      expect(frame.countCells(WATER)).toBe(16);
    }
  });

  it("reports failing passes as TerrainError", () => {
    const simulation = new TerrainSimulation();
    const result = simulation.tryRun(3, 3, 1, {
      seed: 4,
      evolutionRules: BASE_TILE_UNIVERSE.map((tile) => ({
        selector: exactTile(tile),
        transform: () => 0.5,
      })),
    });

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("INVALID_ARGUMENT");
    expect(result.error.message).toMatch(
      /^Pipeline failed at step 1 \(pass: terrain\.evolve\): Rule for tile \d returned non-integer 0\.5 at \(0, 0\)$/,
    );
  });

  it("reports progress per pass", () => {
    const progress: [number, string][] = [];
    new TerrainSimulation().run(3, 3, 1, {
      seed: 2,
      onProgress: (percent, passId) => progress.push([percent, passId]),
    });

    expect(progress).toEqual([
      [50, COLLAPSE_WAVE_PASS_ID],
      [100, EVOLVE_PASS_ID],
    ]);
  });

  it("traces passes, generations and contradictions", () => {
    const A = 1;
    const B = 2;
    const history = new TerrainSimulation().run(4, 3, 2, {
      seed: 9,
      trace: true,
      universe: [A, B],
      adjacencyRules: {
        [A]: { right: [B], left: [A] },
        [B]: { right: [B], left: [A] },
      },
    });

    const starts = history.trace.filter((e) => e.eventType === "start").map((e) => e.passId);
    const contradictions = history.trace.filter(
      (e) => e.eventType === "warning" && e.passId === COLLAPSE_WAVE_PASS_ID,
    );
    const generations = history.trace.filter(
      (e) => e.eventType === "decision" && e.passId === EVOLVE_PASS_ID,
    );

    expect(starts).toEqual([COLLAPSE_WAVE_PASS_ID, EVOLVE_PASS_ID]);
    expect(history.wave.contradictions).toBeGreaterThan(0);
    expect(contradictions).toHaveLength(history.wave.contradictions);
    expect(generations).toHaveLength(2);
  });

  it("warns about adjacency entries it ignores", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const malformed: AdjacencyRuleSet = JSON.parse('{"1":{"north":[1]}}');

    const history = new TerrainSimulation().run(2, 2, 0, {
      seed: 1,
      trace: true,
      adjacencyRules: malformed,
    });

    const ignored = history.trace.filter(
      (e) => e.eventType === "warning" && e.passId === COLLAPSE_WAVE_PASS_ID,
    );
    expect(ignored.length).toBeGreaterThan(0);
    expect(ignored[0]?.data).toMatchObject({
      message: expect.stringMatching(/^Ignored adjacency entry /),
    });
  });
});

describe("runSimulation", () => {
  it("isolates runs from each other", () => {
    runSimulation(4, 4, 1, { seed: 3, adjacencyRules: { [WATER]: { up: [] } } });

    const a = runSimulation(4, 4, 1, { seed: 3 });
    const b = new TerrainSimulation().run(4, 4, 1, { seed: 3 });
    expect(a.checksum).toBe(b.checksum);
  });
});

describe("determinism helpers", () => {
  it("accepts seeded runs", () => {
    expect(() =>
      assertDeterministic({ width: 6, height: 6, steps: 2, options: { seed: 42 } }),
    ).not.toThrow();

    const report = testDeterminism(
      { width: 4, height: 4, steps: 1, options: { seed: "dunes" } },
      2,
    );
    expect(report.deterministic).toBe(true);
    expect(report.checksums).toHaveLength(2);
    expect(report.uniqueChecksums).toHaveLength(1);
  });
});
