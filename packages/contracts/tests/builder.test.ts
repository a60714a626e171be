import { describe, expect, it } from "vitest";
import { AdjacencyRulesSchema, EvolutionRuleSpecSchema } from "../src/schemas/simulation";
import {
  buildSimulationConfig,
  DEFAULT_SIMULATION_DIMENSION,
  DEFAULT_SIMULATION_STEPS,
  parseSimulationConfig,
} from "../src/utils/builder";

describe("buildSimulationConfig", () => {
  it("fills defaults", () => {
    const res = buildSimulationConfig({});
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({
      width: DEFAULT_SIMULATION_DIMENSION,
      height: DEFAULT_SIMULATION_DIMENSION,
      steps: DEFAULT_SIMULATION_STEPS,
    });
  });

  it("keeps provided values", () => {
    const res = buildSimulationConfig({ width: 5, steps: 0, seed: "dunes", trace: true });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({
      width: 5,
      height: 64,
      steps: 0,
      seed: "dunes",
      trace: true,
    });
  });

  it("folds issues into one INVALID_ARGUMENT error", () => {
    const res = buildSimulationConfig({ width: 0, steps: -1 });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("INVALID_ARGUMENT");
    expect(res.error.message).toBe(
      "Invalid simulation config: width: Width must be positive; steps: Steps cannot be negative",
    );
    expect(res.error.details?.issues).toEqual([
      { path: "width", message: "Width must be positive" },
      { path: "steps", message: "Steps cannot be negative" },
    ]);
  });
});

describe("parseSimulationConfig", () => {
  it("rejects non-integer dimensions", () => {
    const res = parseSimulationConfig({ width: 2.5, height: 3, steps: 1 });
    expect(res.isErr()).toBe(true);
    expect(res.error.message).toBe(
      "Invalid simulation config: width: Width must be an integer",
    );
  });

  it("rejects non-objects", () => {
    expect(parseSimulationConfig("wide").isErr()).toBe(true);
  });
});

describe("rule schemas", () => {
  it("accepts well-formed adjacency tables", () => {
    expect(
      AdjacencyRulesSchema.safeParse({ 1: { up: [1, 2], left: [] } }).success,
    ).toBe(true);
  });

  it("rejects unknown directions and non-tile keys", () => {
    expect(AdjacencyRulesSchema.safeParse({ 1: { north: [1] } }).success).toBe(false);
    expect(AdjacencyRulesSchema.safeParse({ water: { up: [1] } }).success).toBe(false);
  });

  it("validates evolution rule thresholds", () => {
    expect(
      EvolutionRuleSpecSchema.safeParse({
        tile: "*",
        clauses: [{ neighbor: 1, atLeast: 8, becomes: 2 }],
      }).success,
    ).toBe(true);
    expect(
      EvolutionRuleSpecSchema.safeParse({
        tile: 1,
        clauses: [{ neighbor: 1, atLeast: 9, becomes: 2 }],
      }).success,
    ).toBe(false);
  });
});
