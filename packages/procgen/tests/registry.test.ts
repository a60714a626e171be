import { describe, expect, it } from "vitest";
import { BaseTile } from "../src/tiles/base-tiles";
import { createDefaultRegistry, TileRegistry } from "../src/tiles/registry";
import { thrown } from "./helpers";

describe("TileRegistry", () => {
  it("preloads the base tiles with matching ids", () => {
    const registry = createDefaultRegistry();
    expect(registry.universe()).toEqual([1, 2, 3, 4]);
    expect(registry.byName("water")).toBe(BaseTile.WATER);
    expect(registry.byName("forest")).toBe(BaseTile.FOREST);
    expect(registry.colorOf(BaseTile.SAND)).toBe("#ffc125");
  });

  it("assigns ids in registration order", () => {
    const registry = createDefaultRegistry();
    const lava = registry.register("lava");
    expect(lava).toBe(5);
    expect(registry.nameOf(lava)).toBe("lava");
    expect(registry.colorOf(lava)).toBeUndefined();
    expect(registry.size).toBe(5);
  });

  it("describes known and unknown ids", () => {
    const registry = createDefaultRegistry();
    expect(registry.describe(1)).toBe("Tile(water)");
    expect(registry.describe(999)).toBe("Tile(id=999)");
  });

  it("raises NOT_FOUND for unknown names and ids", () => {
    const registry = new TileRegistry();
    expect(thrown(() => registry.byName("swamp"))).toMatchObject({
      code: "NOT_FOUND",
      message: 'Unknown tile name "swamp"',
    });
    expect(() => registry.byId(3)).toThrow('Unknown tile id 3');
    expect(registry.findByName("swamp")).toBeUndefined();
    expect(registry.has(3)).toBe(false);
  });

  it("rejects duplicate and empty names", () => {
    const registry = createDefaultRegistry();
    expect(thrown(() => registry.register("sand"))).toMatchObject({
      code: "INVALID_ARGUMENT",
      message: 'Tile "sand" is already registered',
    });
    expect(() => registry.register("")).toThrow("Tile name cannot be empty");
  });
});
