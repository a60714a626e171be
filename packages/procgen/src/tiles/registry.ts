/**
 * Tile registry: stable numeric ids with optional display metadata.
 *
 * The solver and the automaton only see ids. Names and colors are kept for
 * renderers and error messages.
 */

import { type TileKind, TerrainError } from "@terrain-sim/contracts";
import { BASE_TILE_DEFINITIONS } from "./base-tiles";

export interface TileInfo {
  readonly id: TileKind;
  readonly name: string;
  readonly color?: string;
}

export class TileRegistry {
  private readonly byIdMap = new Map<TileKind, TileInfo>();
  private readonly byNameMap = new Map<string, TileInfo>();
  private nextId = 1;

  /**
   * Register a new tile kind and return its id.
   *
   * @throws {TerrainError} INVALID_ARGUMENT if the name is empty or taken
   */
  register(name: string, color?: string): TileKind {
    if (name.length === 0) {
      throw TerrainError.invalidArgument("Tile name cannot be empty");
    }
    if (this.byNameMap.has(name)) {
      throw TerrainError.invalidArgument(`Tile "${name}" is already registered`, {
        name,
        id: this.byNameMap.get(name)?.id,
      });
    }

    const info: TileInfo = {
      id: this.nextId++,
      name,
      ...(color !== undefined && { color }),
    };
    this.byIdMap.set(info.id, info);
    this.byNameMap.set(name, info);
    return info.id;
  }

  has(id: TileKind): boolean {
    return this.byIdMap.has(id);
  }

  findByName(name: string): TileKind | undefined {
    return this.byNameMap.get(name)?.id;
  }

  /**
   * @throws {TerrainError} NOT_FOUND for an unregistered name
   */
  byName(name: string): TileKind {
    const info = this.byNameMap.get(name);
    if (!info) {
      throw TerrainError.notFound(`Unknown tile name "${name}"`, { name });
    }
    return info.id;
  }

  /**
   * @throws {TerrainError} NOT_FOUND for an unregistered id
   */
  byId(id: TileKind): TileInfo {
    const info = this.byIdMap.get(id);
    if (!info) {
      throw TerrainError.notFound(`Unknown tile id ${id}`, { id });
    }
    return info;
  }

  nameOf(id: TileKind): string {
    return this.byId(id).name;
  }

  /**
   * Display color, `undefined` when the tile was registered without one.
   */
  colorOf(id: TileKind): string | undefined {
    return this.byId(id).color;
  }

  /**
   * "Tile(water)" for known ids, "Tile(id=999)" otherwise.
   */
  describe(id: TileKind): string {
    const info = this.byIdMap.get(id);
    return info ? `Tile(${info.name})` : `Tile(id=${id})`;
  }

  /**
   * All registered ids in registration order.
   */
  universe(): TileKind[] {
    return Array.from(this.byIdMap.keys());
  }

  get size(): number {
    return this.byIdMap.size;
  }
}

/**
 * Registry pre-loaded with water, sand, grass and forest (ids 1-4).
 */
export function createDefaultRegistry(): TileRegistry {
  const registry = new TileRegistry();
  for (const def of BASE_TILE_DEFINITIONS) {
    registry.register(def.name, def.color);
  }
  return registry;
}
