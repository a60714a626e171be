import { z } from "zod";
import { DIRECTIONS } from "../types/terrain";
import { SeedSchema } from "./seed";

const TileKindSchema = z.number().int().positive();

/** Largest grid side accepted from configuration */
export const MAX_GRID_DIMENSION = 4096;

export const SimulationConfigSchema = z.object({
  width: z
    .number()
    .int("Width must be an integer")
    .positive("Width must be positive")
    .max(MAX_GRID_DIMENSION),
  height: z
    .number()
    .int("Height must be an integer")
    .positive("Height must be positive")
    .max(MAX_GRID_DIMENSION),
  steps: z
    .number()
    .int("Steps must be an integer")
    .min(0, "Steps cannot be negative"),
  seed: SeedSchema.optional(),
  trace: z.boolean().optional(),
});

export type ValidatedSimulationConfig = z.infer<typeof SimulationConfigSchema>;

export const DirectionSchema = z.enum(DIRECTIONS);

/**
 * Allowed-neighbor list for a single (tile, direction) entry.
 */
export const NeighborListSchema = z.array(TileKindSchema);

/**
 * Strict form of an adjacency table. Tables that fail it are still
 * accepted by the rule table, which drops the entries that do not parse.
 */
export const AdjacencyRulesSchema = z.record(
  z.string().regex(/^[1-9]\d*$/, { error: "Tile keys must be positive integers" }),
  z.partialRecord(DirectionSchema, NeighborListSchema),
);

export const ThresholdClauseSchema = z.object({
  neighbor: TileKindSchema,
  atLeast: z.number().int().min(0).max(8),
  becomes: TileKindSchema,
});

export const EvolutionRuleSpecSchema = z.object({
  tile: z.union([TileKindSchema, z.literal("*")]),
  clauses: z.array(ThresholdClauseSchema),
});
