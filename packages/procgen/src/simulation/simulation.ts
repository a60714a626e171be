/**
 * Terrain simulation orchestrator.
 *
 * Runs wave collapse, then the cellular automaton, and returns every frame.
 * Rule tables belong to the instance: overrides passed to {@link
 * TerrainSimulation.run} stay installed for later runs on the same instance
 * and never affect other instances.
 */

import {
  type AdjacencyRuleSet,
  type EvolutionRuleSpec,
  parseSimulationConfig,
  randomUint32,
  Result,
  SeededRandom,
  TerrainError,
  type TileKind,
} from "@terrain-sim/contracts";
import { CaRuleEngine } from "../automata/engine";
import type { CaRule } from "../automata/rules";
import { toCaRules } from "../automata/rules";
import type { ReadonlyTileGrid } from "../core/grid/types";
import { calculateFramesChecksum } from "../core/hash/checksum";
import { createPipeline } from "../pipeline/builder";
import {
  createEmptyArtifact,
  type EmptyArtifact,
  type ProgressCallback,
  type TraceEvent,
} from "../pipeline/types";
import { normalizeSeed } from "../seed";
import { createDefaultRegistry, type TileRegistry } from "../tiles/registry";
import { AdjacencyRuleTable, validateAdjacencyRules } from "../wfc/adjacency";
import type { WaveStats } from "../wfc/solver";
import { createCollapseWavePass, createEvolvePass } from "./passes";

export interface SimulationRunOptions {
  /** uint32 or a string hashed with DJB2; omitted continues the current stream */
  readonly seed?: number | string;
  /** Replaces this instance's adjacency table */
  readonly adjacencyRules?: AdjacencyRuleSet;
  /** Added on top of the built-in automaton rules */
  readonly evolutionRules?: readonly (CaRule | EvolutionRuleSpec)[];
  /** Tiles the wave may pick from; defaults to the registry's tiles */
  readonly universe?: readonly TileKind[];
  readonly trace?: boolean;
  readonly onProgress?: ProgressCallback;
}

export interface SimulationHistory {
  readonly seed: number;
  readonly width: number;
  readonly height: number;
  readonly steps: number;
  /** `frames[0]` is the wave output, `frames[k]` the state after k steps */
  readonly frames: readonly ReadonlyTileGrid[];
  readonly wave: WaveStats;
  readonly checksum: string;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface TerrainSimulationOptions {
  readonly registry?: TileRegistry;
  readonly adjacency?: AdjacencyRuleTable;
  readonly automata?: CaRuleEngine;
  readonly random?: SeededRandom;
}

function toTerrainError(error: unknown): TerrainError {
  if (TerrainError.isTerrainError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return TerrainError.generationFailed(message, { cause: error });
}

export class TerrainSimulation {
  readonly registry: TileRegistry;
  readonly adjacency: AdjacencyRuleTable;
  readonly automata: CaRuleEngine;
  private readonly random: SeededRandom;

  constructor(options: TerrainSimulationOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.adjacency =
      options.adjacency ?? new AdjacencyRuleTable(this.registry.universe());
    this.automata = options.automata ?? new CaRuleEngine();
    this.random = options.random ?? new SeededRandom(randomUint32());
  }

  /** Seed the instance's random source last started from */
  get seed(): number {
    return this.random.seed;
  }

  /**
   * Generate a terrain and evolve it for `steps` generations.
   *
   * @throws {TerrainError} INVALID_ARGUMENT for bad dimensions, step count,
   *   seed or evolution rule; the run is aborted before any work
   */
  run(
    width: number,
    height: number,
    steps: number,
    options: SimulationRunOptions = {},
  ): SimulationHistory {
    const config = parseSimulationConfig({
      width,
      height,
      steps,
      ...(options.seed !== undefined && { seed: options.seed }),
      ...(options.trace !== undefined && { trace: options.trace }),
    }).getOrThrow();

    const evolutionRules = options.evolutionRules
      ? toCaRules(options.evolutionRules)
      : undefined;

    if (config.seed !== undefined) {
      this.random.reseed(normalizeSeed(config.seed));
    }

    let ruleIssues: string[] = [];
    if (options.adjacencyRules) {
      ruleIssues = validateAdjacencyRules(options.adjacencyRules);
      this.adjacency.install(options.adjacencyRules);
    }
    if (evolutionRules) {
      this.automata.installRules(evolutionRules);
    }

    const pipeline = createPipeline<EmptyArtifact>("terrain", config)
      .pipe(
        createCollapseWavePass({
          universe: options.universe ?? this.registry.universe(),
          adjacency: this.adjacency,
          ruleIssues,
        }),
      )
      .pipe(createEvolvePass(this.automata))
      .build();

    const result = pipeline.runSync(createEmptyArtifact(), this.random, {
      ...(options.onProgress && { onProgress: options.onProgress }),
    });

    if (!result.success) {
      const cause = toTerrainError(result.error.cause ?? result.error);
      const failure = new TerrainError(cause.code, result.error.message, cause.details);
      failure.cause = cause;
      throw failure;
    }

    const { frames, wave } = result.artifact;
    return {
      seed: this.random.seed,
      width: config.width,
      height: config.height,
      steps: config.steps,
      frames,
      wave,
      checksum: calculateFramesChecksum(frames),
      trace: result.trace,
      durationMs: result.durationMs,
    };
  }

  /**
   * {@link run} with failures returned instead of thrown.
   */
  tryRun(
    width: number,
    height: number,
    steps: number,
    options: SimulationRunOptions = {},
  ): Result<SimulationHistory, TerrainError> {
    return Result.fromThrowable(
      () => this.run(width, height, steps, options),
      toTerrainError,
    );
  }
}

/**
 * Run on a fresh {@link TerrainSimulation}, so no rule override or random
 * state leaks between calls.
 */
export function runSimulation(
  width: number,
  height: number,
  steps: number,
  options: SimulationRunOptions = {},
): SimulationHistory {
  return new TerrainSimulation().run(width, height, steps, options);
}
