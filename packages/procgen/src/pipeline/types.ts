/**
 * Pipeline Types
 *
 * Typed artifacts and passes for the terrain pipeline.
 */

import type {
  RandomSource,
  ValidatedSimulationConfig,
} from "@terrain-sim/contracts";
import type { TileGrid } from "../core/grid/tile-grid";
import type { WaveStats } from "../wfc/solver";

// =============================================================================
// ARTIFACTS - Typed intermediate and final data products
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

/**
 * Empty artifact - starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * Initial terrain produced by wave collapse
 */
export interface WaveArtifact extends Artifact<"wave"> {
  readonly type: "wave";
  readonly grid: TileGrid;
  readonly stats: WaveStats;
}

/**
 * Wave output followed by every automaton generation
 */
export interface FramesArtifact extends Artifact<"frames"> {
  readonly type: "frames";
  readonly frames: readonly TileGrid[];
  readonly wave: WaveStats;
}

export function createEmptyArtifact(): EmptyArtifact {
  return { type: "empty", id: "empty" };
}

// =============================================================================
// TRACING
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Decision event for "explain why" debugging
 */
export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly unknown[];
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Shared state handed to every pass of one run.
 */
export interface PassContext {
  readonly random: RandomSource;
  readonly config: Readonly<ValidatedSimulationConfig>;
  readonly trace: TraceCollector;
}

/**
 * A pass transforms one artifact type into another.
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

export type PipelineResult<T extends Artifact> =
  | {
      readonly success: true;
      readonly artifact: T;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    }
  | {
      readonly success: false;
      readonly error: Error;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    };

/**
 * Progress callback type
 */
export type ProgressCallback = (progress: number, passId: string) => void;

export interface PipelineOptions {
  /** Progress callback (percent, passId) */
  readonly onProgress?: ProgressCallback;
}

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  /** Pass ids in execution order */
  readonly passIds: readonly string[];
  runSync(
    input: TStart,
    random: RandomSource,
    options?: PipelineOptions,
  ): PipelineResult<TEnd>;
}
