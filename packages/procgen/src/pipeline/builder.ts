/**
 * Type-safe pipeline builder DSL.
 *
 * Allows composing passes into pipelines with compile-time type checking
 * of artifact flow.
 */

import type {
  RandomSource,
  ValidatedSimulationConfig,
} from "@terrain-sim/contracts";
import { createTraceCollector } from "./trace";
import type {
  Artifact,
  Pass,
  PassContext,
  Pipeline,
  PipelineOptions,
  PipelineResult,
  TraceCollector,
} from "./types";

/**
 * Mutable bookkeeping for one run, shared by every composed step.
 */
interface Execution {
  readonly ctx: PassContext;
  readonly trace: TraceCollector;
  readonly totalSteps: number;
  readonly options: PipelineOptions | undefined;
  passId: string | undefined;
  stepIndex: number;
}

type Runner<TStart extends Artifact, TCurrent extends Artifact> = (
  input: TStart,
  exec: Execution,
) => TCurrent;

/**
 * Run a single pass with tracing and progress reporting
 */
function executePass<TIn extends Artifact, TOut extends Artifact>(
  pass: Pass<TIn, TOut>,
  index: number,
  input: TIn,
  exec: Execution,
): TOut {
  exec.passId = pass.id;
  exec.stepIndex = index;

  exec.trace.start(pass.id);
  const stepStart = performance.now();

  const output = pass.run(input, exec.ctx);

  exec.trace.end(pass.id, performance.now() - stepStart);

  if (exec.options?.onProgress) {
    const progress = Math.round(((index + 1) / exec.totalSteps) * 100);
    exec.options.onProgress(progress, pass.id);
  }

  return output;
}

/**
 * Build error result
 */
function buildErrorResult<TCurrent extends Artifact>(
  error: unknown,
  exec: Execution,
  startTime: number,
): PipelineResult<TCurrent> {
  const originalError =
    error instanceof Error ? error : new Error(String(error));

  const passId = exec.passId ?? "unknown";
  const enhancedError = new Error(
    `Pipeline failed at step ${exec.stepIndex} (pass: ${passId}): ${originalError.message}`,
  );
  enhancedError.cause = originalError;

  return {
    success: false,
    error: enhancedError,
    trace: exec.trace.getEvents(),
    durationMs: performance.now() - startTime,
  };
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<
  TStart extends Artifact,
  TCurrent extends Artifact,
> {
  private constructor(
    private readonly id: string,
    private readonly config: Readonly<ValidatedSimulationConfig>,
    private readonly passIds: readonly string[],
    private readonly runner: Runner<TStart, TCurrent>,
  ) {}

  /**
   * Create a new pipeline builder
   */
  static create<TStart extends Artifact>(
    id: string,
    config: Readonly<ValidatedSimulationConfig>,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, config, [], (input) => input);
  }

  /**
   * Add a pass to the pipeline.
   */
  pipe<TNext extends Artifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.runner;
    const index = this.passIds.length;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      this.config,
      [...this.passIds, pass.id],
      (input, exec) => executePass(pass, index, previous(input, exec), exec),
    );
  }

  /**
   * Build the final pipeline
   */
  build(): Pipeline<TStart, TCurrent> {
    const { id, config, runner } = this;
    const passIds = [...this.passIds];

    return {
      id,
      passIds,

      runSync(
        input: TStart,
        random: RandomSource,
        options?: PipelineOptions,
      ): PipelineResult<TCurrent> {
        const startTime = performance.now();
        const trace = createTraceCollector(config.trace ?? false);
        const exec: Execution = {
          ctx: { random, config, trace },
          trace,
          totalSteps: passIds.length,
          options,
          passId: undefined,
          stepIndex: -1,
        };

        try {
          const artifact = runner(input, exec);
          return {
            success: true,
            artifact,
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        } catch (error) {
          return buildErrorResult<TCurrent>(error, exec, startTime);
        }
      },
    };
  }
}

/**
 * Convenience function to create a pipeline
 */
export function createPipeline<TStart extends Artifact>(
  id: string,
  config: Readonly<ValidatedSimulationConfig>,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id, config);
}
