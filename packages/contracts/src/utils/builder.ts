import {
  SimulationConfigSchema,
  type ValidatedSimulationConfig,
} from "../schemas/simulation";
import { TerrainError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";
import type { SimulationConfigInput } from "../types/terrain";

export const DEFAULT_SIMULATION_DIMENSION = 64;
export const DEFAULT_SIMULATION_STEPS = 10;

/**
 * Fill defaults into a partial simulation config and validate it.
 * Validation issues are folded into a single INVALID_ARGUMENT error.
 */
export function buildSimulationConfig(
  input: Partial<SimulationConfigInput>,
): Result<ValidatedSimulationConfig, TerrainError> {
  const candidate: SimulationConfigInput = {
    width: input.width ?? DEFAULT_SIMULATION_DIMENSION,
    height: input.height ?? DEFAULT_SIMULATION_DIMENSION,
    steps: input.steps ?? DEFAULT_SIMULATION_STEPS,
    ...(input.seed !== undefined && { seed: input.seed }),
    ...(input.trace !== undefined && { trace: input.trace }),
  };

  return parseSimulationConfig(candidate);
}

/**
 * Validate a complete simulation config without filling defaults.
 */
export function parseSimulationConfig(
  input: unknown,
): Result<ValidatedSimulationConfig, TerrainError> {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (parsed.success) return Ok(parsed.data);

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return Err(
    TerrainError.invalidArgument(
      `Invalid simulation config: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { issues },
    ),
  );
}
