/**
 * Terrain pipeline passes: wave collapse followed by automaton evolution.
 */

import type { TileKind } from "@terrain-sim/contracts";
import type { CaRuleEngine } from "../automata/engine";
import type {
  EmptyArtifact,
  FramesArtifact,
  Pass,
  WaveArtifact,
} from "../pipeline/types";
import type { AdjacencyRuleTable } from "../wfc/adjacency";
import { WfcSolver } from "../wfc/solver";
import { countChangedCells } from "./stats";

export const COLLAPSE_WAVE_PASS_ID = "terrain.collapse-wave";
export const EVOLVE_PASS_ID = "terrain.evolve";

export interface CollapseWavePassOptions {
  readonly universe: readonly TileKind[];
  readonly adjacency: AdjacencyRuleTable;
  /** Problems found in caller-supplied adjacency rules, reported as warnings */
  readonly ruleIssues?: readonly string[];
}

/**
 * Resolve the initial terrain with the wave solver.
 * Contradictions are traced as warnings; forced repairs as decisions.
 */
export function createCollapseWavePass(
  options: CollapseWavePassOptions,
): Pass<EmptyArtifact, WaveArtifact> {
  return {
    id: COLLAPSE_WAVE_PASS_ID,
    inputType: "empty",
    outputType: "wave",
    run(_input, ctx) {
      for (const issue of options.ruleIssues ?? []) {
        ctx.trace.warning(COLLAPSE_WAVE_PASS_ID, `Ignored adjacency entry ${issue}`);
      }

      const solver = new WfcSolver({
        onContradiction: (event) => {
          const { cell, source, direction } = event;
          ctx.trace.warning(
            COLLAPSE_WAVE_PASS_ID,
            `Contradiction at (${cell.x}, ${cell.y}) from (${source.x}, ${source.y}) going ${direction}`,
          );
          if (event.forced) {
            ctx.trace.decision(
              COLLAPSE_WAVE_PASS_ID,
              `Repair (${cell.x}, ${cell.y})`,
              [],
              event.tile,
              "no candidate satisfied the neighbor rule; forced a prior candidate",
            );
          }
        },
      });

      const { grid, stats } = solver.solve(
        ctx.config.width,
        ctx.config.height,
        options.universe,
        options.adjacency,
        ctx.random,
      );

      return { type: "wave", id: "wave", grid, stats };
    },
  };
}

/**
 * Step the automaton `config.steps` times from the wave output.
 */
export function createEvolvePass(
  automata: CaRuleEngine,
): Pass<WaveArtifact, FramesArtifact> {
  return {
    id: EVOLVE_PASS_ID,
    inputType: "wave",
    outputType: "frames",
    run(input, ctx) {
      const frames = [input.grid];
      automata.evolve(input.grid, ctx.config.steps, (generation, grid) => {
        const previous = frames[frames.length - 1];
        frames.push(grid);
        if (ctx.trace.enabled && previous) {
          const changed = countChangedCells(previous, grid);
          ctx.trace.decision(
            EVOLVE_PASS_ID,
            `Generation ${generation}`,
            [],
            changed,
            changed === 0 ? "fixed point" : "cells changed",
          );
        }
      });

      return { type: "frames", id: "frames", frames, wave: input.stats };
    },
  };
}
