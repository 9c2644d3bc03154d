/**
 * Reactive Controller for Cleaning Robots
 * =======================================
 *
 * Chooses a robot's action from its current cell only:
 *
 * - Dirty cell      -> Clean (stay in place)
 * - Clean cell      -> Move to a uniformly random Moore neighbor
 * - No neighbors    -> Wait (1x1 grid)
 *
 * No memory of visited cells and no path planning. The only stochastic
 * input is the shared random stream handed in by the caller.
 */

import { Cell } from "./types";
import { Grid } from "./grid";
import { DirtState } from "./dirt-state";
import { RandomSource } from "./random";

// ============================================================================
// Types
// ============================================================================

export type ReactiveAction =
  | { action: "Clean"; target: Cell }
  | { action: "Move"; target: Cell }
  | { action: "Wait"; target: null };

// ============================================================================
// Action Selection
// ============================================================================

/**
 * Get the reactive action for a robot standing on `cell`.
 * Draws from `random` only when the robot has to move.
 */
export function getReactiveAction(cell: Cell, dirt: DirtState, grid: Grid, random: RandomSource): ReactiveAction {
  if (dirt.isDirty(cell)) {
    return { action: "Clean", target: cell };
  }

  const target = random.choice(grid.neighbors(cell));
  if (!target) {
    return { action: "Wait", target: null };
  }

  return { action: "Move", target };
}

export function describeAction(action: ReactiveAction): string {
  switch (action.action) {
    case "Clean":
      return `Cleaned (${action.target.x}, ${action.target.y})`;
    case "Move":
      return `Moved to (${action.target.x}, ${action.target.y})`;
    case "Wait":
      return "Waiting";
  }
}
