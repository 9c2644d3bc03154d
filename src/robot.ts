/**
 * Cleaning robot with position and movement bookkeeping.
 */

import { AgentKind, Cell, Position } from "./types";
import { Grid } from "./grid";
import { DirtState } from "./dirt-state";
import { RandomSource } from "./random";
import { describeAction, getReactiveAction, ReactiveAction } from "./reactive-controller";

export class CleaningRobot {
  readonly id: string;
  readonly robotIndex: number;
  readonly kind: AgentKind = AgentKind.CLEANER;
  cell: Cell;

  // Counters only ever grow
  moves: number = 0;
  cellsCleaned: number = 0;
  currentAction: string = "Idle";

  constructor(robotIndex: number, cell: Cell) {
    this.id = `robot${robotIndex + 1}`;
    this.robotIndex = robotIndex;
    this.cell = cell;
  }

  /**
   * One activation: decide from the current cell, then act.
   */
  step(dirt: DirtState, grid: Grid, random: RandomSource): ReactiveAction {
    const action = getReactiveAction(this.cell, dirt, grid, random);
    this.execute(action, dirt);
    return action;
  }

  private execute(action: ReactiveAction, dirt: DirtState): void {
    switch (action.action) {
      case "Clean":
        if (dirt.clean(action.target)) {
          this.cellsCleaned++;
        }
        break;

      case "Move":
        this.cell = action.target;
        this.moves++;
        break;

      case "Wait":
        break;
    }

    this.currentAction = describeAction(action);
  }
}

export function agentKind(robot: CleaningRobot): AgentKind {
  return robot.kind;
}

export function agentPosition(robot: CleaningRobot): Position {
  return { x: robot.cell.x, y: robot.cell.y };
}
