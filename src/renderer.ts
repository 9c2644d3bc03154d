/**
 * Text renderer for the cleaning simulation.
 *
 * Reads the model only through agentKind/agentPosition and the dirt table.
 */

import { Grid } from "./grid";
import { DirtState } from "./dirt-state";
import { agentKind, agentPosition, CleaningRobot } from "./robot";
import { PortrayalStyles } from "./ontology-schema";

const EMPTY_GLYPH = ".";

export interface RenderSource {
  readonly grid: Grid;
  readonly dirt: DirtState;
  readonly robots: readonly CleaningRobot[];
}

export class TextRenderer {
  private readonly styles: PortrayalStyles;

  constructor(styles: PortrayalStyles) {
    this.styles = styles;
  }

  /**
   * One line per grid row, top row first. Robots are drawn over dirt; a
   * cell holding more than one robot shows the count, or "+" for ten or more.
   */
  render(world: RenderSource): string {
    const { width, height } = world.grid;
    const rows: string[][] = [];

    // Background and dirt
    for (let y = 0; y < height; y++) {
      const row: string[] = [];
      for (let x = 0; x < width; x++) {
        row.push(world.dirt.isDirty(world.grid.cellAt(x, y)) ? this.styles.dirt.glyph : EMPTY_GLYPH);
      }
      rows.push(row);
    }

    // Robots
    const occupancy = new Map<number, number>();
    for (const robot of world.robots) {
      const { x, y } = agentPosition(robot);
      const index = world.grid.getFlatIndex(x, y);
      const count = (occupancy.get(index) ?? 0) + 1;
      occupancy.set(index, count);

      if (count === 1) {
        rows[y][x] = this.styles[agentKind(robot)].glyph;
      } else {
        rows[y][x] = count > 9 ? "+" : String(count);
      }
    }

    return rows.map((row) => row.join("")).join("\n");
  }
}
