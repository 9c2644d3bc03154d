/**
 * DirtState - side table of dirty cells, owned by the model.
 *
 * Dirt is sampled once at construction (without replacement) and only ever
 * removed afterwards.
 */

import { cellKey, Cell } from "./types";
import { RandomSource } from "./random";

export class DirtState {
  readonly totalCells: number;
  private readonly dirty: Map<string, Cell> = new Map();

  constructor(cells: readonly Cell[], dirtyPercent: number, random: RandomSource) {
    this.totalCells = cells.length;

    const numDirty = Math.floor((cells.length * dirtyPercent) / 100);
    for (const cell of random.sample(cells, numDirty)) {
      this.dirty.set(cellKey(cell), cell);
    }
  }

  isDirty(cell: Cell): boolean {
    return this.dirty.has(cellKey(cell));
  }

  /**
   * Mark a cell clean. Returns true if it was dirty; cleaning a clean cell is a no-op.
   */
  clean(cell: Cell): boolean {
    return this.dirty.delete(cellKey(cell));
  }

  dirtyCount(): number {
    return this.dirty.size;
  }

  cleanCount(): number {
    return this.totalCells - this.dirty.size;
  }

  /**
   * Remaining dirty cells, sorted row by row.
   */
  dirtyCells(): Cell[] {
    return [...this.dirty.values()].sort((a, b) => a.y - b.y || a.x - b.x);
  }
}
