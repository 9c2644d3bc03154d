/**
 * Grid - fixed 2-D lattice of cells with Moore (8-connected) adjacency.
 * Bounded by default; `torus` wraps neighbors around the edges.
 * Immutable after construction.
 */

import { Cell } from "./types";
import { OutOfRangeError } from "./errors";

const MOORE_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];

export class Grid {
  readonly width: number;
  readonly height: number;
  readonly torus: boolean;
  private readonly cells: readonly Cell[];
  private readonly neighborCache: ReadonlyArray<readonly Cell[]>;

  constructor(width: number, height: number, torus: boolean = false) {
    this.width = width;
    this.height = height;
    this.torus = torus;

    const cells: Cell[] = [];
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        cells.push(Object.freeze({ x, y }));
      }
    }
    this.cells = cells;
    this.neighborCache = cells.map((cell) => this.computeNeighbors(cell));
  }

  get size(): number {
    return this.cells.length;
  }

  isValid(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  getFlatIndex(x: number, y: number): number {
    return y * this.width + x;
  }

  cellAt(x: number, y: number): Cell {
    if (!this.isValid(x, y)) {
      throw new OutOfRangeError(x, y, this.width, this.height);
    }
    return this.cells[this.getFlatIndex(x, y)];
  }

  /**
   * All cells, row by row. Returns a fresh array on every call.
   */
  allCells(): Cell[] {
    return [...this.cells];
  }

  /**
   * Moore neighbors of `cell`, in a fixed order (top row, middle row, bottom row).
   */
  neighbors(cell: Cell): readonly Cell[] {
    if (!this.isValid(cell.x, cell.y)) {
      throw new OutOfRangeError(cell.x, cell.y, this.width, this.height);
    }
    return this.neighborCache[this.getFlatIndex(cell.x, cell.y)];
  }

  private computeNeighbors(cell: Cell): Cell[] {
    const result: Cell[] = [];
    const seen = new Set<number>();

    for (const [dx, dy] of MOORE_OFFSETS) {
      let nx = cell.x + dx;
      let ny = cell.y + dy;

      if (this.torus) {
        nx = (nx + this.width) % this.width;
        ny = (ny + this.height) % this.height;
      } else if (nx < 0 || nx >= this.width || ny < 0 || ny >= this.height) {
        continue;
      }

      // On narrow tori several offsets land on the same cell, or on the cell itself
      const index = this.getFlatIndex(nx, ny);
      if ((nx === cell.x && ny === cell.y) || seen.has(index)) continue;
      seen.add(index);
      result.push(this.cells[index]);
    }

    return result;
  }
}
