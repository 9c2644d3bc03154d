/**
 * Core types for the reactive cleaning simulation.
 */

export interface Position {
  x: number;
  y: number;
}

/**
 * A grid cell. Cells are created once by the Grid and never mutated.
 */
export type Cell = Readonly<Position>;

export function cellKey(cell: Position): string {
  return `${cell.x},${cell.y}`;
}

export enum AgentKind {
  CLEANER = "cleaner",
}

/**
 * Things a renderer can draw: every agent kind, plus dirt, which lives in a
 * side table rather than as an agent.
 */
export type PortrayalTarget = AgentKind | "dirt";

export interface PortrayalStyle {
  color: string;
  size: number;
  glyph: string;
}

export interface ModelConfig {
  n: number;
  width: number;
  height: number;
  dirtyPercent: number;
  maxSteps: number;
  seed?: number;
  torus?: boolean;
}

export type ModelStatus = "running" | "terminated";

export type TerminationReason = "clean" | "budget";

export interface MetricsSnapshot {
  /** Ticks completed when taken: 0 at construction, then the post-tick count. */
  step: number;
  dirtyCount: number;
  percentClean: number;
  totalMoves: number;
}
