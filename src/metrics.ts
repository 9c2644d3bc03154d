/**
 * Metrics - read-only aggregations over model state, plus the per-step
 * history consumed by plotting collaborators.
 */

import { MetricsSnapshot } from "./types";
import { DirtState } from "./dirt-state";
import { CleaningRobot } from "./robot";

/**
 * The slice of a model that metrics read. Safe to pass a model that is
 * still being constructed, as long as these fields exist.
 */
export interface MetricsSource {
  readonly currentStep: number;
  readonly dirt: DirtState;
  readonly robots: readonly CleaningRobot[];
}

export function computePercentClean(model: MetricsSource): number {
  return 100 * (1 - model.dirt.dirtyCount() / model.dirt.totalCells);
}

export function computeTotalMoves(model: MetricsSource): number {
  let total = 0;
  for (const robot of model.robots) total += robot.moves;
  return total;
}

export type ModelReporter = (model: MetricsSource) => number;

export const MODEL_REPORTERS = {
  PercentClean: computePercentClean,
  TotalMoves: computeTotalMoves,
} satisfies Record<string, ModelReporter>;

const CSV_HEADERS = ["step", "dirtyCount", "percentClean", "totalMoves"] as const;

function toCSV(headers: readonly string[], rows: (string | number)[][]): string {
  const h = headers.join(",");
  const body = rows.map((r) => r.join(",")).join("\n");
  return h + "\n" + body + "\n";
}

export class MetricsCollector {
  private readonly snapshots: MetricsSnapshot[] = [];

  collect(model: MetricsSource): MetricsSnapshot {
    const snapshot: MetricsSnapshot = {
      step: model.currentStep,
      dirtyCount: model.dirt.dirtyCount(),
      percentClean: MODEL_REPORTERS.PercentClean(model),
      totalMoves: MODEL_REPORTERS.TotalMoves(model),
    };
    this.snapshots.push(snapshot);
    return snapshot;
  }

  get history(): readonly MetricsSnapshot[] {
    return this.snapshots;
  }

  latest(): MetricsSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  series<K extends keyof MetricsSnapshot>(key: K): MetricsSnapshot[K][] {
    return this.snapshots.map((s) => s[key]);
  }

  toCSV(): string {
    return toCSV(
      CSV_HEADERS,
      this.snapshots.map((s) => CSV_HEADERS.map((h) => s[h]))
    );
  }
}
