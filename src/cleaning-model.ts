/**
 * CleaningModel - owns the grid, the dirt table and the robots, and drives
 * the simulation one tick at a time.
 *
 * Every tick activates all robots once, in an order re-drawn from the shared
 * random stream. Robots act on the live dirt table, so a robot activated
 * later in a tick sees what earlier robots cleaned.
 */

import { Cell, ModelConfig, ModelStatus, TerminationReason } from "./types";
import { Grid } from "./grid";
import { DirtState } from "./dirt-state";
import { CleaningRobot } from "./robot";
import { RandomSource, randomSeed } from "./random";
import { MetricsCollector, computePercentClean, computeTotalMoves, MetricsSource } from "./metrics";
import { validateConfig } from "./config";

export const START_POSITION = { x: 0, y: 0 } as const;

export class CleaningModel implements MetricsSource {
  readonly grid: Grid;
  readonly dirt: DirtState;
  readonly robots: readonly CleaningRobot[];
  readonly random: RandomSource;
  readonly maxSteps: number;
  readonly metrics: MetricsCollector = new MetricsCollector();
  currentStep: number = 0;

  constructor(config: ModelConfig) {
    validateConfig(config);

    this.maxSteps = config.maxSteps;
    this.random = new RandomSource(config.seed ?? randomSeed());
    this.grid = new Grid(config.width, config.height, config.torus ?? false);
    this.dirt = new DirtState(this.grid.allCells(), config.dirtyPercent, this.random);

    const startCell: Cell = this.grid.cellAt(START_POSITION.x, START_POSITION.y);
    const robots: CleaningRobot[] = [];
    for (let i = 0; i < config.n; i++) {
      robots.push(new CleaningRobot(i, startCell));
    }
    this.robots = robots;

    this.metrics.collect(this);
  }

  get seed(): number {
    return this.random.seed;
  }

  get status(): ModelStatus {
    return this.terminationReason === null ? "running" : "terminated";
  }

  /**
   * Why the run ended, or null while it is still running. A grid that is
   * clean when the budget runs out counts as clean.
   */
  get terminationReason(): TerminationReason | null {
    if (this.dirt.dirtyCount() === 0) return "clean";
    if (this.currentStep >= this.maxSteps) return "budget";
    return null;
  }

  isTerminated(): boolean {
    return this.status === "terminated";
  }

  /**
   * Run one simulation tick. A no-op once terminated.
   */
  tick(): void {
    if (this.isTerminated()) return;

    const order = this.random.shuffle([...this.robots]);
    for (const robot of order) {
      robot.step(this.dirt, this.grid, this.random);
    }

    this.currentStep++;
    this.metrics.collect(this);
  }

  /**
   * Tick until terminated, or until `maxTicks` more ticks have run.
   * Returns the number of ticks executed.
   */
  run(maxTicks: number = Infinity): number {
    let executed = 0;
    while (executed < maxTicks && !this.isTerminated()) {
      this.tick();
      executed++;
    }
    return executed;
  }

  percentClean(): number {
    return computePercentClean(this);
  }

  totalMoves(): number {
    return computeTotalMoves(this);
  }
}
