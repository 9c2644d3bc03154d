/**
 * Error taxonomy for the simulation core. In-run conditions (grid clean,
 * budget spent) are states, not errors.
 */

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Bad construction parameters. The simulation never starts.
 */
export class InvalidConfigurationError extends SimulationError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration for "${field}": ${message}`);
    this.field = field;
  }
}

/**
 * Coordinate lookup outside the grid. Always a defect in the caller.
 */
export class OutOfRangeError extends SimulationError {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, width: number, height: number) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.x = x;
    this.y = y;
  }
}
