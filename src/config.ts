/**
 * Model configuration: validation, and merging user overrides over the
 * defaults declared in the ontology.
 */

import { ModelConfig } from "./types";
import { InvalidConfigurationError } from "./errors";
import { SEED_RANGE } from "./random";
import { PARAMETER_NAMES, ModelParameters } from "./ontology-schema";

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(field, `expected a positive integer, got ${value}`);
  }
}

/**
 * Reject configurations the simulation cannot start from.
 */
export function validateConfig(config: ModelConfig): void {
  requirePositiveInteger("n", config.n);
  requirePositiveInteger("width", config.width);
  requirePositiveInteger("height", config.height);
  requirePositiveInteger("maxSteps", config.maxSteps);

  if (!Number.isInteger(config.dirtyPercent) || config.dirtyPercent < 0 || config.dirtyPercent > 100) {
    throw new InvalidConfigurationError("dirtyPercent", `expected an integer in [0, 100], got ${config.dirtyPercent}`);
  }

  if (config.seed !== undefined) {
    const seed = config.seed;
    if (!Number.isInteger(seed) || seed < 0 || seed >= SEED_RANGE) {
      throw new InvalidConfigurationError("seed", `expected an integer in [0, ${SEED_RANGE}), got ${seed}`);
    }
  }
}

export function resolveConfig(overrides: Partial<ModelConfig>, params: ModelParameters): ModelConfig {
  return {
    n: overrides.n ?? params.n.defaultValue,
    width: overrides.width ?? params.width.defaultValue,
    height: overrides.height ?? params.height.defaultValue,
    dirtyPercent: overrides.dirtyPercent ?? params.dirtyPercent.defaultValue,
    maxSteps: overrides.maxSteps ?? params.maxSteps.defaultValue,
    seed: overrides.seed,
    torus: overrides.torus ?? false,
  };
}

/**
 * Enforce the control bounds and steps declared in the ontology (tighter than
 * what the model itself accepts).
 */
export function checkParameterBounds(config: ModelConfig, params: ModelParameters): void {
  for (const name of PARAMETER_NAMES) {
    const param = params[name];
    const value = config[name];

    if (param.min !== null && value < param.min) {
      throw new InvalidConfigurationError(name, `${value} is below the minimum of ${param.min}`);
    }
    if (param.max !== null && value > param.max) {
      throw new InvalidConfigurationError(name, `${value} is above the maximum of ${param.max}`);
    }
    const base = param.min ?? 0;
    if (param.step !== null && (value - base) % param.step !== 0) {
      throw new InvalidConfigurationError(name, `${value} is not a multiple of ${param.step} from ${base}`);
    }
  }
}
