import { describe, expect, it } from "vitest";

import { checkParameterBounds, resolveConfig, validateConfig } from "../config";
import { InvalidConfigurationError } from "../errors";
import { OntologyStore } from "../ontology-store";

const params = OntologyStore.getDefaultParameters();

describe("resolveConfig", () => {
  it("fills every field from the parameter defaults", () => {
    expect(resolveConfig({}, params)).toEqual({
      n: 5,
      width: 10,
      height: 10,
      dirtyPercent: 100,
      maxSteps: 200,
      seed: undefined,
      torus: false,
    });
  });

  it("prefers explicit overrides", () => {
    const config = resolveConfig({ n: 2, dirtyPercent: 30, seed: 9, torus: true }, params);

    expect(config).toEqual({
      n: 2,
      width: 10,
      height: 10,
      dirtyPercent: 30,
      maxSteps: 200,
      seed: 9,
      torus: true,
    });
  });
});

describe("validateConfig", () => {
  it("accepts a well-formed configuration", () => {
    expect(() => validateConfig(resolveConfig({ seed: 1 }, params))).not.toThrow();
  });

  it("rejects fractional dirty percentages", () => {
    try {
      validateConfig(resolveConfig({ dirtyPercent: 12.5 }, params));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.field).toBe("dirtyPercent");
        expect(error.message).toBe('Invalid configuration for "dirtyPercent": expected an integer in [0, 100], got 12.5');
      }
    }
  });

  it("rejects seeds outside the unsigned 32-bit range", () => {
    expect(() => validateConfig(resolveConfig({ seed: -1 }, params))).toThrow(
      'Invalid configuration for "seed": expected an integer in [0, 4294967296), got -1'
    );
    expect(() => validateConfig(resolveConfig({ seed: 4294967296 }, params))).toThrow(InvalidConfigurationError);
  });

  it("names the offending field", () => {
    expect(() => validateConfig(resolveConfig({ width: 0 }, params))).toThrow(
      'Invalid configuration for "width": expected a positive integer, got 0'
    );
  });
});

describe("checkParameterBounds", () => {
  it("rejects values above the declared maximum", () => {
    const config = resolveConfig({ n: 51 }, params);

    expect(() => checkParameterBounds(config, params)).toThrow(InvalidConfigurationError);
    expect(() => checkParameterBounds(config, params)).toThrow("51 is above the maximum of 50");
  });

  it("rejects values below the declared minimum", () => {
    expect(() => checkParameterBounds(resolveConfig({ maxSteps: 0 }, params), params)).toThrow(
      "0 is below the minimum of 1"
    );
  });

  it("rejects values off the declared step", () => {
    expect(() => checkParameterBounds(resolveConfig({ dirtyPercent: 12 }, params), params)).toThrow(
      'Invalid configuration for "dirtyPercent": 12 is not a multiple of 5 from 0'
    );
    expect(() => checkParameterBounds(resolveConfig({ dirtyPercent: 35 }, params), params)).not.toThrow();
  });

  it("leaves unbounded parameters open", () => {
    expect(() => checkParameterBounds(resolveConfig({ maxSteps: 100000 }, params), params)).not.toThrow();
  });
});
