import { describe, expect, it } from "vitest";

import { formatUsage, parseCliArgs, runCli } from "../cli";
import { InvalidConfigurationError } from "../errors";
import { OntologyStore } from "../ontology-store";

function capture() {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    out: {
      log: (message: string) => logs.push(message),
      error: (message: string) => errors.push(message),
    },
  };
}

const SCENARIO = ["--n", "1", "--width", "3", "--height", "3", "--dirty-percent", "100", "--max-steps", "50", "--seed", "42"];

describe("parseCliArgs", () => {
  it("maps flags onto config overrides", () => {
    const options = parseCliArgs([...SCENARIO, "--torus", "--csv"]);

    expect(options.overrides).toEqual({
      n: 1,
      width: 3,
      height: 3,
      dirtyPercent: 100,
      maxSteps: 50,
      seed: 42,
      torus: true,
    });
    expect(options.csv).toBe(true);
    expect(options.render).toBe(false);
  });

  it("leaves omitted values undefined", () => {
    const options = parseCliArgs([]);

    expect(options.overrides.n).toBeUndefined();
    expect(options.overrides.seed).toBeUndefined();
    expect(options.help).toBe(false);
  });

  it("rejects values that are not numbers", () => {
    expect(() => parseCliArgs(["--width", "wide"])).toThrow(InvalidConfigurationError);
  });
});

describe("runCli", () => {
  it("runs the scenario to a clean grid and prints the summary", () => {
    const { logs, errors, out } = capture();

    expect(runCli(SCENARIO, out)).toBe(0);
    expect(errors).toEqual([]);
    expect(logs).toEqual([
      "[Simulation] 1 robot(s) on a 3x3 grid, 9 dirty cell(s), seed 42",
      "Status: terminated (clean)",
      "Step: 46/50",
      "Percent clean: 100.00",
      "Total moves: 37",
    ]);
  });

  it("prints the metrics history as CSV", () => {
    const { logs, out } = capture();

    runCli([...SCENARIO, "--csv"], out);
    const csv = logs[logs.length - 1].split("\n");

    expect(csv).toHaveLength(48);
    expect(csv[0]).toBe("step,dirtyCount,percentClean,totalMoves");
    expect(csv[47]).toBe("46,0,100,37");
  });

  it("prints every frame when rendering", () => {
    const { logs, out } = capture();

    runCli(["--n", "1", "--width", "3", "--height", "2", "--dirty-percent", "50", "--max-steps", "2", "--seed", "3", "--render"], out);

    expect(logs.slice(1, 4)).toEqual(["Step 0\nR*.\n**.", "Step 1\n.R.\n**.", "Step 2\n.R.\n**."]);
    expect(logs[4]).toBe("Status: terminated (budget)");
  });

  it("reads the final world back from the ontology", () => {
    const { logs, out } = capture();

    runCli([...SCENARIO, "--inspect"], out);

    expect(logs.slice(-2)).toEqual(["robot1 at (2, 2): 37 move(s), 9 cell(s) cleaned", "Dirty cells remaining: 0"]);
  });

  it("enforces the ontology bounds", () => {
    const { errors, out } = capture();

    expect(runCli(["--n", "80"], out)).toBe(1);
    expect(errors).toEqual(['[Simulation] Invalid configuration for "n": 80 is above the maximum of 50']);
  });

  it("reports unknown flags", () => {
    const { errors, out } = capture();

    expect(runCli(["--speed", "3"], out)).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("[Simulation] ")).toBe(true);
  });

  it("rejects values off the declared step", () => {
    const { errors, out } = capture();

    expect(runCli(["--dirty-percent", "12"], out)).toBe(1);
    expect(errors).toEqual(['[Simulation] Invalid configuration for "dirtyPercent": 12 is not a multiple of 5 from 0']);
  });

  it("prints usage built from the ontology labels", () => {
    const { logs, out } = capture();

    expect(runCli(["--help"], out)).toBe(0);
    expect(logs).toEqual([formatUsage(OntologyStore.getDefaultParameters())]);
    expect(logs[0].split("\n").slice(2, 7)).toEqual([
      "  --n <int>              Number of agents (default 5, 1-50)",
      "  --width <int>          Width (default 10, 1-50)",
      "  --height <int>         Height (default 10, 1-50)",
      "  --dirty-percent <int>  Initial Dirty (%) (default 100, 0-100, step 5)",
      "  --max-steps <int>      Max steps (default 200, at least 1)",
    ]);
  });
});
