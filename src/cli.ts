/**
 * Command-line runner: builds a model from ontology defaults plus flags,
 * runs it to termination and reports the metrics.
 */

import { parseArgs } from "node:util";
import { ModelConfig } from "./types";
import { InvalidConfigurationError } from "./errors";
import { CleaningModel } from "./cleaning-model";
import { OntologyStore } from "./ontology-store";
import { TextRenderer } from "./renderer";
import { checkParameterBounds, resolveConfig } from "./config";
import { PARAMETER_NAMES, ModelParameters, ParameterName, ParameterSpec } from "./ontology-schema";

export interface CliOptions {
  overrides: Partial<ModelConfig>;
  render: boolean;
  csv: boolean;
  inspect: boolean;
  help: boolean;
}

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

const PARAMETER_FLAGS: Record<ParameterName, string> = {
  n: "--n",
  width: "--width",
  height: "--height",
  dirtyPercent: "--dirty-percent",
  maxSteps: "--max-steps",
};

const FLAG_COLUMN = 23;

function describeParameter(param: ParameterSpec): string {
  const notes = [`default ${param.defaultValue}`];
  if (param.min !== null && param.max !== null) notes.push(`${param.min}-${param.max}`);
  else if (param.min !== null) notes.push(`at least ${param.min}`);
  else if (param.max !== null) notes.push(`at most ${param.max}`);
  if (param.step !== null && param.step !== 1) notes.push(`step ${param.step}`);
  return `${param.label.replace(/:$/, "")} (${notes.join(", ")})`;
}

/**
 * Help text; parameter lines come from the ontology labels and bounds.
 */
export function formatUsage(params: ModelParameters): string {
  const parameterLines = PARAMETER_NAMES.map(
    (name) => `  ${`${PARAMETER_FLAGS[name]} <int>`.padEnd(FLAG_COLUMN)}${describeParameter(params[name])}`
  );
  return [
    "Usage: reactive-cleaning [options]",
    "",
    ...parameterLines,
    "  --seed <int>           random seed (random when omitted)",
    "  --torus                wrap neighbors around the grid edges",
    "  --render               print the grid after every tick",
    "  --csv                  print the metrics history as CSV",
    "  --inspect              print robots and dirty cells read back from the ontology",
    "  -h, --help             show this message",
  ].join("\n");
}

function parseNumber(field: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new InvalidConfigurationError(field, `"${raw}" is not a number`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      n: { type: "string" },
      width: { type: "string" },
      height: { type: "string" },
      "dirty-percent": { type: "string" },
      "max-steps": { type: "string" },
      seed: { type: "string" },
      torus: { type: "boolean", default: false },
      render: { type: "boolean", default: false },
      csv: { type: "boolean", default: false },
      inspect: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const overrides: Partial<ModelConfig> = {
    n: parseNumber("n", values.n),
    width: parseNumber("width", values.width),
    height: parseNumber("height", values.height),
    dirtyPercent: parseNumber("dirtyPercent", values["dirty-percent"]),
    maxSteps: parseNumber("maxSteps", values["max-steps"]),
    seed: parseNumber("seed", values.seed),
    torus: values.torus,
  };

  return {
    overrides,
    render: values.render ?? false,
    csv: values.csv ?? false,
    inspect: values.inspect ?? false,
    help: values.help ?? false,
  };
}

function formatSummary(model: CleaningModel): string[] {
  return [
    `Status: ${model.status} (${model.terminationReason ?? "in progress"})`,
    `Step: ${model.currentStep}/${model.maxSteps}`,
    `Percent clean: ${model.percentClean().toFixed(2)}`,
    `Total moves: ${model.totalMoves()}`,
  ];
}

/**
 * Run the simulation described by `argv`. Returns the process exit code.
 */
export function runCli(argv: string[], out: CliOutput = console): number {
  try {
    const options = parseCliArgs(argv);
    const ontology = new OntologyStore();
    if (options.help) {
      out.log(formatUsage(ontology.params));
      return 0;
    }

    const config = resolveConfig(options.overrides, ontology.params);
    checkParameterBounds(config, ontology.params);

    const model = new CleaningModel(config);
    out.log(
      `[Simulation] ${config.n} robot(s) on a ${config.width}x${config.height} grid, ` +
        `${model.dirt.dirtyCount()} dirty cell(s), seed ${model.seed}`
    );

    const renderer = options.render ? new TextRenderer(ontology.portrayal) : null;
    if (renderer) out.log(`Step 0\n${renderer.render(model)}`);

    while (!model.isTerminated()) {
      model.tick();
      if (renderer) out.log(`Step ${model.currentStep}\n${renderer.render(model)}`);
    }

    for (const line of formatSummary(model)) out.log(line);

    if (options.csv) {
      out.log(model.metrics.toCSV().trimEnd());
    }

    if (options.inspect) {
      ontology.syncWorld(model);
      for (const robot of ontology.queryRobots()) {
        out.log(
          `${robot.id} at (${robot.position.x}, ${robot.position.y}): ` +
            `${robot.moves} move(s), ${robot.cellsCleaned} cell(s) cleaned`
        );
      }
      const dirty = ontology.queryDirtyCells();
      out.log(`Dirty cells remaining: ${dirty.length}`);
    }

    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    out.error(`[Simulation] ${message}`);
    return 1;
  }
}
