export * from "./types";
export * from "./errors";
export { RandomSource, SEED_RANGE, randomSeed } from "./random";
export { Grid } from "./grid";
export { DirtState } from "./dirt-state";
export { getReactiveAction, describeAction } from "./reactive-controller";
export type { ReactiveAction } from "./reactive-controller";
export { CleaningRobot, agentKind, agentPosition } from "./robot";
export { CleaningModel, START_POSITION } from "./cleaning-model";
export { MetricsCollector, MODEL_REPORTERS, computePercentClean, computeTotalMoves } from "./metrics";
export type { MetricsSource, ModelReporter } from "./metrics";
export { validateConfig, resolveConfig, checkParameterBounds } from "./config";
export { OntologyStore } from "./ontology-store";
export type { RobotRecord, WorldSource } from "./ontology-store";
export { PARAMETER_NAMES } from "./ontology-schema";
export type { ModelParameters, ParameterName, ParameterSpec, PortrayalStyles } from "./ontology-schema";
export { TextRenderer } from "./renderer";
export type { RenderSource } from "./renderer";
