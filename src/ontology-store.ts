/**
 * OntologyStore - in-process SPARQL store (oxigraph) holding the model
 * parameters, portrayal styles and, on demand, a mirror of the world.
 *
 * The runner reads every parameter default and bound from here instead of
 * hardcoding them.
 */

import { Store, Term } from "oxigraph";
import { AgentKind, Position, PortrayalStyle } from "./types";
import { CleaningRobot } from "./robot";
import { DirtState } from "./dirt-state";
import {
  CLEAN_NS,
  CLEANING_ONTOLOGY_TURTLE,
  LOAD_PARAMETERS_QUERY,
  LOAD_PORTRAYAL_QUERY,
  PARAMETER_NAMES,
  QUERY_DIRTY_CELLS,
  QUERY_ROBOTS,
  ModelParameters,
  ParameterName,
  PortrayalStyles,
} from "./ontology-schema";

type Row = Map<string, Term>;

/**
 * World state as mirrored into the store.
 */
export interface WorldSource {
  readonly robots: readonly CleaningRobot[];
  readonly dirt: DirtState;
}

export interface RobotRecord {
  id: string;
  index: number;
  position: Position;
  moves: number;
  cellsCleaned: number;
}

function isParameterName(value: string): value is ParameterName {
  return PARAMETER_NAMES.some((name) => name === value);
}

function numberOrNull(row: Row, key: string): number | null {
  const term = row.get(key);
  return term ? parseFloat(term.value) : null;
}

function requireNumber(row: Row, key: string): number {
  const value = numberOrNull(row, key);
  if (value === null || Number.isNaN(value)) {
    throw new Error(`Ontology row is missing numeric binding "${key}"`);
  }
  return value;
}

function requireString(row: Row, key: string): string {
  const term = row.get(key);
  if (!term) {
    throw new Error(`Ontology row is missing binding "${key}"`);
  }
  return term.value;
}

export class OntologyStore {
  private store: Store;
  private _params: ModelParameters | null = null;
  private _portrayal: PortrayalStyles | null = null;

  constructor() {
    this.store = new Store();
    this.initializeOntology();
  }

  /**
   * Model parameters from the ontology (cached after first load).
   */
  get params(): ModelParameters {
    if (!this._params) {
      this._params = this.loadParameters();
    }
    return this._params;
  }

  get portrayal(): PortrayalStyles {
    if (!this._portrayal) {
      this._portrayal = this.loadPortrayal();
    }
    return this._portrayal;
  }

  /**
   * Load the TBox and default configuration.
   */
  initializeOntology(): void {
    this.store.load(CLEANING_ONTOLOGY_TURTLE, { format: "text/turtle" });
  }

  private select(query: string): Row[] {
    const results = this.store.query(query);
    if (!Array.isArray(results)) {
      throw new Error("Expected SELECT results from ontology query");
    }
    const rows: unknown[] = results;
    return rows.filter((row): row is Row => row instanceof Map);
  }

  private loadParameters(): ModelParameters {
    const rows = this.select(LOAD_PARAMETERS_QUERY);
    const params = OntologyStore.getDefaultParameters();

    if (rows.length === 0) {
      console.warn("[Ontology] No model parameters found, using defaults");
      return params;
    }

    for (const r of rows) {
      const name = requireString(r, "name");
      if (!isParameterName(name)) {
        console.warn(`[Ontology] Ignoring unknown parameter "${name}"`);
        continue;
      }
      params[name] = {
        name,
        label: r.get("label")?.value ?? name,
        defaultValue: requireNumber(r, "defaultValue"),
        min: numberOrNull(r, "minValue"),
        max: numberOrNull(r, "maxValue"),
        step: numberOrNull(r, "stepValue"),
      };
    }

    return params;
  }

  private loadPortrayal(): PortrayalStyles {
    const styles = OntologyStore.getDefaultPortrayal();

    for (const r of this.select(LOAD_PORTRAYAL_QUERY)) {
      const style: PortrayalStyle = {
        color: requireString(r, "color"),
        size: requireNumber(r, "size"),
        glyph: requireString(r, "glyph"),
      };
      const target = requireString(r, "target");
      if (target === AgentKind.CLEANER || target === "dirt") {
        styles[target] = style;
      }
    }

    return styles;
  }

  /**
   * Fallback defaults if the ontology holds no parameters.
   */
  static getDefaultParameters(): ModelParameters {
    return {
      n: { name: "n", label: "Number of agents:", defaultValue: 5, min: 1, max: 50, step: 1 },
      width: { name: "width", label: "Width:", defaultValue: 10, min: 1, max: 50, step: 1 },
      height: { name: "height", label: "Height:", defaultValue: 10, min: 1, max: 50, step: 1 },
      dirtyPercent: { name: "dirtyPercent", label: "Initial Dirty (%)", defaultValue: 100, min: 0, max: 100, step: 5 },
      maxSteps: { name: "maxSteps", label: "Max steps", defaultValue: 200, min: 1, max: null, step: null },
    };
  }

  static getDefaultPortrayal(): PortrayalStyles {
    return {
      [AgentKind.CLEANER]: { color: "#1f77b4", size: 50, glyph: "R" },
      dirt: { color: "#8b4513", size: 15, glyph: "*" },
    };
  }

  // ==========================================================================
  // World mirror (ABox)
  // ==========================================================================

  /**
   * Replace the ABox with the current robots and dirty cells.
   */
  syncWorld(world: WorldSource): void {
    // Create a fresh store
    this.store = new Store();
    this.initializeOntology();

    const lines: string[] = [`@prefix clean: <${CLEAN_NS}> .`];

    for (const robot of world.robots) {
      lines.push(
        `<urn:robot:${robot.id}> a clean:CleaningRobot ;`,
        `  clean:robotId "${robot.id}" ;`,
        `  clean:robotIndex ${robot.robotIndex} ;`,
        `  clean:positionX ${robot.cell.x} ;`,
        `  clean:positionY ${robot.cell.y} ;`,
        `  clean:moves ${robot.moves} ;`,
        `  clean:cellsCleaned ${robot.cellsCleaned} .`
      );
    }

    for (const cell of world.dirt.dirtyCells()) {
      lines.push(
        `<urn:cell:${cell.x}_${cell.y}> a clean:DirtyCell ;`,
        `  clean:positionX ${cell.x} ;`,
        `  clean:positionY ${cell.y} .`
      );
    }

    this.store.load(lines.join("\n"), { format: "text/turtle" });
  }

  queryRobots(): RobotRecord[] {
    return this.select(QUERY_ROBOTS).map((r) => ({
      id: requireString(r, "id"),
      index: requireNumber(r, "index"),
      position: { x: requireNumber(r, "x"), y: requireNumber(r, "y") },
      moves: requireNumber(r, "moves"),
      cellsCleaned: requireNumber(r, "cleaned"),
    }));
  }

  queryDirtyCells(): Position[] {
    return this.select(QUERY_DIRTY_CELLS).map((r) => ({
      x: requireNumber(r, "x"),
      y: requireNumber(r, "y"),
    }));
  }
}
