/**
 * Ontology Schema - TBox and default configuration for the cleaning model.
 * Model parameters (defaults, bounds, labels) and portrayal styles live here
 * and are read back through SPARQL, so nothing in the runner hardcodes them.
 */

import { PortrayalStyle, PortrayalTarget } from "./types";

export const CLEAN_NS = "http://example.org/ontology/reactive_cleaning#";

export const CLEANING_ONTOLOGY_TURTLE = `
@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .
@prefix clean: <${CLEAN_NS}> .

# =============================================================================
# CLASSES (TBox)
# =============================================================================

clean:CleaningRobot rdf:type owl:Class ;
    rdfs:label "Cleaning Robot" ;
    rdfs:comment "A reactive robot that cleans its cell or moves to a random neighbor" .

clean:DirtyCell rdf:type owl:Class ;
    rdfs:label "Dirty Cell" ;
    rdfs:comment "A grid cell that still holds dirt" .

clean:ModelParameter rdf:type owl:Class ;
    rdfs:label "Model Parameter" ;
    rdfs:comment "A construction parameter of the cleaning model with its default and bounds" .

clean:PortrayalStyle rdf:type owl:Class ;
    rdfs:label "Portrayal Style" ;
    rdfs:comment "How a renderer draws one kind of thing" .

# =============================================================================
# PROPERTIES (TBox)
# =============================================================================

clean:robotId rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:CleaningRobot ;
    rdfs:range xsd:string .

clean:robotIndex rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:CleaningRobot ;
    rdfs:range xsd:integer .

clean:positionX rdf:type owl:DatatypeProperty ;
    rdfs:range xsd:integer .

clean:positionY rdf:type owl:DatatypeProperty ;
    rdfs:range xsd:integer .

clean:moves rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:CleaningRobot ;
    rdfs:range xsd:integer .

clean:cellsCleaned rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:CleaningRobot ;
    rdfs:range xsd:integer .

clean:parameterName rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:ModelParameter ;
    rdfs:range xsd:string .

clean:defaultValue rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:ModelParameter .

clean:minValue rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:ModelParameter .

clean:maxValue rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:ModelParameter .

clean:stepValue rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:ModelParameter .

clean:portrays rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:PortrayalStyle ;
    rdfs:range xsd:string .

clean:color rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:PortrayalStyle ;
    rdfs:range xsd:string .

clean:size rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:PortrayalStyle ;
    rdfs:range xsd:integer .

clean:glyph rdf:type owl:DatatypeProperty ;
    rdfs:domain clean:PortrayalStyle ;
    rdfs:range xsd:string .

# =============================================================================
# MODEL PARAMETERS
# =============================================================================

clean:param_n a clean:ModelParameter ;
    clean:parameterName "n" ;
    rdfs:label "Number of agents:" ;
    clean:defaultValue 5 ;
    clean:minValue 1 ;
    clean:maxValue 50 ;
    clean:stepValue 1 .

clean:param_width a clean:ModelParameter ;
    clean:parameterName "width" ;
    rdfs:label "Width:" ;
    clean:defaultValue 10 ;
    clean:minValue 1 ;
    clean:maxValue 50 ;
    clean:stepValue 1 .

clean:param_height a clean:ModelParameter ;
    clean:parameterName "height" ;
    rdfs:label "Height:" ;
    clean:defaultValue 10 ;
    clean:minValue 1 ;
    clean:maxValue 50 ;
    clean:stepValue 1 .

clean:param_dirtyPercent a clean:ModelParameter ;
    clean:parameterName "dirtyPercent" ;
    rdfs:label "Initial Dirty (%)" ;
    clean:defaultValue 100 ;
    clean:minValue 0 ;
    clean:maxValue 100 ;
    clean:stepValue 5 .

clean:param_maxSteps a clean:ModelParameter ;
    clean:parameterName "maxSteps" ;
    rdfs:label "Max steps" ;
    clean:defaultValue 200 ;
    clean:minValue 1 .

# =============================================================================
# PORTRAYAL
# =============================================================================

clean:style_cleaner a clean:PortrayalStyle ;
    clean:portrays "cleaner" ;
    clean:color "#1f77b4" ;
    clean:size 50 ;
    clean:glyph "R" .

clean:style_dirt a clean:PortrayalStyle ;
    clean:portrays "dirt" ;
    clean:color "#8b4513" ;
    clean:size 15 ;
    clean:glyph "*" .
`;

// ============================================================================
// Parameter types
// ============================================================================

export type ParameterName = "n" | "width" | "height" | "dirtyPercent" | "maxSteps";

export const PARAMETER_NAMES: readonly ParameterName[] = ["n", "width", "height", "dirtyPercent", "maxSteps"];

export interface ParameterSpec {
  name: ParameterName;
  label: string;
  defaultValue: number;
  min: number | null;
  max: number | null;
  step: number | null;
}

export type ModelParameters = Record<ParameterName, ParameterSpec>;

export type PortrayalStyles = Record<PortrayalTarget, PortrayalStyle>;

// ============================================================================
// Queries
// ============================================================================

export const LOAD_PARAMETERS_QUERY = `
PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
PREFIX clean: <${CLEAN_NS}>

SELECT ?name ?label ?defaultValue ?minValue ?maxValue ?stepValue
WHERE {
  ?param a clean:ModelParameter .
  ?param clean:parameterName ?name .
  ?param clean:defaultValue ?defaultValue .
  OPTIONAL { ?param rdfs:label ?label }
  OPTIONAL { ?param clean:minValue ?minValue }
  OPTIONAL { ?param clean:maxValue ?maxValue }
  OPTIONAL { ?param clean:stepValue ?stepValue }
}
`;

export const LOAD_PORTRAYAL_QUERY = `
PREFIX clean: <${CLEAN_NS}>

SELECT ?target ?color ?size ?glyph
WHERE {
  ?style a clean:PortrayalStyle .
  ?style clean:portrays ?target .
  ?style clean:color ?color .
  ?style clean:size ?size .
  ?style clean:glyph ?glyph .
}
`;

export const QUERY_ROBOTS = `
PREFIX clean: <${CLEAN_NS}>

SELECT ?id ?index ?x ?y ?moves ?cleaned
WHERE {
  ?robot a clean:CleaningRobot .
  ?robot clean:robotId ?id .
  ?robot clean:robotIndex ?index .
  ?robot clean:positionX ?x .
  ?robot clean:positionY ?y .
  ?robot clean:moves ?moves .
  ?robot clean:cellsCleaned ?cleaned .
}
ORDER BY ?index
`;

export const QUERY_DIRTY_CELLS = `
PREFIX clean: <${CLEAN_NS}>

SELECT ?x ?y
WHERE {
  ?cell a clean:DirtyCell .
  ?cell clean:positionX ?x .
  ?cell clean:positionY ?y .
}
ORDER BY ?y ?x
`;
