// src/index.ts
export * from './errors';
export { resolveOptions, validationOptionsSchema } from './config';
export type { ValidationOptions, ValidationOptionsInput } from './config';
export { logger, createChildLogger } from './utils/logger';

export { Graph } from './rdf/graph';
export type { GraphParseOptions } from './rdf/graph';
export * from './rdf/terms';
export { SH, RDF, RDFS, XSD, SH_NS, RDF_NS, RDFS_NS, XSD_NS } from './rdf/vocabulary';

export * from './shacl/model/propertyShape';
export * from './shacl/model/nodeShape';
export * from './shacl/model/sparqlConstraint';
export * from './shacl/model/validationResult';
export * from './shacl/model/validationReport';

export * as helpers from './shacl/validators/helpers';
export * as typeValidator from './shacl/validators/type';
export * as stringValidator from './shacl/validators/string';
export * as valueValidator from './shacl/validators/value';
export * as qualifiedValidator from './shacl/validators/qualified';
export * as cardinalityValidator from './shacl/validators/cardinality';
export * as logicalValidator from './shacl/validators/logicalOperators';
export * as sparqlValidator from './shacl/validators/sparql';

export type { QueryEngine, QueryOptions, QueryRow } from './shacl/query/queryEngine';
export { OxigraphQueryEngine } from './shacl/query/oxigraphQueryEngine';
export { substituteThis } from './shacl/query/substitution';

export { readShapes, parseShapesGraph, buildShapeMap, compilePattern } from './shacl/shapesReader';
export type { ShapesGraph } from './shacl/shapesReader';
export { extractShapeTargets, findFocusNodes, resolveFocusNodes, ShaclTargetType } from './shacl/targets';
export type { ShapeTarget } from './shacl/targets';
export { writeReport, reportToTriples } from './shacl/reportWriter';
export { parseReport } from './shacl/reportParser';
export type { ParseReportResult } from './shacl/reportParser';
export { ShaclValidationService } from './shacl/shaclValidatorService';
export type { ShapesInput } from './shacl/shaclValidatorService';
