// src/shacl/shaclValidatorService.ts
import type { Logger } from 'pino';
import { resolveOptions, ValidationOptions, ValidationOptionsInput } from '../config';
import { Graph } from '../rdf/graph';
import { Term, termToString } from '../rdf/terms';
import { createChildLogger } from '../utils/logger';
import { mapWithConcurrency } from '../utils/concurrency';
import type { NodeShape, ShapeMap } from './model/nodeShape';
import { ValidationReport } from './model/validationReport';
import type { ValidationResult } from './model/validationResult';
import { OxigraphQueryEngine } from './query/oxigraphQueryEngine';
import type { QueryEngine } from './query/queryEngine';
import { buildShapeMap, parseShapesGraph, ShapesGraph } from './shapesReader';
import { resolveFocusNodes } from './targets';
import * as cardinality from './validators/cardinality';
import * as logicalOperators from './validators/logicalOperators';
import * as qualified from './validators/qualified';
import * as sparql from './validators/sparql';
import * as string from './validators/string';
import * as type from './validators/type';
import * as value from './validators/value';

/**
 * Shapes to validate against: Turtle text, a parsed shapes graph, or shapes built in code
 */
export type ShapesInput = Graph | string | readonly NodeShape[];

function loadShapes(shapes: ShapesInput): ShapesGraph {
    if (typeof shapes === 'string' || shapes instanceof Graph) {
        return parseShapesGraph(shapes);
    }
    return { shapes: [...shapes], shapeMap: buildShapeMap(shapes) };
}

/**
 * Validates a data graph against node shapes and assembles the report
 */
export class ShaclValidationService {
    private readonly _queryEngine: QueryEngine;
    private readonly _log: Logger;

    constructor(queryEngine: QueryEngine = new OxigraphQueryEngine()) {
        this._queryEngine = queryEngine;
        this._log = createChildLogger({ component: 'shacl-validation-service' });
    }

    public async validate(
        dataGraph: Graph,
        shapes: ShapesInput,
        options: ValidationOptionsInput = {}
    ): Promise<ValidationReport> {
        const resolved = resolveOptions(options);
        const started = Date.now();
        const { shapes: nodeShapes, shapeMap } = loadShapes(shapes);

        this._log.debug({
            triples: dataGraph.size,
            shapes: nodeShapes.length,
            parallel: resolved.parallel,
        }, 'Validation started');

        const validateShape = (shape: NodeShape): Promise<ValidationResult[]> =>
            this.validateShape(dataGraph, shape, shapeMap, resolved);

        let perShape: ValidationResult[][];
        if (resolved.parallel) {
            perShape = await mapWithConcurrency(nodeShapes, resolved.maxConcurrency, validateShape);
        } else {
            perShape = [];
            for (const shape of nodeShapes) {
                perShape.push(await validateShape(shape));
            }
        }

        const report = ValidationReport.fromResults(perShape.flat());
        this._log.info({
            conforms: report.conforms,
            violations: report.violations.length,
            warnings: report.warnings.length,
            info: report.info.length,
            durationMs: Date.now() - started,
        }, 'Validation finished');
        return report;
    }

    /**
     * All results for one (focus node, shape) pair
     */
    public async validateFocusNode(
        dataGraph: Graph,
        focusNode: Term,
        shape: NodeShape,
        shapeMap: ShapeMap = buildShapeMap([shape]),
        options: ValidationOptionsInput = {}
    ): Promise<ValidationResult[]> {
        return this.checkFocusNode(dataGraph, focusNode, shape, shapeMap, resolveOptions(options));
    }

    private async validateShape(
        dataGraph: Graph,
        shape: NodeShape,
        shapeMap: ShapeMap,
        options: ValidationOptions
    ): Promise<ValidationResult[]> {
        const focusNodes = resolveFocusNodes(dataGraph, shape);
        this._log.debug({ shape: termToString(shape.id), focusNodes: focusNodes.length }, 'Validating shape');

        const results: ValidationResult[] = [];
        for (const focusNode of focusNodes) {
            results.push(...await this.checkFocusNode(dataGraph, focusNode, shape, shapeMap, options));
        }
        return results;
    }

    private async checkFocusNode(
        dataGraph: Graph,
        focusNode: Term,
        shape: NodeShape,
        shapeMap: ShapeMap,
        options: ValidationOptions
    ): Promise<ValidationResult[]> {
        const results: ValidationResult[] = [
            ...type.validateNode(dataGraph, focusNode, shape),
            ...string.validateNode(dataGraph, focusNode, shape),
            ...value.validateNode(dataGraph, focusNode, shape),
            ...logicalOperators.validateNode(dataGraph, focusNode, shape, shapeMap, {
                maxRecursionDepth: options.maxRecursionDepth,
            }),
        ];

        for (const propertyShape of shape.propertyShapes) {
            results.push(
                ...cardinality.validate(dataGraph, focusNode, propertyShape),
                ...type.validate(dataGraph, focusNode, propertyShape),
                ...string.validate(dataGraph, focusNode, propertyShape),
                ...value.validate(dataGraph, focusNode, propertyShape),
                ...qualified.validate(dataGraph, focusNode, propertyShape),
            );
        }

        if (shape.sparqlConstraints.length > 0) {
            results.push(...await sparql.validate(dataGraph, focusNode, shape.sparqlConstraints, {
                engine: this._queryEngine,
                timeoutMs: options.queryTimeoutMs,
            }));
        }
        return results;
    }
}
