// src/shacl/validators/logicalOperators.ts
import type { Graph } from '../../rdf/graph';
import { SubjectTerm, Term, termToString } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import { createChildLogger } from '../../utils/logger';
import type { NodeShape, ShapeMap } from '../model/nodeShape';
import type { ValidationResult } from '../model/validationResult';
import * as cardinality from './cardinality';
import { buildNodeViolation } from './helpers';
import * as qualified from './qualified';
import * as string from './string';
import * as type from './type';
import * as value from './value';

const log = createChildLogger({ component: 'logical-operators' });

export const DEFAULT_MAX_RECURSION_DEPTH = 50;

export interface LogicalValidationOptions {
    /** Nesting level of the shape being checked; 0 for a shape reached through a target */
    depth?: number;
    maxRecursionDepth?: number;
}

interface Context {
    graph: Graph;
    focusNode: Term;
    shapeMap: ShapeMap;
    depth: number;
    maxDepth: number;
}

/**
 * sh:and, sh:or, sh:xone and sh:not. Each operator yields at most one result on the
 * referencing shape; referenced shapes are checked with every node and property validator.
 */
export function validateNode(
    graph: Graph,
    focusNode: Term,
    shape: NodeShape,
    shapeMap: ShapeMap,
    options: LogicalValidationOptions = {}
): ValidationResult[] {
    const ctx: Context = {
        graph,
        focusNode,
        shapeMap,
        depth: options.depth ?? 0,
        maxDepth: options.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH,
    };

    if (ctx.depth > ctx.maxDepth) {
        log.error({ shape: termToString(shape.id), depth: ctx.depth },
            'Max recursion depth exceeded validating logical operators');
        return [];
    }

    return [
        ...validateAnd(ctx, shape),
        ...validateOr(ctx, shape),
        ...validateXone(ctx, shape),
        ...validateNot(ctx, shape),
    ];
}

function validateAnd(ctx: Context, shape: NodeShape): ValidationResult[] {
    if (!shape.and || shape.and.length === 0) {
        return [];
    }
    const failingShapes = shape.and.filter(ref => !conformsTo(ctx, ref)).length;
    if (failingShapes === 0) {
        return [];
    }
    return [
        buildNodeViolation(ctx.focusNode, shape, 'AND constraint failed: not all shapes conform', {
            constraintComponent: SH.AndConstraintComponent,
            failingShapes,
        }),
    ];
}

function validateOr(ctx: Context, shape: NodeShape): ValidationResult[] {
    if (!shape.or || shape.or.length === 0) {
        return [];
    }
    if (shape.or.some(ref => conformsTo(ctx, ref))) {
        return [];
    }
    return [
        buildNodeViolation(ctx.focusNode, shape, 'OR constraint failed: no shape conforms', {
            constraintComponent: SH.OrConstraintComponent,
            testedShapes: shape.or.length,
        }),
    ];
}

function validateXone(ctx: Context, shape: NodeShape): ValidationResult[] {
    if (!shape.xone || shape.xone.length === 0) {
        return [];
    }
    const conformingCount = shape.xone.filter(ref => conformsTo(ctx, ref)).length;
    if (conformingCount === 1) {
        return [];
    }
    return [
        buildNodeViolation(ctx.focusNode, shape,
            `XONE constraint failed: ${conformingCount} shapes conform (expected exactly 1)`, {
                constraintComponent: SH.XoneConstraintComponent,
                conformingCount,
                testedShapes: shape.xone.length,
            }),
    ];
}

function validateNot(ctx: Context, shape: NodeShape): ValidationResult[] {
    if (!shape.not || !conformsTo(ctx, shape.not)) {
        return [];
    }
    return [
        buildNodeViolation(ctx.focusNode, shape, 'NOT constraint failed: negated shape conforms', {
            constraintComponent: SH.NotConstraintComponent,
            negatedShape: shape.not,
        }),
    ];
}

function conformsTo(ctx: Context, ref: SubjectTerm): boolean {
    const referenced = ctx.shapeMap.get(termToString(ref));
    if (!referenced) {
        log.warn({ shape: termToString(ref) }, 'Referenced shape not found in shape map');
        return true;
    }
    return validateAgainstShape(ctx, referenced).length === 0;
}

function validateAgainstShape(ctx: Context, referenced: NodeShape): ValidationResult[] {
    const { graph, focusNode } = ctx;
    const results: ValidationResult[] = [
        ...type.validateNode(graph, focusNode, referenced),
        ...string.validateNode(graph, focusNode, referenced),
        ...value.validateNode(graph, focusNode, referenced),
        ...validateNode(graph, focusNode, referenced, ctx.shapeMap, {
            depth: ctx.depth + 1,
            maxRecursionDepth: ctx.maxDepth,
        }),
    ];
    for (const propertyShape of referenced.propertyShapes) {
        results.push(
            ...cardinality.validate(graph, focusNode, propertyShape),
            ...type.validate(graph, focusNode, propertyShape),
            ...string.validate(graph, focusNode, propertyShape),
            ...value.validate(graph, focusNode, propertyShape),
            ...qualified.validate(graph, focusNode, propertyShape),
        );
    }
    return results;
}
