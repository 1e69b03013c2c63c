// src/shacl/validators/sparql.ts
import { errorMessage, QueryTimeoutError } from '../../errors';
import type { Graph } from '../../rdf/graph';
import { Term, termToString } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import { createChildLogger } from '../../utils/logger';
import type { SparqlConstraint } from '../model/sparqlConstraint';
import { createValidationResult, DetailValue, ValidationResult } from '../model/validationResult';
import type { QueryEngine, QueryRow } from '../query/queryEngine';
import { substituteThis } from '../query/substitution';

const log = createChildLogger({ component: 'sparql-validator' });

export interface SparqlValidationOptions {
    engine: QueryEngine;
    timeoutMs: number;
}

function toViolation(row: QueryRow, focusNode: Term, constraint: SparqlConstraint): ValidationResult {
    const details: Record<string, DetailValue> = {};
    for (const [name, term] of row) {
        details[name] = term;
    }
    return createValidationResult({
        focusNode,
        sourceShape: constraint.sourceShape,
        constraintComponent: SH.SPARQLConstraintComponent,
        severity: 'Violation',
        message: constraint.message,
        details,
    });
}

async function validateConstraint(
    graph: Graph,
    focusNode: Term,
    constraint: SparqlConstraint,
    options: SparqlValidationOptions
): Promise<ValidationResult[]> {
    const query = substituteThis(constraint.select, focusNode, constraint.prefixes);
    let rows: QueryRow[];
    try {
        rows = await options.engine.select(graph, query, { timeoutMs: options.timeoutMs });
    } catch (e: unknown) {
        log.warn({
            shape: termToString(constraint.sourceShape),
            focusNode: termToString(focusNode),
            timedOut: e instanceof QueryTimeoutError,
            err: errorMessage(e),
        }, 'SPARQL constraint query failed; constraint skipped');
        return [];
    }
    return rows.map(row => toViolation(row, focusNode, constraint));
}

/**
 * Run every SPARQL constraint against the focus node. Each returned row is one violation.
 * A query that fails or times out is logged and contributes nothing.
 */
export async function validate(
    graph: Graph,
    focusNode: Term,
    constraints: readonly SparqlConstraint[],
    options: SparqlValidationOptions
): Promise<ValidationResult[]> {
    const results: ValidationResult[] = [];
    for (const constraint of constraints) {
        results.push(...await validateConstraint(graph, focusNode, constraint, options));
    }
    return results;
}
