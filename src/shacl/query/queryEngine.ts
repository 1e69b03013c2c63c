// src/shacl/query/queryEngine.ts
import type { Graph } from '../../rdf/graph';
import type { Term } from '../../rdf/terms';

/**
 * One solution of a SELECT query: variable name (no sigil) -> bound term.
 * Unbound variables are absent.
 */
export type QueryRow = ReadonlyMap<string, Term>;

export interface QueryOptions {
    timeoutMs: number;
}

/**
 * Executes SELECT queries against a data graph. Implementations throw QueryExecutionError
 * (or QueryTimeoutError) when a query cannot be answered.
 */
export interface QueryEngine {
    select(graph: Graph, query: string, options: QueryOptions): Promise<QueryRow[]>;
}
