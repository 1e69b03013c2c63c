// src/shacl/query/oxigraphQueryEngine.ts
import { QueryExecutionError } from '../../errors';
import type { Graph } from '../../rdf/graph';
import { blankNode, literal, namedNode, Term } from '../../rdf/terms';
import type { QueryEngine, QueryOptions, QueryRow } from './queryEngine';
import { QueryWorker } from './queryWorker';
import type { WireTerm, WireTriple } from './queryWorker';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function toWireTerm(term: Term): WireTerm {
    if (term.termType === 'Literal') {
        return { termType: 'Literal', value: term.value, language: term.language, datatype: term.datatype.value };
    }
    return { termType: term.termType, value: term.value };
}

/**
 * Convert a term posted back by the query worker into an n3 term
 */
function fromWireTerm(value: unknown): Term | undefined {
    if (!isRecord(value) || typeof value.value !== 'string') {
        return undefined;
    }
    switch (value.termType) {
        case 'NamedNode':
            return namedNode(value.value);
        case 'BlankNode':
            return blankNode(value.value);
        case 'Literal': {
            if (typeof value.language === 'string' && value.language !== '') {
                return literal(value.value, value.language);
            }
            if (typeof value.datatype === 'string') {
                return literal(value.value, namedNode(value.datatype));
            }
            return literal(value.value);
        }
        default:
            return undefined;
    }
}

function toRows(raw: unknown, query: string): QueryRow[] {
    if (!Array.isArray(raw)) {
        throw new QueryExecutionError('Query did not return SELECT solutions', query);
    }
    const rows: QueryRow[] = [];
    for (const solution of raw) {
        const row = new Map<string, Term>();
        if (Array.isArray(solution)) {
            for (const entry of solution) {
                if (!Array.isArray(entry)) {
                    continue;
                }
                const [name, bound] = entry;
                const term = fromWireTerm(bound);
                if (typeof name === 'string' && term) {
                    row.set(name.replace(/^[?$]/, ''), term);
                }
            }
        }
        rows.push(row);
    }
    return rows;
}

/**
 * Runs SPARQL SELECT queries with oxigraph. Each graph is loaded once into a store held by its own
 * worker thread, so a query that runs past its timeout can be stopped and reported as QueryTimeoutError.
 * Idle workers do not keep the process alive; close() stops them all.
 */
export class OxigraphQueryEngine implements QueryEngine {
    private readonly _workers = new WeakMap<Graph, QueryWorker>();
    private readonly _open = new Set<QueryWorker>();
    private readonly _modulePath = require.resolve('oxigraph');

    public async select(graph: Graph, query: string, options: QueryOptions): Promise<QueryRow[]> {
        const raw = await this.workerFor(graph).run(query, options.timeoutMs);
        return toRows(raw, query);
    }

    public async close(): Promise<void> {
        const workers = Array.from(this._open);
        this._open.clear();
        await Promise.all(workers.map(worker => worker.close()));
    }

    private workerFor(graph: Graph): QueryWorker {
        const cached = this._workers.get(graph);
        if (cached) {
            this._open.add(cached);
            return cached;
        }
        const triples = graph.triples().map((triple): WireTriple => [
            toWireTerm(triple.subject),
            toWireTerm(triple.predicate),
            toWireTerm(triple.object),
        ]);
        const worker = new QueryWorker(triples, this._modulePath);
        this._workers.set(graph, worker);
        this._open.add(worker);
        return worker;
    }
}
