// src/rdf/graph.ts
import { Store as N3Store, Parser as N3Parser, DataFactory } from 'n3';
import type * as RDF from '@rdfjs/types';
import { GraphParseError } from '../errors';
import { isIri, isSubjectTerm, isTerm, Iri, SubjectTerm, Term, Triple } from './terms';

export interface GraphParseOptions {
    baseIRI?: string;
    /** Prefix for blank node labels; '' keeps the labels of the input */
    blankNodePrefix?: string;
}

interface ParserErrorContext {
    context?: { line?: unknown };
}

function errorLine(error: Error & ParserErrorContext): number | undefined {
    const line = error.context?.line;
    return typeof line === 'number' ? line : undefined;
}

/**
 * Read-only triple set. Duplicates are collapsed by the underlying store.
 */
export class Graph {
    private readonly _store: N3Store;
    private readonly _prefixes: Readonly<Record<string, string>>;

    constructor(triples: Iterable<Triple> = [], prefixes: Record<string, string> = {}) {
        this._store = new N3Store();
        for (const triple of triples) {
            this._store.addQuad(DataFactory.quad(triple.subject, triple.predicate, triple.object));
        }
        this._prefixes = Object.freeze({ ...prefixes });
    }

    /**
     * Parse Turtle (or N-Triples) text. Throws GraphParseError on the first syntax error.
     */
    public static fromTurtle(content: string, options: GraphParseOptions = {}): Graph {
        const parser = new N3Parser({
            baseIRI: options.baseIRI,
            blankNodePrefix: options.blankNodePrefix,
        });
        const triples: Triple[] = [];
        const prefixes: Record<string, string> = {};

        let quads: RDF.Quad[];
        try {
            quads = parser.parse(content, null, (prefix, prefixNode) => {
                prefixes[prefix] = prefixNode.value;
            });
        } catch (e: unknown) {
            if (e instanceof Error) {
                throw new GraphParseError(e.message, errorLine(e));
            }
            throw new GraphParseError(String(e));
        }

        for (const quad of quads) {
            if (isSubjectTerm(quad.subject) && isIri(quad.predicate) && isTerm(quad.object)) {
                triples.push({ subject: quad.subject, predicate: quad.predicate, object: quad.object });
            }
        }
        return new Graph(triples, prefixes);
    }

    public get size(): number {
        return this._store.size;
    }

    public get prefixes(): Readonly<Record<string, string>> {
        return this._prefixes;
    }

    /**
     * Triples matching the given subject, predicate and object; omitted positions match anything.
     */
    public triplesWith(subject?: Term | null, predicate?: Iri | null, object?: Term | null): Triple[] {
        // literals never occur in subject position
        if (subject && subject.termType === 'Literal') {
            return [];
        }
        const triples: Triple[] = [];
        for (const quad of this._store.getQuads(subject ?? null, predicate ?? null, object ?? null, null)) {
            if (isSubjectTerm(quad.subject) && isIri(quad.predicate) && isTerm(quad.object)) {
                triples.push({ subject: quad.subject, predicate: quad.predicate, object: quad.object });
            }
        }
        return triples;
    }

    public triples(): Triple[] {
        return this.triplesWith();
    }

    public objects(subject: Term, predicate: Iri): Term[] {
        return this.triplesWith(subject, predicate).map(triple => triple.object);
    }

    public subjects(predicate: Iri, object?: Term): SubjectTerm[] {
        return this.triplesWith(null, predicate, object).map(triple => triple.subject);
    }

    /**
     * First object of (subject, predicate, ?), if any
     */
    public object(subject: Term, predicate: Iri): Term | undefined {
        return this.objects(subject, predicate)[0];
    }

    public has(triple: Triple): boolean {
        return this._store.countQuads(triple.subject, triple.predicate, triple.object, null) > 0;
    }
}
