// src/rdf/terms.ts
import type * as RDF from '@rdfjs/types';
import { DataFactory } from 'n3';

/**
 * The term variants a graph can hold: IRIs, blank nodes and literals.
 */
export type Term = RDF.NamedNode | RDF.BlankNode | RDF.Literal;
export type Iri = RDF.NamedNode;
export type SubjectTerm = RDF.NamedNode | RDF.BlankNode;

export interface Triple {
    subject: SubjectTerm;
    predicate: Iri;
    object: Term;
}

export const { namedNode, blankNode, literal } = DataFactory;

export function isTerm(term: RDF.Term | null | undefined): term is Term {
    if (!term) {
        return false;
    }
    return term.termType === 'NamedNode' || term.termType === 'BlankNode' || term.termType === 'Literal';
}

export function isSubjectTerm(term: RDF.Term | null | undefined): term is SubjectTerm {
    return !!term && (term.termType === 'NamedNode' || term.termType === 'BlankNode');
}

export function isIri(term: RDF.Term | null | undefined): term is Iri {
    return !!term && term.termType === 'NamedNode';
}

export function isLiteral(term: RDF.Term | null | undefined): term is RDF.Literal {
    return !!term && term.termType === 'Literal';
}

/**
 * N-Triples style rendering, used in messages and as a map key
 */
export function termToString(term: Term | null | undefined): string {
    if (!term) {
        return "N/A";
    }
    switch (term.termType) {
        case "NamedNode":
            return `<${term.value}>`;
        case "BlankNode":
            return `_:${term.value}`;
        case "Literal": {
            const lexical = JSON.stringify(term.value);
            if (term.language) {
                return `${lexical}@${term.language}`;
            }
            return `${lexical}^^<${term.datatype.value}>`;
        }
    }
}

export function termListIncludes(terms: readonly Term[], term: Term): boolean {
    return terms.some(candidate => candidate.equals(term));
}

export interface SerializedTerm {
    value: string;
    termType: Term['termType'];
    language?: string;
    datatype?: string;
}

/**
 * Plain-object form of a term, for JSON output
 */
export function serializeTerm(term: Term): SerializedTerm;
export function serializeTerm(term: Term | undefined): SerializedTerm | undefined;
export function serializeTerm(term: Term | undefined): SerializedTerm | undefined {
    if (!term) { return undefined; }
    const base = { value: term.value, termType: term.termType };
    if (term.termType === 'Literal') {
        return {
            ...base,
            language: term.language || undefined,
            datatype: term.datatype.value,
        };
    }
    return base;
}
