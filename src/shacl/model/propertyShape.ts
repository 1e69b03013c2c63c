// src/shacl/model/propertyShape.ts
import type { Iri, SubjectTerm, Term } from '../../rdf/terms';
import type { Literal } from '@rdfjs/types';

export type NodeKind =
    | 'IRI'
    | 'BlankNode'
    | 'Literal'
    | 'BlankNodeOrIRI'
    | 'BlankNodeOrLiteral'
    | 'IRIOrLiteral';

/**
 * A numeric bound, either a plain number or a numeric literal from a shapes graph
 */
export type NumericBound = number | Literal;

/**
 * Constraint parameters shared by node shapes and property shapes.
 * An absent field means the constraint is not active.
 */
export interface ConstraintParameters {
    datatype?: Iri;
    class?: Iri;
    nodeKind?: NodeKind;
    pattern?: RegExp;
    minLength?: number;
    maxLength?: number;
    languageIn?: readonly string[];
    /** Allowed values; an empty list is inactive */
    in?: readonly Term[];
    hasValue?: Term;
    minInclusive?: NumericBound;
    maxInclusive?: NumericBound;
    minExclusive?: NumericBound;
    maxExclusive?: NumericBound;
}

/**
 * Constraints on the values reached from a focus node through a single predicate (sh:property).
 */
export interface PropertyShape extends ConstraintParameters {
    id: SubjectTerm;
    path: Iri;
    message?: string;
    minCount?: number;
    maxCount?: number;
    qualifiedClass?: Iri;
    qualifiedMinCount?: number;
}
