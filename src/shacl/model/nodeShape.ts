// src/shacl/model/nodeShape.ts
import type { Iri, SubjectTerm, Term } from '../../rdf/terms';
import type { ConstraintParameters, PropertyShape } from './propertyShape';
import type { SparqlConstraint } from './sparqlConstraint';

/**
 * A node shape: targets that select focus nodes, constraints on the focus node itself,
 * property shapes and SPARQL constraints.
 */
export interface NodeShape extends ConstraintParameters {
    id: SubjectTerm;
    message?: string;

    targetClasses: readonly Iri[];
    targetNodes: readonly Term[];
    targetSubjectsOf: readonly Iri[];
    targetObjectsOf: readonly Iri[];
    /** Set when the shape is itself a class, making its instances focus nodes */
    implicitClassTarget?: Iri;

    propertyShapes: readonly PropertyShape[];
    sparqlConstraints: readonly SparqlConstraint[];

    and?: readonly SubjectTerm[];
    or?: readonly SubjectTerm[];
    xone?: readonly SubjectTerm[];
    not?: SubjectTerm;
}

/**
 * Shapes indexed by the string form of their id, for resolving logical references
 */
export type ShapeMap = ReadonlyMap<string, NodeShape>;

export function createNodeShape(fields: Partial<NodeShape> & Pick<NodeShape, 'id'>): NodeShape {
    return {
        targetClasses: [],
        targetNodes: [],
        targetSubjectsOf: [],
        targetObjectsOf: [],
        propertyShapes: [],
        sparqlConstraints: [],
        ...fields,
    };
}
