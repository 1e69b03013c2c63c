// src/shacl/shapesReader.ts
import type { Literal } from '@rdfjs/types';
import { ShapeParseError } from '../errors';
import { Graph } from '../rdf/graph';
import { isIri, isLiteral, isSubjectTerm, Iri, SubjectTerm, Term, termToString } from '../rdf/terms';
import { RDF, RDFS, SH } from '../rdf/vocabulary';
import { createNodeShape, NodeShape, ShapeMap } from './model/nodeShape';
import type { ConstraintParameters, NodeKind, PropertyShape } from './model/propertyShape';
import type { SparqlConstraint } from './model/sparqlConstraint';
import { extractNumber } from './validators/helpers';

const NODE_KINDS: ReadonlyMap<string, NodeKind> = new Map<string, NodeKind>([
    [SH.IRI.value, 'IRI'],
    [SH.BlankNode.value, 'BlankNode'],
    [SH.Literal.value, 'Literal'],
    [SH.BlankNodeOrIRI.value, 'BlankNodeOrIRI'],
    [SH.BlankNodeOrLiteral.value, 'BlankNodeOrLiteral'],
    [SH.IRIOrLiteral.value, 'IRIOrLiteral'],
]);

const TARGET_PREDICATES: readonly Iri[] = [SH.targetClass, SH.targetNode, SH.targetSubjectsOf, SH.targetObjectsOf];

const DEFAULT_SPARQL_MESSAGE = 'SPARQL constraint violated';

/**
 * Shapes read from a shapes graph. `shapes` are the declared node shapes in graph order;
 * `shapeMap` also holds shapes that are only reachable through sh:and, sh:or, sh:xone or sh:not.
 */
export interface ShapesGraph {
    shapes: NodeShape[];
    shapeMap: ShapeMap;
}

/**
 * Reads NodeShape objects out of a shapes graph. Throws ShapeParseError on malformed shapes.
 */
class ShapesReader {
    private readonly _shapeMap = new Map<string, NodeShape>();
    private readonly _pending: SubjectTerm[] = [];

    constructor(private readonly _graph: Graph) {}

    public read(): ShapesGraph {
        const shapes = this.declaredShapeIds().map(id => this.nodeShape(id));

        // shapes referenced by logical operators, read on demand
        let ref = this._pending.shift();
        while (ref) {
            if (!this._shapeMap.has(termToString(ref))) {
                this.nodeShape(ref);
            }
            ref = this._pending.shift();
        }

        return { shapes, shapeMap: this._shapeMap };
    }

    private declaredShapeIds(): SubjectTerm[] {
        const ids = new Map<string, SubjectTerm>();
        const add = (id: SubjectTerm): void => {
            if (!ids.has(termToString(id))) {
                ids.set(termToString(id), id);
            }
        };
        this._graph.subjects(RDF.type, SH.NodeShape).forEach(add);
        for (const predicate of TARGET_PREDICATES) {
            this._graph.subjects(predicate)
                .filter(id => this._graph.object(id, SH.path) === undefined)
                .forEach(add);
        }
        return Array.from(ids.values());
    }

    private nodeShape(id: SubjectTerm): NodeShape {
        const key = termToString(id);
        const existing = this._shapeMap.get(key);
        if (existing) {
            return existing;
        }

        const graph = this._graph;
        // a property shape used as a logical operand behaves like a node shape with that one property
        const ownPath = graph.object(id, SH.path);
        const propertyShapes = ownPath !== undefined
            ? [this.propertyShape(id)]
            : graph.objects(id, SH.property).map(propertyId => this.propertyShape(this.subject(id, propertyId, 'sh:property')));

        const implicitClassTarget = isIri(id) && graph.has({ subject: id, predicate: RDF.type, object: RDFS.Class })
            ? id
            : undefined;

        const shape = createNodeShape({
            id,
            message: ownPath !== undefined ? undefined : this.optionalString(id, SH.message),
            targetClasses: this.iris(id, SH.targetClass),
            targetNodes: graph.objects(id, SH.targetNode),
            targetSubjectsOf: this.iris(id, SH.targetSubjectsOf),
            targetObjectsOf: this.iris(id, SH.targetObjectsOf),
            implicitClassTarget,
            propertyShapes,
            sparqlConstraints: graph.objects(id, SH.sparql).map(node => this.sparqlConstraint(id, node)),
            ...(ownPath !== undefined ? {} : this.constraintParameters(id)),
            and: this.shapeList(id, SH.and, 'sh:and'),
            or: this.shapeList(id, SH.or, 'sh:or'),
            xone: this.shapeList(id, SH.xone, 'sh:xone'),
            not: this.shapeRef(id),
        });
        this._shapeMap.set(key, shape);
        return shape;
    }

    private propertyShape(id: SubjectTerm): PropertyShape {
        const path = this._graph.object(id, SH.path);
        if (!isIri(path)) {
            throw new ShapeParseError(termToString(id), path === undefined
                ? 'Missing required property: sh:path'
                : 'sh:path must be an IRI');
        }

        const qualifiedShape = this._graph.object(id, SH.qualifiedValueShape);
        return {
            id,
            path,
            message: this.optionalString(id, SH.message),
            minCount: this.optionalCount(id, SH.minCount, 'sh:minCount'),
            maxCount: this.optionalCount(id, SH.maxCount, 'sh:maxCount'),
            ...this.constraintParameters(id),
            qualifiedClass: qualifiedShape !== undefined ? this.optionalIri(qualifiedShape, SH.class) : undefined,
            qualifiedMinCount: this.optionalCount(id, SH.qualifiedMinCount, 'sh:qualifiedMinCount'),
        };
    }

    private constraintParameters(id: SubjectTerm): ConstraintParameters {
        const params: ConstraintParameters = {
            datatype: this.optionalIri(id, SH.datatype),
            class: this.optionalIri(id, SH.class),
            nodeKind: this.optionalNodeKind(id),
            pattern: this.optionalPattern(id),
            minLength: this.optionalCount(id, SH.minLength, 'sh:minLength'),
            maxLength: this.optionalCount(id, SH.maxLength, 'sh:maxLength'),
            hasValue: this._graph.object(id, SH.hasValue),
            minInclusive: this.optionalBound(id, SH.minInclusive, 'sh:minInclusive'),
            maxInclusive: this.optionalBound(id, SH.maxInclusive, 'sh:maxInclusive'),
            minExclusive: this.optionalBound(id, SH.minExclusive, 'sh:minExclusive'),
            maxExclusive: this.optionalBound(id, SH.maxExclusive, 'sh:maxExclusive'),
        };

        const inHead = this._graph.object(id, SH.in);
        if (inHead !== undefined) {
            params.in = this.list(id, inHead, 'sh:in');
        }
        const languageHead = this._graph.object(id, SH.languageIn);
        if (languageHead !== undefined) {
            params.languageIn = this.list(id, languageHead, 'sh:languageIn').map(tag => {
                if (!isLiteral(tag)) {
                    throw new ShapeParseError(termToString(id), 'sh:languageIn members must be literals');
                }
                return tag.value;
            });
        }
        return params;
    }

    private sparqlConstraint(shapeId: SubjectTerm, node: Term): SparqlConstraint {
        const constraintId = this.subject(shapeId, node, 'sh:sparql');
        const select = this.optionalString(constraintId, SH.select);
        if (select === undefined) {
            throw new ShapeParseError(termToString(shapeId), 'Missing required property: sh:select');
        }
        const prefixes = this.prefixDeclarations(shapeId, constraintId);
        return {
            sourceShape: shapeId,
            message: this.optionalString(constraintId, SH.message) ?? DEFAULT_SPARQL_MESSAGE,
            select,
            prefixes: Object.keys(prefixes).length > 0 ? prefixes : undefined,
        };
    }

    /**
     * sh:prefixes -> sh:declare -> (sh:prefix, sh:namespace)
     */
    private prefixDeclarations(shapeId: SubjectTerm, constraintId: SubjectTerm): Record<string, string> {
        const prefixes: Record<string, string> = {};
        for (const owner of this._graph.objects(constraintId, SH.prefixes)) {
            for (const declaration of this._graph.objects(owner, SH.declare)) {
                const prefix = this._graph.object(declaration, SH.prefix);
                const namespace = this._graph.object(declaration, SH.namespace);
                if (!isLiteral(prefix) || namespace === undefined || namespace.termType === 'BlankNode') {
                    throw new ShapeParseError(termToString(shapeId), 'sh:declare needs a literal sh:prefix and an sh:namespace');
                }
                prefixes[prefix.value] = namespace.value;
            }
        }
        return prefixes;
    }

    private shapeList(id: SubjectTerm, predicate: Iri, name: string): SubjectTerm[] | undefined {
        const head = this._graph.object(id, predicate);
        if (head === undefined) {
            return undefined;
        }
        return this.list(id, head, name).map(member => this.queue(this.subject(id, member, name)));
    }

    private shapeRef(id: SubjectTerm): SubjectTerm | undefined {
        const ref = this._graph.object(id, SH.not);
        return ref === undefined ? undefined : this.queue(this.subject(id, ref, 'sh:not'));
    }

    private queue(ref: SubjectTerm): SubjectTerm {
        this._pending.push(ref);
        return ref;
    }

    /**
     * Members of an RDF collection, in order
     */
    private list(owner: SubjectTerm, head: Term, name: string): Term[] {
        const members: Term[] = [];
        const seen = new Set<string>();
        let node: Term = head;
        while (!node.equals(RDF.nil)) {
            const key = termToString(node);
            if (seen.has(key)) {
                throw new ShapeParseError(termToString(owner), `Malformed RDF list in ${name}: cycle`);
            }
            seen.add(key);
            const first = this._graph.object(node, RDF.first);
            const rest = this._graph.object(node, RDF.rest);
            if (first === undefined || rest === undefined) {
                throw new ShapeParseError(termToString(owner), `Malformed RDF list in ${name}: missing rdf:first or rdf:rest`);
            }
            members.push(first);
            node = rest;
        }
        return members;
    }

    private subject(owner: SubjectTerm, term: Term, name: string): SubjectTerm {
        if (!isSubjectTerm(term)) {
            throw new ShapeParseError(termToString(owner), `${name} must reference an IRI or blank node`);
        }
        return term;
    }

    private iris(id: SubjectTerm, predicate: Iri): Iri[] {
        return this._graph.objects(id, predicate).filter(isIri);
    }

    private optionalIri(id: Term, predicate: Iri): Iri | undefined {
        const value = this._graph.object(id, predicate);
        return isIri(value) ? value : undefined;
    }

    private optionalString(id: Term, predicate: Iri): string | undefined {
        const value = this._graph.objects(id, predicate).find(isLiteral);
        return value?.value;
    }

    private optionalCount(id: SubjectTerm, predicate: Iri, name: string): number | undefined {
        const value = this._graph.object(id, predicate);
        if (value === undefined) {
            return undefined;
        }
        const count = isLiteral(value) ? Number(value.value) : Number.NaN;
        if (!Number.isInteger(count) || count < 0) {
            throw new ShapeParseError(termToString(id), `${name} must be a non-negative integer`);
        }
        return count;
    }

    private optionalBound(id: SubjectTerm, predicate: Iri, name: string): Literal | undefined {
        const value = this._graph.object(id, predicate);
        if (value === undefined) {
            return undefined;
        }
        if (!isLiteral(value) || extractNumber(value) === undefined) {
            throw new ShapeParseError(termToString(id), `${name} must be a numeric literal`);
        }
        return value;
    }

    private optionalNodeKind(id: SubjectTerm): NodeKind | undefined {
        const value = this._graph.object(id, SH.nodeKind);
        if (value === undefined) {
            return undefined;
        }
        const kind = NODE_KINDS.get(value.value);
        if (!isIri(value) || !kind) {
            throw new ShapeParseError(termToString(id), `Unknown sh:nodeKind ${termToString(value)}`);
        }
        return kind;
    }

    private optionalPattern(id: SubjectTerm): RegExp | undefined {
        const source = this.optionalString(id, SH.pattern);
        if (source === undefined) {
            return undefined;
        }
        return compilePattern(termToString(id), source, this.optionalString(id, SH.flags) ?? '');
    }
}

/**
 * Compile an sh:pattern with its sh:flags. Supported flags: i, m, s and q (literal match).
 */
export function compilePattern(shapeId: string, source: string, flags: string): RegExp {
    let jsFlags = '';
    let pattern = source;
    for (const flag of flags) {
        switch (flag) {
            case 'i':
            case 'm':
            case 's':
                if (!jsFlags.includes(flag)) {
                    jsFlags += flag;
                }
                break;
            case 'q':
                pattern = source.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
                break;
            default:
                throw new ShapeParseError(shapeId, `Unsupported sh:flags value '${flag}'`);
        }
    }
    try {
        return new RegExp(pattern, jsFlags);
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ShapeParseError(shapeId, `Failed to compile regex pattern: ${reason}`);
    }
}

/**
 * Read every shape of a shapes graph, including shapes only referenced by logical operators
 */
export function parseShapesGraph(shapes: Graph | string): ShapesGraph {
    const graph = typeof shapes === 'string' ? Graph.fromTurtle(shapes) : shapes;
    return new ShapesReader(graph).read();
}

/**
 * Declared node shapes of a shapes graph: subjects typed sh:NodeShape and subjects of target predicates
 */
export function readShapes(shapes: Graph | string): NodeShape[] {
    return parseShapesGraph(shapes).shapes;
}

export function buildShapeMap(shapes: readonly NodeShape[]): ShapeMap {
    return new Map(shapes.map(shape => [termToString(shape.id), shape]));
}
