// src/shacl/validators/helpers.ts
import type { Graph } from '../../rdf/graph';
import { isLiteral, Iri, Term, termToString } from '../../rdf/terms';
import { RDF, XSD } from '../../rdf/vocabulary';
import type { NodeShape } from '../model/nodeShape';
import type { NodeKind, NumericBound, PropertyShape } from '../model/propertyShape';
import { createValidationResult, DetailValue, ValidationResult } from '../model/validationResult';

/**
 * Details attached to a violation. `constraintComponent` and `value` are lifted onto the
 * result itself; everything else stays in `details`.
 */
export interface ViolationDetails {
    constraintComponent?: Iri;
    value?: Term;
    [key: string]: DetailValue | undefined;
}

type NumericKind = 'integer' | 'decimal' | 'float';

const NUMERIC_KINDS: ReadonlyMap<string, NumericKind> = new Map<string, NumericKind>([
    ...[
        XSD.integer,
        XSD.long,
        XSD.int,
        XSD.short,
        XSD.byte,
        XSD.nonNegativeInteger,
        XSD.nonPositiveInteger,
        XSD.positiveInteger,
        XSD.negativeInteger,
        XSD.unsignedLong,
        XSD.unsignedInt,
        XSD.unsignedShort,
        XSD.unsignedByte,
    ].map((datatype): [string, NumericKind] => [datatype.value, 'integer']),
    [XSD.decimal.value, 'decimal'],
    [XSD.double.value, 'float'],
    [XSD.float.value, 'float'],
]);

const LEXICAL_FORMS: Readonly<Record<NumericKind, RegExp>> = {
    integer: /^[+-]?\d+$/,
    decimal: /^[+-]?(\d+(\.\d*)?|\.\d+)$/,
    float: /^([+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?|[+-]?INF|NaN)$/,
};

/**
 * Objects of every (focusNode, path, ?) triple
 */
export function getPropertyValues(graph: Graph, focusNode: Term, path: Iri): Term[] {
    return graph.objects(focusNode, path);
}

/**
 * Direct rdf:type assertion only; subclasses are not followed.
 */
export function isInstanceOf(graph: Graph, term: Term, classIri: Iri): boolean {
    if (isLiteral(term)) {
        return false;
    }
    return graph.has({ subject: term, predicate: RDF.type, object: classIri });
}

export function isDatatype(term: Term, datatype: Iri): boolean {
    return isLiteral(term) && term.datatype.equals(datatype);
}

export function isNodeKind(term: Term, kind: NodeKind): boolean {
    switch (kind) {
        case 'IRI':
            return term.termType === 'NamedNode';
        case 'BlankNode':
            return term.termType === 'BlankNode';
        case 'Literal':
            return term.termType === 'Literal';
        case 'BlankNodeOrIRI':
            return term.termType === 'BlankNode' || term.termType === 'NamedNode';
        case 'BlankNodeOrLiteral':
            return term.termType === 'BlankNode' || term.termType === 'Literal';
        case 'IRIOrLiteral':
            return term.termType === 'NamedNode' || term.termType === 'Literal';
    }
}

/**
 * Lexical form of a literal; undefined for IRIs and blank nodes.
 */
export function extractString(term: Term): string | undefined {
    return isLiteral(term) ? term.value : undefined;
}

/**
 * Lexical form of a numeric literal, when it is valid for the literal's XSD datatype
 */
function numericLexical(term: Term): { kind: NumericKind; lexical: string } | undefined {
    if (!isLiteral(term)) {
        return undefined;
    }
    const kind = NUMERIC_KINDS.get(term.datatype.value);
    if (!kind) {
        return undefined;
    }
    const lexical = term.value.trim();
    return LEXICAL_FORMS[kind].test(lexical) ? { kind, lexical } : undefined;
}

/**
 * Numeric value of a literal with an XSD numeric datatype; undefined for anything else,
 * including lexical forms the datatype does not allow and NaN.
 */
export function extractNumber(term: Term): number | undefined {
    const numeric = numericLexical(term);
    if (!numeric) {
        return undefined;
    }
    if (numeric.lexical.endsWith('INF')) {
        return numeric.lexical.startsWith('-') ? -Infinity : Infinity;
    }
    const value = Number(numeric.lexical);
    return Number.isNaN(value) ? undefined : value;
}

export function unwrapBound(bound: NumericBound): number | undefined {
    return typeof bound === 'number' ? bound : extractNumber(bound);
}

function exactInteger(value: Term | number): bigint | undefined {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) ? BigInt(value) : undefined;
    }
    const numeric = numericLexical(value);
    return numeric?.kind === 'integer' ? BigInt(numeric.lexical.replace(/^\+/, '')) : undefined;
}

/**
 * Sign of (value - bound); undefined when either side is not numeric.
 * Two integers are compared exactly, whatever their size.
 */
export function compareNumeric(value: Term, bound: NumericBound): number | undefined {
    const exactValue = exactInteger(value);
    const exactBound = exactInteger(bound);
    if (exactValue !== undefined && exactBound !== undefined) {
        return exactValue === exactBound ? 0 : exactValue < exactBound ? -1 : 1;
    }
    const actual = extractNumber(value);
    const limit = unwrapBound(bound);
    if (actual === undefined || limit === undefined) {
        return undefined;
    }
    return actual === limit ? 0 : actual < limit ? -1 : 1;
}

/**
 * Length in code points, so astral characters count once
 */
export function stringLength(value: string): number {
    return [...value].length;
}

export function describeTerm(term: Term): string {
    return termToString(term);
}

function splitDetails(details: ViolationDetails): {
    constraintComponent?: Iri;
    value?: Term;
    rest: Record<string, DetailValue>;
} {
    const { constraintComponent, value, ...others } = details;
    const rest: Record<string, DetailValue> = {};
    for (const [key, detail] of Object.entries(others)) {
        if (detail !== undefined) {
            rest[key] = detail;
        }
    }
    return { constraintComponent, value, rest };
}

export function buildViolation(
    focusNode: Term,
    propertyShape: PropertyShape,
    defaultMessage: string,
    details: ViolationDetails
): ValidationResult {
    const { constraintComponent, value, rest } = splitDetails(details);
    return createValidationResult({
        focusNode,
        resultPath: propertyShape.path,
        value,
        sourceShape: propertyShape.id,
        constraintComponent,
        severity: 'Violation',
        message: propertyShape.message ?? defaultMessage,
        details: rest,
    });
}

/**
 * Violation of a constraint applied to the focus node itself; there is no result path.
 */
export function buildNodeViolation(
    focusNode: Term,
    nodeShape: NodeShape,
    defaultMessage: string,
    details: ViolationDetails
): ValidationResult {
    const { constraintComponent, value, rest } = splitDetails(details);
    return createValidationResult({
        focusNode,
        value,
        sourceShape: nodeShape.id,
        constraintComponent,
        severity: 'Violation',
        message: nodeShape.message ?? defaultMessage,
        details: rest,
    });
}
