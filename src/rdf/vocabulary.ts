// src/rdf/vocabulary.ts
import { DataFactory } from 'n3';
import type { NamedNode } from '@rdfjs/types';

const { namedNode } = DataFactory;

export const SH_NS = 'http://www.w3.org/ns/shacl#';
export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

const sh = (name: string): NamedNode => namedNode(SH_NS + name);
const rdf = (name: string): NamedNode => namedNode(RDF_NS + name);
const xsd = (name: string): NamedNode => namedNode(XSD_NS + name);

export const RDF = {
    type: rdf('type'),
    first: rdf('first'),
    rest: rdf('rest'),
    nil: rdf('nil'),
    langString: rdf('langString'),
} as const;

export const RDFS = {
    Class: namedNode(RDFS_NS + 'Class'),
} as const;

export const XSD = {
    string: xsd('string'),
    boolean: xsd('boolean'),
    integer: xsd('integer'),
    decimal: xsd('decimal'),
    double: xsd('double'),
    float: xsd('float'),
    long: xsd('long'),
    int: xsd('int'),
    short: xsd('short'),
    byte: xsd('byte'),
    nonNegativeInteger: xsd('nonNegativeInteger'),
    nonPositiveInteger: xsd('nonPositiveInteger'),
    positiveInteger: xsd('positiveInteger'),
    negativeInteger: xsd('negativeInteger'),
    unsignedLong: xsd('unsignedLong'),
    unsignedInt: xsd('unsignedInt'),
    unsignedShort: xsd('unsignedShort'),
    unsignedByte: xsd('unsignedByte'),
} as const;

export const SH = {
    // shapes and targets
    NodeShape: sh('NodeShape'),
    PropertyShape: sh('PropertyShape'),
    targetClass: sh('targetClass'),
    targetNode: sh('targetNode'),
    targetSubjectsOf: sh('targetSubjectsOf'),
    targetObjectsOf: sh('targetObjectsOf'),
    property: sh('property'),
    path: sh('path'),
    message: sh('message'),
    // constraint parameters
    minCount: sh('minCount'),
    maxCount: sh('maxCount'),
    datatype: sh('datatype'),
    class: sh('class'),
    nodeKind: sh('nodeKind'),
    pattern: sh('pattern'),
    flags: sh('flags'),
    minLength: sh('minLength'),
    maxLength: sh('maxLength'),
    languageIn: sh('languageIn'),
    in: sh('in'),
    hasValue: sh('hasValue'),
    minInclusive: sh('minInclusive'),
    maxInclusive: sh('maxInclusive'),
    minExclusive: sh('minExclusive'),
    maxExclusive: sh('maxExclusive'),
    qualifiedValueShape: sh('qualifiedValueShape'),
    qualifiedMinCount: sh('qualifiedMinCount'),
    and: sh('and'),
    or: sh('or'),
    xone: sh('xone'),
    not: sh('not'),
    sparql: sh('sparql'),
    select: sh('select'),
    prefixes: sh('prefixes'),
    declare: sh('declare'),
    prefix: sh('prefix'),
    namespace: sh('namespace'),
    // node kinds
    IRI: sh('IRI'),
    BlankNode: sh('BlankNode'),
    Literal: sh('Literal'),
    BlankNodeOrIRI: sh('BlankNodeOrIRI'),
    BlankNodeOrLiteral: sh('BlankNodeOrLiteral'),
    IRIOrLiteral: sh('IRIOrLiteral'),
    // constraint components
    MinCountConstraintComponent: sh('MinCountConstraintComponent'),
    MaxCountConstraintComponent: sh('MaxCountConstraintComponent'),
    DatatypeConstraintComponent: sh('DatatypeConstraintComponent'),
    ClassConstraintComponent: sh('ClassConstraintComponent'),
    NodeKindConstraintComponent: sh('NodeKindConstraintComponent'),
    PatternConstraintComponent: sh('PatternConstraintComponent'),
    MinLengthConstraintComponent: sh('MinLengthConstraintComponent'),
    MaxLengthConstraintComponent: sh('MaxLengthConstraintComponent'),
    LanguageInConstraintComponent: sh('LanguageInConstraintComponent'),
    InConstraintComponent: sh('InConstraintComponent'),
    HasValueConstraintComponent: sh('HasValueConstraintComponent'),
    MinInclusiveConstraintComponent: sh('MinInclusiveConstraintComponent'),
    MaxInclusiveConstraintComponent: sh('MaxInclusiveConstraintComponent'),
    MinExclusiveConstraintComponent: sh('MinExclusiveConstraintComponent'),
    MaxExclusiveConstraintComponent: sh('MaxExclusiveConstraintComponent'),
    QualifiedMinCountConstraintComponent: sh('QualifiedMinCountConstraintComponent'),
    AndConstraintComponent: sh('AndConstraintComponent'),
    OrConstraintComponent: sh('OrConstraintComponent'),
    XoneConstraintComponent: sh('XoneConstraintComponent'),
    NotConstraintComponent: sh('NotConstraintComponent'),
    SPARQLConstraintComponent: sh('SPARQLConstraintComponent'),
    // report vocabulary
    ValidationReport: sh('ValidationReport'),
    ValidationResult: sh('ValidationResult'),
    conforms: sh('conforms'),
    result: sh('result'),
    focusNode: sh('focusNode'),
    resultPath: sh('resultPath'),
    value: sh('value'),
    resultMessage: sh('resultMessage'),
    resultSeverity: sh('resultSeverity'),
    sourceShape: sh('sourceShape'),
    sourceConstraintComponent: sh('sourceConstraintComponent'),
    Violation: sh('Violation'),
    Warning: sh('Warning'),
    Info: sh('Info'),
} as const;

/**
 * Prefixes used when writing reports
 */
export const REPORT_PREFIXES: Record<string, string> = {
    sh: SH_NS,
    rdf: RDF_NS,
    xsd: XSD_NS,
};
