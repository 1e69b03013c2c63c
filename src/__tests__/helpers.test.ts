import { describe, expect, it } from 'vitest';
import { blankNode, literal } from '../rdf/terms';
import { SH, XSD } from '../rdf/vocabulary';
import type { PropertyShape } from '../shacl/model/propertyShape';
import {
    buildViolation,
    compareNumeric,
    extractNumber,
    extractString,
    getPropertyValues,
    isDatatype,
    isInstanceOf,
    isNodeKind,
    stringLength,
} from '../shacl/validators/helpers';
import { ex, turtle } from './fixtures';

describe('constraint helpers', () => {
    const graph = turtle(`
        ex:f1 a ex:Function ;
            ex:name "run" ;
            ex:arity 2 .
    `);

    it('returns every value of a property', () => {
        expect(getPropertyValues(graph, ex('f1'), ex('name')).map(term => term.value)).toEqual(['run']);
        expect(getPropertyValues(graph, ex('f1'), ex('missing'))).toEqual([]);
    });

    it('checks class membership by direct rdf:type only', () => {
        expect(isInstanceOf(graph, ex('f1'), ex('Function'))).toBe(true);
        expect(isInstanceOf(graph, ex('f1'), ex('Module'))).toBe(false);
        expect(isInstanceOf(graph, literal('f1'), ex('Function'))).toBe(false);
    });

    it('compares literal datatypes', () => {
        expect(isDatatype(literal('2', XSD.integer), XSD.integer)).toBe(true);
        expect(isDatatype(literal('2'), XSD.integer)).toBe(false);
        expect(isDatatype(ex('f1'), XSD.integer)).toBe(false);
    });

    it('matches node kinds against the term variant', () => {
        expect(isNodeKind(ex('f1'), 'IRI')).toBe(true);
        expect(isNodeKind(ex('f1'), 'BlankNodeOrLiteral')).toBe(false);
        expect(isNodeKind(blankNode('b'), 'BlankNodeOrIRI')).toBe(true);
        expect(isNodeKind(literal('x'), 'IRIOrLiteral')).toBe(true);
        expect(isNodeKind(literal('x'), 'BlankNode')).toBe(false);
    });

    it('extracts strings from literals only', () => {
        expect(extractString(literal('hello', 'en'))).toBe('hello');
        expect(extractString(ex('f1'))).toBeUndefined();
    });

    it('extracts numbers from numeric literals only', () => {
        expect(extractNumber(literal('42', XSD.integer))).toBe(42);
        expect(extractNumber(literal('-3.5', XSD.decimal))).toBe(-3.5);
        expect(extractNumber(literal('abc', XSD.integer))).toBeUndefined();
        expect(extractNumber(literal('42'))).toBeUndefined();
        expect(extractNumber(ex('f1'))).toBeUndefined();
    });

    it('rejects lexical forms the numeric datatype does not allow', () => {
        expect(extractNumber(literal('0x10', XSD.integer))).toBeUndefined();
        expect(extractNumber(literal('1e3', XSD.integer))).toBeUndefined();
        expect(extractNumber(literal('1.5', XSD.integer))).toBeUndefined();
        expect(extractNumber(literal('1e3', XSD.decimal))).toBeUndefined();
        expect(extractNumber(literal('NaN', XSD.double))).toBeUndefined();
        expect(extractNumber(literal('1e3', XSD.double))).toBe(1000);
        expect(extractNumber(literal('.5', XSD.decimal))).toBe(0.5);
        expect(extractNumber(literal('+7', XSD.int))).toBe(7);
    });

    it('reads INF and -INF as infinities', () => {
        expect(extractNumber(literal('INF', XSD.double))).toBe(Infinity);
        expect(extractNumber(literal('-INF', XSD.float))).toBe(-Infinity);
        expect(extractNumber(literal('INF', XSD.decimal))).toBeUndefined();
    });

    it('compares integers exactly beyond the double range', () => {
        const big = literal('9007199254740993', XSD.integer);
        expect(compareNumeric(big, literal('9007199254740992', XSD.integer))).toBe(1);
        expect(compareNumeric(big, literal('9007199254740993', XSD.long))).toBe(0);
        expect(compareNumeric(literal('5', XSD.integer), 7)).toBe(-1);
        expect(compareNumeric(literal('2.5', XSD.decimal), 2)).toBe(1);
        expect(compareNumeric(literal('abc'), 2)).toBeUndefined();
    });

    it('counts code points', () => {
        expect(stringLength('abc')).toBe(3);
        expect(stringLength('a\u{1F600}')).toBe(2);
    });

    it('builds a violation with path, shape and lifted details', () => {
        const shape: PropertyShape = { id: ex('NameShape'), path: ex('name') };
        const result = buildViolation(ex('f1'), shape, 'default message', {
            constraintComponent: SH.PatternConstraintComponent,
            value: literal('run'),
            actualValue: 'run',
        });
        expect(result.severity).toBe('Violation');
        expect(result.message).toBe('default message');
        expect(result.resultPath?.equals(ex('name'))).toBe(true);
        expect(result.sourceShape?.equals(ex('NameShape'))).toBe(true);
        expect(result.constraintComponent?.equals(SH.PatternConstraintComponent)).toBe(true);
        expect(result.value?.equals(literal('run'))).toBe(true);
        expect(result.details).toEqual({ actualValue: 'run' });
        expect(Object.isFrozen(result)).toBe(true);
    });

    it('prefers the shape message over the default', () => {
        const shape: PropertyShape = { id: ex('NameShape'), path: ex('name'), message: 'Name is invalid' };
        expect(buildViolation(ex('f1'), shape, 'default message', {}).message).toBe('Name is invalid');
    });
});
