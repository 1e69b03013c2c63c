import { describe, expect, it } from 'vitest';
import { ShapeParseError } from '../errors';
import { literal, termToString } from '../rdf/terms';
import { XSD } from '../rdf/vocabulary';
import { compilePattern, parseShapesGraph, readShapes } from '../shacl/shapesReader';
import { ex, PREFIXES } from './fixtures';

describe('shapes reader', () => {
    const shapesText = PREFIXES + `
        ex:FunctionShape a sh:NodeShape ;
            sh:targetClass ex:Function ;
            sh:message "Function is malformed" ;
            sh:property [
                sh:path ex:name ;
                sh:minCount 1 ;
                sh:maxCount 1 ;
                sh:datatype xsd:string ;
                sh:pattern "^[a-z_]+$" ;
                sh:flags "i" ;
                sh:minLength 1 ;
                sh:maxLength 64 ;
                sh:message "Bad name"
            ] ;
            sh:property [
                sh:path ex:visibility ;
                sh:in ( ex:public ex:private ) ;
                sh:nodeKind sh:IRI
            ] ;
            sh:property [
                sh:path ex:arity ;
                sh:minInclusive 0 ;
                sh:maxExclusive 256
            ] ;
            sh:property [
                sh:path ex:hasClause ;
                sh:qualifiedValueShape [ sh:class ex:Clause ] ;
                sh:qualifiedMinCount 1 ;
                sh:hasValue ex:defaultClause
            ] ;
            sh:sparql [
                sh:message "End before start" ;
                sh:prefixes ex:Prefixes ;
                sh:select "SELECT $this WHERE { $this ex:endLine ?e }"
            ] .

        ex:Prefixes sh:declare [ sh:prefix "ex" ; sh:namespace "http://example.org/"^^xsd:anyURI ] .

        ex:LabelShape sh:targetSubjectsOf ex:label ;
            sh:languageIn ( "en" "de" ) ;
            sh:or ( ex:ShortLabel [ sh:datatype rdf:langString ] ) ;
            sh:not ex:EmptyLabel .

        ex:ShortLabel sh:maxLength 10 .
        ex:EmptyLabel sh:hasValue "" .

        ex:Widget a rdfs:Class, sh:NodeShape ;
            sh:targetNode ex:w1 ;
            sh:targetObjectsOf ex:uses .
    `;

    it('reads declared node shapes in order', () => {
        const shapes = readShapes(shapesText);
        expect(shapes.map(shape => termToString(shape.id))).toEqual([
            '<http://example.org/FunctionShape>',
            '<http://example.org/Widget>',
            '<http://example.org/LabelShape>',
        ]);
    });

    it('reads targets and the shape message', () => {
        const [fn, widget, label] = readShapes(shapesText);
        expect(fn.message).toBe('Function is malformed');
        expect(fn.targetClasses).toEqual([ex('Function')]);
        expect(widget.implicitClassTarget).toEqual(ex('Widget'));
        expect(widget.targetNodes).toEqual([ex('w1')]);
        expect(widget.targetObjectsOf).toEqual([ex('uses')]);
        expect(label.targetSubjectsOf).toEqual([ex('label')]);
    });

    it('reads every property constraint', () => {
        const [fn] = readShapes(shapesText);
        const byPath = new Map(fn.propertyShapes.map(shape => [shape.path.value, shape]));

        const name = byPath.get('http://example.org/name');
        expect(name?.minCount).toBe(1);
        expect(name?.maxCount).toBe(1);
        expect(name?.datatype).toEqual(XSD.string);
        expect(name?.pattern?.source).toBe('^[a-z_]+$');
        expect(name?.pattern?.flags).toBe('i');
        expect(name?.minLength).toBe(1);
        expect(name?.maxLength).toBe(64);
        expect(name?.message).toBe('Bad name');

        const visibility = byPath.get('http://example.org/visibility');
        expect(visibility?.in).toEqual([ex('public'), ex('private')]);
        expect(visibility?.nodeKind).toBe('IRI');

        const arity = byPath.get('http://example.org/arity');
        expect(arity?.minInclusive).toEqual(literal('0', XSD.integer));
        expect(arity?.maxExclusive).toEqual(literal('256', XSD.integer));

        const clause = byPath.get('http://example.org/hasClause');
        expect(clause?.qualifiedClass).toEqual(ex('Clause'));
        expect(clause?.qualifiedMinCount).toBe(1);
        expect(clause?.hasValue).toEqual(ex('defaultClause'));
    });

    it('reads SPARQL constraints with declared prefixes', () => {
        const [fn] = readShapes(shapesText);
        expect(fn.sparqlConstraints).toEqual([{
            sourceShape: ex('FunctionShape'),
            message: 'End before start',
            select: 'SELECT $this WHERE { $this ex:endLine ?e }',
            prefixes: { ex: 'http://example.org/' },
        }]);
    });

    it('reads logical operators and adds referenced shapes to the shape map', () => {
        const { shapes, shapeMap } = parseShapesGraph(shapesText);
        const label = shapes[2];
        expect(label.languageIn).toEqual(['en', 'de']);
        expect(label.or).toHaveLength(2);
        expect(label.not).toEqual(ex('EmptyLabel'));
        expect(shapeMap.get('<http://example.org/ShortLabel>')?.maxLength).toBe(10);
        expect(shapeMap.get('<http://example.org/EmptyLabel>')?.hasValue).toEqual(literal(''));
        const anonymous = label.or?.[1];
        expect(anonymous && shapeMap.get(termToString(anonymous))?.datatype?.value)
            .toBe('http://www.w3.org/1999/02/22-rdf-syntax-ns#langString');
    });

    it('rejects a property shape without sh:path', () => {
        const text = PREFIXES + 'ex:S a sh:NodeShape ; sh:property [ sh:minCount 1 ] .';
        expect(() => readShapes(text)).toThrow(ShapeParseError);
    });

    it('rejects a SPARQL constraint without sh:select', () => {
        const text = PREFIXES + 'ex:S a sh:NodeShape ; sh:sparql [ sh:message "x" ] .';
        expect(() => readShapes(text)).toThrow('Missing required property: sh:select');
    });

    it('rejects a malformed list', () => {
        const text = PREFIXES + 'ex:S a sh:NodeShape ; sh:in ex:NotAList .';
        expect(() => readShapes(text)).toThrow(ShapeParseError);
    });

    it('rejects an invalid pattern', () => {
        const text = PREFIXES + 'ex:S a sh:NodeShape ; sh:pattern "([a-z" .';
        expect(() => readShapes(text)).toThrow(ShapeParseError);
    });

    it('compiles sh:flags', () => {
        expect(compilePattern('s', 'a.b', 'q').test('a.b')).toBe(true);
        expect(compilePattern('s', 'a.b', 'q').test('axb')).toBe(false);
        expect(compilePattern('s', '^abc$', 'im').flags).toBe('im');
        expect(() => compilePattern('s', 'a', 'x')).toThrow(ShapeParseError);
    });
});
