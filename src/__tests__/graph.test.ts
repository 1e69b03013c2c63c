import { describe, expect, it } from 'vitest';
import { GraphParseError } from '../errors';
import { Graph } from '../rdf/graph';
import { literal, namedNode } from '../rdf/terms';
import { RDF, XSD } from '../rdf/vocabulary';
import { ex, turtle } from './fixtures';

describe('Graph', () => {
    const graph = turtle(`
        ex:alice a ex:Person ;
            ex:name "Alice" ;
            ex:age 30 ;
            ex:knows ex:bob, ex:carol .
        ex:bob a ex:Person .
    `);

    it('collects triples and prefixes from Turtle', () => {
        expect(graph.size).toBe(6);
        expect(graph.prefixes.ex).toBe('http://example.org/');
    });

    it('looks up objects by subject and predicate', () => {
        const knows = graph.objects(ex('alice'), ex('knows')).map(term => term.value).sort();
        expect(knows).toEqual(['http://example.org/bob', 'http://example.org/carol']);
        expect(graph.object(ex('alice'), ex('age'))?.equals(literal('30', XSD.integer))).toBe(true);
    });

    it('looks up subjects by predicate and object', () => {
        const people = graph.subjects(RDF.type, ex('Person')).map(term => term.value).sort();
        expect(people).toEqual(['http://example.org/alice', 'http://example.org/bob']);
    });

    it('returns nothing for a literal subject', () => {
        expect(graph.triplesWith(literal('Alice'))).toEqual([]);
    });

    it('collapses duplicate triples', () => {
        const triple = { subject: ex('a'), predicate: ex('p'), object: ex('b') };
        const dup = new Graph([triple, { ...triple }]);
        expect(dup.size).toBe(1);
        expect(dup.has(triple)).toBe(true);
        expect(dup.has({ ...triple, object: namedNode('http://example.org/c') })).toBe(false);
    });

    it('reports the line of a syntax error', () => {
        let caught: unknown;
        try {
            Graph.fromTurtle('\n\nex:a ex:b ex:c .');
        } catch (e: unknown) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(GraphParseError);
        expect(caught instanceof GraphParseError ? caught.line : undefined).toBe(3);
    });
});
