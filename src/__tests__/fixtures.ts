// src/__tests__/fixtures.ts
import { Graph } from '../rdf/graph';
import { Iri, namedNode } from '../rdf/terms';

export const EX = 'http://example.org/';

export const ex = (name: string): Iri => namedNode(EX + name);

export const PREFIXES = `
@prefix ex: <${EX}> .
@prefix sh: <http://www.w3.org/ns/shacl#> .
@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .
`;

/**
 * Parse Turtle with the common prefixes already declared
 */
export function turtle(body: string): Graph {
    return Graph.fromTurtle(PREFIXES + body);
}
