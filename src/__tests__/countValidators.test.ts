import { describe, expect, it } from 'vitest';
import { SH } from '../rdf/vocabulary';
import type { PropertyShape } from '../shacl/model/propertyShape';
import * as cardinality from '../shacl/validators/cardinality';
import * as qualified from '../shacl/validators/qualified';
import { ex, turtle } from './fixtures';

describe('qualified validator', () => {
    const shape: PropertyShape = {
        id: ex('CallbackShape'),
        path: ex('hasCallback'),
        qualifiedClass: ex('Function'),
        qualifiedMinCount: 2,
    };

    it('is inactive unless both qualified parameters are set', () => {
        const graph = turtle('ex:server ex:hasCallback ex:other .');
        expect(qualified.validate(graph, ex('server'), { id: ex('S'), path: ex('hasCallback') })).toEqual([]);
        expect(qualified.validate(graph, ex('server'), { ...shape, qualifiedClass: undefined })).toEqual([]);
        expect(qualified.validate(graph, ex('server'), { ...shape, qualifiedMinCount: undefined })).toEqual([]);
    });

    it('reports too few qualified values', () => {
        const graph = turtle(`
            ex:server ex:hasCallback ex:f1, ex:other .
            ex:f1 a ex:Function .
        `);
        const results = qualified.validate(graph, ex('server'), shape);
        expect(results).toHaveLength(1);
        expect(results[0].details).toEqual({
            qualifiedClass: ex('Function'),
            qualifiedMinCount: 2,
            actualQualifiedCount: 1,
            totalValues: 2,
        });
        expect(results[0].constraintComponent?.equals(SH.QualifiedMinCountConstraintComponent)).toBe(true);
    });

    it('conforms when enough values qualify', () => {
        const graph = turtle(`
            ex:server ex:hasCallback ex:f1, ex:f2 .
            ex:f1 a ex:Function .
            ex:f2 a ex:Function .
        `);
        expect(qualified.validate(graph, ex('server'), shape)).toEqual([]);
    });

    it('is disabled when either field is missing', () => {
        const graph = turtle('ex:server ex:other ex:x .');
        expect(qualified.validate(graph, ex('server'), { ...shape, qualifiedClass: undefined })).toEqual([]);
        expect(qualified.validate(graph, ex('server'), { ...shape, qualifiedMinCount: undefined })).toEqual([]);
    });
});

describe('cardinality validator', () => {
    const graph = turtle(`
        ex:m1 ex:name "a" .
        ex:m2 ex:name "a", "b", "c" .
    `);

    it('reports too few values', () => {
        const shape: PropertyShape = { id: ex('S'), path: ex('name'), minCount: 1 };
        const results = cardinality.validate(graph, ex('nobody'), shape);
        expect(results).toHaveLength(1);
        expect(results[0].details).toEqual({ minCount: 1, actualCount: 0 });
        expect(cardinality.validate(graph, ex('m1'), shape)).toEqual([]);
    });

    it('reports too many values', () => {
        const shape: PropertyShape = { id: ex('S'), path: ex('name'), maxCount: 2 };
        const results = cardinality.validate(graph, ex('m2'), shape);
        expect(results).toHaveLength(1);
        expect(results[0].message).toBe('Property has too many values (expected at most 2, found 3)');
        expect(results[0].constraintComponent?.equals(SH.MaxCountConstraintComponent)).toBe(true);
    });
});
