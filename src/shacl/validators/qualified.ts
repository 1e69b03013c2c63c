// src/shacl/validators/qualified.ts
import type { Graph } from '../../rdf/graph';
import type { Term } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import type { PropertyShape } from '../model/propertyShape';
import type { ValidationResult } from '../model/validationResult';
import { buildViolation, describeTerm, getPropertyValues, isInstanceOf } from './helpers';

/**
 * sh:qualifiedValueShape with an sh:class and sh:qualifiedMinCount: at least that many values
 * must be instances of the class. Without both fields the check is off.
 */
export function validate(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const { qualifiedClass, qualifiedMinCount } = shape;
    if (!qualifiedClass || qualifiedMinCount === undefined) {
        return [];
    }

    const values = getPropertyValues(graph, focusNode, shape.path);
    const qualifiedCount = values.filter(value => isInstanceOf(graph, value, qualifiedClass)).length;
    if (qualifiedCount >= qualifiedMinCount) {
        return [];
    }

    return [
        buildViolation(focusNode, shape,
            `Property has too few values of required type (expected at least ${qualifiedMinCount} instances of ${describeTerm(qualifiedClass)}, found ${qualifiedCount})`, {
                constraintComponent: SH.QualifiedMinCountConstraintComponent,
                qualifiedClass,
                qualifiedMinCount,
                actualQualifiedCount: qualifiedCount,
                totalValues: values.length,
            }),
    ];
}
