// src/shacl/validators/cardinality.ts
import type { Graph } from '../../rdf/graph';
import type { Term } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import type { PropertyShape } from '../model/propertyShape';
import type { ValidationResult } from '../model/validationResult';
import { buildViolation, getPropertyValues } from './helpers';

/**
 * sh:minCount and sh:maxCount on the number of values of the property
 */
export function validate(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    if (shape.minCount === undefined && shape.maxCount === undefined) {
        return [];
    }

    const results: ValidationResult[] = [];
    const count = getPropertyValues(graph, focusNode, shape.path).length;

    if (shape.minCount !== undefined && count < shape.minCount) {
        results.push(buildViolation(focusNode, shape,
            `Property has too few values (expected at least ${shape.minCount}, found ${count})`, {
                constraintComponent: SH.MinCountConstraintComponent,
                minCount: shape.minCount,
                actualCount: count,
            }));
    }

    if (shape.maxCount !== undefined && count > shape.maxCount) {
        results.push(buildViolation(focusNode, shape,
            `Property has too many values (expected at most ${shape.maxCount}, found ${count})`, {
                constraintComponent: SH.MaxCountConstraintComponent,
                maxCount: shape.maxCount,
                actualCount: count,
            }));
    }

    return results;
}
