// src/shacl/validators/value.ts
import type { Graph } from '../../rdf/graph';
import { Iri, Term, termListIncludes } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import type { NodeShape } from '../model/nodeShape';
import type { ConstraintParameters, NumericBound, PropertyShape } from '../model/propertyShape';
import type { ValidationResult } from '../model/validationResult';
import {
    buildNodeViolation,
    buildViolation,
    compareNumeric,
    describeTerm,
    extractNumber,
    getPropertyValues,
    unwrapBound,
    ViolationDetails,
} from './helpers';

type BoundName = 'minInclusive' | 'maxInclusive' | 'minExclusive' | 'maxExclusive';

interface BoundCheck {
    name: BoundName;
    component: Iri;
    /** whether the sign of (actual - bound) satisfies the bound */
    holds: (comparison: number) => boolean;
    describe: (bound: number, actual: number) => string;
}

const BOUND_CHECKS: readonly BoundCheck[] = [
    {
        name: 'minInclusive',
        component: SH.MinInclusiveConstraintComponent,
        holds: comparison => comparison >= 0,
        describe: (bound, actual) => `Value is below minimum (expected >= ${bound}, found ${actual})`,
    },
    {
        name: 'maxInclusive',
        component: SH.MaxInclusiveConstraintComponent,
        holds: comparison => comparison <= 0,
        describe: (bound, actual) => `Value exceeds maximum (expected <= ${bound}, found ${actual})`,
    },
    {
        name: 'minExclusive',
        component: SH.MinExclusiveConstraintComponent,
        holds: comparison => comparison > 0,
        describe: (bound, actual) => `Value is not above minimum (expected > ${bound}, found ${actual})`,
    },
    {
        name: 'maxExclusive',
        component: SH.MaxExclusiveConstraintComponent,
        holds: comparison => comparison < 0,
        describe: (bound, actual) => `Value is not below maximum (expected < ${bound}, found ${actual})`,
    },
];

type Emit = (defaultMessage: string, details: ViolationDetails) => void;

function checkIn(allowedValues: readonly Term[] | undefined, values: readonly Term[], emit: Emit): void {
    if (!allowedValues || allowedValues.length === 0) {
        return;
    }
    for (const value of values) {
        if (!termListIncludes(allowedValues, value)) {
            emit('Value is not one of the allowed values', {
                constraintComponent: SH.InConstraintComponent,
                value,
                allowedValues,
                actualValue: value,
            });
        }
    }
}

function checkHasValue(requiredValue: Term | undefined, values: readonly Term[], emit: Emit): void {
    if (!requiredValue || termListIncludes(values, requiredValue)) {
        return;
    }
    emit(`Required value ${describeTerm(requiredValue)} is missing`, {
        constraintComponent: SH.HasValueConstraintComponent,
        requiredValue,
    });
}

function checkBounds(params: ConstraintParameters, values: readonly Term[], emit: Emit): void {
    for (const check of BOUND_CHECKS) {
        const configured: NumericBound | undefined = params[check.name];
        if (configured === undefined) {
            continue;
        }
        const bound = unwrapBound(configured);
        if (bound === undefined) {
            continue;
        }
        for (const value of values) {
            const actual = extractNumber(value);
            const comparison = compareNumeric(value, configured);
            if (actual === undefined || comparison === undefined || check.holds(comparison)) {
                continue;
            }
            emit(check.describe(bound, actual), {
                constraintComponent: check.component,
                value,
                [check.name]: bound,
                actualValue: actual,
            });
        }
    }
}

/**
 * sh:in, sh:hasValue and the numeric range constraints on the values of the property.
 * sh:hasValue yields at most one result; non-numeric values are skipped by the range checks.
 */
export function validate(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const results: ValidationResult[] = [];
    const values = getPropertyValues(graph, focusNode, shape.path);
    const emit: Emit = (message, details) => {
        results.push(buildViolation(focusNode, shape, message, details));
    };

    checkIn(shape.in, values, emit);
    checkHasValue(shape.hasValue, values, emit);
    checkBounds(shape, values, emit);
    return results;
}

export function validateNode(_graph: Graph, focusNode: Term, shape: NodeShape): ValidationResult[] {
    const results: ValidationResult[] = [];
    const emit: Emit = (message, details) => {
        results.push(buildNodeViolation(focusNode, shape, message, details));
    };

    checkIn(shape.in, [focusNode], emit);
    checkHasValue(shape.hasValue, [focusNode], emit);
    checkBounds(shape, [focusNode], emit);
    return results;
}
