// src/shacl/model/validationResult.ts
import type { Iri, SubjectTerm, Term } from '../../rdf/terms';

export type Severity = 'Violation' | 'Warning' | 'Info';

export type DetailValue = Term | string | number | boolean | readonly Term[] | readonly string[];

export type ValidationDetails = Readonly<Record<string, DetailValue>>;

/**
 * One detected non-conformance. Violations, warnings and info differ only by severity.
 */
export interface ValidationResult {
    readonly focusNode: Term;
    readonly resultPath?: Iri;
    readonly value?: Term;
    readonly message: string;
    readonly severity: Severity;
    readonly sourceShape?: SubjectTerm;
    readonly constraintComponent?: Iri;
    readonly details: ValidationDetails;
}

export function createValidationResult(fields: Omit<ValidationResult, 'details'> & { details?: ValidationDetails }): ValidationResult {
    const result: ValidationResult = {
        ...fields,
        details: Object.freeze({ ...(fields.details ?? {}) }),
    };
    return Object.freeze(result);
}
