// src/shacl/model/validationReport.ts
import { serializeTerm, SerializedTerm } from '../../rdf/terms';
import type { Severity, ValidationResult } from './validationResult';

export interface SerializedValidationResult {
    message: string;
    severity: Severity;
    focusNode: SerializedTerm;
    resultPath?: SerializedTerm;
    value?: SerializedTerm;
    sourceShape?: SerializedTerm;
    constraintComponent?: SerializedTerm;
}

export interface SerializedValidationReport {
    conforms: boolean;
    issueCount: number;
    results: SerializedValidationResult[];
}

/**
 * Outcome of one validation run, results bucketed by severity
 */
export class ValidationReport {
    public readonly violations: readonly ValidationResult[];
    public readonly warnings: readonly ValidationResult[];
    public readonly info: readonly ValidationResult[];

    constructor(
        public readonly conforms: boolean,
        violations: readonly ValidationResult[] = [],
        warnings: readonly ValidationResult[] = [],
        info: readonly ValidationResult[] = []
    ) {
        this.violations = Object.freeze([...violations]);
        this.warnings = Object.freeze([...warnings]);
        this.info = Object.freeze([...info]);
        Object.freeze(this);
    }

    /**
     * Partition results by severity; the report conforms when no result is a Violation.
     */
    public static fromResults(results: readonly ValidationResult[]): ValidationReport {
        const violations = results.filter(r => r.severity === 'Violation');
        const warnings = results.filter(r => r.severity === 'Warning');
        const info = results.filter(r => r.severity === 'Info');
        return new ValidationReport(violations.length === 0, violations, warnings, info);
    }

    public get issueCount(): number {
        return this.violations.length + this.warnings.length + this.info.length;
    }

    public hasViolations(): boolean {
        return this.violations.length > 0;
    }

    public get results(): ValidationResult[] {
        return [...this.violations, ...this.warnings, ...this.info];
    }

    public toJSON(): SerializedValidationReport {
        return {
            conforms: this.conforms,
            issueCount: this.issueCount,
            results: this.results.map(res => ({
                message: res.message,
                severity: res.severity,
                focusNode: serializeTerm(res.focusNode),
                resultPath: serializeTerm(res.resultPath),
                value: serializeTerm(res.value),
                sourceShape: serializeTerm(res.sourceShape),
                constraintComponent: serializeTerm(res.constraintComponent),
            })),
        };
    }
}
