// src/shacl/reportParser.ts
import { GraphParseError, ReportParseError } from '../errors';
import { Graph } from '../rdf/graph';
import { isIri, isLiteral, isSubjectTerm, SubjectTerm, Term, termToString } from '../rdf/terms';
import { RDF, SH, XSD } from '../rdf/vocabulary';
import { createChildLogger } from '../utils/logger';
import { ValidationReport } from './model/validationReport';
import { createValidationResult, Severity, ValidationResult } from './model/validationResult';

const log = createChildLogger({ component: 'report-parser' });

export type ParseReportResult =
    | { ok: true; report: ValidationReport }
    | { ok: false; error: ReportParseError };

const SEVERITIES: ReadonlyMap<string, Severity> = new Map<string, Severity>([
    [SH.Violation.value, 'Violation'],
    [SH.Warning.value, 'Warning'],
    [SH.Info.value, 'Info'],
]);

function failure(code: ReportParseError['code'], message: string): ParseReportResult {
    return { ok: false, error: new ReportParseError(code, message) };
}

/**
 * Read an sh:conforms value: an xsd:boolean literal, or the plain strings "true" / "false"
 */
function readConforms(term: Term): boolean | undefined {
    if (!isLiteral(term)) {
        return undefined;
    }
    if (term.value === 'true') {
        return true;
    }
    if (term.value === 'false') {
        return false;
    }
    if (term.datatype.equals(XSD.boolean)) {
        if (term.value === '1') {
            return true;
        }
        if (term.value === '0') {
            return false;
        }
    }
    return undefined;
}

/**
 * Unknown or missing severities are read as Violation
 */
function readSeverity(term: Term | undefined): Severity {
    return (term && SEVERITIES.get(term.value)) || 'Violation';
}

function readResult(graph: Graph, node: SubjectTerm): ValidationResult | undefined {
    const focusNode = graph.object(node, SH.focusNode);
    if (focusNode === undefined) {
        log.warn({ result: termToString(node) }, 'Validation result without sh:focusNode skipped');
        return undefined;
    }

    const resultPath = graph.object(node, SH.resultPath);
    const message = graph.objects(node, SH.resultMessage).find(isLiteral);
    const sourceShape = graph.object(node, SH.sourceShape);
    const component = graph.object(node, SH.sourceConstraintComponent);

    return createValidationResult({
        focusNode,
        resultPath: isIri(resultPath) ? resultPath : undefined,
        value: graph.object(node, SH.value),
        message: message?.value ?? '',
        severity: readSeverity(graph.object(node, SH.resultSeverity)),
        sourceShape: isSubjectTerm(sourceShape) ? sourceShape : undefined,
        constraintComponent: isIri(component) ? component : undefined,
    });
}

/**
 * Parse a Turtle validation report. Malformed input is returned as an error, never thrown.
 */
export function parseReport(text: string): ParseReportResult {
    let graph: Graph;
    try {
        graph = Graph.fromTurtle(text, { blankNodePrefix: '' });
    } catch (e: unknown) {
        if (e instanceof GraphParseError) {
            return failure('turtle_parse_error', e.message);
        }
        throw e;
    }

    const reportNode = graph.subjects(SH.conforms)[0];
    if (reportNode === undefined) {
        if (graph.subjects(RDF.type, SH.ValidationReport).length > 0) {
            return failure('missing_conforms_value', 'Validation report has no sh:conforms value');
        }
        return failure('no_validation_report_found', 'No subject with sh:conforms found');
    }

    const conformsTerm = graph.object(reportNode, SH.conforms);
    const conforms = conformsTerm === undefined ? undefined : readConforms(conformsTerm);
    if (conforms === undefined) {
        return failure('invalid_conforms_value', `Invalid sh:conforms value ${termToString(conformsTerm)}`);
    }

    const results: ValidationResult[] = [];
    for (const node of graph.objects(reportNode, SH.result)) {
        if (!isSubjectTerm(node)) {
            continue;
        }
        const result = readResult(graph, node);
        if (result) {
            results.push(result);
        }
    }

    const violations = results.filter(r => r.severity === 'Violation');
    const warnings = results.filter(r => r.severity === 'Warning');
    const info = results.filter(r => r.severity === 'Info');
    return { ok: true, report: new ValidationReport(conforms, violations, warnings, info) };
}
