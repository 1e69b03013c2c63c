import { describe, expect, it } from 'vitest';
import { blankNode, literal } from '../rdf/terms';
import { SH, XSD } from '../rdf/vocabulary';
import { ValidationReport } from '../shacl/model/validationReport';
import { createValidationResult } from '../shacl/model/validationResult';
import { parseReport } from '../shacl/reportParser';
import { reportToTriples, writeReport } from '../shacl/reportWriter';
import { ex, PREFIXES } from './fixtures';

const tooShort = createValidationResult({
    focusNode: ex('a'),
    resultPath: ex('name'),
    value: literal('x'),
    message: 'Too short',
    severity: 'Violation',
    sourceShape: ex('NameShape'),
    constraintComponent: SH.MinLengthConstraintComponent,
    details: { minLength: 3 },
});

const advisory = createValidationResult({
    focusNode: ex('b'),
    message: '',
    severity: 'Warning',
});

const note = createValidationResult({
    focusNode: literal('7', XSD.integer),
    message: 'Just so you know',
    severity: 'Info',
});

describe('validation report', () => {
    it('partitions results by severity', () => {
        const report = ValidationReport.fromResults([advisory, tooShort, note]);
        expect(report.conforms).toBe(false);
        expect(report.violations).toEqual([tooShort]);
        expect(report.warnings).toEqual([advisory]);
        expect(report.info).toEqual([note]);
        expect(report.issueCount).toBe(3);
        expect(report.hasViolations()).toBe(true);
        expect(report.results).toEqual([tooShort, advisory, note]);
    });

    it('conforms when only warnings and info remain', () => {
        const report = ValidationReport.fromResults([advisory, note]);
        expect(report.conforms).toBe(true);
        expect(report.hasViolations()).toBe(false);
    });

    it('is frozen', () => {
        const report = ValidationReport.fromResults([tooShort]);
        expect(Object.isFrozen(report)).toBe(true);
        expect(Object.isFrozen(report.violations)).toBe(true);
        expect(Object.isFrozen(tooShort)).toBe(true);
        expect(Object.isFrozen(tooShort.details)).toBe(true);
    });

    it('serializes to JSON', () => {
        const json = ValidationReport.fromResults([tooShort]).toJSON();
        expect(json.conforms).toBe(false);
        expect(json.issueCount).toBe(1);
        expect(json.results).toEqual([{
            message: 'Too short',
            severity: 'Violation',
            focusNode: { value: 'http://example.org/a', termType: 'NamedNode' },
            resultPath: { value: 'http://example.org/name', termType: 'NamedNode' },
            value: { value: 'x', termType: 'Literal', datatype: XSD.string.value },
            sourceShape: { value: 'http://example.org/NameShape', termType: 'NamedNode' },
            constraintComponent: { value: SH.MinLengthConstraintComponent.value, termType: 'NamedNode' },
        }]);
    });
});

describe('report writer', () => {
    it('emits the report node and one node per result', () => {
        const triples = reportToTriples(ValidationReport.fromResults([tooShort, advisory]));
        const conforms = triples.find(t => t.predicate.equals(SH.conforms));
        expect(conforms?.object).toEqual(literal('false', XSD.boolean));
        expect(triples.filter(t => t.predicate.equals(SH.result))).toHaveLength(2);
        // empty messages are not written
        expect(triples.filter(t => t.predicate.equals(SH.resultMessage))).toHaveLength(1);
    });

    it('writes a conforming report without results', async () => {
        const parsed = parseReport(await writeReport(ValidationReport.fromResults([])));
        expect(parsed.ok).toBe(true);
        if (parsed.ok) {
            expect(parsed.report.conforms).toBe(true);
            expect(parsed.report.issueCount).toBe(0);
        }
    });

    it('round-trips through the parser', async () => {
        const text = await writeReport(ValidationReport.fromResults([tooShort, advisory, note]));
        const parsed = parseReport(text);
        if (!parsed.ok) {
            throw parsed.error;
        }
        const { report } = parsed;
        expect(report.conforms).toBe(false);

        expect(report.violations).toHaveLength(1);
        const violation = report.violations[0];
        expect(violation.focusNode).toEqual(ex('a'));
        expect(violation.resultPath).toEqual(ex('name'));
        expect(violation.value).toEqual(literal('x'));
        expect(violation.message).toBe('Too short');
        expect(violation.sourceShape).toEqual(ex('NameShape'));
        expect(violation.constraintComponent).toEqual(SH.MinLengthConstraintComponent);

        expect(report.warnings).toHaveLength(1);
        expect(report.warnings[0].focusNode).toEqual(ex('b'));
        expect(report.warnings[0].message).toBe('');
        expect(report.warnings[0].resultPath).toBeUndefined();

        expect(report.info).toHaveLength(1);
        expect(report.info[0].focusNode).toEqual(literal('7', XSD.integer));
    });

    it('keeps blank node labels of the results apart from the report structure', async () => {
        const clash = createValidationResult({
            focusNode: blankNode('report'),
            value: blankNode('result0'),
            message: 'Clashing labels',
            severity: 'Violation',
        });
        const parsed = parseReport(await writeReport(ValidationReport.fromResults([clash])));
        if (!parsed.ok) {
            throw parsed.error;
        }
        expect(parsed.report.issueCount).toBe(1);
        const [violation] = parsed.report.violations;
        expect(violation.focusNode).toEqual(blankNode('report'));
        expect(violation.value).toEqual(blankNode('result0'));
        expect(violation.message).toBe('Clashing labels');
    });
});

describe('report parser', () => {
    it('reports unparseable Turtle', () => {
        const parsed = parseReport('ex:r ex:p ex:o .');
        expect(parsed.ok).toBe(false);
        if (!parsed.ok) {
            expect(parsed.error.code).toBe('turtle_parse_error');
        }
    });

    it.each([
        ['ex:a ex:b ex:c .', 'no_validation_report_found'],
        ['ex:r a sh:ValidationReport .', 'missing_conforms_value'],
        ['ex:r sh:conforms "maybe" .', 'invalid_conforms_value'],
        ['ex:r sh:conforms ex:yes .', 'invalid_conforms_value'],
    ])('rejects %s', (body, code) => {
        const parsed = parseReport(PREFIXES + body);
        expect(parsed.ok).toBe(false);
        if (!parsed.ok) {
            expect(parsed.error.code).toBe(code);
        }
    });

    it.each([
        ['true', true],
        ['false', false],
        ['"true"', true],
        ['"false"', false],
        ['"1"^^xsd:boolean', true],
        ['"0"^^xsd:boolean', false],
    ])('reads sh:conforms %s', (value, expected) => {
        const parsed = parseReport(PREFIXES + `ex:r sh:conforms ${value} .`);
        expect(parsed.ok && parsed.report.conforms).toBe(expected);
    });

    it('reads an unknown severity as a violation', () => {
        const parsed = parseReport(PREFIXES + `
            ex:r sh:conforms false ; sh:result ex:res .
            ex:res sh:focusNode ex:a ; sh:resultSeverity ex:Critical ; sh:resultMessage "Broken" .
        `);
        if (!parsed.ok) {
            throw parsed.error;
        }
        expect(parsed.report.violations).toHaveLength(1);
        expect(parsed.report.violations[0].severity).toBe('Violation');
        expect(parsed.report.violations[0].message).toBe('Broken');
    });

    it('skips results without a focus node', () => {
        const parsed = parseReport(PREFIXES + `
            ex:r sh:conforms false ; sh:result ex:res .
            ex:res sh:resultMessage "Nowhere" .
        `);
        if (!parsed.ok) {
            throw parsed.error;
        }
        expect(parsed.report.conforms).toBe(false);
        expect(parsed.report.issueCount).toBe(0);
    });
});
