// src/shacl/reportWriter.ts
import type { BlankNode } from '@rdfjs/types';
import { Writer as N3Writer, DataFactory } from 'n3';
import { blankNode, literal, Term, Triple } from '../rdf/terms';
import { RDF, REPORT_PREFIXES, SH, XSD } from '../rdf/vocabulary';
import type { ValidationReport } from './model/validationReport';
import type { Severity } from './model/validationResult';

const SEVERITY_IRIS = {
    Violation: SH.Violation,
    Warning: SH.Warning,
    Info: SH.Info,
} as const satisfies Record<Severity, Term>;

/**
 * Blank node labels for the report structure that no blank node inside the results uses
 */
function labelAllocator(report: ValidationReport): (base: string) => BlankNode {
    const taken = new Set<string>();
    for (const result of report.results) {
        for (const term of [result.focusNode, result.value, result.sourceShape]) {
            if (term?.termType === 'BlankNode') {
                taken.add(term.value);
            }
        }
    }
    return (base) => {
        let label = base;
        for (let n = 1; taken.has(label); n++) {
            label = `${base}_${n}`;
        }
        taken.add(label);
        return blankNode(label);
    };
}

/**
 * Triples of the W3C validation report vocabulary for a report. The report and each result are blank nodes
 * whose labels differ from every blank node the results mention.
 */
export function reportToTriples(report: ValidationReport): Triple[] {
    const freshNode = labelAllocator(report);
    const reportNode = freshNode('report');
    const triples: Triple[] = [
        { subject: reportNode, predicate: RDF.type, object: SH.ValidationReport },
        { subject: reportNode, predicate: SH.conforms, object: literal(String(report.conforms), XSD.boolean) },
    ];

    report.results.forEach((result, index) => {
        const resultNode = freshNode(`result${index}`);
        const add = (predicate: Triple['predicate'], object: Term | undefined): void => {
            if (object !== undefined) {
                triples.push({ subject: resultNode, predicate, object });
            }
        };

        triples.push({ subject: reportNode, predicate: SH.result, object: resultNode });
        add(RDF.type, SH.ValidationResult);
        add(SH.focusNode, result.focusNode);
        add(SH.resultSeverity, SEVERITY_IRIS[result.severity]);
        add(SH.resultPath, result.resultPath);
        add(SH.value, result.value);
        add(SH.resultMessage, result.message !== '' ? literal(result.message) : undefined);
        add(SH.sourceShape, result.sourceShape);
        add(SH.sourceConstraintComponent, result.constraintComponent);
    });

    return triples;
}

/**
 * Serialize a report to Turtle. parseReport reads this output back.
 */
export function writeReport(report: ValidationReport): Promise<string> {
    const writer = new N3Writer({ prefixes: REPORT_PREFIXES });
    for (const triple of reportToTriples(report)) {
        writer.addQuad(DataFactory.quad(triple.subject, triple.predicate, triple.object));
    }
    return new Promise((resolve, reject) => {
        writer.end((error: Error | null, result: string) => {
            if (error) {
                reject(error);
            } else {
                resolve(result);
            }
        });
    });
}
