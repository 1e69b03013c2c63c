// src/shacl/model/sparqlConstraint.ts
import type { SubjectTerm } from '../../rdf/terms';

/**
 * A SELECT query over the data graph (sh:sparql). `$this` in the query stands for the focus node;
 * every row the query returns is one violation.
 */
export interface SparqlConstraint {
    sourceShape: SubjectTerm;
    message: string;
    select: string;
    /** prefix -> namespace, prepended to the query as PREFIX declarations */
    prefixes?: Readonly<Record<string, string>>;
}
