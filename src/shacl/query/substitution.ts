// src/shacl/query/substitution.ts
import type { Term } from '../../rdf/terms';

const THIS_TOKEN = /\$this\b/g;
const SELECT_PROJECTION = /\bSELECT\b(\s+(?:DISTINCT|REDUCED)\b)?([^{]*?)(?=\bWHERE\b|\{)/gi;
const FIRST_WHERE = /WHERE\s*\{/i;

/**
 * SPARQL surface form of a term: `<iri>`, `_:label` or a quoted literal
 */
export function sparqlTerm(term: Term): string {
    switch (term.termType) {
        case 'NamedNode':
            return `<${term.value}>`;
        case 'BlankNode':
            return `_:${term.value}`;
        case 'Literal': {
            const lexical = JSON.stringify(term.value);
            if (term.language) {
                return `${lexical}@${term.language}`;
            }
            return `${lexical}^^<${term.datatype.value}>`;
        }
    }
}

export function prefixDeclarations(prefixes: Readonly<Record<string, string>> | undefined): string {
    if (!prefixes) {
        return '';
    }
    return Object.entries(prefixes)
        .map(([prefix, namespace]) => `PREFIX ${prefix}: <${namespace}>\n`)
        .join('');
}

function projectsThis(query: string): boolean {
    for (const match of query.matchAll(SELECT_PROJECTION)) {
        if (/\?this\b/.test(match[2])) {
            return true;
        }
    }
    return false;
}

/**
 * Replace `$this` in a SELECT query with the focus node.
 *
 * For IRIs and literals, `$this` in a projection becomes `?this`, every other `$this` becomes the
 * constant, and `?this` is bound to the constant right after the first `WHERE {`.
 * Blank node labels are substituted as-is with no binding, so `SELECT $this` is not supported there.
 * Substitution is textual: `$this` inside a string literal or comment is replaced too.
 */
export function substituteThis(
    query: string,
    focusNode: Term,
    prefixes?: Readonly<Record<string, string>>
): string {
    const constant = sparqlTerm(focusNode);
    let substituted: string;

    if (focusNode.termType === 'BlankNode') {
        substituted = query.replace(THIS_TOKEN, () => constant);
    } else {
        substituted = query
            .replace(SELECT_PROJECTION, (match: string) => match.replace(THIS_TOKEN, '?this'))
            .replace(THIS_TOKEN, () => constant);
        if (projectsThis(substituted)) {
            substituted = substituted.replace(FIRST_WHERE, () => `WHERE { BIND(${constant} AS ?this) . `);
        }
    }

    return prefixDeclarations(prefixes) + substituted;
}
