// src/shacl/validators/string.ts
import type { Graph } from '../../rdf/graph';
import { isLiteral, Term } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import type { NodeShape } from '../model/nodeShape';
import type { PropertyShape } from '../model/propertyShape';
import type { ValidationResult } from '../model/validationResult';
import {
    buildNodeViolation,
    buildViolation,
    extractString,
    getPropertyValues,
    stringLength,
    ViolationDetails,
} from './helpers';

// String.search ignores lastIndex, so a pattern compiled with the g flag stays stateless
function matches(pattern: RegExp, value: string): boolean {
    return value.search(pattern) !== -1;
}

/**
 * sh:pattern, sh:minLength and sh:maxLength on every literal value of the property; IRIs and
 * blank nodes are skipped. sh:languageIn also rejects non-literal values.
 */
export function validate(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const results: ValidationResult[] = [];
    const values = getPropertyValues(graph, focusNode, shape.path);

    if (shape.pattern) {
        const pattern = shape.pattern;
        for (const value of values) {
            const str = extractString(value);
            if (str === undefined || matches(pattern, str)) {
                continue;
            }
            results.push(buildViolation(focusNode, shape,
                `Value does not match required pattern "${pattern.source}"`, {
                    constraintComponent: SH.PatternConstraintComponent,
                    value,
                    pattern: pattern.source,
                    actualValue: str,
                }));
        }
    }

    if (shape.minLength !== undefined) {
        const minLength = shape.minLength;
        for (const value of values) {
            const str = extractString(value);
            if (str === undefined) {
                continue;
            }
            const actualLength = stringLength(str);
            if (actualLength < minLength) {
                results.push(buildViolation(focusNode, shape,
                    `Value is too short (expected at least ${minLength} characters, found ${actualLength})`, {
                        constraintComponent: SH.MinLengthConstraintComponent,
                        value,
                        minLength,
                        actualLength,
                        actualValue: str,
                    }));
            }
        }
    }

    if (shape.maxLength !== undefined) {
        const maxLength = shape.maxLength;
        for (const value of values) {
            const str = extractString(value);
            if (str === undefined) {
                continue;
            }
            const actualLength = stringLength(str);
            if (actualLength > maxLength) {
                results.push(buildViolation(focusNode, shape,
                    `Value is too long (expected at most ${maxLength} characters, found ${actualLength})`, {
                        constraintComponent: SH.MaxLengthConstraintComponent,
                        value,
                        maxLength,
                        actualLength,
                        actualValue: str,
                    }));
            }
        }
    }

    if (shape.languageIn && shape.languageIn.length > 0) {
        for (const value of values) {
            const problem = languageProblem(value, shape.languageIn, 'Value');
            if (problem) {
                results.push(buildViolation(focusNode, shape, problem.message, problem.details));
            }
        }
    }

    return results;
}

export function validateNode(_graph: Graph, focusNode: Term, shape: NodeShape): ValidationResult[] {
    const results: ValidationResult[] = [];
    const str = extractString(focusNode);

    if (shape.pattern && str !== undefined && !matches(shape.pattern, str)) {
        results.push(buildNodeViolation(focusNode, shape,
            `Focus node does not match required pattern "${shape.pattern.source}"`, {
                constraintComponent: SH.PatternConstraintComponent,
                value: focusNode,
                pattern: shape.pattern.source,
                actualValue: str,
            }));
    }

    if (shape.minLength !== undefined && str !== undefined) {
        const actualLength = stringLength(str);
        if (actualLength < shape.minLength) {
            results.push(buildNodeViolation(focusNode, shape,
                `Focus node is too short (expected at least ${shape.minLength} characters, found ${actualLength})`, {
                    constraintComponent: SH.MinLengthConstraintComponent,
                    value: focusNode,
                    minLength: shape.minLength,
                    actualLength,
                    actualValue: str,
                }));
        }
    }

    if (shape.maxLength !== undefined && str !== undefined) {
        const actualLength = stringLength(str);
        if (actualLength > shape.maxLength) {
            results.push(buildNodeViolation(focusNode, shape,
                `Focus node is too long (expected at most ${shape.maxLength} characters, found ${actualLength})`, {
                    constraintComponent: SH.MaxLengthConstraintComponent,
                    value: focusNode,
                    maxLength: shape.maxLength,
                    actualLength,
                    actualValue: str,
                }));
        }
    }

    if (shape.languageIn && shape.languageIn.length > 0) {
        const problem = languageProblem(focusNode, shape.languageIn, 'Focus node');
        if (problem) {
            results.push(buildNodeViolation(focusNode, shape, problem.message, problem.details));
        }
    }

    return results;
}

interface LanguageProblem {
    message: string;
    details: ViolationDetails;
}

/**
 * sh:languageIn: the term must be a literal whose language tag is in the allowed list
 */
function languageProblem(term: Term, allowedLanguages: readonly string[], subject: string): LanguageProblem | undefined {
    const details: ViolationDetails = {
        constraintComponent: SH.LanguageInConstraintComponent,
        value: term,
        allowedLanguages,
    };

    if (!isLiteral(term)) {
        return { message: `${subject} must be a literal with a language tag`, details };
    }
    const language = term.language;
    if (!language) {
        return { message: `${subject} must have a language tag`, details };
    }
    // language tags compare case-insensitively; the Turtle parser lowercases them
    const normalized = language.toLowerCase();
    if (allowedLanguages.some(tag => tag.toLowerCase() === normalized)) {
        return undefined;
    }
    return {
        message: `Language tag '${language}' is not in the allowed list`,
        details: { ...details, actualLanguage: language },
    };
}
