// src/config.ts
import { z } from 'zod';
import { InvalidOptionsError } from './errors';

const DEFAULT_QUERY_TIMEOUT_MS = 5000;

function envTimeout(): number {
    const raw = process.env.SHACL_QUERY_TIMEOUT_MS;
    if (!raw) {
        return DEFAULT_QUERY_TIMEOUT_MS;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_QUERY_TIMEOUT_MS;
}

const envQueryTimeoutMs = envTimeout();

export const validationOptionsSchema = z.object({
    /** Upper bound for a single SPARQL constraint query */
    queryTimeoutMs: z.number().int().positive().default(envQueryTimeoutMs),
    /** Validate shapes concurrently through a bounded pool */
    parallel: z.boolean().default(false),
    maxConcurrency: z.number().int().positive().default(4),
    /** Nesting limit for sh:and / sh:or / sh:xone / sh:not */
    maxRecursionDepth: z.number().int().nonnegative().default(50),
}).strict();

export type ValidationOptionsInput = z.input<typeof validationOptionsSchema>;
export type ValidationOptions = z.output<typeof validationOptionsSchema>;

/**
 * Fill defaults and check caller-supplied options. Throws InvalidOptionsError.
 */
export function resolveOptions(input: ValidationOptionsInput = {}): ValidationOptions {
    const parsed = validationOptionsSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            const where = issue.path.length > 0 ? issue.path.join('.') : 'options';
            return `${where}: ${issue.message}`;
        });
        throw new InvalidOptionsError(issues);
    }
    return parsed.data;
}
