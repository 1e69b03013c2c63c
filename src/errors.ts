// src/errors.ts

/**
 * Thrown when Turtle input cannot be parsed into a graph
 */
export class GraphParseError extends Error {
    constructor(
        message: string,
        public readonly line?: number
    ) {
        super(line !== undefined ? `${message} (line ${line})` : message);
        this.name = 'GraphParseError';
    }
}

/**
 * Thrown when a shapes graph contains a shape that cannot be read
 */
export class ShapeParseError extends Error {
    constructor(
        public readonly shapeId: string,
        public readonly reason: string
    ) {
        super(`Invalid shape ${shapeId}: ${reason}`);
        this.name = 'ShapeParseError';
    }
}

export type ReportParseErrorCode =
    | 'turtle_parse_error'
    | 'no_validation_report_found'
    | 'missing_conforms_value'
    | 'invalid_conforms_value';

/**
 * Returned (not thrown) by the report parser when the input is not a usable report
 */
export class ReportParseError extends Error {
    constructor(
        public readonly code: ReportParseErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'ReportParseError';
    }
}

export class QueryExecutionError extends Error {
    constructor(
        message: string,
        public readonly query: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'QueryExecutionError';
    }
}

/**
 * Thrown when a query does not complete within the caller's timeout
 */
export class QueryTimeoutError extends QueryExecutionError {
    constructor(
        query: string,
        public readonly timeoutMs: number,
        public readonly elapsedMs: number
    ) {
        super(`Query exceeded timeout of ${timeoutMs}ms (took ${elapsedMs}ms)`, query);
        this.name = 'QueryTimeoutError';
    }
}

export class InvalidOptionsError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid validation options: ${issues.join('; ')}`);
        this.name = 'InvalidOptionsError';
    }
}

/**
 * Best-effort message extraction for values caught in a catch clause
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
