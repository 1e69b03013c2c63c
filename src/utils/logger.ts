// src/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create the root logger. Level comes from LOG_LEVEL.
 */
function createLogger(): Logger {
    const level = process.env.LOG_LEVEL || 'info';
    return pino({
        level,
        base: {
            service: 'shape-graph-validator',
        },
        formatters: {
            level: (label) => {
                return { level: label };
            },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
    return logger.child(additionalContext);
}
