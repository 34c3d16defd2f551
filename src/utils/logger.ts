/**
 * Structured Logging with Pino
 * Written to stderr so command output on stdout stays readable
 */

import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

const loggerOptions = {
    level: config.logging.level,
};

let logger: Logger;

if (config.logging.pretty) {
    logger = pino({
        ...loggerOptions,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2,
            },
        },
    });
} else {
    logger = pino(loggerOptions, pino.destination(2));
}

export { logger };
export type { Logger };

/**
 * Create a child logger scoped to one component
 */
export function createComponentLogger(component: string, parent: Logger = logger): Logger {
    return parent.child({ component });
}
