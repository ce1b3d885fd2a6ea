/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { logger } from './utils/logger.js';
 *   logger.info({ inspectionId }, 'Image uploaded');
 *
 * Child loggers for subsystems:
 *   const log = createLogger('UploadService');
 *   log.warn({ attempt }, 'Retrying upload');
 */

import pino, { type Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function defaultLevel(): string {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

export const logger = pino({
    level: process.env.LOG_LEVEL || defaultLevel(),

    // Keep storage credentials and signed form fields out of log output
    redact: {
        paths: [
            'req.headers.authorization',
            'req.headers.cookie',
            'accessKeyId',
            'secretAccessKey',
            'credentials',
            'fields.Policy',
            'fields["X-Amz-Signature"]',
            'fields["X-Amz-Credential"]',
            'fields["X-Amz-Security-Token"]',
        ],
        censor: '[REDACTED]',
    },

    base: {
        service: 'bumper-inspection-gateway',
        env: nodeEnv,
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    transport: isDev
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname,service,env',
            },
        }
        : undefined,
});

export type { Logger };

export function createLogger(module: string): Logger {
    return logger.child({ module });
}

export const serviceLogger = createLogger('service');
export const httpLogger = createLogger('http');
export const storageLogger = createLogger('storage');
