/**
 * Sentry Error Tracking Integration
 *
 * Reporting is enabled only when SENTRY_DSN is configured; without it,
 * capture calls are no-ops.
 */

import * as Sentry from '@sentry/node';
import { serviceLogger } from './logger.js';

export interface ErrorContext {
    inspectionId?: string;
    endpoint?: string;
    requestId?: string;
    extra?: Record<string, unknown>;
}

let enabled = false;

export function initErrorTracking(dsn: string | undefined, environment: string): boolean {
    if (!dsn) {
        serviceLogger.info('Sentry DSN not configured - error tracking disabled');
        return false;
    }

    Sentry.init({
        dsn,
        environment,
        release: process.env.npm_package_version,
        tracesSampleRate: 0,
    });
    enabled = true;
    serviceLogger.info({ environment }, 'Sentry initialized');
    return true;
}

export function captureError(error: unknown, context: ErrorContext = {}): void {
    if (!enabled) return;

    try {
        Sentry.captureException(error, {
            tags: {
                ...(context.endpoint ? { endpoint: context.endpoint } : {}),
                ...(context.inspectionId ? { inspectionId: context.inspectionId } : {}),
            },
            extra: {
                requestId: context.requestId,
                ...context.extra,
            },
        });
    } catch (reportError) {
        serviceLogger.warn({ err: reportError }, 'Sentry capture failed');
    }
}
