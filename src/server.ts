/**
 * HTTP server assembly.
 *
 * buildServer() wires routes, hooks and the error handler without listening,
 * so tests drive it through fastify.inject().
 */

import crypto from 'crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { InspectionSettings } from './config/env.js';
import { createFastifyErrorHandler } from './lib/errors/error-handler.js';
import healthRoutes from './routes/health.js';
import inspectionRoutes from './routes/inspections.js';
import { InspectionService } from './services/InspectionService.js';
import type { FetchLike } from './services/UploadService.js';
import type { ObjectStore } from './storage/ObjectStore.js';
import { httpLogger } from './utils/logger.js';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface ServerOptions {
    store: ObjectStore;
    settings: InspectionSettings;
    /** Empty list reflects any origin. */
    allowedOrigins?: string[];
    fetchImpl?: FetchLike;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
    const { store, settings, allowedOrigins = [], fetchImpl } = options;

    const fastify = Fastify({
        logger: false, // We use our own pino logger
        requestIdHeader: REQUEST_ID_HEADER,
        genReqId: () => crypto.randomUUID(),
    });

    // Set before any plugin so every encapsulated context inherits it
    fastify.setErrorHandler(createFastifyErrorHandler());

    await fastify.register(cors, {
        origin: allowedOrigins.length > 0 ? allowedOrigins : true,
        exposedHeaders: [REQUEST_ID_HEADER],
    });

    // REQUEST ID - echoed back for log correlation
    fastify.addHook('onSend', async (request, reply) => {
        reply.header(REQUEST_ID_HEADER, request.id);
    });

    fastify.addHook('onResponse', async (request, reply) => {
        httpLogger.info({
            requestId: request.id,
            method: request.method,
            url: request.url,
            statusCode: reply.statusCode,
            durationMs: Math.round(reply.elapsedTime),
        }, 'Request completed');
    });

    const service = new InspectionService(store, settings, fetchImpl);

    await fastify.register(healthRoutes, { prefix: '/health', store });
    await fastify.register(inspectionRoutes, {
        prefix: '/api/inspections',
        service,
        maxUploadBytes: settings.maxUploadBytes,
    });

    return fastify;
}
