/**
 * Health Routes
 *
 * GET /health           liveness
 * GET /health/detailed  bucket reachability, 503 when the bucket does not answer
 */

import type { FastifyInstance } from 'fastify';
import type { ObjectStore } from '../storage/ObjectStore.js';

const startTime = Date.now();

export interface HealthRoutesOptions {
    store: ObjectStore;
}

export function quickHealthCheck(): { status: 'ok'; timestamp: string } {
    return {
        status: 'ok',
        timestamp: new Date().toISOString(),
    };
}

export default async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
    const { store } = options;

    fastify.get('/', async () => quickHealthCheck());

    fastify.get('/detailed', async (_request, reply) => {
        const checkStart = Date.now();
        const bucketReachable = await store.ping();
        const latencyMs = Date.now() - checkStart;

        reply.status(bucketReachable ? 200 : 503);
        return {
            status: bucketReachable ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptime: Math.floor((Date.now() - startTime) / 1000),
            storage: {
                bucket: store.bucket,
                reachable: bucketReachable,
                latencyMs,
            },
        };
    });
}
