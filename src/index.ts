/**
 * Bumper Inspection Gateway - Main Entry Point
 *
 * Accepts bumper photos, drops them into the shared bucket for the
 * external screw-detection worker, and hands back the labelled result.
 */

import { env, inspectionSettings, mode } from './config/env.js';
import { buildServer } from './server.js';
import { S3ObjectStore, createS3Client } from './storage/S3ObjectStore.js';
import { initErrorTracking } from './utils/errorTracker.js';
import { logger } from './utils/logger.js';
import { GracefulShutdown } from './utils/shutdown.js';

const settings = inspectionSettings(env);
initErrorTracking(env.SENTRY_DSN, env.NODE_ENV);

const s3Client = createS3Client(env);
const store = new S3ObjectStore(s3Client, settings.bucket);

const fastify = await buildServer({
    store,
    settings,
    allowedOrigins: env.ALLOWED_ORIGINS,
});

const shutdown = new GracefulShutdown();
shutdown.register('httpServer', 0, () => fastify.close());
shutdown.register('s3Client', 10, async () => {
    s3Client.destroy();
});
shutdown.listen();

try {
    const address = await fastify.listen({ port: env.PORT, host: env.HOST });
    logger.info({
        address,
        mode,
        bucket: settings.bucket,
        unlabelledPrefix: settings.prefixes.unlabelled,
        labelledPrefix: settings.prefixes.labelled,
    }, 'Bumper inspection gateway listening');
} catch (error) {
    logger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
}
