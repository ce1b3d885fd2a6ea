/**
 * Inspection Routes
 *
 * POST /api/inspections           raw image body -> upload + wait for the labelled result
 * GET  /api/inspections/:id       single re-check of the labelled key
 * GET  /api/inspections/:id/image redirect to a signed URL of the labelled image
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { NotFoundError, UnsupportedMediaTypeError } from '../lib/errors/index.js';
import {
    ACCEPTED_CONTENT_TYPES,
    IMAGE_SOURCES,
    normaliseContentType,
    type InspectionService,
} from '../services/InspectionService.js';
import { isInspectionId } from '../storage/keys.js';

// ============================================
// REQUEST SCHEMAS
// ============================================

const SubmitQuerySchema = z.object({
    source: z.enum(IMAGE_SOURCES).default('upload'),
});

const InspectionParamsSchema = z.object({
    id: z.string().toLowerCase().refine(isInspectionId, 'Inspection id must be a UUID v4'),
});

export interface InspectionRoutesOptions {
    service: InspectionService;
    maxUploadBytes: number;
}

// ============================================
// ROUTE REGISTRATION
// ============================================

export default async function inspectionRoutes(fastify: FastifyInstance, options: InspectionRoutesOptions) {
    const { service, maxUploadBytes } = options;

    // Images arrive as the raw request body
    fastify.addContentTypeParser(
        [...ACCEPTED_CONTENT_TYPES],
        { parseAs: 'buffer', bodyLimit: maxUploadBytes },
        async (_request: FastifyRequest, body: Buffer) => body
    );

    /**
     * POST /api/inspections?source=camera|upload
     */
    fastify.post('/', async (request, reply) => {
        const { source } = SubmitQuerySchema.parse(request.query);

        // Only the image parser above yields bytes
        if (!(request.body instanceof Uint8Array)) {
            throw new UnsupportedMediaTypeError(
                `Send the raw image with Content-Type ${ACCEPTED_CONTENT_TYPES.join(' or ')}`
            );
        }

        const result = await service.runInspection({
            bytes: request.body,
            contentType: normaliseContentType(request.headers['content-type']),
            source,
        });

        reply.status(result.status === 'completed' ? 201 : 202);
        return result;
    });

    /**
     * GET /api/inspections/:id
     */
    fastify.get('/:id', async (request) => {
        const { id } = InspectionParamsSchema.parse(request.params);
        return service.getInspection(id);
    });

    /**
     * GET /api/inspections/:id/image
     */
    fastify.get('/:id/image', async (request, reply) => {
        const { id } = InspectionParamsSchema.parse(request.params);
        const inspection = await service.getInspection(id);

        if (inspection.status !== 'completed' || !inspection.resultUrl) {
            throw new NotFoundError(`Result for inspection '${id}' is not available yet`, 'RESULT_NOT_READY');
        }

        return reply.redirect(inspection.resultUrl);
    });
}
