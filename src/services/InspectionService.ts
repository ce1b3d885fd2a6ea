/**
 * INSPECTION SERVICE
 *
 * One inspection = upload into the unlabelled mailbox, then wait for the
 * worker's labelled copy. Results are handed out as signed URLs.
 */

import type { InspectionSettings } from '../config/env.js';
import {
    NotFoundError,
    PayloadTooLargeError,
    ResultReadError,
    UnsupportedMediaTypeError,
    ValidationError,
} from '../lib/errors/index.js';
import type { ObjectStore, StoredObject } from '../storage/ObjectStore.js';
import { labelledKeyForId } from '../storage/keys.js';
import { createLogger } from '../utils/logger.js';
import { ResultPoller } from './ResultPoller.js';
import { UploadService, type FetchLike, type ImageUpload } from './UploadService.js';

const log = createLogger('InspectionService');

export const ACCEPTED_CONTENT_TYPES = ['image/jpeg', 'image/png'] as const;
export type AcceptedContentType = typeof ACCEPTED_CONTENT_TYPES[number];

export const IMAGE_SOURCES = ['camera', 'upload'] as const;
export type ImageSource = typeof IMAGE_SOURCES[number];

export interface InspectionRequest extends ImageUpload {
    source: ImageSource;
}

export type InspectionStatus = 'completed' | 'timed_out' | 'pending';

export interface InspectionResult {
    id: string;
    status: InspectionStatus;
    source?: ImageSource;
    unlabelledKey?: string;
    labelledKey: string;
    resultUrl?: string;
    uploadAttempts?: number;
    pollAttempts?: number;
}

export function isAcceptedContentType(value: string): value is AcceptedContentType {
    const accepted: readonly string[] = ACCEPTED_CONTENT_TYPES;
    return accepted.includes(value);
}

/** Strip parameters such as `; charset=binary` and normalise case. */
export function normaliseContentType(header: string | undefined): string {
    return (header ?? '').split(';')[0].trim().toLowerCase();
}

export class InspectionService {
    private readonly uploader: UploadService;
    private readonly poller: ResultPoller;

    constructor(
        private readonly store: ObjectStore,
        private readonly settings: InspectionSettings,
        fetchImpl?: FetchLike
    ) {
        this.uploader = new UploadService(store, settings, fetchImpl);
        this.poller = new ResultPoller(store, settings.poll);
    }

    validateImage(image: ImageUpload): void {
        if (!isAcceptedContentType(image.contentType)) {
            throw new UnsupportedMediaTypeError(
                `Content type must be one of: ${ACCEPTED_CONTENT_TYPES.join(', ')}`
            );
        }
        if (image.bytes.byteLength === 0) {
            throw new ValidationError('Image is empty', 'EMPTY_IMAGE');
        }
        if (image.bytes.byteLength > this.settings.maxUploadBytes) {
            throw new PayloadTooLargeError(
                `Image must be at most ${this.settings.maxUploadBytes} bytes`
            );
        }
    }

    async runInspection(request: InspectionRequest): Promise<InspectionResult> {
        this.validateImage(request);

        const receipt = await this.uploader.upload(request);
        log.info({
            inspectionId: receipt.id,
            source: request.source,
            bytes: request.bytes.byteLength,
        }, 'Screw detection in progress');

        const outcome = await this.poller.waitForResult(receipt.labelledKey);

        const base = {
            id: receipt.id,
            source: request.source,
            unlabelledKey: receipt.unlabelledKey,
            labelledKey: receipt.labelledKey,
            uploadAttempts: receipt.attempts,
            pollAttempts: outcome.attempts,
        };

        if (outcome.state === 'timeout') {
            return { ...base, status: 'timed_out' };
        }

        return {
            ...base,
            status: 'completed',
            resultUrl: await this.signResult(outcome.key),
        };
    }

    async getInspection(id: string): Promise<InspectionResult> {
        const labelledKey = labelledKeyForId(id, this.settings.prefixes);
        const info = await this.poller.checkOnce(labelledKey);

        if (!info) {
            return { id, status: 'pending', labelledKey };
        }

        return {
            id,
            status: 'completed',
            labelledKey,
            resultUrl: await this.signResult(labelledKey),
        };
    }

    async downloadResult(id: string): Promise<StoredObject> {
        const labelledKey = labelledKeyForId(id, this.settings.prefixes);
        let object: StoredObject | null;
        try {
            object = await this.store.getObject(labelledKey);
        } catch (error) {
            log.error({ err: error, key: labelledKey }, 'Error reading image file from storage');
            throw new ResultReadError(labelledKey, error);
        }
        if (!object) {
            throw new NotFoundError(`Result for inspection '${id}' is not available yet`, 'RESULT_NOT_READY');
        }
        return object;
    }

    private signResult(labelledKey: string): Promise<string> {
        return this.store.getSignedDownloadUrl(labelledKey, this.settings.resultUrlExpiresSeconds);
    }
}
