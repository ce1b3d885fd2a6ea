/**
 * UPLOAD SERVICE
 *
 * Writes a photo into the unlabelled mailbox:
 * 1. Generate a fresh key
 * 2. Ask the store for a presigned POST (no retry - nothing can be sent without it)
 * 3. Submit one multipart form; S3 answers 204 on success
 * 4. Retry the same submission on network errors, 429 and 5xx, with a fixed delay
 */

import type { InspectionSettings } from '../config/env.js';
import { PresignError, UploadError } from '../lib/errors/index.js';
import type { ObjectStore, PresignedUpload } from '../storage/ObjectStore.js';
import { deriveLabelledKey, generateUnlabelledKey } from '../storage/keys.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/reliability.js';

const log = createLogger('UploadService');

export const UPLOAD_SUCCESS_STATUS = 204;

export type FetchLike = typeof fetch;

export interface ImageUpload {
    bytes: Uint8Array;
    contentType: string;
}

export interface UploadReceipt {
    id: string;
    unlabelledKey: string;
    labelledKey: string;
    attempts: number;
}

/** Non-2xx answer from the storage endpoint. */
class UploadStatusError extends Error {
    constructor(readonly status: number) {
        super(`Storage endpoint answered status ${status}`);
        this.name = 'UploadStatusError';
    }
}

function isRetryableUploadFailure(error: unknown): boolean {
    if (error instanceof UploadStatusError) {
        return error.status === 429 || error.status >= 500;
    }
    // fetch rejects only on network-level failures
    return true;
}

export class UploadService {
    constructor(
        private readonly store: ObjectStore,
        private readonly settings: InspectionSettings,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async upload(image: ImageUpload): Promise<UploadReceipt> {
        const { id, key } = generateUnlabelledKey(this.settings.prefixes);

        let presigned: PresignedUpload;
        try {
            presigned = await this.store.createPresignedPost(key, {
                expiresInSeconds: this.settings.presignExpiresSeconds,
                maxBytes: this.settings.maxUploadBytes,
                contentType: image.contentType,
            });
        } catch (error) {
            log.error({ err: error, key }, 'Presigned URL generation unsuccessful');
            throw new PresignError(key, error);
        }

        let attempts = 0;
        let lastStatus: number | null = null;

        try {
            await withRetry(async (attempt) => {
                attempts = attempt;
                lastStatus = null;
                const status = await this.submit(presigned, key, image);
                lastStatus = status;
                if (status !== UPLOAD_SUCCESS_STATUS) {
                    throw new UploadStatusError(status);
                }
            }, {
                maxAttempts: this.settings.upload.maxAttempts,
                delayMs: this.settings.upload.retryDelayMs,
                retryOn: isRetryableUploadFailure,
                onRetry: (error, attempt) => {
                    log.warn({
                        key,
                        attempt,
                        maxAttempts: this.settings.upload.maxAttempts,
                        error: error instanceof Error ? error.message : String(error),
                    }, 'Image upload failed, retrying');
                },
            });
        } catch (error) {
            log.error({ key, attempts, status: lastStatus }, 'Image uploading unsuccessful');
            throw new UploadError(key, lastStatus, attempts, error);
        }

        log.info({ inspectionId: id, key, attempts }, 'Image uploaded');

        return {
            id,
            unlabelledKey: key,
            labelledKey: deriveLabelledKey(key, this.settings.prefixes),
            attempts,
        };
    }

    private async submit(presigned: PresignedUpload, key: string, image: ImageUpload): Promise<number> {
        const form = new FormData();
        for (const [name, value] of Object.entries(presigned.fields)) {
            form.append(name, value);
        }
        // S3 ignores every field after the file part
        const fileName = key.slice(key.lastIndexOf('/') + 1);
        form.append('file', new Blob([image.bytes], { type: image.contentType }), fileName);

        const response = await this.fetchImpl(presigned.url, {
            method: 'POST',
            body: form,
        });
        // Drain the body so the socket is released
        await response.arrayBuffer();
        return response.status;
    }
}
