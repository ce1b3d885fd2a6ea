/**
 * S3 Object Store
 *
 * Works against AWS S3 or any S3-compatible endpoint (MinIO, R2).
 * Uses @aws-sdk/client-s3, @aws-sdk/s3-presigned-post and @aws-sdk/s3-request-presigner.
 *
 * Hard rule: the HTTP surface never streams result images - always signed URLs.
 */

import {
    S3Client,
    GetObjectCommand,
    HeadObjectCommand,
    HeadBucketCommand,
    S3ServiceException,
} from '@aws-sdk/client-s3';
import { createPresignedPost } from '@aws-sdk/s3-presigned-post';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Env } from '../config/env.js';
import { storageLogger } from '../utils/logger.js';
import type {
    ObjectInfo,
    ObjectStore,
    PresignedUpload,
    PresignOptions,
    StoredObject,
} from './ObjectStore.js';

// ============================================================================
// CLIENT
// ============================================================================

export function createS3Client(env: Env): S3Client {
    const credentials = env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY
        ? { accessKeyId: env.AWS_ACCESS_KEY_ID, secretAccessKey: env.AWS_SECRET_ACCESS_KEY }
        : undefined; // default provider chain

    return new S3Client({
        region: env.AWS_REGION,
        ...(env.S3_ENDPOINT ? { endpoint: env.S3_ENDPOINT, forcePathStyle: true } : {}),
        ...(credentials ? { credentials } : {}),
    });
}

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey']);

export function isNotFoundError(error: unknown): boolean {
    if (error instanceof S3ServiceException) {
        return NOT_FOUND_NAMES.has(error.name) || error.$metadata.httpStatusCode === 404;
    }
    return false;
}

// ============================================================================
// STORE
// ============================================================================

export class S3ObjectStore implements ObjectStore {
    constructor(
        private readonly client: S3Client,
        readonly bucket: string
    ) {}

    async createPresignedPost(key: string, options: PresignOptions): Promise<PresignedUpload> {
        const { url, fields } = await createPresignedPost(this.client, {
            Bucket: this.bucket,
            Key: key,
            Conditions: [
                ['content-length-range', 1, options.maxBytes],
                ['eq', '$Content-Type', options.contentType],
            ],
            Fields: {
                'Content-Type': options.contentType,
            },
            Expires: options.expiresInSeconds,
        });

        storageLogger.debug({ key, expiresIn: options.expiresInSeconds }, 'Presigned POST issued');
        return { url, fields };
    }

    async headObject(key: string): Promise<ObjectInfo | null> {
        try {
            const response = await this.client.send(new HeadObjectCommand({
                Bucket: this.bucket,
                Key: key,
            }));

            return {
                key,
                size: response.ContentLength,
                contentType: response.ContentType,
                lastModified: response.LastModified,
            };
        } catch (error) {
            if (isNotFoundError(error)) return null;
            throw error;
        }
    }

    async getObject(key: string): Promise<StoredObject | null> {
        try {
            const response = await this.client.send(new GetObjectCommand({
                Bucket: this.bucket,
                Key: key,
            }));

            if (!response.Body) {
                throw new Error(`S3 returned no body for ${key}`);
            }
            const body = await response.Body.transformToByteArray();

            return {
                key,
                body,
                size: body.byteLength,
                contentType: response.ContentType,
                lastModified: response.LastModified,
            };
        } catch (error) {
            if (isNotFoundError(error)) return null;
            throw error;
        }
    }

    async getSignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
        const command = new GetObjectCommand({
            Bucket: this.bucket,
            Key: key,
        });
        return getSignedUrl(this.client, command, { expiresIn: expiresInSeconds });
    }

    async ping(): Promise<boolean> {
        try {
            await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
            return true;
        } catch (error) {
            storageLogger.warn({ err: error, bucket: this.bucket }, 'Bucket health check failed');
            return false;
        }
    }
}
