/**
 * Environment Loader Tests
 */

import { describe, it, expect } from 'vitest';
import { inspectionSettings, parseEnv } from '../src/config/env.js';

describe('Environment loader', () => {
    describe('parseEnv', () => {
        it('should apply defaults for an empty environment', () => {
            const env = parseEnv({});

            expect(env).toMatchObject({
                NODE_ENV: 'development',
                PORT: 3000,
                HOST: '0.0.0.0',
                AWS_REGION: 'us-east-1',
                S3_BUCKET: 'bumper-inspection-images',
                UNLABELLED_PREFIX: 'image/unlabelled',
                LABELLED_PREFIX: 'image/labelled',
                PRESIGN_EXPIRES_SECONDS: 3600,
                UPLOAD_MAX_ATTEMPTS: 3,
                POLL_INITIAL_DELAY_MS: 10_000,
                POLL_INTERVAL_MS: 2000,
                POLL_MAX_ATTEMPTS: 15,
                ALLOWED_ORIGINS: [],
            });
            expect(env.AWS_ACCESS_KEY_ID).toBeUndefined();
        });

        it('should coerce numbers and split origins', () => {
            const env = parseEnv({
                PORT: '8080',
                POLL_MAX_ATTEMPTS: '30',
                ALLOWED_ORIGINS: 'http://kiosk.test, http://line-3.test,',
            });

            expect(env.PORT).toBe(8080);
            expect(env.POLL_MAX_ATTEMPTS).toBe(30);
            expect(env.ALLOWED_ORIGINS).toEqual(['http://kiosk.test', 'http://line-3.test']);
        });

        it('should treat blank values as unset', () => {
            const env = parseEnv({ S3_BUCKET: '', AWS_ACCESS_KEY_ID: '', AWS_SECRET_ACCESS_KEY: '' });
            expect(env.S3_BUCKET).toBe('bumper-inspection-images');
            expect(env.AWS_ACCESS_KEY_ID).toBeUndefined();
        });

        it('should trim slashes from key prefixes', () => {
            const env = parseEnv({ UNLABELLED_PREFIX: '/inbox/raw/', LABELLED_PREFIX: 'outbox/' });
            expect(env.UNLABELLED_PREFIX).toBe('inbox/raw');
            expect(env.LABELLED_PREFIX).toBe('outbox');
        });

        it('should name every invalid variable', () => {
            expect(() => parseEnv({ PORT: 'eighty', POLL_MAX_ATTEMPTS: '0' }))
                .toThrow(/PORT: .*; POLL_MAX_ATTEMPTS: /);
        });

        it('should require both halves of a static credential', () => {
            expect(() => parseEnv({ AWS_ACCESS_KEY_ID: 'test-key-id' }))
                .toThrow('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together');
        });

        it('should refuse identical mailbox prefixes', () => {
            expect(() => parseEnv({ UNLABELLED_PREFIX: 'image', LABELLED_PREFIX: 'image' }))
                .toThrow('UNLABELLED_PREFIX and LABELLED_PREFIX must differ');
        });

        it('should refuse a mailbox nested inside the other', () => {
            expect(() => parseEnv({ UNLABELLED_PREFIX: 'image', LABELLED_PREFIX: 'image/labelled' }))
                .toThrow('UNLABELLED_PREFIX and LABELLED_PREFIX must not be nested');
            expect(() => parseEnv({ UNLABELLED_PREFIX: 'image/labelled/raw', LABELLED_PREFIX: 'image/labelled' }))
                .toThrow('UNLABELLED_PREFIX and LABELLED_PREFIX must not be nested');
        });

        it('should accept sibling prefixes that share a leading name', () => {
            const env = parseEnv({ UNLABELLED_PREFIX: 'image', LABELLED_PREFIX: 'images' });
            expect(env.UNLABELLED_PREFIX).toBe('image');
            expect(env.LABELLED_PREFIX).toBe('images');
        });
    });

    describe('inspectionSettings', () => {
        it('should project the handshake settings', () => {
            const settings = inspectionSettings(parseEnv({
                S3_BUCKET: 'line-3-images',
                UPLOAD_RETRY_DELAY_MS: '0',
                POLL_INTERVAL_MS: '500',
            }));

            expect(settings).toEqual({
                bucket: 'line-3-images',
                prefixes: { unlabelled: 'image/unlabelled', labelled: 'image/labelled' },
                presignExpiresSeconds: 3600,
                resultUrlExpiresSeconds: 900,
                maxUploadBytes: 10 * 1024 * 1024,
                upload: { maxAttempts: 3, retryDelayMs: 0 },
                poll: { initialDelayMs: 10_000, intervalMs: 500, maxAttempts: 15 },
            });
        });
    });
});
