import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// ===================================
// 1. AUTO-DETECT ENVIRONMENT
// ===================================

export enum EnvMode {
    TEST = 'test',
    LOCAL = 'local',
    PRODUCTION = 'production'
}

function detectMode(nodeEnv: string | undefined): EnvMode {
    if (nodeEnv === 'test') return EnvMode.TEST;
    if (nodeEnv === 'production') return EnvMode.PRODUCTION;
    return EnvMode.LOCAL;
}

const CURRENT_MODE = detectMode(process.env.NODE_ENV);

// ===================================
// 2. LOAD CORRECT ENV FILE
// ===================================

if (CURRENT_MODE === EnvMode.LOCAL) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
    // Fallback to .env if .env.local missing
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
} else if (CURRENT_MODE === EnvMode.TEST) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.test') });
}
// Production uses injected variables (no file loading needed)

// ===================================
// 3. SCHEMA
// ===================================

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const optionalString = z.string().trim().min(1).optional();

const prefix = z
    .string()
    .trim()
    .min(1)
    .regex(/^[A-Za-z0-9!_.*'()/-]+$/, 'must be a plain S3 key prefix')
    .transform((value) => value.replace(/^\/+|\/+$/g, ''));

const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: positiveInt.default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    ALLOWED_ORIGINS: z
        .string()
        .default('')
        .transform((raw) => raw.split(',').map((origin) => origin.trim()).filter(Boolean)),

    // storage
    AWS_REGION: z.string().min(1).default('us-east-1'),
    AWS_ACCESS_KEY_ID: optionalString,
    AWS_SECRET_ACCESS_KEY: optionalString,
    S3_ENDPOINT: z.string().url().optional(),
    S3_BUCKET: z.string().min(3).max(63).default('bumper-inspection-images'),
    UNLABELLED_PREFIX: prefix.default('image/unlabelled'),
    LABELLED_PREFIX: prefix.default('image/labelled'),

    // handshake
    PRESIGN_EXPIRES_SECONDS: positiveInt.max(7 * 24 * 60 * 60).default(3600),
    RESULT_URL_EXPIRES_SECONDS: positiveInt.max(7 * 24 * 60 * 60).default(15 * 60),
    UPLOAD_MAX_BYTES: positiveInt.default(10 * 1024 * 1024),
    UPLOAD_MAX_ATTEMPTS: positiveInt.default(3),
    UPLOAD_RETRY_DELAY_MS: nonNegativeInt.default(1000),
    POLL_INITIAL_DELAY_MS: nonNegativeInt.default(10_000),
    POLL_INTERVAL_MS: nonNegativeInt.default(2000),
    POLL_MAX_ATTEMPTS: positiveInt.default(15),

    // error tracking
    SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

// ===================================
// 4. LOAD & VALIDATE
// ===================================

/**
 * Parse and validate a raw environment record.
 * Empty strings count as unset so that blank lines in .env files fall back to defaults.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (value !== undefined && value !== '') {
            cleaned[key] = value;
        }
    }

    const result = EnvSchema.safeParse(cleaned);
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`[CONFIG] Invalid environment: ${problems}`);
    }

    if (Boolean(result.data.AWS_ACCESS_KEY_ID) !== Boolean(result.data.AWS_SECRET_ACCESS_KEY)) {
        throw new Error('[CONFIG] AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together');
    }

    const { UNLABELLED_PREFIX: unlabelled, LABELLED_PREFIX: labelled } = result.data;
    if (unlabelled === labelled) {
        throw new Error('[CONFIG] UNLABELLED_PREFIX and LABELLED_PREFIX must differ');
    }
    if (labelled.startsWith(`${unlabelled}/`) || unlabelled.startsWith(`${labelled}/`)) {
        throw new Error('[CONFIG] UNLABELLED_PREFIX and LABELLED_PREFIX must not be nested');
    }

    return result.data;
}

// ===================================
// 5. RUNTIME SETTINGS
// ===================================

export interface KeyPrefixes {
    unlabelled: string;
    labelled: string;
}

export interface InspectionSettings {
    bucket: string;
    prefixes: KeyPrefixes;
    presignExpiresSeconds: number;
    resultUrlExpiresSeconds: number;
    maxUploadBytes: number;
    upload: {
        maxAttempts: number;
        retryDelayMs: number;
    };
    poll: {
        initialDelayMs: number;
        intervalMs: number;
        maxAttempts: number;
    };
}

export function inspectionSettings(env: Env): InspectionSettings {
    return {
        bucket: env.S3_BUCKET,
        prefixes: {
            unlabelled: env.UNLABELLED_PREFIX,
            labelled: env.LABELLED_PREFIX,
        },
        presignExpiresSeconds: env.PRESIGN_EXPIRES_SECONDS,
        resultUrlExpiresSeconds: env.RESULT_URL_EXPIRES_SECONDS,
        maxUploadBytes: env.UPLOAD_MAX_BYTES,
        upload: {
            maxAttempts: env.UPLOAD_MAX_ATTEMPTS,
            retryDelayMs: env.UPLOAD_RETRY_DELAY_MS,
        },
        poll: {
            initialDelayMs: env.POLL_INITIAL_DELAY_MS,
            intervalMs: env.POLL_INTERVAL_MS,
            maxAttempts: env.POLL_MAX_ATTEMPTS,
        },
    };
}

// ===================================
// 6. EXPORT THE SAFE ENV OBJECT
// ===================================

export const env = parseEnv(process.env);
export const mode = CURRENT_MODE;
