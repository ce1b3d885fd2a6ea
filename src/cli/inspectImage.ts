/**
 * inspect-image command: run one inspection from the terminal.
 *
 * Exit codes: 0 result saved, 1 error, 2 worker did not answer in time.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';
import { AppError, ValidationError } from '../lib/errors/index.js';
import type { Logger } from '../utils/logger.js';
import {
    IMAGE_SOURCES,
    type AcceptedContentType,
    type ImageSource,
    type InspectionService,
} from '../services/InspectionService.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_TIMEOUT = 2;

export const USAGE = 'Usage: inspect-image <photo.jpg|photo.png> [--out result.jpg] [--source camera|upload]';

export interface InspectImageArgs {
    imagePath: string;
    outPath: string;
    source: ImageSource;
}

const EXTENSION_TYPES: Record<string, AcceptedContentType> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
};

function isImageSource(value: string): value is ImageSource {
    const sources: readonly string[] = IMAGE_SOURCES;
    return sources.includes(value);
}

export function contentTypeForPath(filePath: string): AcceptedContentType {
    const type = EXTENSION_TYPES[path.extname(filePath).toLowerCase()];
    if (!type) {
        throw new ValidationError(`Unsupported image extension: ${filePath} (expected .jpg, .jpeg or .png)`);
    }
    return type;
}

export function parseInspectArgs(argv: string[]): InspectImageArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            out: { type: 'string', short: 'o' },
            source: { type: 'string', short: 's', default: 'upload' },
        },
    });

    const imagePath = positionals[0];
    if (!imagePath || positionals.length > 1) {
        throw new ValidationError(USAGE);
    }

    const source = values.source ?? 'upload';
    if (!isImageSource(source)) {
        throw new ValidationError(`--source must be one of: ${IMAGE_SOURCES.join(', ')}`);
    }

    const parsed = path.parse(imagePath);
    const outPath = values.out ?? path.join(parsed.dir, `${parsed.name}.labelled.jpg`);

    return { imagePath, outPath, source };
}

export interface InspectImageOutput {
    info(message: string): void;
    error(message: string): void;
}

export async function runInspectImage(
    args: InspectImageArgs,
    service: InspectionService,
    output: InspectImageOutput
): Promise<number> {
    const contentType = contentTypeForPath(args.imagePath);
    const bytes = await readFile(args.imagePath);

    output.info(`Uploading ${args.imagePath} (${bytes.byteLength} bytes)...`);
    const result = await service.runInspection({ bytes, contentType, source: args.source });

    if (result.status !== 'completed') {
        output.error(`No result after ${result.pollAttempts ?? 0} checks. Inspection id: ${result.id}`);
        return EXIT_TIMEOUT;
    }

    const labelled = await service.downloadResult(result.id);
    await writeFile(args.outPath, labelled.body);
    output.info(`Result saved to ${args.outPath} (inspection ${result.id})`);
    return EXIT_OK;
}

/**
 * Log a failed run and print a one-line reason for the terminal.
 */
export function reportInspectFailure(
    error: unknown,
    log: Pick<Logger, 'error'>,
    output: InspectImageOutput
): number {
    log.error({ err: error }, 'Inspection failed');
    if (error instanceof AppError) {
        output.error(`${error.code}: ${error.message}`);
    } else {
        output.error(error instanceof Error ? error.message : String(error));
    }
    return EXIT_ERROR;
}
