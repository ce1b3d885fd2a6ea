#!/usr/bin/env node
/**
 * Run one inspection from the terminal against the configured bucket.
 * Run: npm run inspect -- photo.jpg --out result.jpg
 */

import { env, inspectionSettings } from '../config/env.js';
import {
    parseInspectArgs,
    reportInspectFailure,
    runInspectImage,
    type InspectImageOutput,
} from '../cli/inspectImage.js';
import { InspectionService } from '../services/InspectionService.js';
import { S3ObjectStore, createS3Client } from '../storage/S3ObjectStore.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('inspect-image');

const terminal: InspectImageOutput = {
    info: (message) => console.log(message),
    error: (message) => console.error(message),
};

async function main(): Promise<number> {
    const args = parseInspectArgs(process.argv.slice(2));
    const settings = inspectionSettings(env);
    const client = createS3Client(env);

    try {
        const service = new InspectionService(new S3ObjectStore(client, settings.bucket), settings);
        return await runInspectImage(args, service, terminal);
    } finally {
        client.destroy();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        process.exitCode = reportInspectFailure(error, log, terminal);
    });
