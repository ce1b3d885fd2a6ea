/**
 * RESULT POLLER
 *
 * Waits for the inference worker to drop the labelled image:
 * an initial grace period, then up to N probes at a fixed interval.
 * A missing key means "not yet"; any other storage failure ends the wait.
 */

import type { InspectionSettings } from '../config/env.js';
import { AppError, ResultReadError } from '../lib/errors/index.js';
import type { ObjectInfo, ObjectStore } from '../storage/ObjectStore.js';
import { createLogger } from '../utils/logger.js';
import { pollUntil } from '../utils/reliability.js';

const log = createLogger('ResultPoller');

export type PollOutcome =
    | { state: 'ready'; key: string; info: ObjectInfo; attempts: number }
    | { state: 'timeout'; key: string; attempts: number };

export class ResultPoller {
    constructor(
        private readonly store: ObjectStore,
        private readonly settings: InspectionSettings['poll']
    ) {}

    async waitForResult(labelledKey: string): Promise<PollOutcome> {
        const { initialDelayMs, intervalMs, maxAttempts } = this.settings;
        log.debug({ key: labelledKey, initialDelayMs, intervalMs, maxAttempts }, 'Waiting for labelled image');

        const { value, attempts } = await pollUntil(
            (attempt) => {
                log.trace({ key: labelledKey, attempt }, 'Probing labelled key');
                return this.probe(labelledKey);
            },
            { initialDelayMs, intervalMs, maxAttempts }
        );

        if (value === null) {
            log.warn({ key: labelledKey, attempts }, 'Labelled image did not appear in time');
            return { state: 'timeout', key: labelledKey, attempts };
        }

        log.info({ key: labelledKey, attempts }, 'Labelled image found');
        return { state: 'ready', key: labelledKey, info: value, attempts };
    }

    /**
     * One probe, no waiting.
     */
    async checkOnce(labelledKey: string): Promise<ObjectInfo | null> {
        return this.probe(labelledKey);
    }

    private async probe(labelledKey: string): Promise<ObjectInfo | null> {
        try {
            return await this.store.headObject(labelledKey);
        } catch (error) {
            if (error instanceof AppError) throw error;
            log.error({ err: error, key: labelledKey }, 'Error reading image file from storage');
            throw new ResultReadError(labelledKey, error);
        }
    }
}
