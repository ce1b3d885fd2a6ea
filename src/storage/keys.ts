/**
 * Object key layout shared with the inference worker.
 *
 *   <unlabelled>/<uuid>.jpg   photo written by this service
 *   <labelled>/<uuid>.jpg     annotated photo written by the worker
 *
 * The two keys are correlated only through the UUID. The .jpg suffix is
 * fixed whatever format was uploaded; the worker looks for it.
 */

import { v4 as uuidv4, validate as uuidValidate, version as uuidVersion } from 'uuid';
import { ValidationError } from '../lib/errors/index.js';
import type { KeyPrefixes } from '../config/env.js';

const OBJECT_EXTENSION = '.jpg';

export interface GeneratedKey {
    id: string;
    key: string;
}

/** Lowercase UUID v4, the form `generateUnlabelledKey` writes. */
export function isInspectionId(value: string): boolean {
    return value === value.toLowerCase() && uuidValidate(value) && uuidVersion(value) === 4;
}

export function generateUnlabelledKey(prefixes: KeyPrefixes): GeneratedKey {
    const id = uuidv4();
    return { id, key: `${prefixes.unlabelled}/${id}${OBJECT_EXTENSION}` };
}

export function labelledKeyForId(id: string, prefixes: KeyPrefixes): string {
    if (!isInspectionId(id)) {
        throw new ValidationError(`Invalid inspection id: ${id}`, 'INVALID_INSPECTION_ID');
    }
    return `${prefixes.labelled}/${id}${OBJECT_EXTENSION}`;
}

/**
 * Extract the inspection id from an unlabelled key.
 */
export function inspectionIdFromKey(unlabelledKey: string, prefixes: KeyPrefixes): string {
    const expectedDir = `${prefixes.unlabelled}/`;
    if (!unlabelledKey.startsWith(expectedDir)) {
        throw new ValidationError(
            `Key ${unlabelledKey} is not under ${expectedDir}`,
            'INVALID_OBJECT_KEY'
        );
    }

    const fileName = unlabelledKey.slice(expectedDir.length);
    const dot = fileName.lastIndexOf('.');
    const id = dot === -1 ? fileName : fileName.slice(0, dot);

    if (!isInspectionId(id)) {
        throw new ValidationError(`Key ${unlabelledKey} does not carry an inspection id`, 'INVALID_OBJECT_KEY');
    }
    return id;
}

export function deriveLabelledKey(unlabelledKey: string, prefixes: KeyPrefixes): string {
    return labelledKeyForId(inspectionIdFromKey(unlabelledKey, prefixes), prefixes);
}
