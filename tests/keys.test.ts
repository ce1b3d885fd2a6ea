/**
 * Object Key Layout Tests
 */

import { describe, it, expect } from 'vitest';
import {
    deriveLabelledKey,
    generateUnlabelledKey,
    inspectionIdFromKey,
    isInspectionId,
    labelledKeyForId,
} from '../src/storage/keys.js';
import { ValidationError } from '../src/lib/errors/index.js';
import { TEST_PREFIXES } from '../src/tests/test-utils.js';

const ID = '3f2b8c1e-9d4a-4b6e-8a7f-0c1d2e3f4a5b';

describe('Object keys', () => {
    describe('generateUnlabelledKey', () => {
        it('should place a fresh UUID under the unlabelled prefix with a .jpg suffix', () => {
            const { id, key } = generateUnlabelledKey(TEST_PREFIXES);
            expect(isInspectionId(id)).toBe(true);
            expect(key).toBe(`image/unlabelled/${id}.jpg`);
        });

        it('should never reuse an id', () => {
            const first = generateUnlabelledKey(TEST_PREFIXES);
            const second = generateUnlabelledKey(TEST_PREFIXES);
            expect(first.id).not.toBe(second.id);
        });
    });

    describe('deriveLabelledKey', () => {
        it('should map the unlabelled key to the labelled mailbox by id', () => {
            expect(deriveLabelledKey(`image/unlabelled/${ID}.jpg`, TEST_PREFIXES))
                .toBe(`image/labelled/${ID}.jpg`);
        });

        it('should agree with labelledKeyForId for generated keys', () => {
            const { id, key } = generateUnlabelledKey(TEST_PREFIXES);
            expect(deriveLabelledKey(key, TEST_PREFIXES)).toBe(labelledKeyForId(id, TEST_PREFIXES));
        });

        it('should honour custom prefixes', () => {
            const prefixes = { unlabelled: 'inbox/raw', labelled: 'outbox/annotated' };
            expect(deriveLabelledKey(`inbox/raw/${ID}.jpg`, prefixes)).toBe(`outbox/annotated/${ID}.jpg`);
        });

        it('should reject keys outside the unlabelled prefix', () => {
            expect(() => deriveLabelledKey(`image/labelled/${ID}.jpg`, TEST_PREFIXES))
                .toThrow(ValidationError);
        });

        it('should reject keys without an inspection id', () => {
            expect(() => deriveLabelledKey('image/unlabelled/photo.jpg', TEST_PREFIXES))
                .toThrow('does not carry an inspection id');
        });
    });

    describe('inspectionIdFromKey', () => {
        it('should strip the prefix and extension', () => {
            expect(inspectionIdFromKey(`image/unlabelled/${ID}.jpg`, TEST_PREFIXES)).toBe(ID);
        });

        it('should accept a key without extension', () => {
            expect(inspectionIdFromKey(`image/unlabelled/${ID}`, TEST_PREFIXES)).toBe(ID);
        });
    });

    describe('isInspectionId', () => {
        it('should only accept the lowercase form uploads are written with', () => {
            expect(isInspectionId(ID)).toBe(true);
            expect(isInspectionId(ID.toUpperCase())).toBe(false);
        });
    });

    describe('labelledKeyForId', () => {
        it('should reject ids that are not UUID v4', () => {
            expect(() => labelledKeyForId('../secrets', TEST_PREFIXES)).toThrow(ValidationError);
            // UUID v1
            expect(() => labelledKeyForId('6ba7b810-9dad-11d1-80b4-00c04fd430c8', TEST_PREFIXES))
                .toThrow('Invalid inspection id');
        });
    });
});
