import { describe, it, expect } from 'vitest';
import { normalizeThresholds, resolveThresholds } from '../../../src/check/thresholds.js';

describe('normalizeThresholds', () => {
    it('should disable every threshold by default', () => {
        expect(normalizeThresholds()).toEqual({
            downloadWarning: 0,
            downloadCritical: 0,
            uploadWarning: 0,
            uploadCritical: 0,
        });
    });

    it('should raise a warning below its critical to the critical value', () => {
        expect(normalizeThresholds({ downloadWarning: 10, downloadCritical: 50, uploadCritical: 7 })).toEqual({
            downloadWarning: 50,
            downloadCritical: 50,
            uploadWarning: 7,
            uploadCritical: 7,
        });
    });

    it('should keep a warning above its critical', () => {
        const thresholds = normalizeThresholds({ uploadWarning: 20, uploadCritical: 5 });
        expect(thresholds.uploadWarning).toBe(20);
        expect(thresholds.uploadCritical).toBe(5);
    });

    it('should clamp negative values to zero', () => {
        expect(normalizeThresholds({ downloadWarning: -5, uploadCritical: -1 })).toEqual({
            downloadWarning: 0,
            downloadCritical: 0,
            uploadWarning: 0,
            uploadCritical: 0,
        });
    });

    it('should return an immutable set', () => {
        expect(Object.isFrozen(normalizeThresholds({ downloadWarning: 3 }))).toBe(true);
    });
});

describe('resolveThresholds', () => {
    it('should let later sources override earlier ones per field', () => {
        const env = { downloadWarning: 5, downloadCritical: 1 };
        const file = { downloadWarning: 8 };
        const cli = { downloadCritical: 3, uploadWarning: undefined };

        expect(resolveThresholds(env, file, cli)).toEqual({
            downloadWarning: 8,
            downloadCritical: 3,
            uploadWarning: 0,
            uploadCritical: 0,
        });
    });

    it('should normalize after merging', () => {
        expect(resolveThresholds({ uploadWarning: 2 }, { uploadCritical: 6 }).uploadWarning).toBe(6);
    });
});
