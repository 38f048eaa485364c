import type { ThresholdSet } from './types.js';

export type ThresholdInput = Partial<Record<keyof ThresholdSet, number>>;

const THRESHOLD_KEYS = [
    'downloadWarning',
    'downloadCritical',
    'uploadWarning',
    'uploadCritical',
] as const satisfies ReadonlyArray<keyof ThresholdSet>;

function clamp(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return 0;
    return Math.max(Math.trunc(value), 0);
}

/**
 * Fill in disabled thresholds and make critical the stricter bound:
 * a warning below its critical is raised to the critical value.
 */
export function normalizeThresholds(raw: ThresholdInput = {}): ThresholdSet {
    const downloadCritical = clamp(raw.downloadCritical);
    const uploadCritical = clamp(raw.uploadCritical);

    let downloadWarning = clamp(raw.downloadWarning);
    if (downloadWarning < downloadCritical) {
        downloadWarning = downloadCritical;
    }

    let uploadWarning = clamp(raw.uploadWarning);
    if (uploadWarning < uploadCritical) {
        uploadWarning = uploadCritical;
    }

    return Object.freeze({ downloadWarning, downloadCritical, uploadWarning, uploadCritical });
}

/**
 * Merge threshold sources, later ones winning per field, then normalize.
 */
export function resolveThresholds(...sources: ThresholdInput[]): ThresholdSet {
    const merged: ThresholdInput = {};

    for (const source of sources) {
        for (const key of THRESHOLD_KEYS) {
            const value = source[key];
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }

    return normalizeThresholds(merged);
}
