import { MalformedOutputError } from '../errors.js';
import type { Measurement } from '../check/types.js';

const DOWNLOAD_FIELD = 6;
const UPLOAD_FIELD = 7;
const BITS_PER_MEGABIT = 1_000_000;

const DECIMAL_PATTERN = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function toMbps(raw: string, field: string, output: string): number {
    const value = raw.trim();
    if (!DECIMAL_PATTERN.test(value)) {
        throw new MalformedOutputError(`${field} field is not a number: "${value}"`, output);
    }

    const bitsPerSecond = Number(value);
    if (!Number.isFinite(bitsPerSecond)) {
        throw new MalformedOutputError(`${field} field is out of range: "${value}"`, output);
    }

    return bitsPerSecond / BITS_PER_MEGABIT;
}

/**
 * Parse one `speedtest-cli --csv` line. Fields 7 and 8 carry download and
 * upload throughput in bit/s.
 */
export function parseSpeedtestCsv(output: string): Measurement {
    const fields = output.trim().split(',');

    if (fields.length <= UPLOAD_FIELD) {
        throw new MalformedOutputError(
            `expected at least ${UPLOAD_FIELD + 1} comma-separated fields, got ${fields.length}`,
            output,
        );
    }

    return {
        downloadMbps: toMbps(fields[DOWNLOAD_FIELD], 'download', output),
        uploadMbps: toMbps(fields[UPLOAD_FIELD], 'upload', output),
    };
}
