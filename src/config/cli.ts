import { parseArgs } from 'util';
import { UsageError } from '../errors.js';
import type { ThresholdInput } from '../check/thresholds.js';

export interface CliOptions {
    thresholds: ThresholdInput;
    verbose: boolean;
    help: boolean;
    logFile?: string;
    thresholdsPath?: string;
    timeoutMs?: number;
}

export function usage(): string {
    return [
        'Usage: check-speedtest [options]',
        '',
        'Nagios check for internet connection speed',
        '',
        'Options:',
        '  -w, --warning <mbit>    Lower download speed warning limit (Mbit/s), default: 0 (no warning)',
        '  -c, --critical <mbit>   Lower download speed critical limit (Mbit/s), default: 0 (no critical)',
        '  -W, --Warning <mbit>    Lower upload speed warning limit (Mbit/s), default: 0 (no warning)',
        '  -C, --Critical <mbit>   Lower upload speed critical limit (Mbit/s), default: 0 (no critical)',
        '  -t, --timeout <sec>     Seconds to wait for the speed test, default: 60',
        '      --thresholds <file> JSON file with threshold defaults',
        '      --log-file <file>   File to log to, default: <stderr>',
        '  -v, --verbose           Enable verbose output',
        '  -h, --help              Show this help',
    ].join('\n');
}

function parseNonNegativeInt(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value.trim())) {
        throw new UsageError(`Option ${flag} expects a non-negative integer, got "${value}"`);
    }
    return parseInt(value, 10);
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: false,
            strict: true,
            options: {
                warning: { type: 'string', short: 'w' },
                critical: { type: 'string', short: 'c' },
                Warning: { type: 'string', short: 'W' },
                Critical: { type: 'string', short: 'C' },
                timeout: { type: 'string', short: 't' },
                thresholds: { type: 'string' },
                'log-file': { type: 'string' },
                verbose: { type: 'boolean', short: 'v', default: false },
                help: { type: 'boolean', short: 'h', default: false },
            },
        });
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}

export function parseCliArgs(argv: string[]): CliOptions {
    const { values } = readArgs(argv);
    const timeoutSeconds = parseNonNegativeInt('--timeout', values.timeout);
    if (timeoutSeconds === 0) {
        throw new UsageError('Option --timeout must be greater than zero');
    }

    return {
        thresholds: {
            downloadWarning: parseNonNegativeInt('--warning', values.warning),
            downloadCritical: parseNonNegativeInt('--critical', values.critical),
            uploadWarning: parseNonNegativeInt('--Warning', values.Warning),
            uploadCritical: parseNonNegativeInt('--Critical', values.Critical),
        },
        verbose: values.verbose ?? false,
        help: values.help ?? false,
        logFile: values['log-file'],
        thresholdsPath: values.thresholds,
        timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
    };
}
