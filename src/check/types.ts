export type Severity = 'OK' | 'WARNING' | 'CRITICAL' | 'UNKNOWN';

export const EXIT_CODES = {
    OK: 0,
    WARNING: 1,
    CRITICAL: 2,
    UNKNOWN: 3,
} as const satisfies Record<Severity, number>;

export type ExitCode = (typeof EXIT_CODES)[Severity];

export function exitCodeFor(severity: Severity): ExitCode {
    return EXIT_CODES[severity];
}

/**
 * Lower throughput bounds in Mbit/s. Zero disables a threshold.
 */
export interface ThresholdSet {
    readonly downloadWarning: number;
    readonly downloadCritical: number;
    readonly uploadWarning: number;
    readonly uploadCritical: number;
}

export interface Measurement {
    readonly downloadMbps: number;
    readonly uploadMbps: number;
}

export type MeasurementState =
    | { readonly kind: 'not-run' }
    | { readonly kind: 'ran'; readonly measurement: Measurement };

export interface Report {
    readonly severity: Severity;
    readonly summary: string;
    readonly perfdata?: string;
    /** The status line as written to stdout */
    readonly text: string;
}

export type MeasurementOutcome =
    | { readonly kind: 'success'; readonly measurement: Measurement; readonly rawLine: string }
    | { readonly kind: 'timeout'; readonly timeoutMs: number }
    | { readonly kind: 'missing-executable'; readonly command: string; readonly message: string }
    | { readonly kind: 'malformed-output'; readonly output: string; readonly message: string }
    | { readonly kind: 'execution-failure'; readonly exitCode: number | null; readonly message: string };

export type MeasurementFailure = Exclude<MeasurementOutcome, { kind: 'success' }>;
