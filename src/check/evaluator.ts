import { normalizeThresholds } from './thresholds.js';
import type { Measurement, MeasurementState, Report, Severity, ThresholdSet } from './types.js';

/**
 * Classify a measurement. Checks run in a fixed order: download critical,
 * download warning, upload critical, upload warning. A later check may raise
 * the severity but a warning never replaces CRITICAL.
 */
export function evaluateSeverity(measurement: Measurement, thresholds: ThresholdSet): Severity {
    const { downloadMbps, uploadMbps } = measurement;
    const { downloadWarning, downloadCritical, uploadWarning, uploadCritical } = thresholds;
    let severity: Severity = 'OK';

    if (downloadCritical > 0 && downloadMbps <= downloadCritical) {
        severity = 'CRITICAL';
    } else if (downloadWarning > 0 && downloadMbps <= downloadWarning) {
        severity = 'WARNING';
    }

    if (uploadCritical > 0 && uploadMbps <= uploadCritical) {
        severity = 'CRITICAL';
    }
    if (uploadWarning > 0 && uploadMbps <= uploadWarning && severity !== 'CRITICAL') {
        severity = 'WARNING';
    }

    return severity;
}

/**
 * Fixed-point formatting with exact ties rounded to the even digit, where
 * `toFixed` would round them up.
 */
export function formatFixed(value: number, digits: number): string {
    const rounded = value.toFixed(digits);
    if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
        return rounded;
    }

    // Exact decimal expansion of the double; ties end in 5 followed by zeros.
    const exact = value.toFixed(100);
    const cut = exact.indexOf('.') + (digits > 0 ? digits + 1 : 0);
    if (!/^\.?50*$/.test(exact.slice(cut))) {
        return rounded;
    }

    const truncated = exact.slice(0, cut);
    const lastDigit = Number(truncated[truncated.length - 1]);
    return lastDigit % 2 === 0 ? truncated : rounded;
}

function thresholdField(value: number): string {
    return value > 0 ? String(value) : '';
}

export function formatPerfdata(measurement: Measurement, thresholds: ThresholdSet): string {
    const download = [
        `Download=${formatFixed(measurement.downloadMbps, 0)}`,
        thresholdField(thresholds.downloadWarning),
        thresholdField(thresholds.downloadCritical),
        '',
        '',
    ].join(';');
    const upload = [
        `Upload=${formatFixed(measurement.uploadMbps, 0)}`,
        thresholdField(thresholds.uploadWarning),
        thresholdField(thresholds.uploadCritical),
        '',
        '',
    ].join(';');

    return `${download} ${upload}`;
}

export function formatSummary(severity: Severity, measurement: Measurement): string {
    return `${severity}: Download=${formatFixed(measurement.downloadMbps, 2)} Upload=${formatFixed(measurement.uploadMbps, 2)}`;
}

/**
 * Status line without numbers, for runs that produced no measurement.
 */
export function degradedReport(severity: Severity): Report {
    const summary = `${severity}: Download=? Upload=?`;
    return Object.freeze({ severity, summary, text: summary });
}

export function evaluate(state: MeasurementState, thresholds: ThresholdSet): Report {
    if (state.kind === 'not-run') {
        return degradedReport('UNKNOWN');
    }

    const normalized = normalizeThresholds(thresholds);
    const severity = evaluateSeverity(state.measurement, normalized);
    const summary = formatSummary(severity, state.measurement);
    const perfdata = formatPerfdata(state.measurement, normalized);

    return Object.freeze({
        severity,
        summary,
        perfdata,
        text: `${summary}|${perfdata}`,
    });
}
