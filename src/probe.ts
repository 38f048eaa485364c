import type { Logger } from 'pino';
import { degradedReport, evaluate } from './check/evaluator.js';
import { exitCodeFor } from './check/types.js';
import type { ExitCode, MeasurementFailure, MeasurementOutcome, Report, ThresholdSet } from './check/types.js';
import { outcomeSeverity } from './speedtest/invoker.js';

export interface ProbeOptions {
    command: readonly string[];
    thresholds: ThresholdSet;
}

export interface ProbeDependencies {
    invoker: { measure(command: readonly string[]): Promise<MeasurementOutcome> };
    logger: Logger;
}

export interface ProbeResult {
    report: Report;
    exitCode: ExitCode;
}

function logFailure(logger: Logger, outcome: MeasurementFailure): void {
    switch (outcome.kind) {
        case 'timeout':
            logger.warn({ timeoutMs: outcome.timeoutMs }, `Speed test did not finish within ${outcome.timeoutMs} ms`);
            break;
        case 'missing-executable':
            logger.fatal({ command: outcome.command }, `CRITICAL: ${outcome.message}`);
            break;
        case 'malformed-output':
            logger.error({ output: outcome.output }, `Malformed speed test output: ${outcome.message}`);
            break;
        case 'execution-failure':
            logger.fatal({ exitCode: outcome.exitCode }, `CRITICAL: ${outcome.message}`);
            break;
    }
}

/**
 * Run one measurement and turn it into a status report. A failed measurement
 * skips threshold evaluation.
 */
export async function runProbe(options: ProbeOptions, deps: ProbeDependencies): Promise<ProbeResult> {
    const { logger } = deps;
    const outcome = await deps.invoker.measure(options.command);

    if (outcome.kind !== 'success') {
        logFailure(logger, outcome);
        const report = degradedReport(outcomeSeverity(outcome));
        return { report, exitCode: exitCodeFor(report.severity) };
    }

    const { measurement } = outcome;
    logger.debug(
        `Download: ${measurement.downloadMbps.toFixed(2)} Mbit/s; Upload: ${measurement.uploadMbps.toFixed(2)} Mbit/s`,
    );

    const report = evaluate({ kind: 'ran', measurement }, options.thresholds);
    logger.debug({ severity: report.severity }, report.text);

    return { report, exitCode: exitCodeFor(report.severity) };
}
