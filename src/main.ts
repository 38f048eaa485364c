import { loadConfig } from './config/env.js';
import { parseCliArgs, usage, type CliOptions } from './config/cli.js';
import { createLogger, type LoggerOptions } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { loadThresholds } from './check/loader.js';
import { resolveThresholds, type ThresholdInput } from './check/thresholds.js';
import { EXIT_CODES, type ExitCode } from './check/types.js';
import { SpeedtestInvoker, type SpawnFunction } from './speedtest/invoker.js';
import { runProbe } from './probe.js';
import { UsageError } from './errors.js';

export interface MainDependencies {
    env?: Record<string, string | undefined>;
    stdout?: (text: string) => void;
    stderr?: (text: string) => void;
    spawn?: SpawnFunction;
    logStreams?: Pick<LoggerOptions, 'primary' | 'secondary'>;
}

/**
 * One check run from argv to exit code. Stdout receives only the status line
 * (or the help text).
 */
export async function main(argv: string[], deps: MainDependencies = {}): Promise<ExitCode> {
    const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
    const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

    let cli: CliOptions;
    try {
        cli = parseCliArgs(argv);
    } catch (err) {
        if (err instanceof UsageError) {
            stderr(`${err.message}\n\n${usage()}\n`);
            return EXIT_CODES.UNKNOWN;
        }
        throw err;
    }

    if (cli.help) {
        stdout(`${usage()}\n`);
        return EXIT_CODES.OK;
    }

    // Load configuration
    const config = loadConfig(deps.env);
    const logger = createLogger({
        level: config.log.level,
        verbose: cli.verbose,
        logFile: cli.logFile,
        pretty: config.log.pretty,
        ...deps.logStreams,
    });

    // Resolve thresholds: environment, then file, then flags
    const thresholdsPath = cli.thresholdsPath ?? config.thresholdsPath;
    let fileThresholds: ThresholdInput = {};
    if (thresholdsPath) {
        const validator = new SchemaValidator(config.contracts.path, logger);
        validator.loadSchemas();
        fileThresholds = loadThresholds(thresholdsPath, validator, logger);
    }
    const thresholds = resolveThresholds(config.thresholds, fileThresholds, cli.thresholds);
    logger.debug({ thresholds }, 'Thresholds resolved');

    const invoker = new SpeedtestInvoker({
        logger,
        timeoutMs: cli.timeoutMs ?? config.speedtest.timeoutMs,
        spawn: deps.spawn,
    });

    const { report, exitCode } = await runProbe(
        { command: config.speedtest.command, thresholds },
        { invoker, logger },
    );

    stdout(`${report.text}\n`);
    return exitCode;
}
