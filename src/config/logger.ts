import pino from 'pino';
import type { Logger } from 'pino';
import { build as prettyStream } from 'pino-pretty';

export interface LoggerOptions {
    level: string;
    verbose?: boolean;
    /** Replaces stderr as the debug/info/warn sink */
    logFile?: string;
    pretty?: boolean;
    primary?: pino.DestinationStream;
    secondary?: pino.DestinationStream;
}

const STDERR = 2;

const prettyOptions = {
    translateTime: 'SYS:standard',
    ignore: 'hostname',
    sync: true,
};

/**
 * Stdout is reserved for the status line, so diagnostics default to stderr.
 */
export function primaryDestination(logFile?: string): string | number {
    return logFile ?? STDERR;
}

function primaryStream(options: LoggerOptions): pino.DestinationStream {
    if (options.primary) return options.primary;

    const destination = primaryDestination(options.logFile);
    const toFile = options.logFile !== undefined;
    if (options.pretty) {
        return prettyStream({
            ...prettyOptions,
            ...(toFile ? { colorize: false } : {}),
            destination,
            mkdir: toFile,
        });
    }
    return pino.destination({ dest: destination, sync: true, mkdir: toFile });
}

function secondaryStream(options: LoggerOptions): pino.DestinationStream {
    if (options.secondary) return options.secondary;

    if (options.pretty) {
        return prettyStream({ ...prettyOptions, destination: STDERR });
    }
    return pino.destination({ dest: STDERR, sync: true });
}

/**
 * Build the diagnostics logger for one run. Debug, info and warn records go to
 * the primary sink; error and fatal go only to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
    const level = options.verbose ? 'debug' : options.level;

    const streams: pino.StreamEntry[] = [
        { level: 'trace', stream: primaryStream(options) },
        { level: 'error', stream: secondaryStream(options) },
    ];

    return pino({ level }, pino.multistream(streams, { dedupe: true }));
}
