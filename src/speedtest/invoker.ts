import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { Logger } from 'pino';
import { MalformedOutputError } from '../errors.js';
import { parseSpeedtestCsv } from './parser.js';
import type { MeasurementFailure, MeasurementOutcome, Severity } from '../check/types.js';

export const DEFAULT_COMMAND: readonly string[] = ['speedtest-cli', '--csv'];
export const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_KILL_GRACE_MS = 5_000;

export interface SpawnedProcess extends EventEmitter {
    readonly pid?: number;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (command: string, args: string[]) => SpawnedProcess;

export interface InvokerOptions {
    logger: Logger;
    timeoutMs?: number;
    killGraceMs?: number;
    spawn?: SpawnFunction;
}

const isWindows = process.platform === 'win32';

// Own process group, so a timeout can reach anything the tool started.
const spawnChild: SpawnFunction = (command, args) =>
    spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows,
        windowsHide: true,
    });

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Map a failed measurement to the severity the check exits with.
 */
export function outcomeSeverity(outcome: MeasurementFailure): Severity {
    switch (outcome.kind) {
        case 'timeout':
            return 'UNKNOWN';
        case 'missing-executable':
        case 'malformed-output':
        case 'execution-failure':
            return 'CRITICAL';
    }
}

export class SpeedtestInvoker {
    private readonly logger: Logger;
    private readonly timeoutMs: number;
    private readonly killGraceMs: number;
    private readonly spawn: SpawnFunction;
    private readonly killProcessGroup: boolean;

    constructor(options: InvokerOptions) {
        this.logger = options.logger;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
        this.spawn = options.spawn ?? spawnChild;
        this.killProcessGroup = options.spawn === undefined && !isWindows;
    }

    /**
     * Run the speed test once and classify the result. Process failures are
     * returned as outcomes, never thrown.
     */
    measure(command: readonly string[] = DEFAULT_COMMAND): Promise<MeasurementOutcome> {
        const [executable, ...args] = command;

        if (!executable) {
            return Promise.resolve({
                kind: 'execution-failure',
                exitCode: null,
                message: 'Speed test command is empty',
            });
        }

        this.logger.debug({ command }, 'Running speed test command');

        return new Promise<MeasurementOutcome>((resolve) => {
            let child: SpawnedProcess;
            try {
                child = this.spawn(executable, args);
            } catch (err) {
                resolve(this.spawnFailure(executable, err));
                return;
            }

            const stdoutChunks: Buffer[] = [];
            const stderrChunks: Buffer[] = [];
            let settled = false;
            let closed = false;
            let killHandle: NodeJS.Timeout | null = null;

            const settle = (outcome: MeasurementOutcome): void => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timeoutHandle);
                resolve(outcome);
            };

            const timeoutHandle = setTimeout(() => {
                if (settled) {
                    return;
                }

                this.logger.debug({ timeoutMs: this.timeoutMs }, 'Speed test timed out, terminating');
                this.terminate(child, 'SIGTERM');
                // Descendants holding the pipes must not keep this process alive.
                child.stdout?.destroy();
                child.stderr?.destroy();
                killHandle = setTimeout(() => {
                    if (!closed) {
                        this.terminate(child, 'SIGKILL');
                    }
                }, this.killGraceMs);
                killHandle.unref();

                settle({ kind: 'timeout', timeoutMs: this.timeoutMs });
            }, this.timeoutMs);

            child.stdout?.on('data', (chunk: Buffer) => {
                stdoutChunks.push(chunk);
            });
            child.stderr?.on('data', (chunk: Buffer) => {
                stderrChunks.push(chunk);
            });

            child.on('error', (error: Error) => {
                settle(this.spawnFailure(executable, error));
            });

            child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
                closed = true;
                if (killHandle) {
                    clearTimeout(killHandle);
                    killHandle = null;
                }
                if (settled) {
                    return;
                }

                settle(this.classifyExit(exitCode, signal, stdoutChunks, stderrChunks));
            });
        });
    }

    private terminate(child: SpawnedProcess, signal: NodeJS.Signals): void {
        if (this.killProcessGroup && child.pid !== undefined) {
            try {
                process.kill(-child.pid, signal);
                return;
            } catch (err) {
                this.logger.debug({ pid: child.pid, signal, error: err }, 'Process group kill failed');
            }
        }
        child.kill(signal);
    }

    private spawnFailure(executable: string, error: unknown): MeasurementFailure {
        if (errorCode(error) === 'ENOENT') {
            return {
                kind: 'missing-executable',
                command: executable,
                message: `Missing program "${executable}" (${errorMessage(error)})`,
            };
        }

        return { kind: 'execution-failure', exitCode: null, message: errorMessage(error) };
    }

    private classifyExit(
        exitCode: number | null,
        signal: NodeJS.Signals | null,
        stdoutChunks: Buffer[],
        stderrChunks: Buffer[],
    ): MeasurementOutcome {
        if (exitCode !== 0) {
            const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim();
            const reason = signal ? `terminated by ${signal}` : `exited with status ${exitCode}`;
            return {
                kind: 'execution-failure',
                exitCode,
                message: stderr ? `Speed test ${reason}: ${stderr}` : `Speed test ${reason}`,
            };
        }

        let output: string;
        try {
            output = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.concat(stdoutChunks));
        } catch (err) {
            return {
                kind: 'execution-failure',
                exitCode,
                message: `Could not decode speed test output: ${errorMessage(err)}`,
            };
        }

        const rawLine = output.trim();
        this.logger.debug({ rawLine }, 'Speed test output');

        try {
            const measurement = parseSpeedtestCsv(rawLine);
            return { kind: 'success', measurement, rawLine };
        } catch (err) {
            if (err instanceof MalformedOutputError) {
                return { kind: 'malformed-output', output: rawLine, message: err.message };
            }
            return { kind: 'execution-failure', exitCode, message: errorMessage(err) };
        }
    }
}
