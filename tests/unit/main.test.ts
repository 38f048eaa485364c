import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { main } from '../../src/main.js';
import { FakeChild } from '../helpers/fake-child.js';
import { MemorySink } from '../helpers/memory-sink.js';

const sampleLine = '1234,Example ISP,Example City,2026-10-18T10:00:00Z,12.3,15.2,93456789.12,12345678.9,,203.0.113.7';

describe('main', () => {
    const env = { SPEEDTEST_COMMAND: 'speedtest-cli --csv', LOG_PRETTY: 'false' };
    let child: FakeChild;
    let stdout: string[];
    let stderr: string[];
    let primary: MemorySink;
    let secondary: MemorySink;

    const run = (argv: string[]) =>
        main(argv, {
            env,
            stdout: (text) => stdout.push(text),
            stderr: (text) => stderr.push(text),
            spawn: () => child,
            logStreams: { primary, secondary },
        });

    beforeEach(() => {
        child = new FakeChild();
        stdout = [];
        stderr = [];
        primary = new MemorySink();
        secondary = new MemorySink();
    });

    describe('timeout', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should write only the status line to stdout', async () => {
            const pending = run(['-t', '1', '-v']);
            await vi.advanceTimersByTimeAsync(1000);

            await expect(pending).resolves.toBe(3);
            expect(stdout).toEqual(['UNKNOWN: Download=? Upload=?\n']);
            expect(primary.records().map((record) => record.msg)).toContain(
                'Speed test did not finish within 1000 ms',
            );
        });
    });

    it('should write the report as a single stdout line on success', async () => {
        const pending = run(['-w', '100', '-v']);
        child.finish(0, `${sampleLine}\n`);

        await expect(pending).resolves.toBe(1);
        expect(stdout).toEqual(['WARNING: Download=93.46 Upload=12.35|Download=93;100;;; Upload=12;;;;\n']);
        expect(primary.records().length).toBeGreaterThan(0);
    });

    it('should print usage on stderr for a bad flag', async () => {
        await expect(run(['--bogus'])).resolves.toBe(3);

        expect(stdout).toEqual([]);
        expect(stderr).toHaveLength(1);
        expect(stderr[0]).toContain('Usage: check-speedtest [options]');
    });

    it('should print help on stdout', async () => {
        await expect(run(['--help'])).resolves.toBe(0);

        expect(stdout).toHaveLength(1);
        expect(stdout[0]).toContain('-w, --warning <mbit>');
    });
});
