import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { finished } from 'stream/promises';

export class FakeChild extends EventEmitter {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    readonly signals: Array<NodeJS.Signals | number | undefined> = [];

    kill(signal?: NodeJS.Signals | number): boolean {
        this.signals.push(signal);
        return true;
    }

    finish(exitCode: number | null, stdout: string | Buffer = '', stderr = '', signal: NodeJS.Signals | null = null): void {
        this.stdout.end(stdout);
        this.stderr.end(stderr);
        void Promise.all([finished(this.stdout), finished(this.stderr)]).then(() => {
            this.emit('close', exitCode, signal);
        });
    }
}
