#!/usr/bin/env node
import { EXIT_CODES } from './check/types.js';
import { main } from './main.js';

main(process.argv.slice(2)).then(
    (exitCode) => {
        process.exitCode = exitCode;
    },
    (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        process.stdout.write(`UNKNOWN: ${message}\n`);
        process.exitCode = EXIT_CODES.UNKNOWN;
    },
);
