import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { ConfigError } from '../errors.js';
import type { ThresholdInput } from '../check/thresholds.js';

// Load .env file if present
config();

export interface AppConfig {
    speedtest: {
        command: string[];
        timeoutMs: number;
    };
    thresholds: ThresholdInput;
    thresholdsPath?: string;
    contracts: {
        path: string;
    };
    log: {
        level: string;
        pretty: boolean;
    };
}

type Env = Record<string, string | undefined>;

const defaultContractsPath = fileURLToPath(new URL('../../contracts', import.meta.url));

function getEnv(env: Env, key: string, defaultValue: string): string {
    return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
    const value = env[key];
    if (!value) return defaultValue;
    if (!/^\d+$/.test(value.trim())) {
        throw new ConfigError(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parseInt(value, 10);
}

function getEnvThreshold(env: Env, key: string): number | undefined {
    return env[key] ? getEnvNumber(env, key, 0) : undefined;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const value = env[key]?.trim().toLowerCase();
    if (!value) return defaultValue;
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off'].includes(value)) return false;
    throw new ConfigError(`Invalid boolean for environment variable ${key}: ${value}`);
}

export function loadConfig(env: Env = process.env): AppConfig {
    const command = getEnv(env, 'SPEEDTEST_COMMAND', 'speedtest-cli --csv').trim().split(/\s+/);
    const thresholdsPath = env.THRESHOLDS_PATH?.trim();
    const timeoutMs = getEnvNumber(env, 'SPEEDTEST_TIMEOUT_MS', 60000);
    if (timeoutMs === 0) {
        throw new ConfigError('SPEEDTEST_TIMEOUT_MS must be greater than zero');
    }

    return {
        speedtest: {
            command,
            timeoutMs,
        },
        thresholds: {
            downloadWarning: getEnvThreshold(env, 'DOWNLOAD_WARNING'),
            downloadCritical: getEnvThreshold(env, 'DOWNLOAD_CRITICAL'),
            uploadWarning: getEnvThreshold(env, 'UPLOAD_WARNING'),
            uploadCritical: getEnvThreshold(env, 'UPLOAD_CRITICAL'),
        },
        thresholdsPath: thresholdsPath || undefined,
        contracts: {
            path: getEnv(env, 'CONTRACTS_PATH', defaultContractsPath),
        },
        log: {
            level: getEnv(env, 'LOG_LEVEL', 'info'),
            pretty: getEnvBoolean(env, 'LOG_PRETTY', env.NODE_ENV !== 'production'),
        },
    };
}
