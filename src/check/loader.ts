import { readFileSync } from 'fs';
import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { ThresholdInput } from './thresholds.js';

export function loadThresholds(
    thresholdsPath: string,
    validator: SchemaValidator,
    logger: Logger,
): ThresholdInput {
    let data: unknown;
    try {
        data = JSON.parse(readFileSync(thresholdsPath, 'utf-8'));
    } catch (err) {
        logger.error({ thresholdsPath, error: err }, 'Failed to load thresholds');
        throw new ConfigError(`Failed to load thresholds from ${thresholdsPath}: ${err}`);
    }

    const result = validator.validateThresholds(data);
    if (!result.valid) {
        logger.error({ thresholdsPath, errors: result.errors }, 'Invalid thresholds file');
        throw new ConfigError(`Invalid thresholds in ${thresholdsPath}: ${result.errors}`);
    }

    logger.debug({ thresholdsPath, thresholds: result.value }, 'Thresholds loaded');
    return result.value;
}
