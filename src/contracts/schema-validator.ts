import Ajv2020Lib from 'ajv/dist/2020.js';
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';
import type { Logger } from 'pino';
import type { ThresholdInput } from '../check/thresholds.js';

const Ajv2020 = Ajv2020Lib.default;

export const THRESHOLDS_SCHEMA_ID = 'https://speedtest-probe.example.com/schemas/thresholds.json';

function isSchemaObject(value: unknown): value is SchemaObject & { $id: string } {
    return typeof value === 'object' && value !== null && '$id' in value && typeof value.$id === 'string';
}

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; errors: string };

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(
        private contractsPath: string,
        private logger: Logger,
    ) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            this.logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        this.logger.debug({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (isSchemaObject(schema)) {
                    this.ajv.addSchema(schema);
                    this.logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    this.logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                this.logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
    }

    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        for (const entry of readdirSync(dir, { withFileTypes: true })) {
            const fullPath = join(dir, entry.name);

            if (entry.isDirectory()) {
                files.push(...this.getAllJsonFiles(fullPath));
            } else if (entry.isFile() && entry.name.endsWith('.json')) {
                files.push(fullPath);
            }
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            this.logger.warn('Schemas not loaded, validation will fail');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const validateFn = this.ajv.getSchema<T>(schemaId);

        if (!validateFn) {
            this.logger.error({ schemaId }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if ('$async' in validateFn) {
            return { valid: false, errors: `Schema ${schemaId} is asynchronous` };
        }

        if (!validateFn(data)) {
            return { valid: false, errors: this.ajv.errorsText(validateFn.errors) };
        }

        return { valid: true, value: data };
    }

    validateThresholds(data: unknown): ValidationResult<ThresholdInput> {
        return this.validate<ThresholdInput>(THRESHOLDS_SCHEMA_ID, data);
    }
}
