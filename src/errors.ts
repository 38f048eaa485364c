export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class MalformedOutputError extends Error {
    constructor(
        message: string,
        readonly output: string,
    ) {
        super(message);
        this.name = 'MalformedOutputError';
    }
}
