import { ZodError } from 'zod';

/**
 * Raised while loading the scoring policy or pattern library. The engine refuses to
 * start rather than fall back to an undefined default.
 */
export class ConfigurationError extends Error {
    public readonly source: string;
    public readonly keys: string[];

    constructor(source: string, keys: string[], message?: string) {
        super(message || `Invalid ${source} configuration: ${keys.join(', ')}`);
        this.name = 'ConfigurationError';
        this.source = source;
        this.keys = keys;
    }

    static fromZod(source: string, error: ZodError): ConfigurationError {
        const keys = error.issues.map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        });
        return new ConfigurationError(source, keys);
    }

    toJSON() {
        return { error: this.name, source: this.source, keys: this.keys };
    }
}

export class InputValidationError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid request payload: ${issues.join('; ')}`);
        this.name = 'InputValidationError';
        this.issues = issues;
    }

    static fromZod(error: ZodError): InputValidationError {
        return new InputValidationError(
            error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
        );
    }
}
