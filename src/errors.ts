export type Create3ErrorCode =
    | 'INVALID_INPUT'
    | 'INVALID_INPUT_LENGTH'
    | 'INVALID_PREFIX'
    | 'PREFIX_TOO_LONG'
    | 'INVALID_COUNT'
    | 'SEARCH_ABORTED'
    | 'SEARCH_EXHAUSTED'
    | 'INVALID_CONFIG';

/**
 * Base class for every error raised by this package. `code` is stable and
 * meant for programmatic checks; `meta` carries the offending values.
 */
export class Create3Error extends Error {
    readonly code: Create3ErrorCode;
    readonly meta: Record<string, unknown>;

    constructor(code: Create3ErrorCode, message: string, meta: Record<string, unknown> = {}) {
        super(message);
        this.name = 'Create3Error';
        this.code = code;
        this.meta = meta;
    }
}

export class InvalidInputError extends Create3Error {
    constructor(message: string, meta: Record<string, unknown> = {}, code: Create3ErrorCode = 'INVALID_INPUT') {
        super(code, message, meta);
        this.name = 'InvalidInputError';
    }
}

export class InvalidInputLengthError extends InvalidInputError {
    constructor(field: string, expected: number, actual: number) {
        super(
            `${field} has an incorrect length (expected ${expected} bytes, got ${actual}).`,
            { field, expected, actual },
            'INVALID_INPUT_LENGTH',
        );
        this.name = 'InvalidInputLengthError';
    }
}

export class InvalidPrefixError extends Create3Error {
    constructor(prefix: string, message = 'prefix not hex encoded.', code: Create3ErrorCode = 'INVALID_PREFIX') {
        super(code, message, { prefix });
        this.name = 'InvalidPrefixError';
    }
}

export class PrefixTooLongError extends InvalidPrefixError {
    constructor(prefix: string, max: number) {
        super(prefix, `prefix too long (max ${max} hex characters).`, 'PREFIX_TOO_LONG');
        this.name = 'PrefixTooLongError';
    }
}

export class InvalidCountError extends Create3Error {
    constructor(count: number, max: number) {
        super('INVALID_COUNT', `count must be an integer between 1 and ${max}, got ${count}.`, { count, max });
        this.name = 'InvalidCountError';
    }
}

export class SearchAbortedError extends Create3Error {
    constructor(attempts: number) {
        super('SEARCH_ABORTED', `search aborted after ${attempts} attempts.`, { attempts });
        this.name = 'SearchAbortedError';
    }
}

export class SearchExhaustedError extends Create3Error {
    constructor(attempts: number, found: number, wanted: number) {
        super(
            'SEARCH_EXHAUSTED',
            `no ${wanted === 1 ? 'match' : `${wanted} matches`} within ${attempts} attempts (found ${found}).`,
            { attempts, found, wanted },
        );
        this.name = 'SearchExhaustedError';
    }
}

export interface ConfigValidationMeta {
    invalid: string[];
}

export class ConfigValidationError extends Create3Error {
    constructor(meta: ConfigValidationMeta) {
        super('INVALID_CONFIG', `Invalid environment: ${meta.invalid.join(', ')}`, { ...meta });
        this.name = 'ConfigValidationError';
    }
}
