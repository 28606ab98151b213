/**
 * @fileoverview Registry Error Types
 *
 * Startup errors (ConfigError, DataLoadError) abort bootstrap.
 * QueryError is per-request and becomes an error envelope.
 */

export type RegistryErrorCode = 'CONFIG_INVALID' | 'DATA_LOAD_FAILED' | 'QUERY_INVALID';

export abstract class RegistryError extends Error {
    abstract readonly code: RegistryErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed or incomplete registry configuration.
 */
export class ConfigError extends RegistryError {
    readonly code = 'CONFIG_INVALID';
}

/**
 * Missing, unreadable or structurally broken data table.
 */
export class DataLoadError extends RegistryError {
    readonly code = 'DATA_LOAD_FAILED';
}

/**
 * Query input that is not a flat mapping of strings.
 */
export class QueryError extends RegistryError {
    readonly code = 'QUERY_INVALID';
}
