// src/errors.ts

/**
 * Base class for every failure the inspector reports.
 * `code` carries the driver error code (SQLSTATE or a Node network code) when one exists.
 */
export class InspectorError extends Error {
    readonly code?: string;

    constructor(message: string, code?: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Connection settings are malformed. Raised once, at start-up. */
export class ConfigurationError extends InspectorError {}

/** The backend could not be reached or refused the session. */
export class ConnectionError extends InspectorError {
    static from(error: unknown): ConnectionError {
        if (error instanceof ConnectionError) return error;
        return new ConnectionError(errorMessage(error), errorCode(error));
    }
}

/** The backend rejected the statement. */
export class QueryError extends InspectorError {
    static from(error: unknown): QueryError {
        if (error instanceof QueryError) return error;
        return new QueryError(errorMessage(error), errorCode(error));
    }
}

/** Caller input was rejected before reaching the database. */
export class ValidationError extends InspectorError {}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        // AggregateError from a multi-address connect attempt has an empty message
        if (!error.message && error instanceof AggregateError && error.errors.length > 0) {
            return errorMessage(error.errors[0]);
        }
        return error.message || error.name;
    }
    return String(error);
}

export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    if (error instanceof AggregateError && error.errors.length > 0) {
        return errorCode(error.errors[0]);
    }
    return undefined;
}

/** Normalizes anything caught into an InspectorError, keeping subclasses intact. */
export function toInspectorError(error: unknown): InspectorError {
    if (error instanceof InspectorError) return error;
    return new InspectorError(errorMessage(error), errorCode(error));
}
