// src/catalog/guard.ts
import pg from 'pg';
import { ValidationError } from '../errors.js';

export const READ_ONLY_MESSAGE = 'Only SELECT statements are allowed for security reasons.';

// NAMEDATALEN - 1; longer names are silently truncated by the server
const MAX_IDENTIFIER_BYTES = 63;

/** Trimmed, upper-cased text must start with SELECT. */
export function isSelectStatement(query: string): boolean {
    return query.trim().toUpperCase().startsWith('SELECT');
}

/**
 * Throws ValidationError unless the text starts with SELECT. Runs before any
 * connection is acquired. Stacked statements are refused by the server, since
 * the adapter sends everything over the extended query protocol.
 */
export function assertReadOnlyQuery(query: string): void {
    if (!isSelectStatement(query)) {
        console.error(`[guard] Query rejected: does not start with SELECT.`);
        throw new ValidationError(READ_ONLY_MESSAGE);
    }
}

export function quoteIdentifier(name: string, kind: string = 'identifier'): string {
    if (name.length === 0) {
        throw new ValidationError(`The ${kind} must not be empty.`);
    }
    if (name.includes('\0')) {
        throw new ValidationError(`The ${kind} must not contain NUL characters.`);
    }
    if (Buffer.byteLength(name, 'utf8') > MAX_IDENTIFIER_BYTES) {
        throw new ValidationError(`The ${kind} is longer than ${MAX_IDENTIFIER_BYTES} bytes.`);
    }
    return pg.escapeIdentifier(name);
}

/**
 * Quotes a schema-qualified table name. Quoting keeps caller text inside the
 * identifier position; names match case-sensitively, as the catalog lists them.
 */
export function quoteQualifiedName(schemaName: string, tableName: string): string {
    return `${quoteIdentifier(schemaName, 'schema name')}.${quoteIdentifier(tableName, 'table name')}`;
}
