// src/tools/utils.ts
import { ConnectionError, type InspectorError } from '../errors.js';
import type { OperationFailure, OperationResult } from '../result.js';
import type { McpToolResponse } from './types.js';

// SQLSTATE and network codes worth a plain-language hint next to the server message.
const ERROR_HINTS: Record<string, string> = {
    // Connection Errors
    ECONNREFUSED: 'Connection refused. Is the PostgreSQL server running and reachable on the configured host and port?',
    ENOTFOUND: 'Host not found. Check POSTGRES_HOST.',
    ETIMEDOUT: 'Connection timed out.',
    // Authentication Errors
    '28000': 'Authentication failed. Check POSTGRES_USER and POSTGRES_PASSWORD.',
    '28P01': 'Authentication failed. Check POSTGRES_USER and POSTGRES_PASSWORD.',
    // Database Access Errors
    '3D000': 'The configured database does not exist. Check POSTGRES_DB.',
    '42501': 'Permission denied for the requested object or schema.',
    // Schema/Table Errors
    '42P01': 'Relation (table/view) not found. Names are case-sensitive; use list_tables to see them.',
    '3F000': 'Schema does not exist. Use list_schemas to see the available schemas.',
    '42703': 'Column does not exist. Use describe_table to see the columns.',
    '42704': 'Undefined object.',
    // Syntax / Data Errors
    '42601': 'SQL syntax error. Only one statement can be sent per query.',
    '22P02': 'Invalid text representation for the expected data type.',
    '25006': 'The statement tried to write inside a read-only transaction.',
};

export function errorHint(error: InspectorError): string | undefined {
    if (!error.code) return undefined;
    return ERROR_HINTS[error.code];
}

/** "Error <action>: <message>", plus a hint line for known codes. */
export function renderFailure(result: OperationFailure): string {
    const { action, error } = result;
    let text = action ? `Error ${action}: ${error.message}` : `Error: ${error.message}`;
    const hint = errorHint(error);
    if (hint) text += `\nHint: ${hint}`;
    else if (error instanceof ConnectionError && error.code) text += `\nHint: Connection failed (${error.code}).`;
    return text;
}

export function serialize(value: unknown): string {
    return JSON.stringify(value, null, 2);
}

/**
 * Renders an operation result at the transport boundary.
 * Failures are logged server-side and flagged with isError.
 */
export function toToolResponse<T>(toolName: string, result: OperationResult<T>): McpToolResponse {
    if (result.ok) {
        return { content: [{ type: "text", text: serialize(result.value) }] };
    }
    console.error(`[${toolName}] ${result.error.name}${result.action ? ` while ${result.action}` : ''}: ${result.error.message}`);
    return {
        isError: true,
        content: [{ type: "text", text: renderFailure(result) }],
    };
}
