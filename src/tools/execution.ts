// src/tools/execution.ts
import { z } from 'zod';
import { DEFAULT_SAMPLE_LIMIT, DEFAULT_SCHEMA } from '../catalog/inspector.js';
import { success } from '../result.js';
import { defineTool, type ToolContext, type ToolDefinition } from './types.js';
import { toToolResponse } from './utils.js';

// --- Tool: ping ---
const pingTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "ping",
    description: "Checks that the server is responding and the database is reachable. Returns 'Pong!' with the database name and server version.",
    rawInputSchema: {
        message: z.string().optional().default("Ping").describe("Optional message to include in the pong response."),
    },
    handler: async ({ message }) => {
        console.error(`[ping] Received ping with message: ${message}`);
        const result = await inspector.ping();
        if (!result.ok) return toToolResponse('ping', result);
        return toToolResponse('ping', success({ reply: `Pong! (${message})`, ...result.value[0] }));
    },
});

// --- Tool: get_sample_data ---
const getSampleDataTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "get_sample_data",
    description: "Gets sample rows from a table. Schema and table names are matched exactly (case-sensitive).",
    rawInputSchema: {
        table_name: z.string().describe("The name of the table to sample from."),
        schema_name: z.string().optional().default(DEFAULT_SCHEMA).describe(`The schema name (default: "${DEFAULT_SCHEMA}").`),
        limit: z.coerce.number().int().nonnegative().optional().default(DEFAULT_SAMPLE_LIMIT)
            .describe(`Maximum number of rows to return (default: ${DEFAULT_SAMPLE_LIMIT}).`),
    },
    handler: async ({ table_name, schema_name, limit }) => {
        console.error(`[get_sample_data] Sampling up to ${limit} row(s) from '${schema_name}.${table_name}'...`);
        return toToolResponse('get_sample_data', await inspector.getSampleData(table_name, schema_name, limit));
    },
});

// --- Tool: execute_sql_query ---
const executeSqlQueryTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "execute_sql_query",
    description: "Executes a custom read-only SQL query. Only a single SELECT statement is accepted; it runs inside a read-only transaction.",
    rawInputSchema: {
        query: z.string().describe("The SQL query to execute (must be a SELECT statement)."),
    },
    handler: async ({ query }) => {
        console.error(`[execute_sql_query] Executing: ${query.substring(0, 100)}${query.length > 100 ? '...' : ''}`);
        return toToolResponse('execute_sql_query', await inspector.executeSqlQuery(query));
    },
});

export function createExecutionTools(context: ToolContext): ToolDefinition[] {
    return [
        pingTool(context),
        getSampleDataTool(context),
        executeSqlQueryTool(context),
    ];
}
