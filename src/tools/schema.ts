// src/tools/schema.ts
import { z } from 'zod';
import { DEFAULT_SCHEMA } from '../catalog/inspector.js';
import { defineTool, type ToolContext, type ToolDefinition } from './types.js';
import { toToolResponse } from './utils.js';

const schemaNameInput = z.string().optional().default(DEFAULT_SCHEMA)
    .describe(`The schema name (default: "${DEFAULT_SCHEMA}").`);

// --- Tool: list_schemas ---
const listSchemasTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "list_schemas",
    description: "Lists all non-system schemas in the current database with their owners.",
    rawInputSchema: {},
    handler: async () => {
        console.error(`[list_schemas] Listing schemas...`);
        return toToolResponse('list_schemas', await inspector.listSchemas());
    },
});

// --- Tool: list_tables ---
const listTablesTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "list_tables",
    description: "Lists all tables and views in a specific schema, with their type.",
    rawInputSchema: {
        schema_name: schemaNameInput,
    },
    handler: async ({ schema_name }) => {
        console.error(`[list_tables] Listing tables in schema '${schema_name}'...`);
        return toToolResponse('list_tables', await inspector.listTables(schema_name));
    },
});

// --- Tool: describe_table ---
const describeTableTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "describe_table",
    description: "Gets detailed information about a table: columns (ordered by position), types, defaults, and constraints including foreign key targets.",
    rawInputSchema: {
        table_name: z.string().describe("The name of the table to describe."),
        schema_name: schemaNameInput,
    },
    handler: async ({ table_name, schema_name }) => {
        console.error(`[describe_table] Describing table '${schema_name}.${table_name}'...`);
        return toToolResponse('describe_table', await inspector.describeTable(table_name, schema_name));
    },
});

export function createSchemaTools(context: ToolContext): ToolDefinition[] {
    return [
        listSchemasTool(context),
        listTablesTool(context),
        describeTableTool(context),
    ];
}
