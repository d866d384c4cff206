// src/tools/metadata.ts
import { defineTool, type ToolContext, type ToolDefinition } from './types.js';
import { toToolResponse } from './utils.js';

// --- Tool: get_database_overview ---
const getDatabaseOverviewTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "get_database_overview",
    description: "Gets an overview of the whole database: every schema with its table count and a comma-separated list of its tables.",
    rawInputSchema: {},
    handler: async () => {
        console.error(`[get_database_overview] Building database overview...`);
        return toToolResponse('get_database_overview', await inspector.getDatabaseOverview());
    },
});

// --- Tool: get_database_structure ---
// Same document as the postgres://database/overview resource, for clients without resource support.
const getDatabaseStructureTool = ({ inspector }: ToolContext): ToolDefinition => defineTool({
    name: "get_database_structure",
    description: "Gets the complete database structure: schema -> table -> { table_type, columns }. Issues one query per schema and per table, so prefer get_database_overview on large databases.",
    rawInputSchema: {},
    handler: async () => {
        console.error(`[get_database_structure] Walking database structure...`);
        return toToolResponse('get_database_structure', await inspector.getDatabaseStructure());
    },
});

export function createMetadataTools(context: ToolContext): ToolDefinition[] {
    return [
        getDatabaseOverviewTool(context),
        getDatabaseStructureTool(context),
    ];
}
