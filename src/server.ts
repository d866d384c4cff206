// src/server.ts
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CatalogInspector } from './catalog/inspector.js';
import { errorMessage } from './errors.js';
import { SQL_PROMPT_NAME, sqlGenerationPrompt } from './prompts.js';
import { createTools } from './tools/index.js';
import type { McpToolResponse, ToolDefinition } from './tools/types.js';
import { renderFailure, serialize } from './tools/utils.js';

export const SERVER_NAME = "pg-inspector-mcp";
export const SERVER_VERSION = "1.0.0";
export const STRUCTURE_RESOURCE_URI = "postgres://database/overview";
export const STRUCTURE_RESOURCE_NAME = "Database structure";
const STRUCTURE_MIME_TYPE = "application/json";

// Use console.error for logging to avoid interfering with stdout/MCP communication
function withLogging(tool: ToolDefinition): (args: unknown) => Promise<McpToolResponse> {
    return async (args: unknown): Promise<McpToolResponse> => {
        console.error(`>>> Received request for tool: ${tool.name}`);
        console.error(`>>> Arguments: ${JSON.stringify(args)}`);
        try {
            const result = await tool.handler(args);
            console.error(`<<< Finished tool: ${tool.name} (Success: ${!result.isError})`);
            return result;
        } catch (error: unknown) {
            console.error(`!!! Uncaught error in handler for tool: ${tool.name}`, error);
            console.error(`<<< Finished tool: ${tool.name} (Uncaught Error)`);
            return {
                isError: true,
                content: [{ type: "text", text: `Internal server error in tool '${tool.name}': ${errorMessage(error)}` }],
            };
        }
    };
}

/**
 * Builds the MCP server: every tool, the database structure resource and the
 * SQL generation prompt, all bound to one inspector.
 */
export function createServer(inspector: CatalogInspector): McpServer {
    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION,
    });

    const tools = createTools({ inspector });
    console.error(`Registering ${tools.length} tool(s)...`);
    for (const tool of tools) {
        const handler = withLogging(tool);
        server.tool(tool.name, tool.description, tool.rawInputSchema, async (args) => handler(args));
    }
    console.error("Tool registration complete.");

    server.resource(
        STRUCTURE_RESOURCE_NAME,
        STRUCTURE_RESOURCE_URI,
        { mimeType: STRUCTURE_MIME_TYPE, description: "Complete database structure: schema -> table -> { table_type, columns }." },
        async (uri) => {
            console.error(`[resource] Handling read request for resource: ${uri.href}`);
            const result = await inspector.getDatabaseStructure();
            if (!result.ok) {
                console.error(`[resource] Failed to build database structure: ${result.error.message}`);
                return { contents: [{ uri: uri.href, mimeType: "text/plain", text: renderFailure(result) }] };
            }
            return { contents: [{ uri: uri.href, mimeType: STRUCTURE_MIME_TYPE, text: serialize(result.value) }] };
        },
    );

    server.prompt(
        SQL_PROMPT_NAME,
        "Primes an assistant to write SQL for this database, using the current database overview.",
        async () => {
            console.error(`[prompt] Building ${SQL_PROMPT_NAME}...`);
            const result = await sqlGenerationPrompt(inspector);
            const text = result.ok ? result.value : renderFailure(result);
            return {
                messages: [{ role: "user", content: { type: "text", text } }],
            };
        },
    );

    return server;
}
