#!/usr/bin/env node
// src/index.ts
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CatalogInspector } from './catalog/inspector.js';
import { loadConfig } from './config.js';
import { PostgresAdapter, createConnector, type Connector } from './db_adapter.js';
import { createServer } from './server.js';

async function shutdown(connector: Connector, code: number): Promise<never> {
    try {
        await connector.shutdown();
    } catch (error) {
        console.error("Error closing database connections:", error);
    }
    process.exit(code);
}

// --- Main Function to Start the Server ---
async function main() {
    // Resolved once; an invalid configuration stops the process here
    const config = loadConfig();
    const connector = createConnector(config);
    const inspector = new CatalogInspector(new PostgresAdapter(connector));
    const server = createServer(inspector);

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            console.error(`Received ${signal}, shutting down...`);
            void shutdown(connector, 0);
        });
    }

    const transport = new StdioServerTransport();
    try {
        console.error("Attempting to connect MCP server to STDIO transport...");
        await server.connect(transport);
        console.error("MCP Server connected via STDIO transport. Waiting for requests...");
    } catch (error) {
        console.error("Failed to connect server to transport:", error);
        await shutdown(connector, 1);
    }
}

// --- Run the Main Function ---
main().catch((error) => {
    console.error("Fatal error starting MCP server:", error);
    process.exit(1);
});
