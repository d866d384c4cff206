// src/tools/types.ts
import { z, type ZodRawShape } from 'zod';
import type { CatalogInspector } from '../catalog/inspector.js';

/**
 * Defines the standard structure for a successful or error response from an MCP tool.
 */
export type McpToolResponse = {
    // Array of content blocks, typically text for simple responses.
    content: { type: "text"; text: string }[];
    // Optional flag to indicate if the response represents an error state.
    isError?: boolean;
};

/**
 * Defines the structure for a tool definition object used for registration.
 */
export type ToolDefinition = {
    name: string;
    description: string;
    // The raw Zod shape (not the parsed schema), as the MCP server expects it.
    rawInputSchema: ZodRawShape;
    // Arguments arrive untyped from the registration loop and are parsed against rawInputSchema.
    handler: (args: unknown) => Promise<McpToolResponse>;
};

/** Everything a tool handler needs; built once at start-up. */
export type ToolContext = {
    inspector: CatalogInspector;
};

export function defineTool<Shape extends ZodRawShape>(definition: {
    name: string;
    description: string;
    rawInputSchema: Shape;
    handler: (args: z.infer<z.ZodObject<Shape>>) => Promise<McpToolResponse>;
}): ToolDefinition {
    const schema = z.object(definition.rawInputSchema);
    return {
        name: definition.name,
        description: definition.description,
        rawInputSchema: definition.rawInputSchema,
        handler: async (args) => definition.handler(schema.parse(args ?? {})),
    };
}
