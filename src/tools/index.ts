// src/tools/index.ts
import type { ToolContext, ToolDefinition } from './types.js';
import { createSchemaTools } from './schema.js';
import { createMetadataTools } from './metadata.js';
import { createExecutionTools } from './execution.js';

/** Every tool the server registers, bound to one inspector. */
export function createTools(context: ToolContext): ToolDefinition[] {
    return [
        ...createSchemaTools(context),
        ...createMetadataTools(context),
        ...createExecutionTools(context),
    ];
}
