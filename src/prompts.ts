// src/prompts.ts
import type { CatalogInspector } from './catalog/inspector.js';
import { type OperationResult, success } from './result.js';
import { serialize } from './tools/utils.js';

export const SQL_PROMPT_NAME = 'sql_generation_prompt';

export function buildSqlGenerationPrompt(overview: string): string {
    return `
You are helping to write SQL queries for a PostgreSQL database. Here is the current database structure:

${overview}

Please use this information to write accurate SQL queries. When suggesting queries:
1. Use the correct schema and table names
2. Reference actual column names (use the describe_table tool if needed)
3. Follow PostgreSQL syntax
4. Consider data types and constraints
5. Suggest appropriate JOINs based on foreign key relationships

What SQL query would you like help with?
`;
}

/** Embeds the serialized database overview in the SQL-writing prompt. */
export async function sqlGenerationPrompt(inspector: CatalogInspector): Promise<OperationResult<string>> {
    const overview = await inspector.getDatabaseOverview();
    if (!overview.ok) {
        return { ...overview, action: 'generating SQL prompt' };
    }
    return success(buildSqlGenerationPrompt(serialize(overview.value)));
}
