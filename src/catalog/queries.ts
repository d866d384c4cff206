// src/catalog/queries.ts
// Statement templates against information_schema. Values are always bound ($n);
// the only text ever spliced in is a quoted identifier pair (see sampleDataQuery).

import type { SqlParam } from '../normalize.js';

export type QueryRequest = {
    statement: string;
    params: SqlParam[];
};

export const SYSTEM_SCHEMAS = ['information_schema', 'pg_catalog', 'pg_toast'] as const;

const SYSTEM_SCHEMA_LIST = SYSTEM_SCHEMAS.map(name => `'${name}'`).join(', ');

export const LIST_SCHEMAS_SQL = `
SELECT
    schema_name,
    schema_owner
FROM information_schema.schemata
WHERE schema_name NOT IN (${SYSTEM_SCHEMA_LIST})
ORDER BY schema_name;`;

export const SCHEMA_NAMES_SQL = `
SELECT schema_name
FROM information_schema.schemata
WHERE schema_name NOT IN (${SYSTEM_SCHEMA_LIST})
ORDER BY schema_name;`;

export const LIST_TABLES_SQL = `
SELECT
    table_name,
    table_type,
    table_schema
FROM information_schema.tables
WHERE table_schema = $1
ORDER BY table_name;`;

export const STRUCTURE_TABLES_SQL = `
SELECT table_name, table_type
FROM information_schema.tables
WHERE table_schema = $1
ORDER BY table_name;`;

export const DESCRIBE_COLUMNS_SQL = `
SELECT
    column_name,
    data_type,
    is_nullable,
    column_default,
    character_maximum_length,
    numeric_precision,
    numeric_scale,
    ordinal_position
FROM information_schema.columns
WHERE table_name = $1 AND table_schema = $2
ORDER BY ordinal_position;`;

export const STRUCTURE_COLUMNS_SQL = `
SELECT
    column_name,
    data_type,
    is_nullable,
    column_default
FROM information_schema.columns
WHERE table_name = $1 AND table_schema = $2
ORDER BY ordinal_position;`;

// Referenced columns are resolved through referential_constraints and the unique
// key they point at, paired by position, so composite keys do not fan out.
// The engine's implicit "<oid>_<oid>_<n>_not_null" check entries are left out.
export const DESCRIBE_CONSTRAINTS_SQL = `
SELECT
    tc.constraint_name,
    tc.constraint_type,
    kcu.column_name,
    CASE WHEN tc.constraint_type = 'FOREIGN KEY' THEN kcu_ref.table_name END AS foreign_table_name,
    CASE WHEN tc.constraint_type = 'FOREIGN KEY' THEN kcu_ref.column_name END AS foreign_column_name
FROM information_schema.table_constraints tc
LEFT JOIN information_schema.key_column_usage kcu
    ON tc.constraint_schema = kcu.constraint_schema
    AND tc.constraint_name = kcu.constraint_name
    AND tc.table_name = kcu.table_name
LEFT JOIN information_schema.referential_constraints rc
    ON tc.constraint_schema = rc.constraint_schema
    AND tc.constraint_name = rc.constraint_name
LEFT JOIN information_schema.key_column_usage kcu_ref
    ON rc.unique_constraint_schema = kcu_ref.constraint_schema
    AND rc.unique_constraint_name = kcu_ref.constraint_name
    AND kcu.position_in_unique_constraint = kcu_ref.ordinal_position
WHERE tc.table_name = $1 AND tc.table_schema = $2
    AND NOT (tc.constraint_type = 'CHECK' AND tc.constraint_name ~ '^[0-9]+_[0-9]+_[0-9]+_not_null$')
ORDER BY
    CASE tc.constraint_type
        WHEN 'PRIMARY KEY' THEN 1
        WHEN 'FOREIGN KEY' THEN 2
        WHEN 'UNIQUE' THEN 3
        ELSE 4
    END,
    tc.constraint_name,
    kcu.ordinal_position;`;

// Every relation list_tables reports is counted, so table_count matches it per schema.
export const DATABASE_OVERVIEW_SQL = `
SELECT
    s.schema_name,
    COUNT(t.table_name)::int AS table_count,
    string_agg(t.table_name, ', ' ORDER BY t.table_name) AS tables
FROM information_schema.schemata s
LEFT JOIN information_schema.tables t
    ON s.schema_name = t.table_schema
WHERE s.schema_name NOT IN (${SYSTEM_SCHEMA_LIST})
GROUP BY s.schema_name
ORDER BY s.schema_name;`;

export const PING_SQL = 'SELECT current_database() AS database, version() AS server_version;';

export function listTablesQuery(schemaName: string): QueryRequest {
    return { statement: LIST_TABLES_SQL, params: [schemaName] };
}

export function describeColumnsQuery(tableName: string, schemaName: string): QueryRequest {
    return { statement: DESCRIBE_COLUMNS_SQL, params: [tableName, schemaName] };
}

export function describeConstraintsQuery(tableName: string, schemaName: string): QueryRequest {
    return { statement: DESCRIBE_CONSTRAINTS_SQL, params: [tableName, schemaName] };
}

/** `qualifiedTable` must already be quoted; see quoteQualifiedName. */
export function sampleDataQuery(qualifiedTable: string, limit: number): QueryRequest {
    return { statement: `SELECT * FROM ${qualifiedTable} LIMIT $1;`, params: [limit] };
}
