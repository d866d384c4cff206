// src/catalog/inspector.ts
import type { QueryExecutor } from '../db_adapter.js';
import { ValidationError } from '../errors.js';
import type { ResultSet, SqlValue } from '../normalize.js';
import { attempt, failure, type OperationResult } from '../result.js';
import { assertReadOnlyQuery, quoteQualifiedName } from './guard.js';
import {
    DATABASE_OVERVIEW_SQL,
    LIST_SCHEMAS_SQL,
    PING_SQL,
    SCHEMA_NAMES_SQL,
    STRUCTURE_COLUMNS_SQL,
    STRUCTURE_TABLES_SQL,
    describeColumnsQuery,
    describeConstraintsQuery,
    listTablesQuery,
    sampleDataQuery,
    type QueryRequest,
} from './queries.js';

export const DEFAULT_SCHEMA = 'public';
export const DEFAULT_SAMPLE_LIMIT = 10;

export type TableDescriptor = {
    table_name: string;
    schema_name: string;
    columns: ResultSet;
    constraints: ResultSet;
};

export type TableStructure = {
    table_type: SqlValue;
    columns: ResultSet;
};

/** schema name -> table name -> structure */
export type DatabaseStructure = Record<string, Record<string, TableStructure>>;

function textField(value: SqlValue | undefined, field: string): string {
    if (typeof value !== 'string') {
        throw new Error(`Catalog row is missing the text field '${field}'.`);
    }
    return value;
}

/**
 * Builds the catalog statements for each introspection operation and runs them
 * through the executor. Every call starts from scratch; nothing is cached.
 */
export class CatalogInspector {
    constructor(private readonly executor: QueryExecutor) {}

    private run(request: QueryRequest): Promise<ResultSet> {
        return this.executor.execute(request.statement, request.params);
    }

    listSchemas(): Promise<OperationResult<ResultSet>> {
        return attempt('listing schemas', () => this.executor.execute(LIST_SCHEMAS_SQL));
    }

    listTables(schemaName: string = DEFAULT_SCHEMA): Promise<OperationResult<ResultSet>> {
        return attempt(`listing tables in schema '${schemaName}'`, () => this.run(listTablesQuery(schemaName)));
    }

    describeTable(tableName: string, schemaName: string = DEFAULT_SCHEMA): Promise<OperationResult<TableDescriptor>> {
        return attempt(`describing table '${schemaName}.${tableName}'`, async () => {
            const columns = await this.run(describeColumnsQuery(tableName, schemaName)); // ordered by ordinal_position
            const constraints = await this.run(describeConstraintsQuery(tableName, schemaName)); // PK, FK, UNIQUE, then the rest
            return {
                table_name: tableName,
                schema_name: schemaName,
                columns,
                constraints,
            };
        });
    }

    getSampleData(
        tableName: string,
        schemaName: string = DEFAULT_SCHEMA,
        limit: number = DEFAULT_SAMPLE_LIMIT,
    ): Promise<OperationResult<ResultSet>> {
        return attempt(`getting sample data from '${schemaName}.${tableName}'`, async () => {
            if (!Number.isSafeInteger(limit) || limit < 0) {
                throw new ValidationError(`The row limit must be a non-negative integer, got ${limit}.`);
            }
            // Names are quoted into the statement; the limit is bound as $1
            return this.run(sampleDataQuery(quoteQualifiedName(schemaName, tableName), limit));
        });
    }

    async executeSqlQuery(query: string): Promise<OperationResult<ResultSet>> {
        try {
            assertReadOnlyQuery(query); // before any connection is opened
        } catch (error: unknown) {
            return failure(error); // no action label: the message stands on its own
        }
        return attempt('executing query', () => this.executor.execute(query, [], { readOnly: true }));
    }

    getDatabaseOverview(): Promise<OperationResult<ResultSet>> {
        return attempt('getting database overview', () => this.executor.execute(DATABASE_OVERVIEW_SQL));
    }

    /**
     * Walks the whole catalog: one schema query, one table query per schema and one
     * column query per table. Unbounded; meant for small and medium databases.
     */
    getDatabaseStructure(): Promise<OperationResult<DatabaseStructure>> {
        return attempt('getting database structure', async () => {
            // Built from entries, so a schema or table literally named "__proto__" is kept
            const schemaEntries: [string, Record<string, TableStructure>][] = [];
            const schemas = await this.executor.execute(SCHEMA_NAMES_SQL);

            for (const schema of schemas) {
                const schemaName = textField(schema.schema_name, 'schema_name');
                const tables = await this.executor.execute(STRUCTURE_TABLES_SQL, [schemaName]);
                const tableEntries: [string, TableStructure][] = [];

                for (const table of tables) {
                    const tableName = textField(table.table_name, 'table_name');
                    const columns = await this.executor.execute(STRUCTURE_COLUMNS_SQL, [tableName, schemaName]);
                    tableEntries.push([tableName, {
                        table_type: table.table_type ?? null, // BASE TABLE, VIEW, ...
                        columns,
                    }]);
                }
                schemaEntries.push([schemaName, Object.fromEntries(tableEntries)]);
            }
            return Object.fromEntries(schemaEntries);
        });
    }

    ping(): Promise<OperationResult<ResultSet>> {
        return attempt('checking database connection', () => this.executor.execute(PING_SQL));
    }
}
