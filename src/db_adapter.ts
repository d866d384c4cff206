// src/db_adapter.ts
import pg from 'pg';
import type { ClientBase, ClientConfig, PoolClient as PgClient, QueryArrayConfig } from 'pg';
import { performance } from 'perf_hooks';
import { describeTarget, type ConnectionConfig } from './config.js';
import { ConnectionError, QueryError } from './errors.js';
import { toResultRow, type ResultSet, type SqlParam } from './normalize.js';

// --- Connection Layer ---

/** Raw result as handed back by the driver: positional rows plus the row description. */
export type RawResult = {
    fieldNames: string[];
    rows: unknown[][];
};

export interface DatabaseConnection {
    query(statement: string, params: readonly SqlParam[]): Promise<RawResult>;
    // `discard` asks a pooled connection to be destroyed rather than reused
    close(discard?: boolean): Promise<void>;
}

export interface Connector {
    readonly kind: 'client' | 'pool';
    connect(): Promise<DatabaseConnection>;
    shutdown(): Promise<void>;
}

type Queryable = Pick<ClientBase, 'query'>;

// Date and time values stay as the server's text. The stock parsers build
// local-time Date objects, which moves DATE and TIMESTAMP values off their
// stored wall-clock value outside UTC and cuts microseconds.
const TEMPORAL_OIDS = [
    1082, // date
    1083, // time
    1114, // timestamp
    1184, // timestamptz
    1266, // timetz
];
const TEMPORAL_ARRAY_OIDS = [
    1182, // date[]
    1183, // time[]
    1115, // timestamp[]
    1185, // timestamptz[]
    1270, // timetz[]
];
const TEXT_ARRAY_OID = 1009;

export const temporalTypes = new pg.TypeOverrides();
for (const oid of TEMPORAL_OIDS) {
    temporalTypes.setTypeParser(oid, (value: string) => value);
}
const parseTextArray = pg.types.getTypeParser(TEXT_ARRAY_OID);
for (const oid of TEMPORAL_ARRAY_OIDS) {
    temporalTypes.setTypeParser(oid, parseTextArray);
}

async function runArrayQuery(client: Queryable, statement: string, params: readonly SqlParam[]): Promise<RawResult> {
    const queryConfig: QueryArrayConfig<SqlParam[]> & { queryMode: 'extended' } = {
        text: statement,
        values: [...params],
        rowMode: 'array', // positional rows, zipped with the field names in toResultRow
        types: temporalTypes,
        // Extended protocol: the server itself refuses more than one statement per call
        queryMode: 'extended',
    };
    const result = await client.query<unknown[], SqlParam[]>(queryConfig);
    // Utility statements (SET, BEGIN, ...) come back with an empty field list
    return {
        fieldNames: result.fields.map(field => field.name),
        rows: result.rows,
    };
}

function clientOptions(config: ConnectionConfig): ClientConfig {
    return {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl ? { ...config.ssl } : undefined, // undefined leaves TLS off
        connectionTimeoutMillis: config.connectTimeoutMs || undefined, // 0 means the driver default
    };
}

/** Opens a dedicated client for every call and ends it afterwards. */
export function createClientConnector(config: ConnectionConfig): Connector {
    return {
        kind: 'client',
        async connect(): Promise<DatabaseConnection> {
            const client = new pg.Client(clientOptions(config));
            try {
                await client.connect();
            } catch (error: unknown) {
                // A failed connect can leave a half-open socket behind
                await client.end().catch((endError: unknown) => {
                    console.error('[PostgresAdapter] Error closing failed client:', endError);
                });
                throw error;
            }
            return {
                query: (statement, params) => runArrayQuery(client, statement, params),
                close: () => client.end(),
            };
        },
        async shutdown(): Promise<void> {
            // Nothing is held between calls
        },
    };
}

/** Bounded pool behind the same contract, for higher call volumes. */
export function createPoolConnector(config: ConnectionConfig): Connector {
    const pool = new pg.Pool({
        ...clientOptions(config),
        max: config.poolMax, // POSTGRES_POOL_MAX
        idleTimeoutMillis: 300000, // Close idle clients after 5 minutes
    });
    // An idle client can lose its backend; without a listener the process would crash
    pool.on('error', (error) => {
        console.error('[PostgresAdapter] Idle pool client error:', error);
    });
    return {
        kind: 'pool',
        async connect(): Promise<DatabaseConnection> {
            const client: PgClient = await pool.connect();
            return {
                query: (statement, params) => runArrayQuery(client, statement, params),
                close: async (discard = false) => {
                    client.release(discard);
                },
            };
        },
        shutdown: () => pool.end(),
    };
}

export function createConnector(config: ConnectionConfig): Connector {
    const connector = config.poolMax > 0 ? createPoolConnector(config) : createClientConnector(config);
    console.error(`[PostgresAdapter] Using ${connector.kind === 'pool' ? `a pool of up to ${config.poolMax} connections` : 'one connection per call'} to ${describeTarget(config)}.`);
    return connector;
}

// --- Execution Layer ---

export type ExecuteOptions = {
    // Runs the statement inside BEGIN TRANSACTION READ ONLY ... ROLLBACK
    readOnly?: boolean;
};

export interface QueryExecutor {
    execute(statement: string, params?: readonly SqlParam[], options?: ExecuteOptions): Promise<ResultSet>;
}

const BEGIN_READ_ONLY = 'BEGIN TRANSACTION READ ONLY';

function preview(statement: string): string {
    const flat = statement.replace(/\s+/g, ' ').trim();
    return flat.length > 100 ? `${flat.substring(0, 100)}...` : flat;
}

/**
 * Runs one statement per call on a scoped connection and maps the result set
 * into column-name keyed rows. The connection is released on every exit path.
 * Nothing is retried.
 */
export class PostgresAdapter implements QueryExecutor {
    constructor(private readonly connector: Connector) {}

    async execute(statement: string, params: readonly SqlParam[] = [], options: ExecuteOptions = {}): Promise<ResultSet> {
        let connection: DatabaseConnection;
        try {
            connection = await this.connector.connect();
        } catch (error: unknown) {
            console.error('[PostgresAdapter] Connection failed:', error);
            throw ConnectionError.from(error);
        }

        const startTime = performance.now();
        let discard = false; // set when the session state can no longer be trusted
        try {
            const result = options.readOnly
                ? await this.runReadOnly(connection, statement, params, () => { discard = true; })
                : await connection.query(statement, params);
            const rows = result.fieldNames.length === 0
                ? []
                : result.rows.map(values => toResultRow(result.fieldNames, values));
            console.error(`[PostgresAdapter] ${rows.length} row(s) in ${(performance.now() - startTime).toFixed(2)} ms: ${preview(statement)}`);
            return rows;
        } catch (error: unknown) {
            console.error(`[PostgresAdapter] Query failed: ${preview(statement)}`, error);
            throw QueryError.from(error);
        } finally {
            try {
                await connection.close(discard);
            } catch (closeError: unknown) {
                console.error('[PostgresAdapter] Error releasing connection:', closeError);
            }
        }
    }

    private async runReadOnly(
        connection: DatabaseConnection,
        statement: string,
        params: readonly SqlParam[],
        markBroken: () => void,
    ): Promise<RawResult> {
        await connection.query(BEGIN_READ_ONLY, []);
        try {
            return await connection.query(statement, params);
        } finally {
            try {
                await connection.query('ROLLBACK', []);
            } catch (rollbackError: unknown) {
                console.error('[PostgresAdapter] Error rolling back read-only transaction:', rollbackError);
                markBroken();
            }
        }
    }
}
