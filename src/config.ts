// src/config.ts
import 'dotenv/config'; // Load .env file variables into process.env
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export type SslConfig = {
    rejectUnauthorized: boolean;
    ca: string;
};

export type ConnectionConfig = {
    readonly host: string;
    readonly port: number;
    readonly database: string;
    readonly user: string;
    readonly password: string;
    readonly ssl?: Readonly<SslConfig>;
    // 0 keeps the one-connection-per-call model; anything above uses a bounded pool
    readonly poolMax: number;
    // 0 leaves the driver's default (no timeout)
    readonly connectTimeoutMs: number;
};

// Empty strings count as unset so that `POSTGRES_PORT=` in a .env file falls back to the default.
const optionalString = (def: string) =>
    z.string().optional().transform(value => (value === undefined || value === '' ? def : value));

const optionalInt = (def: number, min: number, max: number) =>
    z.string().optional()
        .transform(value => (value === undefined || value.trim() === '' ? String(def) : value.trim()))
        .pipe(z.coerce.number().int().min(min).max(max));

const EnvSchema = z.object({
    POSTGRES_HOST: optionalString('localhost'),
    POSTGRES_PORT: optionalInt(5433, 1, 65535),
    POSTGRES_DB: optionalString('postgres'),
    POSTGRES_USER: optionalString('postgres'),
    POSTGRES_PASSWORD: optionalString('postgres'),
    POSTGRES_SSL_CA_PATH: z.string().optional(),
    POSTGRES_POOL_MAX: optionalInt(0, 0, 100),
    POSTGRES_CONNECT_TIMEOUT_MS: optionalInt(0, 0, 600000),
});

function loadSslConfig(caPath: string | undefined): SslConfig | undefined {
    if (!caPath) {
        console.error("POSTGRES_SSL_CA_PATH not set. PostgreSQL connections will not use a custom CA certificate.");
        return undefined;
    }
    const resolvedCaPath = path.resolve(process.cwd(), caPath);
    console.error(`Reading PostgreSQL CA certificate from: ${resolvedCaPath}`);
    try {
        return {
            rejectUnauthorized: true,
            ca: fs.readFileSync(resolvedCaPath).toString(),
        };
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Failed to read PostgreSQL CA certificate from POSTGRES_SSL_CA_PATH (${caPath}): ${reason}`);
    }
}

/**
 * Resolves the connection settings once, from the environment and fixed defaults.
 * The returned object is frozen and passed explicitly to the connector.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConnectionConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid PostgreSQL configuration. ${details}`);
    }
    const vars = parsed.data;
    const ssl = loadSslConfig(vars.POSTGRES_SSL_CA_PATH);

    const config: ConnectionConfig = {
        host: vars.POSTGRES_HOST,
        port: vars.POSTGRES_PORT,
        database: vars.POSTGRES_DB,
        user: vars.POSTGRES_USER,
        password: vars.POSTGRES_PASSWORD,
        ...(ssl ? { ssl: Object.freeze(ssl) } : {}),
        poolMax: vars.POSTGRES_POOL_MAX,
        connectTimeoutMs: vars.POSTGRES_CONNECT_TIMEOUT_MS,
    };
    return Object.freeze(config);
}

/** Connection target without credentials, for log lines. */
export function describeTarget(config: ConnectionConfig): string {
    return `${config.user}@${config.host}:${config.port}/${config.database}`;
}
