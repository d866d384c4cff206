import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { ConnectionConfig } from "../src/config.js";
import {
    PostgresAdapter,
    createClientConnector,
    createConnector,
    createPoolConnector,
    temporalTypes,
} from "../src/db_adapter.js";
import { ConnectionError } from "../src/errors.js";

// Stand-ins for pg.Client and pg.Pool that record what the adapter hands the driver.
const driver = vi.hoisted(() => {
    type SentConfig = { text: string; values?: unknown[]; rowMode?: string; types?: unknown; queryMode?: string };
    type Reply = { fields: { name: string }[]; rows: unknown[][] };
    type DriverState = {
        clients: FakePgClient[];
        pools: FakePgPool[];
        connectError?: Error;
        failOn?: string;
        reply: (config: SentConfig) => Reply;
    };

    const state: DriverState = {
        clients: [],
        pools: [],
        reply: () => ({ fields: [], rows: [] }),
    };

    class FakePgClient {
        readonly sent: SentConfig[] = [];
        readonly released: (boolean | undefined)[] = [];
        endCount = 0;

        constructor(readonly options: unknown) {
            state.clients.push(this);
        }

        async connect(): Promise<void> {
            if (state.connectError) throw state.connectError;
        }

        async query(config: SentConfig): Promise<Reply> {
            this.sent.push(config);
            if (state.failOn === config.text) throw new Error(`cannot run ${config.text}`);
            return state.reply(config);
        }

        async end(): Promise<void> {
            this.endCount += 1;
        }

        release(discard?: boolean): void {
            this.released.push(discard);
        }
    }

    class FakePgPool {
        readonly listeners = new Map<string, (error: Error) => void>();
        endCount = 0;

        constructor(readonly options: unknown) {
            state.pools.push(this);
        }

        on(event: string, listener: (error: Error) => void): this {
            this.listeners.set(event, listener);
            return this;
        }

        async connect(): Promise<FakePgClient> {
            if (state.connectError) throw state.connectError;
            return new FakePgClient({});
        }

        async end(): Promise<void> {
            this.endCount += 1;
        }
    }

    return { state, FakePgClient, FakePgPool };
});

vi.mock("pg", async (importOriginal) => {
    const actual = await importOriginal<{ default: object }>();
    return { default: { ...actual.default, Client: driver.FakePgClient, Pool: driver.FakePgPool } };
});

const config: ConnectionConfig = {
    host: "db.test",
    port: 5433,
    database: "inventory",
    user: "reader",
    password: "test-secret",
    poolMax: 0,
    connectTimeoutMs: 0,
};

describe("pg wiring", () => {
    const { state } = driver;

    beforeEach(() => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        state.clients.length = 0;
        state.pools.length = 0;
        state.connectError = undefined;
        state.failOn = undefined;
        state.reply = () => ({ fields: [], rows: [] });
    });
    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
    });

    describe("client connector", () => {
        it("sends array-mode queries over the extended protocol and names the columns", async () => {
            state.reply = () => ({ fields: [{ name: "id" }, { name: "name" }], rows: [[1, "ada"], [2, "grace"]] });
            const adapter = new PostgresAdapter(createClientConnector(config));

            await expect(adapter.execute("SELECT id, name FROM users WHERE active = $1", [true])).resolves.toEqual([
                { id: 1, name: "ada" },
                { id: 2, name: "grace" },
            ]);

            expect(state.clients).toHaveLength(1);
            expect(state.clients[0].sent).toEqual([{
                text: "SELECT id, name FROM users WHERE active = $1",
                values: [true],
                rowMode: "array",
                types: temporalTypes,
                queryMode: "extended",
            }]);
            expect(state.clients[0].endCount).toBe(1);
        });

        it("passes the connection settings to the driver", async () => {
            const connector = createClientConnector({
                ...config,
                connectTimeoutMs: 5000,
                ssl: { rejectUnauthorized: true, ca: "test-ca" },
            });

            const connection = await connector.connect();
            await connection.close();

            expect(state.clients[0].options).toEqual({
                host: "db.test",
                port: 5433,
                database: "inventory",
                user: "reader",
                password: "test-secret",
                ssl: { rejectUnauthorized: true, ca: "test-ca" },
                connectionTimeoutMillis: 5000,
            });
        });

        it("leaves TLS and the timeout to the driver when unset", async () => {
            const connection = await createClientConnector(config).connect();
            await connection.close();

            expect(state.clients[0].options).toMatchObject({ ssl: undefined, connectionTimeoutMillis: undefined });
        });

        it("ends a client whose connect failed", async () => {
            state.connectError = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5433"), { code: "ECONNREFUSED" });
            const adapter = new PostgresAdapter(createClientConnector(config));

            const failure = adapter.execute("SELECT 1");
            await expect(failure).rejects.toBeInstanceOf(ConnectionError);
            await expect(failure).rejects.toMatchObject({ code: "ECONNREFUSED" });
            expect(state.clients[0].endCount).toBe(1);
        });
    });

    describe("pool connector", () => {
        it("creates a bounded pool from the connection settings", () => {
            createPoolConnector({ ...config, poolMax: 3 });

            expect(state.pools[0].options).toMatchObject({
                host: "db.test",
                database: "inventory",
                max: 3,
                idleTimeoutMillis: 300000,
            });
        });

        it("releases the client after a read-only query", async () => {
            state.reply = ({ text }) => (text === "SELECT 1 AS one" ? { fields: [{ name: "one" }], rows: [[1]] } : { fields: [], rows: [] });
            const adapter = new PostgresAdapter(createPoolConnector({ ...config, poolMax: 3 }));

            await expect(adapter.execute("SELECT 1 AS one", [], { readOnly: true })).resolves.toEqual([{ one: 1 }]);

            expect(state.clients[0].sent.map(sent => sent.text)).toEqual(["BEGIN TRANSACTION READ ONLY", "SELECT 1 AS one", "ROLLBACK"]);
            expect(state.clients[0].released).toEqual([false]);
        });

        it("discards the client when the rollback fails", async () => {
            state.failOn = "ROLLBACK";
            state.reply = ({ text }) => (text === "SELECT 1 AS one" ? { fields: [{ name: "one" }], rows: [[1]] } : { fields: [], rows: [] });
            const adapter = new PostgresAdapter(createPoolConnector({ ...config, poolMax: 3 }));

            await expect(adapter.execute("SELECT 1 AS one", [], { readOnly: true })).resolves.toEqual([{ one: 1 }]);

            expect(state.clients[0].released).toEqual([true]);
        });

        it("logs idle client errors instead of crashing", () => {
            createPoolConnector({ ...config, poolMax: 3 });
            const error = new Error("terminating connection due to administrator command");

            const listener = state.pools[0].listeners.get("error");
            expect(listener).toBeDefined();
            listener?.(error);

            expect(console.error).toHaveBeenCalledWith("[PostgresAdapter] Idle pool client error:", error);
        });

        it("ends the pool on shutdown", async () => {
            await createPoolConnector({ ...config, poolMax: 3 }).shutdown();

            expect(state.pools[0].endCount).toBe(1);
        });
    });

    it("picks the pool only when a pool size is configured", () => {
        expect(createConnector(config).kind).toBe("client");
        expect(createConnector({ ...config, poolMax: 2 }).kind).toBe("pool");
        expect(state.pools).toHaveLength(1);
    });

    describe("temporal values", () => {
        it("come back as the server's text outside UTC", () => {
            vi.stubEnv("TZ", "Europe/Berlin");
            expect(new Date(2024, 0, 1).getTimezoneOffset()).toBe(-60);

            expect(temporalTypes.getTypeParser(1082)("2024-01-01")).toBe("2024-01-01");
            expect(temporalTypes.getTypeParser(1114)("2024-01-01 00:00:00.123456")).toBe("2024-01-01 00:00:00.123456");
            expect(temporalTypes.getTypeParser(1184)("2024-01-01 00:00:00.123456+01")).toBe("2024-01-01 00:00:00.123456+01");
            expect(temporalTypes.getTypeParser(1083)("12:30:00.5")).toBe("12:30:00.5");
        });

        it("parse arrays into lists of text", () => {
            expect(temporalTypes.getTypeParser(1182)("{2024-01-01,2024-02-29}")).toEqual(["2024-01-01", "2024-02-29"]);
        });

        it("leave other types to the stock parsers", () => {
            expect(temporalTypes.getTypeParser(23)("42")).toBe(42);
        });
    });
});
