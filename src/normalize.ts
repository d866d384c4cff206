// src/normalize.ts

export type SqlParam = string | number | boolean | null;

export type SqlValue = string | number | boolean | null | SqlValue[] | { [key: string]: SqlValue };

export type ResultRow = Record<string, SqlValue>;
export type ResultSet = ResultRow[];

/**
 * Converts a driver value into something JSON can carry without loss of meaning.
 * node-postgres hands back int8/numeric as strings already, and the adapter keeps
 * date and time types as text; bigint only shows up from custom type parsers.
 */
export function normalizeValue(value: unknown): SqlValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
    if (typeof value === 'bigint') return value.toString();
    if (typeof value !== 'object') return String(value);

    // bytea, rendered the way psql prints it
    if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
    if (Array.isArray(value)) return value.map((item: unknown) => normalizeValue(item));

    // fromEntries defines own properties, so a "__proto__" key survives
    return Object.fromEntries(
        Object.entries(value).map(([key, item]): [string, SqlValue] => [key, normalizeValue(item)]),
    );
}

/** Zips a positional row with the statement's column names. */
export function toResultRow(fieldNames: readonly string[], values: readonly unknown[]): ResultRow {
    return Object.fromEntries(
        fieldNames.map((name, index): [string, SqlValue] => [name, normalizeValue(values[index])]),
    );
}
