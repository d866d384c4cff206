import { describe, it, expect } from "vitest";
import { normalizeValue, toResultRow } from "../src/normalize.js";

describe("normalizeValue", () => {
    it("passes JSON-native scalars through", () => {
        expect(normalizeValue("text")).toBe("text");
        expect(normalizeValue(42)).toBe(42);
        expect(normalizeValue(1.5)).toBe(1.5);
        expect(normalizeValue(true)).toBe(true);
        expect(normalizeValue(null)).toBeNull();
        expect(normalizeValue(undefined)).toBeNull();
    });

    it("renders values JSON cannot carry as text", () => {
        expect(normalizeValue(10n)).toBe("10");
        expect(normalizeValue(Number.NaN)).toBe("NaN");
        expect(normalizeValue(Number.POSITIVE_INFINITY)).toBe("Infinity");
    });

    it("keeps temporal text exactly as the server sent it", () => {
        expect(normalizeValue("2024-01-01")).toBe("2024-01-01");
        expect(normalizeValue("2024-01-01 00:00:00.123456")).toBe("2024-01-01 00:00:00.123456");
    });

    it("renders bytea as hex", () => {
        expect(normalizeValue(Buffer.from([0xde, 0xad, 0xbe, 0xef]))).toBe("\\xdeadbeef");
    });

    it("walks arrays and json objects", () => {
        expect(normalizeValue({ tags: ["a", "b"], seen: [10n, null] })).toEqual({
            tags: ["a", "b"],
            seen: ["10", null],
        });
    });

    it("keeps a json key named __proto__", () => {
        expect(JSON.stringify(normalizeValue(JSON.parse('{"__proto__":5,"a":1}')))).toBe('{"__proto__":5,"a":1}');
    });

    it("round-trips non-timestamp values through JSON", () => {
        const row = toResultRow(["name", "count", "active", "note"], ["widget", 3, false, null]);
        expect(JSON.parse(JSON.stringify(row))).toEqual(row);
    });
});

describe("toResultRow", () => {
    it("keys values by column name in column order", () => {
        const row = toResultRow(["id", "name", "created_at"], [7, "ada", "2020-06-01 00:00:00+00"]);
        expect(Object.keys(row)).toEqual(["id", "name", "created_at"]);
        expect(row).toEqual({ id: 7, name: "ada", created_at: "2020-06-01 00:00:00+00" });
    });

    it("keeps a column named __proto__ as an own property", () => {
        const row = toResultRow(["__proto__"], [1]);
        expect(Object.keys(row)).toEqual(["__proto__"]);
        expect(JSON.stringify(row)).toBe('{"__proto__":1}');
    });
});
