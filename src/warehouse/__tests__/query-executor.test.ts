import { describe, expect, it } from "vitest";
import {
  QueryExecutionError,
  coerceScalar,
  toQueryExecutionError,
} from "../query-executor.ts";

describe("coerceScalar", () => {
  it("returns null for an absent value", () => {
    expect(coerceScalar(undefined)).toBeNull();
    expect(coerceScalar(null)).toBeNull();
  });

  it("passes numbers through", () => {
    expect(coerceScalar(0)).toBe(0);
    expect(coerceScalar(94.99)).toBe(94.99);
  });

  it("parses bigint strings and decimal strings", () => {
    expect(coerceScalar("12")).toBe(12);
    expect(coerceScalar("95.00")).toBe(95);
  });

  it("converts bigints", () => {
    expect(coerceScalar(BigInt(7))).toBe(7);
  });

  it("rejects values that are not numeric", () => {
    expect(() => coerceScalar("abc")).toThrow(QueryExecutionError);
    expect(() => coerceScalar("")).toThrow(QueryExecutionError);
    expect(() => coerceScalar(true)).toThrow('Scalar result is not numeric: true');
    try {
      coerceScalar("NaN");
    } catch (err) {
      expect(err).toBeInstanceOf(QueryExecutionError);
      expect((err as QueryExecutionError).code).toBe("NON_NUMERIC_RESULT");
    }
  });
});

describe("toQueryExecutionError", () => {
  it("returns an existing QueryExecutionError unchanged", () => {
    const original = new QueryExecutionError("boom", "QUERY_FAILED");
    expect(toQueryExecutionError(original)).toBe(original);
  });

  it("keeps the driver message and SQLSTATE", () => {
    const driverError = Object.assign(new Error('relation "silver.x" does not exist'), {
      code: "42P01",
    });

    const err = toQueryExecutionError(driverError);

    expect(err.message).toBe('relation "silver.x" does not exist');
    expect(err.code).toBe("QUERY_FAILED");
    expect(err.sqlState).toBe("42P01");
    expect(err.cause).toBe(driverError);
  });

  it("uses the given code and stringifies non-errors", () => {
    const err = toQueryExecutionError("ECONNREFUSED", "CONNECTION_FAILED");

    expect(err.message).toBe("ECONNREFUSED");
    expect(err.code).toBe("CONNECTION_FAILED");
    expect(err.sqlState).toBeUndefined();
  });
});
