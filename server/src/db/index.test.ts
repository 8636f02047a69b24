import { describe, expect, it } from "vitest";
import { ConfigError } from "../config.js";
import { getDefaultSqlitePath } from "../services/paths.js";
import { convertPlaceholders, createSqliteClient } from "./driver.js";
import { resolveDatabaseTarget } from "./index.js";

describe("resolveDatabaseTarget", () => {
  it("uses the embedded sqlite file when unset", () => {
    expect(resolveDatabaseTarget(undefined)).toEqual({
      driver: "sqlite",
      location: getDefaultSqlitePath(),
    });
    expect(resolveDatabaseTarget("  ")).toEqual({
      driver: "sqlite",
      location: getDefaultSqlitePath(),
    });
  });

  it("selects postgres for postgres:// and postgresql:// URLs", () => {
    expect(resolveDatabaseTarget("postgres://u:p@db:5432/news")).toEqual({
      driver: "postgres",
      location: "postgres://u:p@db:5432/news",
    });
    expect(resolveDatabaseTarget("postgresql://db/news").driver).toBe("postgres");
  });

  it("accepts sqlite: and file: paths", () => {
    expect(resolveDatabaseTarget("sqlite:///tmp/subs.db")).toEqual({
      driver: "sqlite",
      location: "/tmp/subs.db",
    });
    expect(resolveDatabaseTarget("sqlite::memory:")).toEqual({
      driver: "sqlite",
      location: ":memory:",
    });
    expect(resolveDatabaseTarget("file:data/subs.db")).toEqual({
      driver: "sqlite",
      location: "data/subs.db",
    });
  });

  it("rejects a sqlite URL without a path", () => {
    expect(() => resolveDatabaseTarget("sqlite:")).toThrow(ConfigError);
    expect(() => resolveDatabaseTarget("sqlite://")).toThrow(
      "DATABASE_URL sqlite: has no database path. Use e.g. sqlite:///path/to/subscribers.db or sqlite::memory:.",
    );
  });

  it("rejects other schemes with a ConfigError", () => {
    expect(() => resolveDatabaseTarget("mysql://db/news")).toThrow(ConfigError);
    expect(() => resolveDatabaseTarget("mysql://db/news")).toThrow(
      /Unsupported DATABASE_URL scheme: mysql/,
    );
  });
});

describe("createSqliteClient", () => {
  it("opens without options", async () => {
    const client = createSqliteClient(":memory:");
    expect((await client.query("SELECT 1 AS one")).rows).toEqual([{ one: 1 }]);
    await client.close();
  });

  it("accepts a busy timeout", async () => {
    const client = createSqliteClient(":memory:", { busyTimeoutMs: 250 });
    expect((await client.query("PRAGMA busy_timeout")).rows).toEqual([{ timeout: 250 }]);
    await client.close();
  });
});

describe("convertPlaceholders", () => {
  it("numbers ? placeholders in order", () => {
    expect(convertPlaceholders("SELECT * FROM t WHERE a = ? AND b = ?")).toBe(
      "SELECT * FROM t WHERE a = $1 AND b = $2",
    );
  });

  it("leaves SQL without placeholders untouched", () => {
    expect(convertPlaceholders("SELECT 1")).toBe("SELECT 1");
  });
});
