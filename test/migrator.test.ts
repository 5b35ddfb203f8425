import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";

import { BootGateError } from "../src/gates/boot_gate_error";
import { loadMigrationUnits, parseMigrationFileName } from "../src/migrations/migration_loader";
import {
  listMigrationStatus,
  readAppliedMigrations,
  runPendingMigrations,
} from "../src/migrations/migrator";

const tableNames = (db: Database.Database): string[] =>
  (
    db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all() as { name: string }[]
  ).map((row) => row.name);

describe("parseMigrationFileName", () => {
  it("reads the id and name", () => {
    expect(parseMigrationFileName("20240101120000_create_users.sql")).toEqual({
      id: 20240101120000,
      name: "create_users",
    });
    expect(parseMigrationFileName("0003_add-index.sql")).toEqual({ id: 3, name: "add-index" });
  });

  it("ignores files that are not migration units", () => {
    expect(parseMigrationFileName("README.md")).toBeNull();
    expect(parseMigrationFileName("create_users.sql")).toBeNull();
    expect(parseMigrationFileName("0_zero.sql")).toBeNull();
  });
});

describe("Migrator (SQLite)", () => {
  let dir: string;
  let migrationsDir: string;
  let db: Database.Database;

  const writeUnit = (fileName: string, sql: string) => {
    writeFileSync(join(migrationsDir, fileName), sql);
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "boot-gate-migrator-"));
    migrationsDir = join(dir, "migrations");
    mkdirSync(migrationsDir);
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing directory as having no units", () => {
    expect(loadMigrationUnits(join(dir, "nope"))).toEqual([]);
    expect(runPendingMigrations(db, join(dir, "nope"))).toEqual([]);
    expect(tableNames(db)).toEqual(["schema_migrations"]);
  });

  it("applies units in ascending id order", () => {
    writeUnit("10_add_email.sql", "ALTER TABLE users ADD COLUMN email TEXT;");
    writeUnit("2_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    writeUnit("notes.txt", "not a migration");

    expect(runPendingMigrations(db, migrationsDir)).toEqual([2, 10]);
    expect(tableNames(db)).toEqual(["schema_migrations", "users"]);
    expect([...readAppliedMigrations(db).keys()]).toEqual([2, 10]);
  });

  it("skips units already recorded", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    expect(runPendingMigrations(db, migrationsDir)).toEqual([1]);

    writeUnit("2_create_orders.sql", "CREATE TABLE orders (id INTEGER PRIMARY KEY);");
    expect(runPendingMigrations(db, migrationsDir)).toEqual([2]);
    expect(runPendingMigrations(db, migrationsDir)).toEqual([]);
  });

  it("keeps earlier units and rolls back only the failing one", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    writeUnit("2_broken.sql", "CREATE TABLE orders (id INTEGER PRIMARY KEY); CREATE TABLE oops (;");
    writeUnit("3_create_items.sql", "CREATE TABLE items (id INTEGER PRIMARY KEY);");

    let caught: unknown;
    try {
      runPendingMigrations(db, migrationsDir);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BootGateError);
    if (!(caught instanceof BootGateError)) return;
    expect(caught.code).toBe("migration_failure");
    expect(caught.details.migrationId).toBe(2);
    expect(caught.details.appliedIds).toEqual([1]);
    expect(tableNames(db)).toEqual(["schema_migrations", "users"]);
    expect([...readAppliedMigrations(db).keys()]).toEqual([1]);
  });

  it("rejects duplicate ids", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    writeUnit("01_create_people.sql", "CREATE TABLE people (id INTEGER PRIMARY KEY);");

    expect(() => runPendingMigrations(db, migrationsDir)).toThrow("duplicate migration id 1");
    expect(tableNames(db)).toEqual(["schema_migrations"]);
  });

  it("lists units as up or down", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    runPendingMigrations(db, migrationsDir);
    writeUnit("2_create_orders.sql", "CREATE TABLE orders (id INTEGER PRIMARY KEY);");

    expect(listMigrationStatus(db, migrationsDir)).toEqual([
      { id: 1, name: "create_users", status: "up", checksumMismatch: false },
      { id: 2, name: "create_orders", status: "down", checksumMismatch: false },
    ]);
  });

  it("flags applied units whose file changed or disappeared", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");
    writeUnit("2_create_orders.sql", "CREATE TABLE orders (id INTEGER PRIMARY KEY);");
    runPendingMigrations(db, migrationsDir);

    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT);");
    rmSync(join(migrationsDir, "2_create_orders.sql"));

    expect(listMigrationStatus(db, migrationsDir)).toEqual([
      { id: 1, name: "create_users", status: "up", checksumMismatch: true },
      { id: 2, name: null, status: "up", checksumMismatch: false },
    ]);
  });

  it("does not create the bookkeeping table when listing", () => {
    writeUnit("1_create_users.sql", "CREATE TABLE users (id INTEGER PRIMARY KEY);");

    expect(listMigrationStatus(db, migrationsDir)).toEqual([
      { id: 1, name: "create_users", status: "down", checksumMismatch: false },
    ]);
    expect(tableNames(db)).toEqual([]);
  });
});
