import type Database from "better-sqlite3";

import { BootGateError, describeError } from "../gates/boot_gate_error";
import { loadMigrationUnits } from "./migration_loader";

export const SCHEMA_MIGRATIONS_TABLE = "schema_migrations";

export type MigrationStatusEntry = {
  id: number;
  name: string | null;
  status: "up" | "down";
  // Applied unit whose file changed since it ran
  checksumMismatch: boolean;
};

type AppliedRow = { version: number; checksum: string | null };

export function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA_MIGRATIONS_TABLE} (
      version INTEGER PRIMARY KEY,
      checksum TEXT,
      inserted_at TEXT NOT NULL
    );
  `);
}

function hasMigrationsTable(db: Database.Database): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(SCHEMA_MIGRATIONS_TABLE) as { name: string } | undefined;
  return Boolean(row);
}

export function readAppliedMigrations(db: Database.Database): Map<number, string | null> {
  if (!hasMigrationsTable(db)) return new Map();

  const rows = db
    .prepare(`SELECT version, checksum FROM ${SCHEMA_MIGRATIONS_TABLE} ORDER BY version`)
    .all() as AppliedRow[];
  return new Map(rows.map((row) => [row.version, row.checksum]));
}

/**
 * Applies every unit in `dir` not yet recorded, ascending by id.
 *
 * Each unit commits together with its `schema_migrations` row. The first
 * failing unit stops the run; units applied before it stay applied.
 * Unit SQL must not open or close transactions itself.
 */
export function runPendingMigrations(db: Database.Database, dir: string): number[] {
  ensureMigrationsTable(db);

  const units = loadMigrationUnits(dir);
  const applied = readAppliedMigrations(db);
  const record = db.prepare(
    `INSERT INTO ${SCHEMA_MIGRATIONS_TABLE} (version, checksum, inserted_at) VALUES (?, ?, ?)`
  );

  const appliedIds: number[] = [];
  for (const unit of units) {
    if (applied.has(unit.id)) continue;

    const apply = db.transaction(() => {
      db.exec(unit.sql);
      record.run(unit.id, unit.checksum, new Date().toISOString());
    });

    try {
      apply();
    } catch (error) {
      throw new BootGateError({
        code: "migration_failure",
        message: `migration ${unit.id} (${unit.fileName}) failed: ${describeError(error)}`,
        migrationId: unit.id,
        appliedIds: [...appliedIds],
        cause: describeError(error),
      });
    }
    appliedIds.push(unit.id);
  }

  return appliedIds;
}

export function listMigrationStatus(db: Database.Database, dir: string): MigrationStatusEntry[] {
  const units = loadMigrationUnits(dir);
  const applied = readAppliedMigrations(db);
  const known = new Set(units.map((unit) => unit.id));

  const entries: MigrationStatusEntry[] = units.map((unit) => {
    const isApplied = applied.has(unit.id);
    const recorded = applied.get(unit.id);
    return {
      id: unit.id,
      name: unit.name,
      status: isApplied ? "up" : "down",
      checksumMismatch: isApplied && Boolean(recorded) && recorded !== unit.checksum,
    };
  });

  for (const version of applied.keys()) {
    if (!known.has(version)) {
      entries.push({ id: version, name: null, status: "up", checksumMismatch: false });
    }
  }

  return entries.sort((a, b) => a.id - b.id);
}
