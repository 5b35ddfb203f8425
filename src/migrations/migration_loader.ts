import { createHash } from "node:crypto";
import * as fs from "node:fs";
import { join } from "node:path";

import { BootGateError } from "../gates/boot_gate_error";
import { MIGRATION_CHECKSUM_ALGORITHM } from "../runtime/default_services";

export type MigrationUnit = {
  id: number;
  name: string;
  fileName: string;
  sql: string;
  checksum: string;
};

const MIGRATION_FILE = /^(\d+)_([A-Za-z0-9_.-]+)\.sql$/;

export const checksumOf = (sql: string): string =>
  createHash(MIGRATION_CHECKSUM_ALGORITHM).update(sql, "utf8").digest("hex");

export function parseMigrationFileName(fileName: string): { id: number; name: string } | null {
  const match = MIGRATION_FILE.exec(fileName);
  if (!match) return null;

  const id = Number(match[1]);
  if (!Number.isSafeInteger(id) || id <= 0) return null;
  return { id, name: match[2] };
}

/**
 * Units found in `dir`, ascending by id. A missing directory has none.
 */
export function loadMigrationUnits(dir: string): MigrationUnit[] {
  if (!fs.existsSync(dir)) return [];

  const units: MigrationUnit[] = [];
  const seen = new Map<number, string>();

  for (const fileName of fs.readdirSync(dir).sort()) {
    const parsed = parseMigrationFileName(fileName);
    if (!parsed) continue;

    const previous = seen.get(parsed.id);
    if (previous) {
      throw new BootGateError({
        code: "migration_failure",
        message: `duplicate migration id ${parsed.id}: ${previous} and ${fileName}`,
        migrationId: parsed.id,
      });
    }
    seen.set(parsed.id, fileName);

    const sql = fs.readFileSync(join(dir, fileName), "utf8");
    units.push({ ...parsed, fileName, sql, checksum: checksumOf(sql) });
  }

  return units.sort((a, b) => a.id - b.id);
}
