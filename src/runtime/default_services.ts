import { getHashes } from "node:crypto";
import { getCiphers } from "node:tls";
import Database from "better-sqlite3";

import type { RuntimeService } from "./service_registry";

export const MIGRATION_CHECKSUM_ALGORITHM = "sha256";

export const cryptoService: RuntimeService = {
  name: "crypto",
  start: async () => {
    if (!getHashes().includes(MIGRATION_CHECKSUM_ALGORITHM)) {
      throw new Error(`crypto: ${MIGRATION_CHECKSUM_ALGORITHM} is not available`);
    }
    return { algorithm: MIGRATION_CHECKSUM_ALGORITHM };
  },
};

export const tlsService: RuntimeService = {
  name: "tls",
  start: async () => {
    const ciphers = getCiphers();
    if (ciphers.length === 0) {
      throw new Error("tls: no ciphers available");
    }
    return { cipherCount: ciphers.length };
  },
};

export const sqliteDriverService: RuntimeService = {
  name: "sqlite_driver",
  start: async () => {
    const check = new Database(":memory:");
    try {
      const row = check.prepare("SELECT sqlite_version() AS version").get() as { version: string };
      return { sqliteVersion: row.version };
    } finally {
      check.close();
    }
  },
};

// Each entry may rely on the ones before it.
export const DEFAULT_RUNTIME_SERVICES: readonly RuntimeService[] = [
  cryptoService,
  tlsService,
  sqliteDriverService,
];
