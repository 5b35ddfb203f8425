import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

/**
 * Fixed-size set of connections to one SQLite database.
 *
 * better-sqlite3 is synchronous, so a "pool" here only bounds how many
 * handles the repository holds open; callers take them round-robin.
 */
export class SqlitePool {
  private connections: Database.Database[] = [];
  private cursor = 0;

  constructor(
    readonly database: string,
    readonly size: number
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`pool size must be a positive integer, got ${size}`);
    }
    // Every :memory: connection is its own database.
    if (database === ":memory:" && size !== 1) {
      throw new Error("in-memory databases only support a pool size of 1");
    }

    if (database !== ":memory:") {
      fs.mkdirSync(dirname(database), { recursive: true });
    }

    try {
      for (let i = 0; i < size; i += 1) {
        const db = new Database(database);
        if (database !== ":memory:") {
          db.pragma("journal_mode = WAL");
        }
        db.pragma("foreign_keys = ON");
        this.connections.push(db);
      }
    } catch (error) {
      this.close();
      throw error;
    }
  }

  acquire(): Database.Database {
    const db = this.connections[this.cursor % this.connections.length];
    if (!db) {
      throw new Error(`pool for ${this.database} is closed`);
    }
    this.cursor = (this.cursor + 1) % this.connections.length;
    return db;
  }

  get isOpen(): boolean {
    return this.connections.length > 0;
  }

  close(): void {
    for (const db of this.connections) {
      if (db.open) db.close();
    }
    this.connections = [];
    this.cursor = 0;
  }
}
