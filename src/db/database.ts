import path from "node:path";
import { mkdirSync } from "node:fs";
import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import { DEFAULT_PROVIDERS, SCHEMA_SQL } from "./schema";

export type Db = Database.Database;

export const MEMORY_DATABASE = ":memory:";

export function openDatabase(dbPath: string = MEMORY_DATABASE): Db {
  if (dbPath !== MEMORY_DATABASE) {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== MEMORY_DATABASE) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
  seedProviders(db);
  return db;
}

function seedProviders(db: Db): void {
  const insert = db.prepare(
    `INSERT OR IGNORE INTO providers (id, name, display_name, base_api_url, notes)
     VALUES (@id, @name, @display_name, @base_api_url, @notes)`
  );
  const seed = db.transaction(() => {
    for (const provider of DEFAULT_PROVIDERS) {
      insert.run({ id: randomUUID(), ...provider });
    }
  });
  seed();
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(value: string | null): Record<string, unknown> | null {
  if (!value) return null;
  const parsed: unknown = JSON.parse(value);
  return isJsonObject(parsed) ? parsed : null;
}

export function toJsonText(value: Record<string, unknown> | null | undefined): string | null {
  return value ? JSON.stringify(value) : null;
}
