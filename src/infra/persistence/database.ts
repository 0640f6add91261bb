/**
 * SQLite database for orders, positions and their audit tables.
 * Uses better-sqlite3 with WAL mode; the schema is applied on open.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { DataIntegrityError } from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import type { HealthStatus, HealthCheckable } from "./types";

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ":memory:";

export function openDatabase(path: string, logger?: Logger): SqliteDatabase {
  if (path !== IN_MEMORY) {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(path);
  if (path !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");

  const schema = readFileSync(join(__dirname, "schema.sql"), "utf-8");
  db.exec(schema);

  logger?.info(`[Database] Initialized at ${path}`);
  return db;
}

/**
 * Parse a stored metadata column. Anything that is not a JSON object reads as {}.
 */
export function parseMetadata(value: string | null | undefined): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}

/**
 * Narrow a stored string column to one of its allowed values
 */
export function oneOf<T extends string>(value: string, allowed: readonly T[], column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new DataIntegrityError(`Unexpected ${column} value "${value}"`);
  }
  return match;
}

export function isUniqueViolation(err: unknown, column: string): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE" &&
    err.message.includes(column)
  );
}

export class DatabaseHealth implements HealthCheckable {
  constructor(private readonly db: SqliteDatabase) {}

  getName(): string {
    return "Database";
  }

  healthCheck(): HealthStatus {
    const checkedAt = Date.now();
    try {
      this.db.prepare("SELECT 1").get();
      return { healthy: true, message: "ok", checkedAt };
    } catch (err) {
      return {
        healthy: false,
        message: err instanceof Error ? err.message : String(err),
        checkedAt,
      };
    }
  }
}
