/**
 * SQLite-backed record of the last imported signature of each source file.
 *
 * Lets repeated runs skip bill files that have not changed since they were
 * last reconciled without querying Postgres per file. The signature is the
 * SHA-256 of the file content. save() must only be called once the file has
 * been fully reconciled, so a failed document is retried on the next run.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export const DEFAULT_CHANGE_TRACKER_PATH =
  "scripts/.congress-import-progress.db";

export function fileSignature(path: string): string {
  return createHash("sha256").update(readFileSync(path)).digest("hex");
}

export class ChangeTracker {
  private readonly sqlite: Database.Database;
  private readonly selectStmt: Database.Statement<[string], { signature: string }>;
  private readonly upsertStmt: Database.Statement<[string, string]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly clearAllStmt: Database.Statement;
  private readonly signatureOf: (path: string) => string;

  constructor(
    dbPath: string = DEFAULT_CHANGE_TRACKER_PATH,
    signatureOf: (path: string) => string = fileSignature
  ) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (dir && !existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.signatureOf = signatureOf;
    this.sqlite = new Database(dbPath);
    this.sqlite.pragma("journal_mode = WAL");
    this.sqlite.pragma("synchronous = NORMAL");

    this.sqlite.exec(`
      CREATE TABLE IF NOT EXISTS files (
        path TEXT PRIMARY KEY,
        signature TEXT NOT NULL,
        updated_at INTEGER DEFAULT (unixepoch())
      ) WITHOUT ROWID;
    `);

    this.selectStmt = this.sqlite.prepare<[string], { signature: string }>(
      "SELECT signature FROM files WHERE path = ?"
    );
    this.upsertStmt = this.sqlite.prepare<[string, string]>(
      `INSERT INTO files (path, signature) VALUES (?, ?)
       ON CONFLICT(path) DO UPDATE SET signature = excluded.signature, updated_at = unixepoch()`
    );
    this.deleteStmt = this.sqlite.prepare<[string]>(
      "DELETE FROM files WHERE path = ?"
    );
    this.clearAllStmt = this.sqlite.prepare("DELETE FROM files");
  }

  /**
   * True when the path was never saved or its content changed since.
   */
  isChanged(path: string): boolean {
    const row = this.selectStmt.get(path);
    if (!row) {
      return true;
    }
    return row.signature !== this.signatureOf(path);
  }

  save(path: string): void {
    this.upsertStmt.run(path, this.signatureOf(path));
  }

  /** Drop the record for one path so it reads as changed again. */
  forget(path: string): void {
    this.deleteStmt.run(path);
  }

  clearAll(): void {
    this.clearAllStmt.run();
  }

  close(): void {
    this.sqlite.close();
  }
}
