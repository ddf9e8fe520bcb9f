/**
 * SQLite ledger of staged artifacts.
 * Records the checksum and size of every file at the moment it was renamed
 * into place, so later runs can tell a complete file from a tampered one.
 */
import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface LedgerEntry {
  path: string;
  source: string;
  sha256: string;
  bytes: number;
  stagedAt: string;
}

interface LedgerRow {
  path: string;
  source: string;
  sha256: string;
  bytes: number;
  staged_at: string;
}

export const LEDGER_FILE_NAME = 'stage-ledger.db';

// ============================================================================
// Checksums
// ============================================================================

export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

// ============================================================================
// Ledger Implementation
// ============================================================================

function toEntry(row: LedgerRow): LedgerEntry {
  return {
    path: row.path,
    source: row.source,
    sha256: row.sha256,
    bytes: row.bytes,
    stagedAt: row.staged_at,
  };
}

export class StageLedger {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    // WAL lets two stager processes share one cache directory
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        path TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        sha256 TEXT NOT NULL,
        bytes INTEGER NOT NULL,
        staged_at TEXT NOT NULL
      );
    `);
  }

  /**
   * Record (or replace) the entry for a freshly staged artifact.
   */
  record(entry: Omit<LedgerEntry, 'stagedAt'> & { stagedAt?: string }): LedgerEntry {
    const stagedAt = entry.stagedAt ?? new Date().toISOString();
    const path = resolve(entry.path);

    this.db
      .prepare(
        `INSERT INTO artifacts (path, source, sha256, bytes, staged_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           source = excluded.source,
           sha256 = excluded.sha256,
           bytes = excluded.bytes,
           staged_at = excluded.staged_at`
      )
      .run(path, entry.source, entry.sha256, entry.bytes, stagedAt);

    return { path, source: entry.source, sha256: entry.sha256, bytes: entry.bytes, stagedAt };
  }

  get(path: string): LedgerEntry | null {
    const row = this.db
      .prepare(
        `SELECT path, source, sha256, bytes, staged_at
         FROM artifacts WHERE path = ?`
      )
      .get(resolve(path)) as LedgerRow | undefined;

    return row ? toEntry(row) : null;
  }

  remove(path: string): boolean {
    const info = this.db.prepare(`DELETE FROM artifacts WHERE path = ?`).run(resolve(path));
    return info.changes > 0;
  }

  list(): LedgerEntry[] {
    const rows = this.db
      .prepare(`SELECT path, source, sha256, bytes, staged_at FROM artifacts ORDER BY path`)
      .all() as LedgerRow[];

    return rows.map(toEntry);
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function openLedger(cacheDir: string): Promise<StageLedger> {
  const dbPath = join(cacheDir, LEDGER_FILE_NAME);
  await mkdir(dirname(dbPath), { recursive: true });
  return new StageLedger(dbPath);
}
