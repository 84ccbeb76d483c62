import fs from 'fs';
import path from 'path';
import pkg from 'sqlite3';
import type { Database, RunResult } from 'sqlite3';
import { isRecord } from '../drive/envelope';
import type { SyncKind, SyncRunRecord } from '../types';

const { verbose } = pkg;
const sqlite3 = verbose();

const KINDS: readonly SyncKind[] = ['full', 'share', 'increment'];

const toRecord = (row: unknown): SyncRunRecord | null => {
  if (!isRecord(row)) return null;
  const kind = KINDS.find((k) => k === row.kind);
  if (!kind) return null;
  return {
    id: Number(row.id),
    kind,
    startedAt: Number(row.started_at),
    finishedAt: Number(row.finished_at),
    generated: Number(row.generated),
    skipped: Number(row.skipped),
    failed: Number(row.failed),
    removed: Number(row.removed),
    error: typeof row.error === 'string' ? row.error : null,
  };
};

/** Terminal counts of every sync run, newest first on read. */
export class SyncHistory {
  private constructor(private readonly db: Database) {}

  static open(dbPath: string): Promise<SyncHistory> {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(dbPath, (err) => {
        if (err) return reject(err);
        db.serialize(() => {
          db.run("PRAGMA journal_mode = WAL;");
          db.run(
            `CREATE TABLE IF NOT EXISTS sync_runs (
              id INTEGER PRIMARY KEY AUTOINCREMENT, kind TEXT NOT NULL,
              started_at INTEGER, finished_at INTEGER,
              generated INTEGER, skipped INTEGER, failed INTEGER, removed INTEGER,
              error TEXT
            )`,
            (createErr) => (createErr ? reject(createErr) : resolve(new SyncHistory(db))),
          );
        });
      });
    });
  }

  record(run: SyncRunRecord): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(
        `INSERT INTO sync_runs (kind, started_at, finished_at, generated, skipped, failed, removed, error)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [run.kind, run.startedAt, run.finishedAt, run.generated, run.skipped, run.failed, run.removed, run.error],
        function (this: RunResult, err: Error | null) {
          if (err) reject(err);
          else resolve(this.lastID);
        },
      );
    });
  }

  recent(limit = 20, kind?: SyncKind): Promise<SyncRunRecord[]> {
    const where = kind ? 'WHERE kind = ?' : '';
    const params: Array<string | number> = kind ? [kind, limit] : [limit];
    return new Promise((resolve, reject) => {
      this.db.all(`SELECT * FROM sync_runs ${where} ORDER BY id DESC LIMIT ?`, params, (err, rows: unknown[]) => {
        if (err) return reject(err);
        resolve(rows.map(toRecord).filter((r): r is SyncRunRecord => r !== null));
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
