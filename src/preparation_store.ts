// preparation_store.ts — durable preparation records
//
// GUARANTEES:
// - One row per preparation attempt, keyed by uid (never rewritten)
// - At most one Running row per (program_type, process, pid): partial unique index
// - insertIfAbsent is atomic (BEGIN IMMEDIATE): concurrent CLI invocations on the
//   same target either see the Running row or insert their own Created row
// - Forward-compatible schema migrations (schema_version)
// - Read cache keyed by uid, invalidated on every write
//
// CONTRACT: Synchronous API (better-sqlite3). Every failure
// surfaces as PreparationError('PERSISTENCE_ERROR').

import Database from 'better-sqlite3';
import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type PreparationStatus = 'Created' | 'Running' | 'Error' | 'Revoked';

export interface PreparationRecord {
  uid: string;
  programType: string;
  process: string;
  port: string;
  pid: string;
  status: PreparationStatus;
  error: string;
  createTime: string;
  updateTime: string;
}

export interface NewPreparation {
  programType: string;
  process: string;
  port: string;
  pid: string;
}

export interface InsertOutcome {
  record: PreparationRecord;
  /** false when a Running record for the same target already existed */
  created: boolean;
}

/**
 * The seam the orchestration layer talks to. SqlitePreparationStore is the
 * production implementation; tests may substitute an in-memory one.
 */
export interface PreparationStore {
  findRecord(programType: string, processName: string, processId: string, matchPid?: boolean): PreparationRecord | null;
  insertRecord(input: NewPreparation): PreparationRecord;
  insertIfAbsent(input: NewPreparation, matchPid?: boolean): InsertOutcome;
  findByUid(uid: string): PreparationRecord | null;
  updatePort(uid: string, port: string): void;
  updatePid(uid: string, pid: string): void;
  updateStatus(uid: string, status: PreparationStatus, error: string): void;
  close(): void;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;
const CACHE_MAX_ENTRIES = 256;

const STATUSES: readonly PreparationStatus[] = ['Created', 'Running', 'Error', 'Revoked'];

interface PreparationRow {
  uid: string;
  program_type: string;
  process: string;
  port: string;
  pid: string;
  status: string;
  error: string;
  create_time: string;
  update_time: string;
}

function nowIso(): string {
  return new Date().toISOString();
}

function toStatus(raw: string): PreparationStatus {
  const found = STATUSES.find((s) => s === raw);
  return found ?? 'Error';
}

function fromRow(row: PreparationRow): PreparationRecord {
  return {
    uid: row.uid,
    programType: row.program_type,
    process: row.process,
    port: row.port,
    pid: row.pid,
    status: toStatus(row.status),
    error: row.error,
    createTime: row.create_time,
    updateTime: row.update_time,
  };
}

function openDatabase(dbPath: string): Database.Database {
  try {
    return new Database(dbPath);
  } catch (err) {
    throw ErrorFactory.persistence('open preparation database', err);
  }
}

/**
 * JSON shape posted to the reporting endpoint and printed by `status`.
 */
export function recordToJson(record: PreparationRecord): Record<string, unknown> {
  return { ...record, running: record.status === 'Running' };
}

/* -------------------------------------------------------------------------- */
/* SQLite store                                                               */
/* -------------------------------------------------------------------------- */

export class SqlitePreparationStore implements PreparationStore {
  private readonly db: Database.Database;

  private cache = new LRUCache<string, PreparationRecord>({ max: CACHE_MAX_ENTRIES });

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    try {
      this.configureDatabase();
      this.runMigrations();
      this.integrityCheck();
    } catch (err) {
      throw ErrorFactory.persistence('open preparation database', err);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    // parent and detached child hit the same file
    this.db.pragma('busy_timeout = 5000');
  }

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < SCHEMA_VERSION) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS preparation (
            uid TEXT PRIMARY KEY,
            program_type TEXT NOT NULL,
            process TEXT NOT NULL DEFAULT '',
            port TEXT NOT NULL DEFAULT '',
            pid TEXT NOT NULL DEFAULT '',
            status TEXT NOT NULL,
            error TEXT NOT NULL DEFAULT '',
            create_time TEXT NOT NULL,
            update_time TEXT NOT NULL,
            CHECK(status IN ('Created','Running','Error','Revoked'))
          ) STRICT;

          CREATE UNIQUE INDEX IF NOT EXISTS idx_preparation_running
            ON preparation(program_type, process, pid) WHERE status = 'Running';

          CREATE INDEX IF NOT EXISTS idx_preparation_process ON preparation(program_type, process);
          CREATE INDEX IF NOT EXISTS idx_preparation_pid ON preparation(program_type, pid);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
      }

      // Future migrations: add only, never remove.
    });

    tx();
  }

  private integrityCheck(): void {
    const result = this.db.prepare('PRAGMA quick_check').get() as { quick_check: string } | undefined;
    if (result?.quick_check !== 'ok') {
      throw new Error(`Database integrity check failed: ${result?.quick_check ?? 'no result'}`);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Queries                                                                  */
  /* ------------------------------------------------------------------------ */

  /**
   * Latest record for a target, a Running one first. With a process name and
   * no matchPid the name is the key, so a restarted process (new pid) still
   * finds its earlier record. With matchPid both name and pid must match;
   * without a name the pid is the key.
   */
  findRecord(programType: string, processName: string, processId: string, matchPid = false): PreparationRecord | null {
    try {
      return this.selectLatest(programType, processName, processId, matchPid);
    } catch (err) {
      throw ErrorFactory.persistence('query attach java process record', err);
    }
  }

  private selectLatest(
    programType: string,
    processName: string,
    processId: string,
    matchPid: boolean
  ): PreparationRecord | null {
    if (processName && matchPid) {
      const row = this.db.prepare(
        `SELECT * FROM preparation WHERE program_type = ? AND process = ? AND pid = ?
         ORDER BY status = 'Running' DESC, update_time DESC, rowid DESC LIMIT 1`
      ).get(programType, processName, processId) as PreparationRow | undefined;
      return row ? fromRow(row) : null;
    }

    const row = processName
      ? (this.db.prepare(
          `SELECT * FROM preparation WHERE program_type = ? AND process = ?
           ORDER BY status = 'Running' DESC, update_time DESC, rowid DESC LIMIT 1`
        ).get(programType, processName) as PreparationRow | undefined)
      : (this.db.prepare(
          `SELECT * FROM preparation WHERE program_type = ? AND pid = ?
           ORDER BY status = 'Running' DESC, update_time DESC, rowid DESC LIMIT 1`
        ).get(programType, processId) as PreparationRow | undefined);

    return row ? fromRow(row) : null;
  }

  findByUid(uid: string): PreparationRecord | null {
    const cached = this.cache.get(uid);
    if (cached) return { ...cached };

    let row: PreparationRow | undefined;
    try {
      row = this.db.prepare(`SELECT * FROM preparation WHERE uid = ?`).get(uid) as PreparationRow | undefined;
    } catch (err) {
      throw ErrorFactory.persistence('query preparation by uid', err);
    }
    if (!row) return null;

    const record = fromRow(row);
    this.cache.set(uid, record);
    return { ...record };
  }

  /* ------------------------------------------------------------------------ */
  /* Writes                                                                   */
  /* ------------------------------------------------------------------------ */

  insertRecord(input: NewPreparation): PreparationRecord {
    try {
      return this.insertRow(input);
    } catch (err) {
      throw ErrorFactory.persistence('insert prepare record', err);
    }
  }

  insertIfAbsent(input: NewPreparation, matchPid = false): InsertOutcome {
    const tx = this.db.transaction((): InsertOutcome => {
      const existing = this.selectLatest(input.programType, input.process, input.pid, matchPid);
      if (existing && existing.status === 'Running') {
        return { record: existing, created: false };
      }
      return { record: this.insertRow(input), created: true };
    });

    try {
      return tx.immediate();
    } catch (err) {
      throw ErrorFactory.persistence('insert prepare record', err);
    }
  }

  private insertRow(input: NewPreparation): PreparationRecord {
    const ts = nowIso();
    const record: PreparationRecord = {
      uid: crypto.randomUUID(),
      programType: input.programType,
      process: input.process,
      port: input.port,
      pid: input.pid,
      status: 'Created',
      error: '',
      createTime: ts,
      updateTime: ts,
    };

    this.db.prepare(
      `INSERT INTO preparation (uid, program_type, process, port, pid, status, error, create_time, update_time)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      record.uid, record.programType, record.process, record.port, record.pid,
      record.status, record.error, record.createTime, record.updateTime
    );

    return record;
  }

  updatePort(uid: string, port: string): void {
    this.update('update preparation port', uid, `UPDATE preparation SET port = ?, update_time = ? WHERE uid = ?`, [port]);
  }

  updatePid(uid: string, pid: string): void {
    this.update('update preparation pid', uid, `UPDATE preparation SET pid = ?, update_time = ? WHERE uid = ?`, [pid]);
  }

  updateStatus(uid: string, status: PreparationStatus, error: string): void {
    this.update(
      'update preparation record',
      uid,
      `UPDATE preparation SET status = ?, error = ?, update_time = ? WHERE uid = ?`,
      [status, error]
    );
  }

  private update(operation: string, uid: string, sql: string, values: string[]): void {
    this.cache.delete(uid);

    let changes: number;
    try {
      changes = this.db.prepare(sql).run(...values, nowIso(), uid).changes;
    } catch (err) {
      throw ErrorFactory.persistence(operation, err);
    }
    if (changes === 0) {
      throw ErrorFactory.persistence(operation, new Error(`preparation record not found: ${uid}`));
    }
  }

  close(): void {
    this.cache.clear();
    this.db.close();
  }
}
