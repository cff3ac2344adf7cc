import { promises as fs } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { z } from 'zod';

import { EventStoreError, describeError } from '../errors';
import { compareEvents, type CanonicalEvent, type EventIdentity, type ProcessedFileRecord } from '../types';
import type { EventStore } from './eventStore';

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const manifestRowSchema = z.object({
  filename: z.string(),
  content_hash: z.string(),
  row_count: z.number().int().nonnegative(),
  processed_at: z.string(),
  extracted_date: z.string().nullable()
});

const eventRowSchema = z.object({
  timestamp: z.string(),
  actor_id: z.string(),
  session_id: z.string(),
  event_name: z.string(),
  org_id: z.string().nullable(),
  email: z.string().nullable(),
  link_label: z.string().nullable(),
  link_type: z.string().nullable(),
  page_title: z.string().nullable(),
  page_url: z.string().nullable(),
  source_file: z.string()
});

type EventRow = z.infer<typeof eventRowSchema>;

const countRowSchema = z.object({ total: z.number().int() });

export interface SqliteEventStoreOptions {
  databaseFile: string;
}

export class SqliteEventStore implements EventStore {
  private readonly databaseFile: string;
  private db: SqliteDatabase | null = null;

  constructor(options: SqliteEventStoreOptions) {
    this.databaseFile = path.resolve(options.databaseFile);
  }

  getDatabasePath(): string {
    return this.databaseFile;
  }

  async init(): Promise<void> {
    if (this.db) {
      return;
    }
    await fs.mkdir(path.dirname(this.databaseFile), { recursive: true });
    let db: SqliteDatabase;
    try {
      db = new Database(this.databaseFile);
    } catch (error) {
      throw new EventStoreError(`Failed to open event database at ${this.databaseFile}: ${describeError(error)}`, {
        cause: error
      });
    }

    try {
      await this.configureDatabase(db);
      db.exec(`
        CREATE TABLE IF NOT EXISTS events (
          timestamp TEXT NOT NULL,
          actor_id TEXT NOT NULL,
          session_id TEXT NOT NULL,
          event_name TEXT NOT NULL,
          org_id TEXT,
          email TEXT,
          link_label TEXT,
          link_type TEXT,
          page_title TEXT,
          page_url TEXT,
          source_file TEXT NOT NULL,
          PRIMARY KEY (timestamp, actor_id, session_id, event_name)
        );
        CREATE TABLE IF NOT EXISTS processed_files (
          filename TEXT PRIMARY KEY,
          content_hash TEXT NOT NULL,
          row_count INTEGER NOT NULL,
          processed_at TEXT NOT NULL,
          extracted_date TEXT
        );
      `);
    } catch (error) {
      db.close();
      if (error instanceof EventStoreError) {
        throw error;
      }
      throw new EventStoreError(`Failed to prepare event database at ${this.databaseFile}: ${describeError(error)}`, {
        cause: error
      });
    }
    this.db = db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /** Deletes the database file (and its WAL companions) and recreates it empty. */
  async reset(): Promise<void> {
    this.close();
    for (const suffix of ['', '-wal', '-shm']) {
      await fs.rm(`${this.databaseFile}${suffix}`, { force: true });
    }
    await this.init();
  }

  lookup(filename: string): ProcessedFileRecord | null {
    const row: unknown = this.getDb()
      .prepare(
        'SELECT filename, content_hash, row_count, processed_at, extracted_date FROM processed_files WHERE filename = ?'
      )
      .get(filename);
    return row === undefined ? null : this.deserializeManifestRow(row);
  }

  record(entry: ProcessedFileRecord): void {
    this.getDb()
      .prepare(
        `INSERT INTO processed_files (filename, content_hash, row_count, processed_at, extracted_date)
         VALUES (@filename, @contentHash, @rowCount, @processedAt, @extractedDate)
         ON CONFLICT(filename) DO UPDATE SET
           content_hash = excluded.content_hash,
           row_count = excluded.row_count,
           processed_at = excluded.processed_at,
           extracted_date = excluded.extracted_date`
      )
      .run(entry);
  }

  listManifest(): ProcessedFileRecord[] {
    const rows: unknown[] = this.getDb()
      .prepare(
        'SELECT filename, content_hash, row_count, processed_at, extracted_date FROM processed_files ORDER BY filename ASC'
      )
      .all();
    return rows.map((row) => this.deserializeManifestRow(row));
  }

  deleteByIdentity(identities: EventIdentity[]): number {
    const statement = this.getDb().prepare(
      'DELETE FROM events WHERE timestamp = ? AND actor_id = ? AND session_id = ? AND event_name = ?'
    );
    let deleted = 0;
    for (const identity of identities) {
      deleted += statement.run(identity.timestamp, identity.actorId, identity.sessionId, identity.eventName).changes;
    }
    return deleted;
  }

  insertEvents(events: CanonicalEvent[]): number {
    const statement = this.getDb().prepare(
      `INSERT INTO events (
         timestamp, actor_id, session_id, event_name, org_id, email,
         link_label, link_type, page_title, page_url, source_file
       ) VALUES (
         @timestamp, @actorId, @sessionId, @eventName, @orgId, @email,
         @linkLabel, @linkType, @pageTitle, @pageUrl, @sourceFile
       )`
    );
    let inserted = 0;
    for (const event of events) {
      inserted += statement.run(event).changes;
    }
    return inserted;
  }

  listEvents(): CanonicalEvent[] {
    const rows: unknown[] = this.getDb()
      .prepare(
        `SELECT timestamp, actor_id, session_id, event_name, org_id, email,
                link_label, link_type, page_title, page_url, source_file
         FROM events
         ORDER BY timestamp, actor_id, session_id, event_name`
      )
      .all();
    // SQLite collation and JS code-unit order agree for ASCII but not beyond it.
    return rows.map((row) => this.deserializeEventRow(row)).sort(compareEvents);
  }

  countEvents(): number {
    const row: unknown = this.getDb().prepare('SELECT COUNT(*) AS total FROM events').get();
    return countRowSchema.parse(row).total;
  }

  withTransaction<T>(operation: () => T): T {
    const db = this.getDb();
    try {
      return db.transaction(operation)();
    } catch (error) {
      if (error instanceof EventStoreError || !this.isSqliteError(error)) {
        throw error;
      }
      throw new EventStoreError(`Event store transaction failed: ${describeError(error)}`, { cause: error });
    }
  }

  private getDb(): SqliteDatabase {
    if (!this.db) {
      throw new EventStoreError('Event store has not been initialized');
    }
    return this.db;
  }

  private deserializeManifestRow(row: unknown): ProcessedFileRecord {
    const parsed = manifestRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new EventStoreError(`Corrupt manifest row: ${parsed.error.message}`);
    }
    return {
      filename: parsed.data.filename,
      contentHash: parsed.data.content_hash,
      rowCount: parsed.data.row_count,
      processedAt: parsed.data.processed_at,
      extractedDate: parsed.data.extracted_date
    };
  }

  private deserializeEventRow(row: unknown): CanonicalEvent {
    const parsed = eventRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new EventStoreError(`Corrupt event row: ${parsed.error.message}`);
    }
    return toCanonicalEvent(parsed.data);
  }

  private async configureDatabase(db: SqliteDatabase): Promise<void> {
    db.pragma('busy_timeout = 5000');
    await this.ensureWalJournalMode(db);
  }

  private async ensureWalJournalMode(db: SqliteDatabase): Promise<void> {
    const maxAttempts = 5;
    const baseDelayMs = 100;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      try {
        const result: unknown = db.pragma('journal_mode = WAL', { simple: true });
        if (typeof result === 'string' && result.toLowerCase() === 'wal') {
          return;
        }
        throw new EventStoreError(`Event database returned journal mode ${String(result)} while enabling WAL`);
      } catch (error) {
        if (!this.isBusySqliteError(error)) {
          throw new EventStoreError(`Failed to enable WAL journal mode: ${describeError(error)}`, { cause: error });
        }
        await sleep(baseDelayMs * (attempt + 1));
      }
    }
    throw new EventStoreError('Timed out enabling WAL journal mode for event database');
  }

  private isSqliteError(error: unknown): boolean {
    return Boolean(
      error && typeof error === 'object' && 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_')
    );
  }

  private isBusySqliteError(error: unknown): boolean {
    return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'SQLITE_BUSY');
  }
}

function toCanonicalEvent(row: EventRow): CanonicalEvent {
  return {
    timestamp: row.timestamp,
    actorId: row.actor_id,
    sessionId: row.session_id,
    eventName: row.event_name,
    orgId: row.org_id,
    email: row.email,
    linkLabel: row.link_label,
    linkType: row.link_type,
    pageTitle: row.page_title,
    pageUrl: row.page_url,
    sourceFile: row.source_file
  };
}
