import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import {
  DELIVERY_DB_PATH,
  DELIVERY_DB_PATH_TOKEN,
} from '../config/news.constants';
import {
  DeliveryMetadata,
  DeliveryRecord,
  RecordOutcome,
} from '../types/news.types';

interface DeliveryRow {
  fingerprint: string;
  title: string;
  link: string;
  source: string;
  delivered_at: string;
}

export class DeliveryStoreError extends Error {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`delivery store ${operation} failed: ${detail}`);
    this.name = 'DeliveryStoreError';
  }
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS deliveries (
    fingerprint TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    source TEXT NOT NULL,
    delivered_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_deliveries_link ON deliveries (link);
  CREATE INDEX IF NOT EXISTS idx_deliveries_delivered_at ON deliveries (delivered_at);
`;

/**
 * Persistent record of delivered fingerprints. The PRIMARY KEY on
 * `fingerprint` is what keeps deliveries unique, across processes too.
 */
@Injectable()
export class DeliveryHistoryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DeliveryHistoryService.name);
  private db: Database.Database | null = null;

  constructor(
    @Optional()
    @Inject(DELIVERY_DB_PATH_TOKEN)
    private readonly dbPath: string = DELIVERY_DB_PATH,
  ) {}

  onModuleInit(): void {
    try {
      this.connection();
    } catch (error) {
      // a run retries the connection and reports the failure in its result
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`delivery store unavailable at startup: ${message}`);
    }
  }

  onModuleDestroy(): void {
    this.close();
  }

  async exists(fingerprint: string): Promise<boolean> {
    return this.guard('exists', () => {
      const row = this.connection()
        .prepare<[string], { found: number }>(
          'SELECT 1 AS found FROM deliveries WHERE fingerprint = ?',
        )
        .get(fingerprint);
      return row !== undefined;
    });
  }

  async existsLink(link: string): Promise<boolean> {
    return this.guard('existsLink', () => {
      const row = this.connection()
        .prepare<[string], { found: number }>(
          'SELECT 1 AS found FROM deliveries WHERE link = ? LIMIT 1',
        )
        .get(link);
      return row !== undefined;
    });
  }

  async record(
    fingerprint: string,
    metadata: DeliveryMetadata,
  ): Promise<RecordOutcome> {
    return this.guard('record', () => {
      const deliveredAt = new Date(
        metadata.deliveredAt ?? Date.now(),
      ).toISOString();
      const result = this.connection()
        .prepare<[string, string, string, string, string]>(
          `INSERT INTO deliveries (fingerprint, title, link, source, delivered_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT (fingerprint) DO NOTHING`,
        )
        .run(
          fingerprint,
          metadata.title,
          metadata.link,
          metadata.source,
          deliveredAt,
        );
      return result.changes > 0 ? 'recorded' : 'already_exists';
    });
  }

  async purge(olderThanMs: number, now: number = Date.now()): Promise<number> {
    return this.guard('purge', () => {
      const cutoff = new Date(now - Math.max(0, olderThanMs)).toISOString();
      const result = this.connection()
        .prepare<[string]>('DELETE FROM deliveries WHERE delivered_at < ?')
        .run(cutoff);
      if (result.changes > 0) {
        this.logger.log(
          `purged deliveries: removed=${result.changes} cutoff=${cutoff}`,
        );
      }
      return result.changes;
    });
  }

  async listRecent(limit: number): Promise<DeliveryRecord[]> {
    return this.guard('listRecent', () =>
      this.connection()
        .prepare<[number], DeliveryRow>(
          `SELECT fingerprint, title, link, source, delivered_at
           FROM deliveries
           ORDER BY delivered_at DESC, fingerprint ASC
           LIMIT ?`,
        )
        .all(limit)
        .map((row) => ({
          fingerprint: row.fingerprint,
          title: row.title,
          link: row.link,
          source: row.source,
          deliveredAt: row.delivered_at,
        })),
    );
  }

  async count(): Promise<number> {
    return this.guard('count', () => {
      const row = this.connection()
        .prepare<
          [],
          { total: number }
        >('SELECT COUNT(*) AS total FROM deliveries')
        .get();
      return row?.total ?? 0;
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connection(): Database.Database {
    if (this.db) {
      return this.db;
    }
    if (this.dbPath !== ':memory:') {
      mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    this.db = db;
    this.logger.log(`delivery store opened: ${this.dbPath}`);
    return db;
  }

  private guard<T>(operation: string, task: () => T): T {
    try {
      return task();
    } catch (error) {
      throw new DeliveryStoreError(operation, error);
    }
  }
}
