/**
 * Ingestion log: remembers the last object version (etag) imported per bucket/key.
 */

import type { ImportReport, IngestionLog, IngestionLogEntry } from '../types/index.js';
import { DatabaseService } from './database.js';

interface IngestionLogRow {
  bucket: string;
  object_key: string;
  etag: string;
  processed_at: Date;
}

export class PgIngestionLog implements IngestionLog {
  constructor(private db: DatabaseService) {}

  async get(bucket: string, key: string): Promise<IngestionLogEntry | null> {
    const row = await this.db.queryOne<IngestionLogRow>(
      `SELECT bucket, object_key, etag, processed_at
       FROM ingestion_log
       WHERE bucket = $1 AND object_key = $2`,
      [bucket, key]
    );

    if (!row) return null;

    return {
      bucket: row.bucket,
      key: row.object_key,
      etag: row.etag,
      processedAt: row.processed_at,
    };
  }

  async markProcessed(bucket: string, key: string, etag: string, report: ImportReport): Promise<void> {
    await this.db.query(
      `INSERT INTO ingestion_log (bucket, object_key, etag, inserted, duplicate_email, invalid, processed_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW())
       ON CONFLICT (bucket, object_key) DO UPDATE SET
         etag = EXCLUDED.etag,
         inserted = EXCLUDED.inserted,
         duplicate_email = EXCLUDED.duplicate_email,
         invalid = EXCLUDED.invalid,
         processed_at = EXCLUDED.processed_at`,
      [bucket, key, etag, report.inserted, report.duplicateEmail, report.invalid]
    );
  }
}
