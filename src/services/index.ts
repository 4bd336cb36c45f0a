import type { Pool } from 'pg';
import type { S3Client } from '@aws-sdk/client-s3';
import type { CustomerStore, IngestionLog, ObjectStore } from '../types/index.js';
import { DatabaseService } from './database.js';
import { CustomerRepository } from './customerRepository.js';
import { PgIngestionLog } from './ingestionLog.js';
import { StorageMirror } from './storage.js';
import { ImportEngine } from './importEngine.js';
import { UploadService } from './uploadService.js';
import { WebhookIngestionService } from './webhookIngestion.js';
import { ExportService } from './exportService.js';
import { KeyedMutex } from '../utils/keyedMutex.js';

/**
 * Everything the routes need, built once at startup and handed to the app
 */
export interface AppServices {
  customers: CustomerStore;
  storage: ObjectStore;
  uploads: UploadService;
  webhooks: WebhookIngestionService;
  exports: ExportService;
  maxUploadBytes: number;
}

export interface ServiceDependencies {
  customers: CustomerStore;
  storage: ObjectStore;
  ingestionLog: IngestionLog;
  importTimeoutMs: number;
  maxUploadBytes: number;
}

/**
 * Wire the services around their stores. The upload and webhook paths share
 * one mutex so they serialize on the same object keys.
 */
export function wireServices(deps: ServiceDependencies): AppServices {
  const engine = new ImportEngine(deps.customers, { timeoutMs: deps.importTimeoutMs });
  const mutex = new KeyedMutex();

  return {
    customers: deps.customers,
    storage: deps.storage,
    uploads: new UploadService(deps.storage, engine, deps.ingestionLog, mutex),
    webhooks: new WebhookIngestionService(deps.storage, engine, deps.ingestionLog, mutex),
    exports: new ExportService(deps.customers),
    maxUploadBytes: deps.maxUploadBytes,
  };
}

export interface RuntimeConfig {
  pool: Pool;
  s3: S3Client;
  bucket: string;
  storageTimeoutMs: number;
  importTimeoutMs: number;
  maxUploadBytes: number;
}

/**
 * Production wiring: PostgreSQL stores and the MinIO mirror
 */
export function createServices(config: RuntimeConfig): AppServices {
  const db = new DatabaseService(config.pool);

  return wireServices({
    customers: new CustomerRepository(db),
    storage: new StorageMirror(config.s3, {
      bucket: config.bucket,
      timeoutMs: config.storageTimeoutMs,
    }),
    ingestionLog: new PgIngestionLog(db),
    importTimeoutMs: config.importTimeoutMs,
    maxUploadBytes: config.maxUploadBytes,
  });
}
