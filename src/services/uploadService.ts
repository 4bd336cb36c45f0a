/**
 * Upload Service
 * The browser upload path: mirror the original file to object storage and
 * import its rows.
 *
 * A storage failure does not stop the import; it is logged and returned
 * next to the report. When both succeed the object version is recorded in
 * the ingestion log under the same per-key lock the webhook path takes, so
 * the notification storage emits for this upload is recognised as done.
 */

import type {
  ImportReport,
  IngestionLog,
  ObjectStore,
  StorageObjectRef,
} from '../types/index.js';
import { ImportEngine } from './importEngine.js';
import { ingestionKey } from './webhookIngestion.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type MirrorResult =
  | { status: 'stored'; object: StorageObjectRef }
  | { status: 'failed'; message: string };

export interface UploadResult {
  report: ImportReport;
  storage: MirrorResult;
}

export class UploadService {
  constructor(
    private storage: ObjectStore,
    private engine: ImportEngine,
    private log: IngestionLog,
    private mutex: KeyedMutex
  ) {}

  async ingestUpload(filename: string, body: Uint8Array): Promise<UploadResult> {
    const key = this.storage.deriveKey(filename, body);
    const bucket = this.storage.bucket;

    return this.mutex.runExclusive(ingestionKey(bucket, key), async (): Promise<UploadResult> => {
      const storage = await this.mirror(filename, body, key);
      const report = await this.engine.import(body, filename);

      if (storage.status === 'stored') {
        await this.log.markProcessed(bucket, key, storage.object.etag, report);
      }

      return { report, storage };
    });
  }

  private async mirror(filename: string, body: Uint8Array, key: string): Promise<MirrorResult> {
    try {
      const object = await this.storage.store(filename, body, key);
      return { status: 'stored', object };
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ filename, key, error: message }, 'Failed to mirror upload to object storage');
      return { status: 'failed', message };
    }
  }
}
