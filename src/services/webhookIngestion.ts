/**
 * Webhook Ingestion
 * Imports objects announced by object-storage notifications.
 *
 * Per bucket/key the ingestion moves Unseen -> Processing -> Done(etag).
 * - Only ObjectCreated events for .csv keys are acted on.
 * - A notification for an etag already recorded as Done is ignored, so
 *   at-least-once delivery never imports the same object version twice.
 * - Work for one key is serialized over the whole stat/fetch/import/log
 *   sequence; a failure leaves the key retryable.
 */

import { z } from 'zod';
import type {
  DecodedNotification,
  IngestionLog,
  IngestionState,
  ObjectStore,
  StoredObject,
  WebhookEvent,
  WebhookOutcome,
} from '../types/index.js';
import { ImportEngine } from './importEngine.js';
import { normalizeEtag } from './storage.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { ErrorCodes, errorMessage, isIngestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ============================================
// NOTIFICATION DECODING
// ============================================

const notificationRecordSchema = z.object({
  eventName: z.string().min(1),
  s3: z.object({
    bucket: z.object({
      name: z.string().min(1),
    }),
    object: z.object({
      key: z.string().min(1),
      eTag: z.string().optional(),
      size: z.number().int().nonnegative().optional(),
    }),
  }),
});

const notificationSchema = z.object({
  EventName: z.string().optional(),
  Key: z.string().optional(),
  Records: z.array(notificationRecordSchema).min(1),
});

export type StorageNotification = z.infer<typeof notificationSchema>;

/**
 * Object keys arrive URL-encoded, with spaces as '+'
 */
export function decodeObjectKey(raw: string): string {
  const spaced = raw.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // Not valid percent-encoding: the key is used as sent
    return spaced;
  }
}

/**
 * Decode a notification body into events. Anything that does not match the
 * notification schema decodes to `ignored`.
 */
export function decodeStorageEvent(payload: unknown): DecodedNotification {
  const parsed = notificationSchema.safeParse(payload);

  if (!parsed.success) {
    return { kind: 'ignored', reason: 'unrecognized_payload' };
  }

  const events: WebhookEvent[] = parsed.data.Records.map((record) => ({
    eventType: record.eventName,
    bucket: record.s3.bucket.name,
    key: decodeObjectKey(record.s3.object.key),
    etag: record.s3.object.eTag ? normalizeEtag(record.s3.object.eTag) : undefined,
    size: record.s3.object.size,
  }));

  return { kind: 'events', events };
}

/**
 * `s3:ObjectCreated:Put`, `ObjectCreated:CompleteMultipartUpload`, ...
 */
export function isObjectCreatedEvent(eventType: string): boolean {
  return /(^|:)ObjectCreated:/.test(eventType);
}

export function isCsvKey(key: string): boolean {
  return key.toLowerCase().endsWith('.csv');
}

export function ingestionKey(bucket: string, key: string): string {
  return `${bucket}/${key}`;
}

// ============================================
// INGESTION SERVICE
// ============================================

export class WebhookIngestionService {
  constructor(
    private storage: ObjectStore,
    private engine: ImportEngine,
    private log: IngestionLog,
    private mutex: KeyedMutex
  ) {}

  async handle(event: WebhookEvent): Promise<WebhookOutcome> {
    const { bucket, key } = event;

    if (!isObjectCreatedEvent(event.eventType)) {
      logger.debug({ bucket, key, eventType: event.eventType }, 'Ignoring non-create notification');
      return { status: 'ignored', reason: 'unsupported_event' };
    }

    if (!isCsvKey(key)) {
      logger.info({ bucket, key }, 'Ignoring notification for non-CSV object');
      return { status: 'ignored', reason: 'not_csv' };
    }

    return this.mutex.runExclusive(ingestionKey(bucket, key), async (): Promise<WebhookOutcome> => {
      try {
        return await this.ingest(event);
      } catch (error) {
        const retryable = isIngestError(error) ? error.retryable : true;
        const code = isIngestError(error) ? error.code : 'INTERNAL_ERROR';

        logger.error({ bucket, key, code, retryable, error: errorMessage(error) }, 'Notification ingestion failed');

        return { status: 'failed', error: errorMessage(error), code, retryable };
      }
    });
  }

  /**
   * Where a bucket/key stands in its ingestion lifecycle
   */
  async state(bucket: string, key: string): Promise<IngestionState> {
    if (this.mutex.isLocked(ingestionKey(bucket, key))) {
      return { state: 'processing' };
    }

    const entry = await this.log.get(bucket, key);
    if (!entry) {
      return { state: 'unseen' };
    }

    return { state: 'done', etag: entry.etag, processedAt: entry.processedAt };
  }

  private async ingest(event: WebhookEvent): Promise<WebhookOutcome> {
    const { bucket, key } = event;

    let etag = event.etag;
    if (!etag) {
      const stat = await this.storage.stat(bucket, key);
      if (!stat) {
        logger.warn({ bucket, key }, 'Notified object no longer exists');
        return { status: 'ignored', reason: 'object_not_found' };
      }
      etag = stat.etag;
    }

    const done = await this.log.get(bucket, key);
    if (done && done.etag === etag) {
      logger.info({ bucket, key, etag }, 'Duplicate notification ignored');
      return { status: 'ignored', reason: 'duplicate_event' };
    }

    logger.info({ bucket, key, etag }, 'Downloading notified object');

    let object: StoredObject;
    try {
      object = await this.storage.fetch(bucket, key);
    } catch (error) {
      if (isIngestError(error) && error.code === ErrorCodes.OBJECT_NOT_FOUND) {
        logger.warn({ bucket, key }, 'Notified object no longer exists');
        return { status: 'ignored', reason: 'object_not_found' };
      }
      throw error;
    }

    // The version actually read is the one recorded, in case it changed since the notification
    const processedEtag = object.etag || etag;
    const report = await this.engine.import(object.body, ingestionKey(bucket, key));
    await this.log.markProcessed(bucket, key, processedEtag, report);

    logger.info(
      { bucket, key, etag: processedEtag, inserted: report.inserted, rejected: report.rejections.length },
      'Notified object imported'
    );

    return { status: 'imported', report };
  }
}
