/**
 * Webhook Ingestion Tests
 * Notification decoding, per-key serialization and etag deduplication
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  WebhookIngestionService,
  decodeObjectKey,
  decodeStorageEvent,
  isCsvKey,
  isObjectCreatedEvent,
} from '../services/webhookIngestion.js';
import { ImportEngine } from '../services/importEngine.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import type { WebhookEvent } from '../types/index.js';
import { FakeObjectStore, InMemoryCustomerStore, InMemoryIngestionLog } from './fakes.js';

const CSV = 'name,email,age\nAlice,alice@example.com,30\nBob,bob@example.org,25\n';

function createdEvent(key: string, etag?: string): WebhookEvent {
  return { eventType: 's3:ObjectCreated:Put', bucket: 'uploads', key, etag };
}

describe('Notification decoding', () => {
  it('should decode MinIO records into events', () => {
    const decoded = decodeStorageEvent({
      EventName: 's3:ObjectCreated:Put',
      Key: 'uploads/reports%2Fjan+2026.csv',
      Records: [
        {
          eventName: 's3:ObjectCreated:Put',
          s3: {
            bucket: { name: 'uploads' },
            object: { key: 'reports%2Fjan+2026.csv', eTag: '"d41d8cd98f00b204"', size: 42 },
          },
        },
      ],
    });

    expect(decoded).toEqual({
      kind: 'events',
      events: [
        {
          eventType: 's3:ObjectCreated:Put',
          bucket: 'uploads',
          key: 'reports/jan 2026.csv',
          etag: 'd41d8cd98f00b204',
          size: 42,
        },
      ],
    });
  });

  it('should ignore payloads that are not notifications', () => {
    expect(decodeStorageEvent(undefined)).toEqual({ kind: 'ignored', reason: 'unrecognized_payload' });
    expect(decodeStorageEvent({ hello: 'world' })).toEqual({ kind: 'ignored', reason: 'unrecognized_payload' });
    expect(decodeStorageEvent({ Records: [] })).toEqual({ kind: 'ignored', reason: 'unrecognized_payload' });
  });

  it('should keep keys with broken percent-encoding as sent', () => {
    expect(decodeObjectKey('100%+done.csv')).toBe('100% done.csv');
  });

  it('should recognise create events and csv keys', () => {
    expect(isObjectCreatedEvent('s3:ObjectCreated:Put')).toBe(true);
    expect(isObjectCreatedEvent('ObjectCreated:CompleteMultipartUpload')).toBe(true);
    expect(isObjectCreatedEvent('s3:ObjectRemoved:Delete')).toBe(false);
    expect(isCsvKey('exports/Customers.CSV')).toBe(true);
    expect(isCsvKey('photo.png')).toBe(false);
  });
});

describe('Webhook Ingestion Service', () => {
  let customers: InMemoryCustomerStore;
  let storage: FakeObjectStore;
  let log: InMemoryIngestionLog;
  let service: WebhookIngestionService;

  beforeEach(() => {
    customers = new InMemoryCustomerStore();
    storage = new FakeObjectStore();
    log = new InMemoryIngestionLog();
    service = new WebhookIngestionService(storage, new ImportEngine(customers), log, new KeyedMutex());
  });

  it('should import an announced object and record its etag', async () => {
    const etag = storage.put('uploads', 'jan.csv', CSV);

    const outcome = await service.handle(createdEvent('jan.csv', etag));

    expect(outcome.status).toBe('imported');
    if (outcome.status === 'imported') {
      expect(outcome.report.inserted).toBe(2);
      expect(outcome.report.source).toBe('uploads/jan.csv');
    }
    expect(log.entries.get('uploads/jan.csv')?.etag).toBe(etag);
    expect(customers.customers.map((c) => c.source)).toEqual(['uploads/jan.csv', 'uploads/jan.csv']);
  });

  it('should ignore events that are not object creations', async () => {
    storage.put('uploads', 'jan.csv', CSV);

    const outcome = await service.handle({ eventType: 's3:ObjectRemoved:Delete', bucket: 'uploads', key: 'jan.csv' });

    expect(outcome).toEqual({ status: 'ignored', reason: 'unsupported_event' });
    expect(storage.fetchCalls).toBe(0);
  });

  it('should ignore objects that are not csv files', async () => {
    const outcome = await service.handle(createdEvent('photo.png', 'abc'));

    expect(outcome).toEqual({ status: 'ignored', reason: 'not_csv' });
    expect(storage.fetchCalls).toBe(0);
  });

  it('should ignore a replayed notification for the same etag', async () => {
    const etag = storage.put('uploads', 'jan.csv', CSV);

    await service.handle(createdEvent('jan.csv', etag));
    const replay = await service.handle(createdEvent('jan.csv', etag));

    expect(replay).toEqual({ status: 'ignored', reason: 'duplicate_event' });
    expect(storage.fetchCalls).toBe(1);
    expect(log.markCalls).toBe(1);
    expect(customers.customers).toHaveLength(2);
  });

  it('should look up the etag when the notification carries none', async () => {
    storage.put('uploads', 'jan.csv', CSV);

    await service.handle(createdEvent('jan.csv'));
    const replay = await service.handle(createdEvent('jan.csv'));

    expect(replay).toEqual({ status: 'ignored', reason: 'duplicate_event' });
    expect(storage.fetchCalls).toBe(1);
  });

  it('should import a new version of the same key again', async () => {
    const first = storage.put('uploads', 'jan.csv', CSV);
    await service.handle(createdEvent('jan.csv', first));

    const second = storage.put('uploads', 'jan.csv', `${CSV}Cara,cara@example.com,41\n`);
    const outcome = await service.handle(createdEvent('jan.csv', second));

    expect(outcome.status).toBe('imported');
    if (outcome.status === 'imported') {
      expect(outcome.report.inserted).toBe(1);
      expect(outcome.report.duplicateEmail).toBe(2);
    }
    expect(log.entries.get('uploads/jan.csv')?.etag).toBe(second);
  });

  it('should process concurrent notifications for one key once', async () => {
    customers.insertDelayMs = 5;
    const etag = storage.put('uploads', 'jan.csv', CSV);

    const outcomes = await Promise.all([
      service.handle(createdEvent('jan.csv', etag)),
      service.handle(createdEvent('jan.csv', etag)),
      service.handle(createdEvent('jan.csv', etag)),
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['imported', 'ignored', 'ignored']);
    expect(storage.fetchCalls).toBe(1);
    expect(log.markCalls).toBe(1);
    expect(customers.insertCalls).toBe(2);
  });

  it('should report processing while a key is being imported', async () => {
    customers.insertDelayMs = 5;
    const etag = storage.put('uploads', 'jan.csv', CSV);

    expect(await service.state('uploads', 'jan.csv')).toEqual({ state: 'unseen' });

    const pending = service.handle(createdEvent('jan.csv', etag));
    expect(await service.state('uploads', 'jan.csv')).toEqual({ state: 'processing' });

    await pending;
    expect(await service.state('uploads', 'jan.csv')).toEqual({
      state: 'done',
      etag,
      processedAt: new Date('2026-01-01T00:00:00Z'),
    });
  });

  it('should leave the key retryable when storage is unavailable', async () => {
    const etag = storage.put('uploads', 'jan.csv', CSV);
    storage.available = false;

    const failed = await service.handle(createdEvent('jan.csv', etag));

    expect(failed).toMatchObject({ status: 'failed', code: 'STORAGE_UNAVAILABLE', retryable: true });
    expect(log.markCalls).toBe(0);
    expect(await service.state('uploads', 'jan.csv')).toEqual({ state: 'unseen' });

    storage.available = true;
    const retried = await service.handle(createdEvent('jan.csv', etag));

    expect(retried.status).toBe('imported');
  });

  it('should report a file that is not UTF-8 as not retryable', async () => {
    const etag = storage.put('uploads', 'bad.csv', new Uint8Array([0x41, 0x2c, 0xff, 0x0a]));

    const outcome = await service.handle(createdEvent('bad.csv', etag));

    expect(outcome).toEqual({
      status: 'failed',
      error: 'File is not valid UTF-8 text',
      code: 'ENCODING_ERROR',
      retryable: false,
    });
    expect(log.markCalls).toBe(0);
  });

  it('should ignore notifications for objects that are gone', async () => {
    expect(await service.handle(createdEvent('gone.csv', 'abc'))).toEqual({
      status: 'ignored',
      reason: 'object_not_found',
    });
    expect(await service.handle(createdEvent('gone.csv'))).toEqual({
      status: 'ignored',
      reason: 'object_not_found',
    });
  });

  it('should fail retryably when the customer store goes down mid-import', async () => {
    customers.failAfter = 1;
    const etag = storage.put('uploads', 'jan.csv', CSV);

    const outcome = await service.handle(createdEvent('jan.csv', etag));

    expect(outcome).toMatchObject({ status: 'failed', code: 'STORE_UNAVAILABLE', retryable: true });
    expect(log.entries.has('uploads/jan.csv')).toBe(false);
  });
});
