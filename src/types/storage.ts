/**
 * Object storage and notification types
 */

import type { ImportReport } from './import.js';

export interface StorageObjectRef {
  bucket: string;
  key: string;
  size: number;
  etag: string;
}

export interface StoredObject {
  body: Uint8Array;
  etag: string;
  size: number;
}

export interface ObjectStat {
  etag: string;
  size: number;
}

/** Object operations the ingestion paths depend on. */
export interface ObjectStore {
  readonly bucket: string;
  deriveKey(filename: string, body: Uint8Array, at?: Date): string;
  store(filename: string, body: Uint8Array, key?: string): Promise<StorageObjectRef>;
  fetch(bucket: string, key: string): Promise<StoredObject>;
  exists(bucket: string, key: string): Promise<boolean>;
  stat(bucket: string, key: string): Promise<ObjectStat | null>;
  healthCheck(): Promise<boolean>;
}

export interface WebhookEvent {
  eventType: string;
  bucket: string;
  key: string;
  etag?: string;
  size?: number;
}

export type DecodedNotification =
  | { kind: 'events'; events: WebhookEvent[] }
  | { kind: 'ignored'; reason: 'unrecognized_payload' };

export type IgnoreReason =
  | 'unsupported_event'
  | 'not_csv'
  | 'object_not_found'
  | 'duplicate_event';

export type WebhookOutcome =
  | { status: 'imported'; report: ImportReport }
  | { status: 'ignored'; reason: IgnoreReason }
  | { status: 'failed'; error: string; code: string; retryable: boolean };

export type IngestionState =
  | { state: 'unseen' }
  | { state: 'processing' }
  | { state: 'done'; etag: string; processedAt: Date };

export interface IngestionLogEntry {
  bucket: string;
  key: string;
  etag: string;
  processedAt: Date;
}

/** File-level record of which object versions have been imported. */
export interface IngestionLog {
  get(bucket: string, key: string): Promise<IngestionLogEntry | null>;
  markProcessed(bucket: string, key: string, etag: string, report: ImportReport): Promise<void>;
}
