/**
 * Storage Mirror Tests
 * The S3 client is short-circuited in its initialize step, so no request leaves the process.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { S3Client, type ServiceOutputTypes } from '@aws-sdk/client-s3';
import { StorageMirror, compactTimestamp, createS3Client, normalizeEtag } from '../services/storage.js';

type Responder = (commandName: string, input: unknown) => ServiceOutputTypes;

function s3Error(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

function stubbedClient(respond: Responder, calls: string[]): S3Client {
  const client = createS3Client({
    endpoint: 'http://localhost:9000',
    region: 'us-east-1',
    accessKeyId: 'test-access',
    secretAccessKey: 'test-secret',
  });

  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const commandName = context.commandName ?? 'unknown';
      calls.push(commandName);
      return { output: respond(commandName, args.input), response: {} };
    },
    { step: 'initialize', name: 'stubResponses' }
  );

  return client;
}

const BODY = Buffer.from('name,email,age\nAlice,alice@example.com,30\n', 'utf8');

describe('Storage helpers', () => {
  it('should strip the quotes S3 puts around etags', () => {
    expect(normalizeEtag('"9b2cf535f27731c974343645a3985328"')).toBe('9b2cf535f27731c974343645a3985328');
    expect(normalizeEtag('plain')).toBe('plain');
  });

  it('should format compact UTC timestamps', () => {
    expect(compactTimestamp(new Date('2026-01-18T09:30:15.123Z'))).toBe('20260118T093015Z');
  });
});

describe('Storage Mirror', () => {
  let calls: string[];

  beforeEach(() => {
    calls = [];
  });

  it('should derive keys from time, content hash and basename', () => {
    const mirror = new StorageMirror(stubbedClient(() => ({ $metadata: {} }), calls), { bucket: 'uploads', timeoutMs: 1000 });
    const at = new Date('2026-01-18T09:30:15Z');

    const key = mirror.deriveKey('C:\\Users\\me\\people.csv', BODY, at);

    expect(key).toMatch(/^20260118T093015Z_[0-9a-f]{12}_people\.csv$/);
    expect(mirror.deriveKey('people.csv', BODY, at)).toBe(key);
    expect(mirror.deriveKey('people.csv', Buffer.from('other'), at)).not.toBe(key);
  });

  it('should create a missing bucket before the first upload', async () => {
    const client = stubbedClient((command) => {
      if (command === 'HeadBucketCommand') throw s3Error('NotFound', 404);
      if (command === 'PutObjectCommand') return { $metadata: {}, ETag: '"abc123"' };
      return { $metadata: {} };
    }, calls);
    const mirror = new StorageMirror(client, { bucket: 'uploads', timeoutMs: 1000 });

    const ref = await mirror.store('people.csv', BODY, 'k1.csv');
    await mirror.store('people.csv', BODY, 'k2.csv');

    expect(ref).toEqual({ bucket: 'uploads', key: 'k1.csv', size: BODY.byteLength, etag: 'abc123' });
    expect(calls).toEqual(['HeadBucketCommand', 'CreateBucketCommand', 'PutObjectCommand', 'PutObjectCommand']);
  });

  it('should carry on when another writer created the bucket first', async () => {
    const client = stubbedClient((command) => {
      if (command === 'HeadBucketCommand') throw s3Error('NotFound', 404);
      if (command === 'CreateBucketCommand') throw s3Error('BucketAlreadyOwnedByYou', 409);
      return { $metadata: {}, ETag: '"abc123"' };
    }, calls);
    const mirror = new StorageMirror(client, { bucket: 'uploads', timeoutMs: 1000 });

    const ref = await mirror.store('people.csv', BODY, 'k1.csv');

    expect(ref.etag).toBe('abc123');
  });

  it('should report an unreachable endpoint as STORAGE_UNAVAILABLE', async () => {
    const client = stubbedClient(() => {
      throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9000'), { code: 'ECONNREFUSED' });
    }, calls);
    const mirror = new StorageMirror(client, { bucket: 'uploads', timeoutMs: 1000 });

    await expect(mirror.store('people.csv', BODY)).rejects.toMatchObject({
      code: 'STORAGE_UNAVAILABLE',
      statusCode: 503,
    });
    expect(await mirror.healthCheck()).toBe(false);
  });

  it('should stat existing objects and return null for missing ones', async () => {
    const client = stubbedClient((_command, input) => {
      const key = typeof input === 'object' && input !== null && 'Key' in input ? input.Key : undefined;
      if (key === 'missing.csv') throw s3Error('NotFound', 404);
      return { $metadata: {}, ETag: '"e1"', ContentLength: 12 };
    }, calls);
    const mirror = new StorageMirror(client, { bucket: 'uploads', timeoutMs: 1000 });

    expect(await mirror.stat('uploads', 'present.csv')).toEqual({ etag: 'e1', size: 12 });
    expect(await mirror.stat('uploads', 'missing.csv')).toBeNull();
    expect(await mirror.exists('uploads', 'missing.csv')).toBe(false);
  });

  it('should map a missing object on download to OBJECT_NOT_FOUND', async () => {
    const client = stubbedClient(() => {
      throw s3Error('NoSuchKey', 404);
    }, calls);
    const mirror = new StorageMirror(client, { bucket: 'uploads', timeoutMs: 1000 });

    await expect(mirror.fetch('uploads', 'gone.csv')).rejects.toMatchObject({ code: 'OBJECT_NOT_FOUND', statusCode: 404 });
  });

  it('should report a healthy bucket listing', async () => {
    const mirror = new StorageMirror(stubbedClient(() => ({ $metadata: {} }), calls), { bucket: 'uploads', timeoutMs: 1000 });

    expect(await mirror.healthCheck()).toBe(true);
    expect(calls).toEqual(['ListObjectsV2Command']);
  });
});
