/**
 * Object-storage notification endpoint.
 * Malformed or irrelevant payloads are answered with 200 so the sender does
 * not retry noise; a 503 asks for redelivery when an import failed for a
 * transient reason. Objects already imported are skipped on redelivery.
 */

import { FastifyInstance } from 'fastify';
import type { AppServices } from '../services/index.js';
import { decodeStorageEvent } from '../services/webhookIngestion.js';
import type { WebhookEvent, WebhookOutcome } from '../types/index.js';
import { logger } from '../utils/logger.js';

interface NotificationItem {
  bucket: string;
  object: string;
  status: WebhookOutcome['status'];
  inserted?: number;
  errors?: number;
  reason?: string;
  error?: string;
  retryable?: boolean;
}

function toItem(event: WebhookEvent, outcome: WebhookOutcome): NotificationItem {
  const base = { bucket: event.bucket, object: event.key };

  switch (outcome.status) {
    case 'imported':
      return {
        ...base,
        status: outcome.status,
        inserted: outcome.report.inserted,
        errors: outcome.report.rejections.length,
      };
    case 'ignored':
      return { ...base, status: outcome.status, reason: outcome.reason };
    case 'failed':
      return { ...base, status: outcome.status, error: outcome.error, retryable: outcome.retryable };
  }
}

function decodeJsonBody(body: string | Buffer): unknown {
  try {
    return JSON.parse(typeof body === 'string' ? body : body.toString('utf8'));
  } catch {
    return undefined;
  }
}

export async function webhookRoutes(
  fastify: FastifyInstance,
  opts: { services: AppServices }
): Promise<void> {
  const { services } = opts;

  // Bodies that are not JSON, whatever their content type, decode to undefined and end up ignored
  fastify.removeContentTypeParser(['application/json', 'text/plain']);
  fastify.addContentTypeParser(['application/json', 'text/plain'], { parseAs: 'string' }, (request, body, done) => {
    done(null, decodeJsonBody(body));
  });
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (request, body, done) => {
    done(null, decodeJsonBody(body));
  });

  /**
   * POST /obs-event
   * Storage event notification (S3 / MinIO format)
   */
  fastify.post('/obs-event', {
    schema: {
      description: 'Receive object-storage notifications and import announced CSV objects',
      tags: ['Webhooks'],
    },
  }, async (request, reply) => {
    const decoded = decodeStorageEvent(request.body);

    if (decoded.kind === 'ignored') {
      logger.debug({ reason: decoded.reason }, 'Notification payload ignored');
      return reply.send({
        success: true,
        data: { ok: 0, errors: 0, ignored: decoded.reason, items: [] },
      });
    }

    const outcomes = await Promise.all(
      decoded.events.map(async (event) => ({ event, outcome: await services.webhooks.handle(event) }))
    );

    const items = outcomes.map(({ event, outcome }) => toItem(event, outcome));
    const ok = items.reduce((sum, item) => sum + (item.inserted ?? 0), 0);
    const errors = items.reduce((sum, item) => sum + (item.errors ?? 0), 0);
    const needsRetry = outcomes.some(({ outcome }) => outcome.status === 'failed' && outcome.retryable);

    return reply.status(needsRetry ? 503 : 200).send({
      success: !needsRetry,
      data: { ok, errors, items },
    });
  });
}
