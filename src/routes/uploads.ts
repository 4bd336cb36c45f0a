/**
 * Upload Routes
 * Browser-facing CSV upload, export of all customers and the sample file.
 */

import { FastifyInstance } from 'fastify';
import type { AppServices } from '../services/index.js';
import { SAMPLE_CSV } from '../services/exportService.js';
import { invalidFileTypeError, noFileError } from '../utils/errors.js';

const UPLOAD_FIELD = 'file';

export async function uploadRoutes(
  fastify: FastifyInstance,
  opts: { services: AppServices }
): Promise<void> {
  const { services } = opts;

  /**
   * POST /upload
   * Multipart upload of one .csv file in the `file` field.
   * Row-level problems are listed in the report; the upload still succeeds.
   */
  fastify.post('/upload', {
    schema: {
      description: 'Upload a name,email,age CSV file, import its rows and mirror it to object storage',
      tags: ['Import'],
      consumes: ['multipart/form-data'],
    },
  }, async (request, reply) => {
    const file = await request.file();
    if (!file || file.fieldname !== UPLOAD_FIELD) {
      throw noFileError();
    }

    if (!file.filename.toLowerCase().endsWith('.csv')) {
      throw invalidFileTypeError(file.filename);
    }

    const body = await file.toBuffer();
    const result = await services.uploads.ingestUpload(file.filename, body);

    return reply.send({
      success: true,
      data: result,
    });
  });

  /**
   * GET /export
   * All customers as CSV, streamed in id order
   */
  fastify.get('/export', {
    schema: {
      description: 'Download every customer as name,email,age CSV',
      tags: ['Import'],
    },
  }, async (request, reply) => {
    reply.header('Content-Type', 'text/csv; charset=utf-8');
    reply.header('Content-Disposition', 'attachment; filename="customers_export.csv"');
    return reply.send(services.exports.exportCsvStream());
  });

  /**
   * GET /sample
   * Example file with the expected layout
   */
  fastify.get('/sample', {
    schema: {
      description: 'Download a sample CSV',
      tags: ['Import'],
    },
  }, async (request, reply) => {
    reply.header('Content-Type', 'text/csv; charset=utf-8');
    reply.header('Content-Disposition', 'attachment; filename="sample_customers.csv"');
    return reply.send(SAMPLE_CSV);
  });
}
