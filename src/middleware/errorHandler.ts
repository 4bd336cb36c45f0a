import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { env } from '../config/env.js';
import { IngestError } from '../utils/errors.js';

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError | IngestError | ZodError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  // Log the error
  logger.error(
    {
      error: {
        message: error.message,
        stack: error.stack,
        code: 'code' in error ? error.code : undefined,
      },
      request: {
        method: request.method,
        url: request.url,
      },
    },
    'Request error'
  );

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    reply.status(400).send({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: error.flatten(),
      },
    });
    return;
  }

  // Import pipeline errors carry their own status and code
  if (error instanceof IngestError) {
    reply.status(error.statusCode).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
    return;
  }

  // Handle Fastify validation errors
  if ('validation' in error && error.validation) {
    reply.status(400).send({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: error.validation,
      },
    });
    return;
  }

  // Fastify and plugin errors (multipart limits, content types, rate limiting)
  if ('statusCode' in error && error.statusCode && error.statusCode < 500) {
    reply.status(error.statusCode).send({
      success: false,
      error: {
        code: error.code || 'ERROR',
        message: error.message,
      },
    });
    return;
  }

  // Handle unknown errors
  reply.status(500).send({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production'
        ? 'An unexpected error occurred'
        : error.message,
      details: env.NODE_ENV === 'development' ? error.stack : undefined,
    },
  });
}
