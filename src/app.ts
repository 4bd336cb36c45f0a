import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { registerRoutes } from './routes/index.js';
import type { AppServices } from './services/index.js';

// Storage notifications and probes are never throttled
const RATE_LIMIT_EXEMPT = ['/obs-event', '/health'];

export async function buildApp(services: AppServices): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
    trustProxy: true,
  });

  // Global error handler
  app.setErrorHandler(errorHandler);

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGIN === '*' ? true : env.CORS_ORIGIN.split(','),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  });

  // Multipart file uploads
  await app.register(multipart, {
    limits: {
      fileSize: services.maxUploadBytes,
      files: 1, // Only 1 file per request
    },
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: env.RATE_LIMIT_MAX,
    timeWindow: env.RATE_LIMIT_WINDOW_MS,
    allowList: (request) => RATE_LIMIT_EXEMPT.some((path) => request.url.startsWith(path)),
    errorResponseBuilder: () => ({
      success: false,
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests, please try again later',
      },
    }),
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'CSV Customer Import API',
        description: 'Imports name,email,age CSV files uploaded directly or announced by object-storage notifications',
        version: process.env.npm_package_version || '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${env.PORT}`,
          description: env.NODE_ENV,
        },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
        requestId: request.id,
      },
      'Request completed'
    );
  });

  // Register routes
  await registerRoutes(app, services);

  return app;
}
