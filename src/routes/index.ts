import { FastifyInstance } from 'fastify';
import type { AppServices } from '../services/index.js';
import { healthRoutes } from './health.js';
import { uploadRoutes } from './uploads.js';
import { webhookRoutes } from './webhooks.js';
import { customerRoutes } from './customers.js';

/**
 * Register all routes
 */
export async function registerRoutes(fastify: FastifyInstance, services: AppServices): Promise<void> {
  // Health check routes (no prefix)
  await fastify.register(healthRoutes, { services });

  // Browser upload, export and sample download (no prefix)
  await fastify.register(uploadRoutes, { services });

  // Object-storage notifications
  await fastify.register(webhookRoutes, { services });

  // API v1 routes
  await fastify.register(customerRoutes, { prefix: '/api/v1/customers', services });

  // Root endpoint
  fastify.get('/', async () => {
    return {
      success: true,
      data: {
        name: 'CSV Customer Import',
        version: process.env.npm_package_version || '1.0.0',
        documentation: '/documentation',
        upload: '/upload',
        export: '/export',
        sample: '/sample',
      },
    };
  });
}
