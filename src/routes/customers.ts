import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppServices } from '../services/index.js';
import { validateQuery } from '../middleware/validate.js';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export async function customerRoutes(
  fastify: FastifyInstance,
  opts: { services: AppServices }
): Promise<void> {
  const { services } = opts;

  /**
   * GET /api/v1/customers
   * Latest imported customers, newest first
   */
  fastify.get('/', {
    preHandler: [validateQuery(listQuerySchema)],
    schema: {
      description: 'List the most recently imported customers',
      tags: ['Customers'],
      querystring: {
        type: 'object',
        properties: {
          limit: { type: 'number', default: 50 },
        },
      },
    },
  }, async (request) => {
    const { limit } = request.query as z.infer<typeof listQuerySchema>;

    const customers = await services.customers.listRecent(limit);

    return {
      success: true,
      data: { customers, count: customers.length },
    };
  });
}
