import { FastifyRequest, FastifyReply } from 'fastify';
import { ZodSchema } from 'zod';

/**
 * Create a validation middleware for query parameters
 */
export function validateQuery<T extends ZodSchema>(schema: T) {
  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> => {
    const result = schema.safeParse(request.query);

    if (!result.success) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid query parameters',
          details: result.error.flatten(),
        },
      });
    }

    // Replace query with parsed/transformed data
    request.query = result.data;
  };
}
