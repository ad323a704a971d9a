import { type FastifyInstance } from 'fastify';
import { type Result } from '@careline/domain';
import { AppError, ErrorCode, createLogger } from '@careline/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { errorCode: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own body parsing failures carry a 4xx statusCode.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(400).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: ErrorCode.NOT_FOUND,
      message: `Route ${request.method} ${request.url} not found`,
    });
  });
}

/** Returns the value of a successful result, or throws it as an AppError. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw AppError.fromCareError(result.error);
  return result.value;
}
