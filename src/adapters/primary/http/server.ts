import fastify, { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { ValidationError } from '../../../domain/errors/ValidationError';
import { InvalidUtcOffsetError } from '../../../domain/errors/InvalidUtcOffsetError';
import { UserNotFoundError } from '../../../domain/errors/UserNotFoundError';
import { UserAlreadyRegisteredError } from '../../../domain/errors/UserAlreadyRegisteredError';
import { InvalidStateTransitionError } from '../../../domain/errors/InvalidStateTransitionError';
import { EntitlementWriteError } from '../../../domain/errors/EntitlementWriteError';
import type { ErrorResponse } from '../../../shared/validation/schemas';
import { logger } from '../../../shared/logger';
import { errorFields } from '../../../shared/utils/errors';

/**
 * Fastify Server Configuration
 *
 * This module configures the Fastify HTTP server with:
 * - Global error handling for domain and validation errors
 * - CORS support
 *
 * **Architecture:** This is a Primary Adapter in Hexagonal Architecture.
 * It translates HTTP requests into use case calls and domain results back
 * into HTTP responses.
 *
 * **Zod Integration:**
 * Route handlers validate params and bodies with Zod v4 schemas themselves;
 * a ZodError thrown there becomes a 400 here.
 */

interface ErrorMapping {
  status: number;
  code: string;
}

/**
 * Status and code for errors the API reports as they are
 */
function mapKnownError(error: Error): ErrorMapping | null {
  if (error instanceof ValidationError || error instanceof InvalidUtcOffsetError) {
    return { status: 400, code: 'VALIDATION_FAILED' };
  }
  if (error instanceof UserNotFoundError) {
    return { status: 404, code: 'USER_NOT_FOUND' };
  }
  if (error instanceof UserAlreadyRegisteredError) {
    return { status: 409, code: 'USER_ALREADY_REGISTERED' };
  }
  if (error instanceof InvalidStateTransitionError) {
    return { status: 409, code: 'INVALID_STATE_TRANSITION' };
  }
  return null;
}

function errorBody(code: string, message: string, details?: unknown[]): ErrorResponse {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

/**
 * Create and configure a Fastify server instance
 *
 * @returns Configured Fastify instance ready to register routes
 */
export function createServer(): FastifyInstance {
  const server = fastify({
    logger:
      process.env['NODE_ENV'] === 'test'
        ? false // Disable logging in tests
        : {
            level: process.env['LOG_LEVEL'] ?? 'info',
          },
  });

  void server.register(cors, {
    origin: true,
  });

  server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send(
        errorBody(
          'VALIDATION_FAILED',
          'Request validation failed',
          error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        )
      );
    }

    const known = mapKnownError(error);
    if (known) {
      const details =
        error instanceof ValidationError && Array.isArray(error.details) ? error.details : undefined;
      return reply.status(known.status).send(errorBody(known.code, error.message, details));
    }

    // Malformed JSON, unsupported media type and similar framework rejections
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send(errorBody(error.code ?? 'BAD_REQUEST', error.message));
    }

    logger.error({
      msg: 'Unhandled request error',
      method: request.method,
      url: request.url,
      ...errorFields(error),
    });

    if (error instanceof EntitlementWriteError) {
      return reply
        .status(500)
        .send(errorBody('ENTITLEMENT_WRITE_FAILED', 'Failed to update entitlement'));
    }

    return reply.status(500).send(errorBody('INTERNAL_ERROR', 'An unexpected error occurred'));
  });

  return server;
}

/**
 * Start the Fastify server
 *
 * @param server - Fastify instance
 * @param port - Port to listen on (default: 3000)
 * @param host - Host to bind to (default: 0.0.0.0)
 */
export async function startServer(
  server: FastifyInstance,
  port = 3000,
  host = '0.0.0.0'
): Promise<void> {
  await server.listen({ port, host });
  logger.info({ msg: 'HTTP server listening', host, port });
}
