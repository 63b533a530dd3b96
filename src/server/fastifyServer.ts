/**
 * Harbor Club Manager - Fastify Server
 *
 * HTTP surface for the three applications:
 * - /api/auth        session login and logout
 * - /api/calendar    events, registrations, categories and the action log
 * - /api/documents   folders, files and folder permissions
 * - /api/management  roles, member types, users and the member directory
 */

import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { STATUS_CODES } from 'http';
import { ZodError } from 'zod';
import { registerAuthRoutes } from '../api/authRoutes.js';
import { registerCalendarRoutes } from '../api/calendarRoutes.js';
import { registerDocumentRoutes } from '../api/documentRoutes.js';
import { registerManagementRoutes } from '../api/managementRoutes.js';
import { Settings } from '../config/settings.js';
import type { DatabaseManager } from '../db/index.js';
import { registerUploadParser } from '../middleware/fileUpload.js';
import type { Services } from '../services/index.js';
import { AppError, ValidationError, type FieldErrors } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { zodToFieldErrors } from '../utils/validation.js';

const logger = createLogger('server');

/**
 * Health check response interface
 */
interface HealthResponse {
  status: 'ok' | 'degraded';
  timestamp: string;
  uptime: number;
  database: {
    status: 'healthy' | 'unhealthy';
    details: string;
  };
}

/**
 * Error body shared by every failed request
 */
export interface ErrorResponse {
  error: string;
  message?: string;
  fieldErrors?: FieldErrors;
}

export interface ServerOptions {
  services: Services;
  database: DatabaseManager;
  /** Per-IP request limit; off in test mode unless set */
  rateLimit?: boolean;
  /** Largest accepted upload body in bytes */
  uploadLimit?: number;
}

function hasStatusCode(error: FastifyError): error is FastifyError & { statusCode: number } {
  return typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500;
}

function errorResponse(error: unknown, request: FastifyRequest): { status: number; body: ErrorResponse } {
  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body: { error: error.code, message: error.message, fieldErrors: error.fieldErrors },
    };
  }
  if (error instanceof AppError) {
    return { status: error.statusCode, body: { error: error.code, message: error.message } };
  }
  if (error instanceof ZodError) {
    const fieldErrors = zodToFieldErrors(error);
    return {
      status: 400,
      body: {
        error: 'Bad Request',
        message: Object.values(fieldErrors)[0]?.[0] ?? 'Validation failed',
        fieldErrors,
      },
    };
  }

  logger.error(`Unhandled error on ${request.method} ${request.url}`, error);
  return { status: 500, body: { error: 'Internal Server Error' } };
}

/**
 * Create and configure the Fastify server instance
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { services, database } = options;
  const fastify = Fastify({ logger: false, trustProxy: true });

  fastify.decorate('services', services);
  fastify.decorateRequest('user', null);

  await fastify.register(cookie);

  await fastify.register(cors, {
    origin: Settings.CORS_ORIGIN ?? (Settings.NODE_ENV === 'development' ? true : false),
    credentials: true,
  });

  if (options.rateLimit ?? !Settings.isTestMode()) {
    await fastify.register(rateLimit, {
      max: Settings.RATE_LIMIT_MAX,
      timeWindow: '1 minute',
    });
  }

  registerUploadParser(fastify, options.uploadLimit);

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    logger.debug(
      `${request.method} ${request.url} - ${reply.statusCode} (${Math.round(reply.elapsedTime)}ms)`,
    );
  });

  fastify.setErrorHandler(async (error: FastifyError, request, reply) => {
    reply.removeHeader('content-disposition');
    if (!(error instanceof AppError) && !(error instanceof ZodError) && hasStatusCode(error)) {
      return reply.status(error.statusCode).send({
        error: STATUS_CODES[error.statusCode] ?? 'Bad Request',
        message: error.message,
      });
    }

    const { status, body } = errorResponse(error, request);
    return reply.status(status).send(body);
  });

  fastify.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  /**
   * Liveness plus a database round trip
   */
  fastify.get('/health', async (): Promise<HealthResponse> => {
    const databaseHealth = database.healthCheck();
    return {
      status: databaseHealth.status === 'healthy' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: databaseHealth,
    };
  });

  await fastify.register(registerAuthRoutes, { prefix: '/api/auth' });
  await fastify.register(registerCalendarRoutes, { prefix: '/api/calendar' });
  await fastify.register(registerDocumentRoutes, { prefix: '/api/documents' });
  await fastify.register(registerManagementRoutes, { prefix: '/api/management' });

  logger.debug('Fastify server configured');
  return fastify;
}

/**
 * Start listening on the configured host and port
 */
export async function startServer(fastify: FastifyInstance): Promise<void> {
  await fastify.listen({ port: Settings.SERVER_PORT, host: Settings.SERVER_HOST });
  logger.info(`Server listening on ${Settings.SERVER_HOST}:${Settings.SERVER_PORT}`);
}
