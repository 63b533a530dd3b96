/**
 * Authentication Middleware
 * ========================
 * Resolves the session token into `request.user` and guards routes by
 * authentication and permission.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { Settings } from '../config/settings.js';
import { hasPermission, type ClubUserWithRole } from '../models/ClubUser.js';
import type { PermissionName } from '../models/Role.js';
import type { Services } from '../services/index.js';
import { isDocumentManager, type RequestContext } from '../services/access.js';
import { AuthenticationError, PermissionDeniedError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('auth-middleware');

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
  }

  interface FastifyRequest {
    user: ClubUserWithRole | null;
  }
}

const BEARER_PREFIX = 'Bearer ';
const USER_AGENT_MAX_LENGTH = 255;

/**
 * Session token from the Authorization header, falling back to the session cookie
 */
export function extractToken(request: FastifyRequest): string | null {
  const authorization = request.headers.authorization;
  if (authorization?.startsWith(BEARER_PREFIX)) {
    const token = authorization.substring(BEARER_PREFIX.length).trim();
    if (token) {
      return token;
    }
  }
  return request.cookies[Settings.SESSION_COOKIE_NAME] || null;
}

/**
 * Populates `request.user`. Never rejects; routes that need a user add requireAuth.
 */
export async function authMiddleware(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  const token = extractToken(request);
  request.user = token ? request.server.services.auth.resolveUser(token) : null;
}

/**
 * Require an active, authenticated user
 */
export async function requireAuth(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  await authMiddleware(request, reply);

  if (!request.user) {
    logAuthFailure(request, 'Missing, invalid or expired session');
    throw new AuthenticationError();
  }
}

/**
 * Require a permission granted by the user's role (superusers hold all)
 */
export function requirePermission(permission: PermissionName) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    await requireAuth(request, reply);

    if (!request.user || !hasPermission(request.user, permission)) {
      logAuthFailure(request, `Insufficient permissions: required ${permission}`);
      throw new PermissionDeniedError();
    }
  };
}

/**
 * Require a user who manages the document library (manage_users or access_admin)
 */
export async function requireDocumentManager(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  await requireAuth(request, reply);

  if (!isDocumentManager(request.user)) {
    logAuthFailure(request, 'Document manager access required');
    throw new PermissionDeniedError();
  }
}

/**
 * Client address and user agent for the action log. The first
 * X-Forwarded-For entry wins over the socket address.
 */
export function requestContext(request: FastifyRequest): RequestContext {
  const forwarded = request.headers['x-forwarded-for'];
  const forwardedValue = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const firstHop = forwardedValue?.split(',')[0]?.trim();
  return {
    ipAddress: firstHop || request.ip || null,
    userAgent: (request.headers['user-agent'] ?? '').slice(0, USER_AGENT_MAX_LENGTH),
  };
}

function logAuthFailure(request: FastifyRequest, reason: string) {
  logger.warn('Authentication failed', {
    reason,
    ip: request.ip,
    path: request.url,
    method: request.method,
  });
}
