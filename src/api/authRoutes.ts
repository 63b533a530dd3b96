/**
 * Authentication Routes
 * ====================
 * Login, logout and the current user
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import { Settings } from '../config/settings.js';
import { toPublicUser, type ClubUserWithRole } from '../models/ClubUser.js';
import { requireAuth } from '../middleware/auth.js';
import { requireUser } from '../services/access.js';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('auth-routes');

function sessionCookieOptions(maxAge: number) {
  return {
    path: '/',
    maxAge,
    httpOnly: true,
    secure: Settings.isProduction(),
    sameSite: 'strict' as const,
  };
}

function serializeUser(user: ClubUserWithRole) {
  return { ...toPublicUser(user), role: user.role };
}

function clearSession(reply: FastifyReply) {
  reply.setCookie(Settings.SESSION_COOKIE_NAME, '', sessionCookieOptions(0));
}

export async function registerAuthRoutes(fastify: FastifyInstance) {
  fastify.post('/login', async (request, reply) => {
    const { token, user } = await fastify.services.auth.login(request.body);

    reply.setCookie(
      Settings.SESSION_COOKIE_NAME,
      token,
      sessionCookieOptions(Settings.getSessionMaxAgeSeconds()),
    );
    logger.info('User login successful', { userId: user.id, ip: request.ip });

    return { success: true, token, user: serializeUser(user) };
  });

  fastify.post('/logout', async (request, reply) => {
    clearSession(reply);
    logger.debug('Session cookie cleared', { ip: request.ip });
    return { success: true, message: 'Logged out successfully' };
  });

  fastify.get('/me', { preHandler: requireAuth }, async request => {
    const user = requireUser(request.user);
    return { user: serializeUser(user) };
  });
}
