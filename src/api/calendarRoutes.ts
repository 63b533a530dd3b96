/**
 * Calendar Routes
 * ===============
 * Events, the public calendar feed, registrations, categories, the action
 * log and member autocomplete.
 */

import type { FastifyInstance } from 'fastify';
import { authMiddleware, requestContext, requireAuth, requirePermission } from '../middleware/auth.js';
import { createLogger } from '../utils/loggingConfig.js';
import { toId, type IdParams } from './params.js';

const logger = createLogger('calendar-routes');

export async function registerCalendarRoutes(fastify: FastifyInstance) {
  const { events, registrations, categories, actionLogs, members } = fastify.services;

  // Events
  fastify.get('/events', { preHandler: authMiddleware }, async request => {
    return events.listEvents(request.query);
  });

  fastify.get('/events/feed', async request => {
    return events.feed(request.query);
  });

  fastify.get<{ Params: IdParams }>(
    '/events/:id',
    { preHandler: authMiddleware },
    async request => {
      return events.getEventDetail(request.user, toId(request.params.id));
    },
  );

  fastify.post(
    '/events',
    { preHandler: requirePermission('create_events') },
    async (request, reply) => {
      const detail = await events.createEvent(request.user, request.body, requestContext(request));
      logger.debug(`Event ${detail.event.id} created through the API`);
      return reply.code(201).send(detail);
    },
  );

  fastify.put<{ Params: IdParams }>(
    '/events/:id',
    { preHandler: requirePermission('edit_events') },
    async request => {
      return events.updateEvent(
        request.user,
        toId(request.params.id),
        request.body,
        requestContext(request),
      );
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/events/:id',
    { preHandler: requirePermission('delete_events') },
    async (request, reply) => {
      await events.deleteEvent(request.user, toId(request.params.id), requestContext(request));
      return reply.code(204).send();
    },
  );

  // Registrations
  fastify.post<{ Params: IdParams }>(
    '/events/:id/register',
    { preHandler: requireAuth },
    async (request, reply) => {
      const registration = await registrations.register(
        request.user,
        toId(request.params.id),
        request.body ?? {},
      );
      return reply.code(201).send(registration);
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/events/:id/register',
    { preHandler: requireAuth },
    async request => {
      return registrations.unregister(request.user, toId(request.params.id));
    },
  );

  fastify.get<{ Params: IdParams }>(
    '/events/:id/registrants',
    { preHandler: authMiddleware },
    async request => {
      return registrations.listRegistrants(request.user, toId(request.params.id));
    },
  );

  // Categories
  fastify.get('/categories', { preHandler: requireAuth }, async request => {
    return categories.listCategories(request.user);
  });

  fastify.get<{ Params: IdParams }>(
    '/categories/:id',
    { preHandler: requireAuth },
    async request => {
      return categories.getCategory(request.user, toId(request.params.id));
    },
  );

  fastify.post(
    '/categories',
    { preHandler: requirePermission('manage_categories') },
    async (request, reply) => {
      const category = await categories.createCategory(request.user, request.body);
      return reply.code(201).send(category);
    },
  );

  fastify.put<{ Params: IdParams }>(
    '/categories/:id',
    { preHandler: requirePermission('manage_categories') },
    async request => {
      return categories.updateCategory(request.user, toId(request.params.id), request.body);
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/categories/:id',
    { preHandler: requirePermission('manage_categories') },
    async (request, reply) => {
      await categories.deleteCategory(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Action log
  fastify.get('/action-logs', { preHandler: requireAuth }, async request => {
    return actionLogs.listActionLogs(request.user, request.query);
  });

  // Contact picker
  fastify.get<{ Querystring: { q?: string } }>(
    '/members/autocomplete',
    { preHandler: requireAuth },
    async request => {
      const results = await members.autocomplete(request.user, request.query.q);
      return { results };
    },
  );
}
