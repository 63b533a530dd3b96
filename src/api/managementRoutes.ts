/**
 * Management Routes
 * =================
 * Roles, member types and their relationships, users, the member's own
 * profile, the member directory and the management dashboard.
 */

import type { FastifyInstance } from 'fastify';
import { requireAuth, requirePermission } from '../middleware/auth.js';
import { createLogger } from '../utils/loggingConfig.js';
import { toId, type IdParams } from './params.js';

const logger = createLogger('management-routes');

export async function registerManagementRoutes(fastify: FastifyInstance) {
  const { roles, membership, members, dashboard } = fastify.services;
  const manageUsers = requirePermission('manage_users');

  // Dashboard
  fastify.get('/dashboard', { preHandler: requireAuth }, async request => {
    return dashboard.overview(request.user);
  });

  fastify.get('/dashboard/section', { preHandler: requireAuth }, async request => {
    return dashboard.section(request.user, request.query);
  });

  // Roles
  fastify.get('/roles', { preHandler: manageUsers }, async request => {
    return roles.listRoles(request.user);
  });

  fastify.get<{ Params: IdParams }>('/roles/:id', { preHandler: manageUsers }, async request => {
    return roles.getRole(request.user, toId(request.params.id));
  });

  fastify.post('/roles', { preHandler: manageUsers }, async (request, reply) => {
    const role = await roles.createRole(request.user, request.body);
    return reply.code(201).send(role);
  });

  fastify.put<{ Params: IdParams }>('/roles/:id', { preHandler: manageUsers }, async request => {
    return roles.updateRole(request.user, toId(request.params.id), request.body);
  });

  fastify.delete<{ Params: IdParams }>(
    '/roles/:id',
    { preHandler: manageUsers },
    async (request, reply) => {
      await roles.deleteRole(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Member types
  fastify.get<{ Querystring: { active?: string } }>(
    '/member-types',
    { preHandler: manageUsers },
    async request => {
      return membership.listMemberTypes(request.user, request.query.active === 'true');
    },
  );

  fastify.post('/member-types', { preHandler: manageUsers }, async (request, reply) => {
    const memberType = await membership.createMemberType(request.user, request.body);
    return reply.code(201).send(memberType);
  });

  fastify.post('/member-types/reorder', { preHandler: manageUsers }, async request => {
    return membership.reorderMemberTypes(request.user, request.body);
  });

  fastify.get<{ Params: IdParams }>(
    '/member-types/:id',
    { preHandler: manageUsers },
    async request => {
      return membership.getMemberType(request.user, toId(request.params.id));
    },
  );

  fastify.put<{ Params: IdParams }>(
    '/member-types/:id',
    { preHandler: manageUsers },
    async request => {
      return membership.updateMemberType(request.user, toId(request.params.id), request.body);
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/member-types/:id',
    { preHandler: manageUsers },
    async (request, reply) => {
      await membership.deleteMemberType(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Member type relationships
  fastify.get('/relationships', { preHandler: manageUsers }, async request => {
    return membership.listRelationships(request.user);
  });

  fastify.post('/relationships', { preHandler: manageUsers }, async (request, reply) => {
    const relationship = await membership.createRelationship(request.user, request.body);
    return reply.code(201).send(relationship);
  });

  fastify.put<{ Params: IdParams }>(
    '/relationships/:id',
    { preHandler: manageUsers },
    async request => {
      return membership.updateRelationship(request.user, toId(request.params.id), request.body);
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/relationships/:id',
    { preHandler: manageUsers },
    async (request, reply) => {
      await membership.deleteRelationship(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Users
  fastify.get('/users', { preHandler: manageUsers }, async request => {
    return members.listUsers(request.user, request.query);
  });

  fastify.post('/users', { preHandler: manageUsers }, async (request, reply) => {
    const user = await members.createUser(request.user, request.body);
    return reply.code(201).send(user);
  });

  fastify.get<{ Params: IdParams }>('/users/:id', { preHandler: manageUsers }, async request => {
    return members.getUser(request.user, toId(request.params.id));
  });

  fastify.put<{ Params: IdParams }>('/users/:id', { preHandler: manageUsers }, async request => {
    return members.updateUser(request.user, toId(request.params.id), request.body);
  });

  fastify.delete<{ Params: IdParams }>(
    '/users/:id',
    { preHandler: manageUsers },
    async (request, reply) => {
      await members.deleteUser(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  fastify.get<{ Params: IdParams }>(
    '/users/:id/dependents',
    { preHandler: requireAuth },
    async request => {
      return members.dependentsOf(request.user, toId(request.params.id));
    },
  );

  // Own profile
  fastify.get('/profile', { preHandler: requireAuth }, async request => {
    return members.getOwnProfile(request.user);
  });

  fastify.put('/profile', { preHandler: requireAuth }, async request => {
    const result = await members.updateOwnProfile(request.user, request.body);
    if (result.passwordChanged) {
      logger.info('Password changed through profile', { userId: result.user.id });
    }
    return result;
  });

  // Directory
  fastify.get('/directory', { preHandler: requireAuth }, async request => {
    return members.directory(request.user, request.query);
  });
}
