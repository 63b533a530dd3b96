/**
 * Role management and default role installation
 */

import { z } from 'zod';
import { ROLE_NAMES, type Role } from '../db/schema.js';
import { DEFAULT_ROLES } from '../models/Role.js';
import type { Repositories } from '../persistence/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { optionalText, parseInput } from '../utils/validation.js';
import { requirePermission, type Actor } from './access.js';

const logger = createLogger('role-service');

const permissionFlags = {
  canViewEvents: z.boolean(),
  canCreateEvents: z.boolean(),
  canEditEvents: z.boolean(),
  canDeleteEvents: z.boolean(),
  canManageCategories: z.boolean(),
  canManageUsers: z.boolean(),
  canAccessAdmin: z.boolean(),
};

export const RoleInputSchema = z.object({
  name: z.enum(ROLE_NAMES),
  description: optionalText(500),
  ...permissionFlags,
});

export const RoleCreateSchema = RoleInputSchema.partial({
  canViewEvents: true,
  canCreateEvents: true,
  canEditEvents: true,
  canDeleteEvents: true,
  canManageCategories: true,
  canManageUsers: true,
  canAccessAdmin: true,
});

export const RoleUpdateSchema = RoleInputSchema.partial();

const DUPLICATE_ROLE = 'Role with this Name already exists.';

export class RoleService {
  constructor(private readonly repos: Repositories) {}

  /**
   * Install any missing default role. Existing rows are left untouched.
   */
  async ensureDefaultRoles(): Promise<Role[]> {
    const created: Role[] = [];
    for (const defaults of DEFAULT_ROLES) {
      if (this.repos.roles.findByName(defaults.name)) {
        continue;
      }
      created.push(this.repos.roles.insert({ ...defaults }));
      logger.info(`Created default role: ${defaults.name}`);
    }
    return created;
  }

  async listRoles(actor: Actor): Promise<Role[]> {
    requirePermission(actor, 'manage_users');
    return this.repos.roles.list();
  }

  async getRole(actor: Actor, id: number): Promise<Role> {
    requirePermission(actor, 'manage_users');
    const role = this.repos.roles.findById(id);
    if (!role) {
      throw new NotFoundError('Role', id);
    }
    return role;
  }

  async createRole(actor: Actor, input: unknown): Promise<Role> {
    requirePermission(actor, 'manage_users');
    const data = parseInput(RoleCreateSchema, input);
    if (this.repos.roles.findByName(data.name)) {
      throw ValidationError.forField('name', DUPLICATE_ROLE);
    }
    const role = this.repos.roles.insert(data);
    logger.info(`Role created: ${role.name}`);
    return role;
  }

  async updateRole(actor: Actor, id: number, input: unknown): Promise<Role> {
    await this.getRole(actor, id);
    const data = parseInput(RoleUpdateSchema, input);
    if (data.name !== undefined) {
      const existing = this.repos.roles.findByName(data.name);
      if (existing && existing.id !== id) {
        throw ValidationError.forField('name', DUPLICATE_ROLE);
      }
    }
    const updated = this.repos.roles.update(id, data);
    if (!updated) {
      throw new NotFoundError('Role', id);
    }
    logger.info(`Role updated: ${updated.name}`);
    return updated;
  }

  async deleteRole(actor: Actor, id: number): Promise<void> {
    const role = await this.getRole(actor, id);
    this.repos.roles.delete(id);
    logger.info(`Role deleted: ${role.name}`);
  }
}
