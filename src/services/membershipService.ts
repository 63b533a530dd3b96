/**
 * Member types and the parent/child relationships between them
 */

import { z } from 'zod';
import type { MemberType, MemberTypeRelationship } from '../db/schema.js';
import type { DatabaseManager } from '../db/index.js';
import type { Repositories } from '../persistence/index.js';
import {
  FieldErrorCollector,
  NON_FIELD_ERRORS,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { optionalText, parseInput } from '../utils/validation.js';
import { requirePermission, type Actor } from './access.js';

const logger = createLogger('membership-service');

export const MemberTypeInputSchema = z.object({
  name: z.string().trim().min(1, 'This field is required.').max(100),
  description: optionalText(1000),
  isActive: z.boolean().default(true),
  canBeParent: z.boolean().default(false),
  canBeChild: z.boolean().default(false),
  displayOrder: z.number().int().min(0).optional(),
});

export const MemberTypeUpdateSchema = z.object({
  name: z.string().trim().min(1, 'This field is required.').max(100).optional(),
  description: z.string().trim().max(1000).optional(),
  isActive: z.boolean().optional(),
  canBeParent: z.boolean().optional(),
  canBeChild: z.boolean().optional(),
  displayOrder: z.number().int().min(0).optional(),
});

export const ReorderSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1),
});

export const RelationshipInputSchema = z.object({
  parentTypeId: z.number().int().positive(),
  childTypeId: z.number().int().positive(),
  relationshipName: z.string().trim().min(1, 'This field is required.').max(100),
  maxChildren: z.number().int().min(1).nullable().default(null),
  isActive: z.boolean().default(true),
});

export const RelationshipUpdateSchema = RelationshipInputSchema.partial();

const DUPLICATE_MEMBER_TYPE = 'Member type with this Name already exists.';
const DUPLICATE_RELATIONSHIP = 'A relationship between these member types already exists.';

export class MembershipService {
  constructor(
    private readonly repos: Repositories,
    private readonly database: DatabaseManager,
  ) {}

  async listMemberTypes(actor: Actor, activeOnly = false): Promise<MemberType[]> {
    requirePermission(actor, 'manage_users');
    return this.repos.memberTypes.list(activeOnly);
  }

  async getMemberType(actor: Actor, id: number): Promise<MemberType> {
    requirePermission(actor, 'manage_users');
    const memberType = this.repos.memberTypes.findById(id);
    if (!memberType) {
      throw new NotFoundError('Member type', id);
    }
    return memberType;
  }

  async createMemberType(actor: Actor, input: unknown): Promise<MemberType> {
    requirePermission(actor, 'manage_users');
    const data = parseInput(MemberTypeInputSchema, input);
    if (this.repos.memberTypes.findByName(data.name)) {
      throw ValidationError.forField('name', DUPLICATE_MEMBER_TYPE);
    }
    const displayOrder = data.displayOrder ?? this.repos.memberTypes.list().length;
    const memberType = this.repos.memberTypes.insert({ ...data, displayOrder });
    logger.info(`Member type created: ${memberType.name}`);
    return memberType;
  }

  async updateMemberType(actor: Actor, id: number, input: unknown): Promise<MemberType> {
    await this.getMemberType(actor, id);
    const data = parseInput(MemberTypeUpdateSchema, input);
    if (data.name !== undefined) {
      const existing = this.repos.memberTypes.findByName(data.name);
      if (existing && existing.id !== id) {
        throw ValidationError.forField('name', DUPLICATE_MEMBER_TYPE);
      }
    }
    const updated = this.repos.memberTypes.update(id, data);
    if (!updated) {
      throw new NotFoundError('Member type', id);
    }
    return updated;
  }

  async deleteMemberType(actor: Actor, id: number): Promise<void> {
    const memberType = await this.getMemberType(actor, id);
    this.repos.memberTypes.delete(id);
    logger.info(`Member type deleted: ${memberType.name}`);
  }

  /**
   * Set each type's display order to its position in `ids`
   */
  async reorderMemberTypes(actor: Actor, input: unknown): Promise<MemberType[]> {
    requirePermission(actor, 'manage_users');
    const { ids } = parseInput(ReorderSchema, input);
    const known = new Set(this.repos.memberTypes.findByIds(ids).map(type => type.id));
    const unknown = ids.filter(id => !known.has(id));
    if (unknown.length > 0) {
      throw ValidationError.forField('ids', `Unknown member type ids: ${unknown.join(', ')}`);
    }
    this.database.transaction(tx => {
      ids.forEach((id, index) => this.repos.memberTypes.setDisplayOrder(id, index, tx));
    });
    return this.repos.memberTypes.list();
  }

  async listRelationships(actor: Actor): Promise<MemberTypeRelationship[]> {
    requirePermission(actor, 'manage_users');
    return this.repos.memberTypes.listRelationships();
  }

  async createRelationship(actor: Actor, input: unknown): Promise<MemberTypeRelationship> {
    requirePermission(actor, 'manage_users');
    const data = parseInput(RelationshipInputSchema, input);
    this.validateRelationship(data.parentTypeId, data.childTypeId, undefined);
    const relationship = this.repos.memberTypes.insertRelationship(data);
    logger.info(
      `Member type relationship created: ${data.parentTypeId} -> ${data.childTypeId} (${data.relationshipName})`,
    );
    return relationship;
  }

  async updateRelationship(actor: Actor, id: number, input: unknown): Promise<MemberTypeRelationship> {
    requirePermission(actor, 'manage_users');
    const current = this.repos.memberTypes.findRelationship(id);
    if (!current) {
      throw new NotFoundError('Member type relationship', id);
    }
    const data = parseInput(RelationshipUpdateSchema, input);
    this.validateRelationship(
      data.parentTypeId ?? current.parentTypeId,
      data.childTypeId ?? current.childTypeId,
      id,
    );
    const updated = this.repos.memberTypes.updateRelationship(id, data);
    if (!updated) {
      throw new NotFoundError('Member type relationship', id);
    }
    return updated;
  }

  async deleteRelationship(actor: Actor, id: number): Promise<void> {
    requirePermission(actor, 'manage_users');
    if (!this.repos.memberTypes.deleteRelationship(id)) {
      throw new NotFoundError('Member type relationship', id);
    }
  }

  private validateRelationship(parentTypeId: number, childTypeId: number, selfId: number | undefined): void {
    const errors = new FieldErrorCollector();
    if (parentTypeId === childTypeId) {
      errors.add(NON_FIELD_ERRORS, 'A member type cannot have a relationship with itself.');
      errors.throwIfAny();
    }

    const parent = this.repos.memberTypes.findById(parentTypeId);
    const child = this.repos.memberTypes.findById(childTypeId);
    if (!parent) {
      errors.add('parentTypeId', 'Select a valid choice. That choice is not one of the available choices.');
    } else if (!parent.canBeParent) {
      errors.add('parentTypeId', `"${parent.name}" is not configured to be a parent type.`);
    }
    if (!child) {
      errors.add('childTypeId', 'Select a valid choice. That choice is not one of the available choices.');
    } else if (!child.canBeChild) {
      errors.add('childTypeId', `"${child.name}" is not configured to be a child type.`);
    }
    errors.throwIfAny();

    const existing = this.repos.memberTypes.findRelationshipByPair(parentTypeId, childTypeId);
    if (existing && existing.id !== selfId) {
      throw ValidationError.forField(NON_FIELD_ERRORS, DUPLICATE_RELATIONSHIP);
    }
  }
}
