/**
 * Repositories for roles, member types and club users
 */

import { and, asc, count, eq, inArray, ne, or, type SQL } from 'drizzle-orm';
import type { DatabaseManager, DbExecutor } from '../db/index.js';
import {
  clubUserMemberTypes,
  clubUsers,
  memberTypeRelationships,
  memberTypes,
  roles,
  type ClubUser,
  type MemberType,
  type MemberTypeRelationship,
  type NewClubUser,
  type NewMemberType,
  type NewMemberTypeRelationship,
  type NewRole,
  type Role,
  type RoleName,
} from '../db/schema.js';
import type { ClubUserWithRole } from '../models/ClubUser.js';
import { containsInsensitive, equalsInsensitive } from './queryHelpers.js';

export class RoleRepository {
  constructor(private readonly database: DatabaseManager) {}

  list(): Role[] {
    return this.database.getDb().select().from(roles).orderBy(asc(roles.name)).all();
  }

  findById(id: number, executor: DbExecutor = this.database.getDb()): Role | undefined {
    return executor.select().from(roles).where(eq(roles.id, id)).get();
  }

  findByName(name: RoleName, executor: DbExecutor = this.database.getDb()): Role | undefined {
    return executor.select().from(roles).where(eq(roles.name, name)).get();
  }

  insert(values: NewRole, executor: DbExecutor = this.database.getDb()): Role {
    return executor.insert(roles).values(values).returning().get();
  }

  update(id: number, values: Partial<NewRole>): Role | undefined {
    return this.database
      .getDb()
      .update(roles)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(roles.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return this.database.getDb().delete(roles).where(eq(roles.id, id)).run().changes > 0;
  }
}

export class MemberTypeRepository {
  constructor(private readonly database: DatabaseManager) {}

  list(activeOnly = false): MemberType[] {
    return this.database
      .getDb()
      .select()
      .from(memberTypes)
      .where(activeOnly ? eq(memberTypes.isActive, true) : undefined)
      .orderBy(asc(memberTypes.displayOrder), asc(memberTypes.name))
      .all();
  }

  findById(id: number): MemberType | undefined {
    return this.database.getDb().select().from(memberTypes).where(eq(memberTypes.id, id)).get();
  }

  findByIds(ids: number[], executor: DbExecutor = this.database.getDb()): MemberType[] {
    if (ids.length === 0) {
      return [];
    }
    return executor.select().from(memberTypes).where(inArray(memberTypes.id, ids)).all();
  }

  findByName(name: string): MemberType | undefined {
    return this.database
      .getDb()
      .select()
      .from(memberTypes)
      .where(equalsInsensitive(memberTypes.name, name))
      .get();
  }

  insert(values: NewMemberType): MemberType {
    return this.database.getDb().insert(memberTypes).values(values).returning().get();
  }

  update(id: number, values: Partial<NewMemberType>): MemberType | undefined {
    return this.database
      .getDb()
      .update(memberTypes)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(memberTypes.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return this.database.getDb().delete(memberTypes).where(eq(memberTypes.id, id)).run().changes > 0;
  }

  setDisplayOrder(id: number, displayOrder: number, executor: DbExecutor): void {
    executor
      .update(memberTypes)
      .set({ displayOrder, updatedAt: new Date() })
      .where(eq(memberTypes.id, id))
      .run();
  }

  listRelationships(): MemberTypeRelationship[] {
    return this.database
      .getDb()
      .select()
      .from(memberTypeRelationships)
      .orderBy(asc(memberTypeRelationships.parentTypeId), asc(memberTypeRelationships.childTypeId))
      .all();
  }

  findRelationship(id: number): MemberTypeRelationship | undefined {
    return this.database
      .getDb()
      .select()
      .from(memberTypeRelationships)
      .where(eq(memberTypeRelationships.id, id))
      .get();
  }

  findRelationshipByPair(parentTypeId: number, childTypeId: number): MemberTypeRelationship | undefined {
    return this.database
      .getDb()
      .select()
      .from(memberTypeRelationships)
      .where(
        and(
          eq(memberTypeRelationships.parentTypeId, parentTypeId),
          eq(memberTypeRelationships.childTypeId, childTypeId),
        ),
      )
      .get();
  }

  /**
   * Active relationships whose parent type is in `parentTypeIds` and child type in `childTypeIds`
   */
  activeRelationshipsBetween(
    parentTypeIds: number[],
    childTypeIds: number[],
    executor: DbExecutor = this.database.getDb(),
  ): MemberTypeRelationship[] {
    if (parentTypeIds.length === 0 || childTypeIds.length === 0) {
      return [];
    }
    return executor
      .select()
      .from(memberTypeRelationships)
      .where(
        and(
          eq(memberTypeRelationships.isActive, true),
          inArray(memberTypeRelationships.parentTypeId, parentTypeIds),
          inArray(memberTypeRelationships.childTypeId, childTypeIds),
        ),
      )
      .all();
  }

  insertRelationship(values: NewMemberTypeRelationship): MemberTypeRelationship {
    return this.database.getDb().insert(memberTypeRelationships).values(values).returning().get();
  }

  updateRelationship(
    id: number,
    values: Partial<NewMemberTypeRelationship>,
  ): MemberTypeRelationship | undefined {
    return this.database
      .getDb()
      .update(memberTypeRelationships)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(memberTypeRelationships.id, id))
      .returning()
      .get();
  }

  deleteRelationship(id: number): boolean {
    return (
      this.database
        .getDb()
        .delete(memberTypeRelationships)
        .where(eq(memberTypeRelationships.id, id))
        .run().changes > 0
    );
  }
}

export interface UserListFilters {
  q?: string;
  roleId?: number;
  memberTypeId?: number;
  activeOnly?: boolean;
  limit?: number;
}

export class ClubUserRepository {
  constructor(private readonly database: DatabaseManager) {}

  findById(id: number, executor: DbExecutor = this.database.getDb()): ClubUser | undefined {
    return executor.select().from(clubUsers).where(eq(clubUsers.id, id)).get();
  }

  findWithRole(id: number): ClubUserWithRole | undefined {
    const row = this.database
      .getDb()
      .select({ user: clubUsers, role: roles })
      .from(clubUsers)
      .leftJoin(roles, eq(clubUsers.roleId, roles.id))
      .where(eq(clubUsers.id, id))
      .get();
    return row ? { ...row.user, role: row.role } : undefined;
  }

  findByEmail(email: string, executor: DbExecutor = this.database.getDb()): ClubUser | undefined {
    return executor.select().from(clubUsers).where(equalsInsensitive(clubUsers.email, email)).get();
  }

  /**
   * Users ordered by last then first name
   */
  list(filters: UserListFilters = {}): ClubUserWithRole[] {
    const conditions: SQL[] = [];
    const term = filters.q?.trim();
    if (term) {
      const match = or(
        containsInsensitive(clubUsers.firstName, term),
        containsInsensitive(clubUsers.lastName, term),
        containsInsensitive(clubUsers.email, term),
        containsInsensitive(clubUsers.nickname, term),
      );
      if (match) {
        conditions.push(match);
      }
    }
    if (filters.roleId !== undefined) {
      conditions.push(eq(clubUsers.roleId, filters.roleId));
    }
    if (filters.activeOnly) {
      conditions.push(eq(clubUsers.isActive, true));
    }
    if (filters.memberTypeId !== undefined) {
      conditions.push(
        inArray(
          clubUsers.id,
          this.database
            .getDb()
            .select({ userId: clubUserMemberTypes.userId })
            .from(clubUserMemberTypes)
            .where(eq(clubUserMemberTypes.memberTypeId, filters.memberTypeId)),
        ),
      );
    }

    const query = this.database
      .getDb()
      .select({ user: clubUsers, role: roles })
      .from(clubUsers)
      .leftJoin(roles, eq(clubUsers.roleId, roles.id))
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(clubUsers.lastName), asc(clubUsers.firstName));

    const rows = filters.limit !== undefined ? query.limit(filters.limit).all() : query.all();
    return rows.map(row => ({ ...row.user, role: row.role }));
  }

  insert(values: NewClubUser, executor: DbExecutor = this.database.getDb()): ClubUser {
    return executor.insert(clubUsers).values(values).returning().get();
  }

  update(
    id: number,
    values: Partial<NewClubUser>,
    executor: DbExecutor = this.database.getDb(),
  ): ClubUser | undefined {
    return executor
      .update(clubUsers)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(clubUsers.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return this.database.getDb().delete(clubUsers).where(eq(clubUsers.id, id)).run().changes > 0;
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(clubUsers).get()?.value ?? 0;
  }

  touchLastLogin(id: number): void {
    this.database
      .getDb()
      .update(clubUsers)
      .set({ lastLogin: new Date() })
      .where(eq(clubUsers.id, id))
      .run();
  }

  setMemberTypes(userId: number, memberTypeIds: number[], executor: DbExecutor): void {
    executor.delete(clubUserMemberTypes).where(eq(clubUserMemberTypes.userId, userId)).run();
    const unique = [...new Set(memberTypeIds)];
    if (unique.length > 0) {
      executor
        .insert(clubUserMemberTypes)
        .values(unique.map(memberTypeId => ({ userId, memberTypeId })))
        .run();
    }
  }

  memberTypeIdsFor(userId: number, executor: DbExecutor = this.database.getDb()): number[] {
    return executor
      .select({ memberTypeId: clubUserMemberTypes.memberTypeId })
      .from(clubUserMemberTypes)
      .where(eq(clubUserMemberTypes.userId, userId))
      .all()
      .map(row => row.memberTypeId);
  }

  /**
   * Member types for several users at once, keyed by user id
   */
  memberTypesFor(userIds: number[]): Map<number, MemberType[]> {
    const result = new Map<number, MemberType[]>();
    if (userIds.length === 0) {
      return result;
    }
    const rows = this.database
      .getDb()
      .select({ userId: clubUserMemberTypes.userId, memberType: memberTypes })
      .from(clubUserMemberTypes)
      .innerJoin(memberTypes, eq(clubUserMemberTypes.memberTypeId, memberTypes.id))
      .where(inArray(clubUserMemberTypes.userId, userIds))
      .orderBy(asc(memberTypes.displayOrder), asc(memberTypes.name))
      .all();
    for (const row of rows) {
      const list = result.get(row.userId) ?? [];
      list.push(row.memberType);
      result.set(row.userId, list);
    }
    return result;
  }

  dependentsOf(parentId: number): ClubUser[] {
    return this.database
      .getDb()
      .select()
      .from(clubUsers)
      .where(eq(clubUsers.parentMemberId, parentId))
      .orderBy(asc(clubUsers.lastName), asc(clubUsers.firstName))
      .all();
  }

  /**
   * Dependents of `parentId` holding `memberTypeId`, optionally ignoring one user
   */
  countDependentsOfType(
    parentId: number,
    memberTypeId: number,
    excludeUserId: number | null,
    executor: DbExecutor = this.database.getDb(),
  ): number {
    const conditions = [
      eq(clubUsers.parentMemberId, parentId),
      eq(clubUserMemberTypes.memberTypeId, memberTypeId),
    ];
    if (excludeUserId !== null) {
      conditions.push(ne(clubUsers.id, excludeUserId));
    }
    return (
      executor
        .select({ value: count() })
        .from(clubUsers)
        .innerJoin(clubUserMemberTypes, eq(clubUserMemberTypes.userId, clubUsers.id))
        .where(and(...conditions))
        .get()?.value ?? 0
    );
  }
}
