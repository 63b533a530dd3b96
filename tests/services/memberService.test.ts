/**
 * Member management, profile and dependent validation tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import type { MemberType } from '../../src/db/schema.js';
import type { ClubUserWithRole } from '../../src/models/ClubUser.js';
import { verifyPassword } from '../../src/services/authService.js';
import { NON_FIELD_ERRORS, PermissionDeniedError, ValidationError } from '../../src/utils/errors.js';
import { createTestData, insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

async function fieldErrors(promise: Promise<unknown>): Promise<Record<string, string[]>> {
  const error = await promise.catch((caught: unknown) => caught);
  if (!(error instanceof ValidationError)) {
    throw new Error(`Expected a ValidationError, got ${String(error)}`);
  }
  return error.fieldErrors;
}

describe('MemberService', () => {
  let ctx: TestContext;
  let admin: ClubUserWithRole;
  let regular: MemberType;

  beforeEach(async () => {
    ctx = await setupTestContext();
    admin = insertUser(ctx, 'admin');
    regular = ctx.services.repos.memberTypes.insert(
      createTestData.memberType({ name: 'Regular', canBeParent: true }),
    );
  });

  function newUser(overrides: Record<string, unknown> = {}) {
    return {
      email: 'Skipper@Example.COM',
      firstName: 'Sam',
      lastName: 'Skipper',
      password1: 'test-password',
      password2: 'test-password',
      memberTypeIds: [regular.id],
      roleId: ctx.roles.member.id,
      ...overrides,
    };
  }

  describe('createUser', () => {
    it('should create a user with a hashed password and member types', async () => {
      const created = await ctx.services.members.createUser(admin, newUser({ salutation: 'Capt.' }));

      expect(created.email).toBe('Skipper@example.com');
      expect(created.role?.name).toBe('member');
      expect(created.salutation).toBe('Capt.');
      expect(created.memberTypes.map(type => type.name)).toEqual(['Regular']);
      expect(created).not.toHaveProperty('passwordHash');

      const stored = ctx.services.repos.users.findById(created.id);
      expect(await verifyPassword('test-password', stored?.passwordHash ?? '')).toBe(true);
    });

    it('should collect every field error at once', async () => {
      await ctx.services.members.createUser(admin, newUser());
      const errors = await fieldErrors(
        ctx.services.members.createUser(
          admin,
          newUser({ password2: 'other', memberTypeIds: [], salutation: 'Sir', email: 'skipper@example.com' }),
        ),
      );

      expect(errors).toEqual({
        email: ['A user with this email already exists.'],
        password2: ["The two password fields didn't match."],
        salutation: ['Select a valid choice. Sir is not one of the available choices.'],
        memberTypeIds: ['Please select at least one member type.'],
      });
    });

    it('should report a duplicate email when two creates race for it', async () => {
      const results = await Promise.allSettled([
        ctx.services.members.createUser(admin, newUser()),
        ctx.services.members.createUser(admin, newUser()),
      ]);

      expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find(result => result.status === 'rejected');
      const reason: unknown = rejected?.status === 'rejected' ? rejected.reason : undefined;
      expect(reason).toBeInstanceOf(ValidationError);
      if (reason instanceof ValidationError) {
        expect(reason.fieldErrors).toEqual({ email: ['A user with this email already exists.'] });
      }
      expect(ctx.services.repos.users.list({ q: 'Skipper' })).toHaveLength(1);
    });

    it('should validate phone numbers', async () => {
      const errors = await fieldErrors(
        ctx.services.members.createUser(admin, newUser({ primaryPhoneNumber: '555-1234' })),
      );
      expect(errors['primaryPhoneNumber']).toEqual([
        "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.",
      ]);
    });

    it('should require manage_users', async () => {
      const member = insertUser(ctx, 'member');
      await expect(ctx.services.members.createUser(member, newUser())).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
    });
  });

  describe('dependents', () => {
    let youth: MemberType;
    let parent: ClubUserWithRole;

    beforeEach(async () => {
      youth = ctx.services.repos.memberTypes.insert(createTestData.memberType({ name: 'Youth', canBeChild: true }));
      ctx.services.repos.memberTypes.insertRelationship({
        parentTypeId: regular.id,
        childTypeId: youth.id,
        relationshipName: 'Child',
        maxChildren: 1,
      });
      parent = insertUser(ctx, 'member', { firstName: 'Pat', lastName: 'Parent' }, [regular.id]);
    });

    it('should link a dependent to their parent', async () => {
      const child = await ctx.services.members.createUser(
        admin,
        newUser({
          email: 'kid@example.com',
          memberTypeIds: [youth.id],
          isDependent: true,
          parentMemberId: parent.id,
          relationshipType: 'Son',
        }),
      );
      expect(child.parentMemberId).toBe(parent.id);
      expect(child.relationshipType).toBe('Son');

      const dependents = await ctx.services.members.dependentsOf(parent, parent.id);
      expect(dependents.map(dependent => dependent.id)).toEqual([child.id]);
    });

    it('should require a parent and relationship type', async () => {
      expect(
        await fieldErrors(
          ctx.services.members.createUser(admin, newUser({ memberTypeIds: [youth.id], isDependent: true })),
        ),
      ).toEqual({ parentMemberId: ['Parent member is required for dependent members.'] });

      expect(
        await fieldErrors(
          ctx.services.members.createUser(
            admin,
            newUser({ memberTypeIds: [youth.id], isDependent: true, parentMemberId: parent.id }),
          ),
        ),
      ).toEqual({ relationshipType: ['Relationship type is required for dependent members.'] });
    });

    it('should require a child-capable member type', async () => {
      expect(
        await fieldErrors(
          ctx.services.members.createUser(
            admin,
            newUser({ isDependent: true, parentMemberId: parent.id, relationshipType: 'Son' }),
          ),
        ),
      ).toEqual({ memberTypeIds: ['At least one selected member type must allow being a child.'] });
    });

    it('should enforce the maximum number of children', async () => {
      const input = {
        memberTypeIds: [youth.id],
        isDependent: true,
        parentMemberId: parent.id,
        relationshipType: 'Daughter',
      };
      await ctx.services.members.createUser(admin, newUser({ ...input, email: 'first@example.com' }));

      expect(
        await fieldErrors(ctx.services.members.createUser(admin, newUser({ ...input, email: 'second@example.com' }))),
      ).toEqual({ parentMemberId: ['Pat Parent already has the maximum of 1 Child dependent(s).'] });
    });

    it('should clear the parent link when a user stops being a dependent', async () => {
      const child = await ctx.services.members.createUser(
        admin,
        newUser({
          email: 'kid@example.com',
          memberTypeIds: [youth.id],
          isDependent: true,
          parentMemberId: parent.id,
          relationshipType: 'Son',
        }),
      );
      const updated = await ctx.services.members.updateUser(admin, child.id, { isDependent: false });
      expect(updated.parentMemberId).toBeNull();
      expect(updated.relationshipType).toBe('');
    });

    it('should only show dependents to the parent or a user manager', async () => {
      const other = insertUser(ctx, 'member');
      await expect(ctx.services.members.dependentsOf(other, parent.id)).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
      await expect(ctx.services.members.dependentsOf(admin, parent.id)).resolves.toEqual([]);
    });
  });

  describe('deleteUser', () => {
    it('should not let a user delete their own account', async () => {
      expect(await fieldErrors(ctx.services.members.deleteUser(admin, admin.id))).toEqual({
        [NON_FIELD_ERRORS]: ['You cannot delete your own account.'],
      });
    });
  });

  describe('profile', () => {
    it('should update the own profile and report a password change', async () => {
      const member = insertUser(ctx, 'member');
      const result = await ctx.services.members.updateOwnProfile(member, {
        nickname: 'Salty',
        middleInitial: 'q',
        password1: 'new-test-password',
        password2: 'new-test-password',
      });

      expect(result.passwordChanged).toBe(true);
      expect(result.user.nickname).toBe('Salty');
      expect(result.user.middleInitial).toBe('Q');
    });

    it('should leave the password alone when not given', async () => {
      const member = insertUser(ctx, 'member');
      const result = await ctx.services.members.updateOwnProfile(member, { city: 'Seattle' });
      expect(result.passwordChanged).toBe(false);
      expect(result.user.city).toBe('Seattle');
    });
  });

  describe('directory', () => {
    it('should list active members and refuse viewers', async () => {
      insertUser(ctx, 'member', { firstName: 'Ann', lastName: 'Zimmer', dateOfBirth: '1980-03-09' }, [regular.id]);
      insertUser(ctx, 'member', { firstName: 'Old', lastName: 'Timer', isActive: false });
      const viewer = insertUser(ctx, 'viewer');

      const entries = await ctx.services.members.directory(admin, { q: 'zimm' });
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        fullName: 'Ann Zimmer',
        birthday: '03/09',
        memberTypes: ['Regular'],
      });

      const inactive = await ctx.services.members.directory(admin, { q: 'timer' });
      expect(inactive).toEqual([]);

      await expect(ctx.services.members.directory(viewer)).rejects.toBeInstanceOf(PermissionDeniedError);
    });
  });

  describe('autocomplete', () => {
    it('should need at least two characters', async () => {
      insertUser(ctx, 'member', { firstName: 'Marina', lastName: 'Keel', email: 'marina@example.com' });
      expect(await ctx.services.members.autocomplete(admin, 'm')).toEqual([]);

      const results = await ctx.services.members.autocomplete(admin, 'keel');
      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        text: 'Marina Keel (marina@example.com)',
        name: 'Marina Keel',
        email: 'marina@example.com',
      });
    });
  });

  describe('createInitialUser', () => {
    it('should default superusers to the admin role', async () => {
      const root = await ctx.services.members.createInitialUser({
        email: 'root@example.com',
        password: 'test-secret',
        firstName: 'Root',
        lastName: 'User',
        isSuperuser: true,
      });
      expect(root.role?.name).toBe('admin');
      expect(root.isSuperuser).toBe(true);
      expect(root.isStaff).toBe(true);
    });
  });
});
