/**
 * Login and session token tests
 */

import jwt from 'jsonwebtoken';
import { beforeEach, describe, expect, it } from 'vitest';
import { AuthService, hashPassword, verifyPassword } from '../../src/services/authService.js';
import { AuthenticationError, ValidationError } from '../../src/utils/errors.js';
import { insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

const INVALID_LOGIN = 'Please enter a correct email and password. Note that both fields may be case-sensitive.';

describe('AuthService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext({ sessionSecret: 'test-secret' });
  });

  describe('passwords', () => {
    it('should verify a hashed password', async () => {
      const hash = await hashPassword('test-password');
      expect(hash).not.toBe('test-password');
      expect(await verifyPassword('test-password', hash)).toBe(true);
      expect(await verifyPassword('wrong', hash)).toBe(false);
    });

    it('should never match an empty hash', async () => {
      expect(await verifyPassword('anything', '')).toBe(false);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      insertUser(ctx, 'member', {
        email: 'Harbor.Master@example.com',
        passwordHash: await hashPassword('test-password'),
      });
    });

    it('should return a token that resolves to the user', async () => {
      const { token, user } = await ctx.services.auth.login({
        email: 'harbor.master@example.com',
        password: 'test-password',
      });

      expect(user.email).toBe('Harbor.Master@example.com');
      expect(user.role?.name).toBe('member');
      expect(user.lastLogin).toBeInstanceOf(Date);
      expect(ctx.services.auth.resolveUser(token)?.id).toBe(user.id);
    });

    it('should reject a wrong password with the generic message', async () => {
      await expect(
        ctx.services.auth.login({ email: 'Harbor.Master@example.com', password: 'nope' }),
      ).rejects.toThrow(INVALID_LOGIN);
    });

    it('should reject inactive users', async () => {
      insertUser(ctx, 'member', {
        email: 'gone@example.com',
        passwordHash: await hashPassword('test-password'),
        isActive: false,
      });
      await expect(
        ctx.services.auth.login({ email: 'gone@example.com', password: 'test-password' }),
      ).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should require both fields', async () => {
      await expect(ctx.services.auth.login({ email: '' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('tokens', () => {
    it('should reject tokens signed with another secret', () => {
      const user = insertUser(ctx, 'member');
      const other = new AuthService(ctx.services.repos, 'other-secret');
      expect(ctx.services.auth.resolveUser(other.signToken(user.id))).toBeNull();
    });

    it('should reject malformed and expired tokens', () => {
      const user = insertUser(ctx, 'member');
      expect(ctx.services.auth.verifyToken('not-a-token')).toBeNull();

      const expired = jwt.sign({ sub: String(user.id), exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret');
      expect(ctx.services.auth.verifyToken(expired)).toBeNull();
    });

    it('should reject tokens without a numeric subject', () => {
      expect(ctx.services.auth.verifyToken(jwt.sign({ sub: 'admin' }, 'test-secret'))).toBeNull();
    });

    it('should stop resolving users once deactivated', () => {
      const user = insertUser(ctx, 'member');
      const token = ctx.services.auth.signToken(user.id);
      ctx.services.repos.users.update(user.id, { isActive: false });
      expect(ctx.services.auth.resolveUser(token)).toBeNull();
    });
  });
});
