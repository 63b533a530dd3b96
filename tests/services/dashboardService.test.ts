/**
 * Management dashboard tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { AuthenticationError, PermissionDeniedError } from '../../src/utils/errors.js';
import { createTestData, insertEvent, insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

describe('DashboardService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
    ctx.services.repos.categories.insert(createTestData.category());
    insertEvent(ctx, { title: 'Spring Launch' });
  });

  it('should count categories, events and users', async () => {
    const member = insertUser(ctx, 'member');
    const overview = await ctx.services.dashboard.overview(member);

    expect(overview.totalCategories).toBe(1);
    expect(overview.totalEvents).toBe(1);
    expect(overview.totalUsers).toBe(1);
    expect(overview.totalActionLogs).toBeUndefined();
    expect(overview.recentEvents.map(event => event.title)).toEqual(['Spring Launch']);
  });

  it('should include the action log count for editors', async () => {
    const editor = insertUser(ctx, 'editor');
    const overview = await ctx.services.dashboard.overview(editor);
    expect(overview.totalActionLogs).toBe(0);
  });

  it('should return the requested section', async () => {
    const admin = insertUser(ctx, 'admin');
    expect(await ctx.services.dashboard.section(admin, { section: 'users' })).toEqual({
      section: 'users',
      totalUsers: 1,
    });

    const events = await ctx.services.dashboard.section(admin, { section: 'events' });
    expect(events.section).toBe('events');
    expect(events).not.toHaveProperty('totalUsers');
  });

  it('should keep the users section for user managers', async () => {
    const member = insertUser(ctx, 'member');
    await expect(ctx.services.dashboard.section(member, { section: 'users' })).rejects.toBeInstanceOf(
      PermissionDeniedError,
    );
    await expect(ctx.services.dashboard.overview(null)).rejects.toBeInstanceOf(AuthenticationError);
  });
});
