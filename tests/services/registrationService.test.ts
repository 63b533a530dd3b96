/**
 * Registration service tests against an in-memory database
 */

import { beforeEach, describe, expect, it } from 'vitest';
import type { Event, MemberType } from '../../src/db/schema.js';
import type { ClubUserWithRole } from '../../src/models/ClubUser.js';
import {
  AuthenticationError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../../src/utils/errors.js';
import { createTestData, insertEvent, insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

const NOW = new Date('2030-05-01T12:00:00.000Z');

describe('RegistrationService', () => {
  let ctx: TestContext;
  let regular: MemberType;
  let family: MemberType;
  let member: ClubUserWithRole;
  let event: Event;

  beforeEach(async () => {
    ctx = await setupTestContext();
    const { repos } = ctx.services;
    regular = repos.memberTypes.insert(createTestData.memberType({ name: 'Regular' }));
    family = repos.memberTypes.insert(createTestData.memberType({ name: 'Family' }));
    member = insertUser(ctx, 'member', { firstName: 'Nora', lastName: 'Banks' }, [regular.id, family.id]);
    event = insertEvent(ctx, {
      registrationStatus: 'required',
      registrantListVisibility: 'members',
      allowGuests: true,
      maxGuestsPerRegistration: 2,
      guestFee: 15,
    });
    ctx.database.transaction(tx =>
      repos.events.replaceFees(
        event.id,
        [
          { memberTypeId: regular.id, amount: 40 },
          { memberTypeId: family.id, amount: 30 },
        ],
        tx,
      ),
    );
  });

  describe('register', () => {
    it('should register with guests and charge the lowest fee plus guest fees', async () => {
      const registration = await ctx.services.registrations.register(
        member,
        event.id,
        {
          notes: ' Bringing snacks ',
          guests: [
            { firstName: 'Ada', lastName: 'Banks' },
            { firstName: 'Leo', lastName: 'Banks', email: 'leo@example.com' },
          ],
        },
        NOW,
      );

      expect(registration.amountDue).toBe(60);
      expect(registration.notes).toBe('Bringing snacks');
      expect(registration.cancelled).toBe(false);
      expect(registration.guests.map(guest => [guest.firstName, guest.email])).toEqual([
        ['Ada', ''],
        ['Leo', 'leo@example.com'],
      ]);
    });

    it('should refuse a second registration', async () => {
      await ctx.services.registrations.register(member, event.id, {}, NOW);
      await expect(ctx.services.registrations.register(member, event.id, {}, NOW)).rejects.toThrow(
        'You are already registered for this event.',
      );
    });

    it('should refuse more guests than allowed', async () => {
      const guests = [
        { firstName: 'A', lastName: 'One' },
        { firstName: 'B', lastName: 'Two' },
        { firstName: 'C', lastName: 'Three' },
      ];
      const error = await ctx.services.registrations
        .register(member, event.id, { guests }, NOW)
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fieldErrors).toEqual({
          guests: ['You can bring at most 2 guest(s) to this event.'],
        });
      }
    });

    it('should refuse guests when the event does not allow them', async () => {
      const noGuests = insertEvent(ctx, { registrationStatus: 'recommended' });
      await expect(
        ctx.services.registrations.register(
          member,
          noGuests.id,
          { guests: [{ firstName: 'A', lastName: 'One' }] },
          NOW,
        ),
      ).rejects.toThrow('Guests are not allowed for this event.');
    });

    it('should refuse a full event', async () => {
      const small = insertEvent(ctx, { registrationStatus: 'required', capacity: 1 });
      const other = insertUser(ctx, 'member');
      await ctx.services.registrations.register(other, small.id, {}, NOW);

      const error = await ctx.services.registrations
        .register(member, small.id, {}, NOW)
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(PermissionDeniedError);
      expect(error).toHaveProperty('message', 'This event is full.');
    });

    it('should require a login and an existing event', async () => {
      await expect(ctx.services.registrations.register(null, event.id, {}, NOW)).rejects.toBeInstanceOf(
        AuthenticationError,
      );
      await expect(ctx.services.registrations.register(member, 9999, {}, NOW)).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe('unregister', () => {
    it('should cancel the registration and allow registering again', async () => {
      await ctx.services.registrations.register(member, event.id, {}, NOW);
      const later = new Date('2030-05-02T08:00:00.000Z');

      const cancelled = await ctx.services.registrations.unregister(member, event.id, later);
      expect(cancelled.cancelled).toBe(true);
      expect(cancelled.cancelledAt?.toISOString()).toBe('2030-05-02T08:00:00.000Z');
      expect(ctx.services.repos.registrations.countActive(event.id)).toBe(0);

      const again = await ctx.services.registrations.register(member, event.id, {}, later);
      expect(again.id).toBe(cancelled.id);
      expect(again.cancelled).toBe(false);
      expect(again.cancelledAt).toBeNull();
    });

    it('should report a missing registration', async () => {
      await expect(ctx.services.registrations.unregister(member, event.id, NOW)).rejects.toThrow(
        'You are not registered for this event.',
      );
    });
  });

  describe('registrants', () => {
    it('should list active registrants with guest counts to members', async () => {
      await ctx.services.registrations.register(
        member,
        event.id,
        { guests: [{ firstName: 'Ada', lastName: 'Banks' }] },
        NOW,
      );
      const reader = insertUser(ctx, 'member');

      const registrants = await ctx.services.registrations.listRegistrants(reader, event.id);
      expect(registrants).toHaveLength(1);
      expect(registrants[0]).toMatchObject({
        memberId: member.id,
        displayName: 'Nora Banks',
        guestCount: 1,
      });
    });

    it('should hide the list from viewers and anonymous users', async () => {
      const viewer = insertUser(ctx, 'viewer');
      await expect(ctx.services.registrations.listRegistrants(viewer, event.id)).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
      await expect(ctx.services.registrations.listRegistrants(null, event.id)).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
    });

    it('should summarize the registration state for the detail view', async () => {
      await ctx.services.registrations.register(member, event.id, {}, NOW);
      const summary = ctx.services.registrations.summarize(member, event, NOW);

      expect(summary.canRegister).toBe(false);
      expect(summary.reason).toBe('You are already registered for this event.');
      expect(summary.isRegistered).toBe(true);
      expect(summary.registrationCount).toBe(1);
      expect(summary.fee).toBe(30);
      expect(summary.registrants?.map(registrant => registrant.displayName)).toEqual(['Nora Banks']);
    });
  });
});
