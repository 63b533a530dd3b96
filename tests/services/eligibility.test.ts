/**
 * Unit tests for registration rules
 */

import { beforeAll, describe, expect, it } from 'vitest';
import type { Event } from '../../src/db/schema.js';
import type { ClubUserWithRole } from '../../src/models/ClubUser.js';
import {
  REGISTRATION_REASONS,
  amountDue,
  canRegister,
  canViewRegistrants,
  memberFee,
  type RegistrationState,
} from '../../src/services/eligibility.js';
import { insertUser, setupTestContext } from '../db/testSetup.js';

type EligibilityEvent = Pick<
  Event,
  | 'registrationStatus'
  | 'registrationOpenDatetime'
  | 'registrationCloseDatetime'
  | 'endDatetime'
  | 'capacity'
>;

const NOW = new Date('2030-05-01T12:00:00.000Z');

function openEvent(overrides: Partial<EligibilityEvent> = {}): EligibilityEvent {
  return {
    registrationStatus: 'required',
    registrationOpenDatetime: null,
    registrationCloseDatetime: null,
    endDatetime: new Date('2030-06-01T19:00:00.000Z'),
    capacity: null,
    ...overrides,
  };
}

function state(overrides: Partial<RegistrationState> = {}): RegistrationState {
  return {
    isContact: false,
    memberTypeIds: [],
    allowedMemberTypeIds: [],
    hasActiveRegistration: false,
    activeRegistrationCount: 0,
    ...overrides,
  };
}

describe('eligibility', () => {
  let member: ClubUserWithRole;
  let viewer: ClubUserWithRole;
  let admin: ClubUserWithRole;
  let inactive: ClubUserWithRole;

  beforeAll(async () => {
    const ctx = await setupTestContext();
    member = insertUser(ctx, 'member');
    viewer = insertUser(ctx, 'viewer');
    admin = insertUser(ctx, 'admin');
    inactive = insertUser(ctx, 'member', { isActive: false });
  });

  describe('canRegister', () => {
    it('should allow a member on an open event', () => {
      expect(canRegister(member, openEvent(), state(), NOW)).toEqual({ allowed: true, reason: null });
    });

    it('should require an active login', () => {
      expect(canRegister(null, openEvent(), state(), NOW).reason).toBe(REGISTRATION_REASONS.notLoggedIn);
      expect(canRegister(inactive, openEvent(), state(), NOW).reason).toBe(
        REGISTRATION_REASONS.notLoggedIn,
      );
    });

    it('should refuse statuses that do not take registrations', () => {
      for (const registrationStatus of ['not_required', 'closed', 'external', 'temporarily_unavailable'] as const) {
        expect(canRegister(member, openEvent({ registrationStatus }), state(), NOW).reason).toBe(
          REGISTRATION_REASONS.notAvailable,
        );
      }
    });

    it('should limit admins_contacts_only to admins and contacts', () => {
      const event = openEvent({ registrationStatus: 'admins_contacts_only' });
      expect(canRegister(member, event, state(), NOW).reason).toBe(REGISTRATION_REASONS.adminsContactsOnly);
      expect(canRegister(member, event, state({ isContact: true }), NOW).allowed).toBe(true);
      expect(canRegister(admin, event, state(), NOW).allowed).toBe(true);
    });

    it('should respect the registration window', () => {
      const notYet = openEvent({ registrationOpenDatetime: new Date('2030-05-10T00:00:00.000Z') });
      expect(canRegister(member, notYet, state(), NOW).reason).toBe(REGISTRATION_REASONS.notOpen);

      const closed = openEvent({ registrationCloseDatetime: new Date('2030-04-30T00:00:00.000Z') });
      expect(canRegister(member, closed, state(), NOW).reason).toBe(REGISTRATION_REASONS.closed);

      const ended = openEvent({ endDatetime: new Date('2030-04-01T00:00:00.000Z') });
      expect(canRegister(member, ended, state(), NOW).reason).toBe(REGISTRATION_REASONS.closed);
    });

    it('should close required_by_close_date events at their end', () => {
      const event = openEvent({
        registrationStatus: 'required_by_close_date',
        endDatetime: new Date('2030-05-01T11:00:00.000Z'),
      });
      expect(canRegister(member, event, state(), NOW).reason).toBe(REGISTRATION_REASONS.closed);
    });

    it('should check member types when the event restricts them', () => {
      const restricted = state({ allowedMemberTypeIds: [1, 2] });
      expect(canRegister(member, openEvent(), { ...restricted, memberTypeIds: [3] }, NOW).reason).toBe(
        REGISTRATION_REASONS.ineligibleType,
      );
      expect(canRegister(member, openEvent(), { ...restricted, memberTypeIds: [3, 2] }, NOW).allowed).toBe(
        true,
      );
    });

    it('should refuse a second registration and a full event', () => {
      expect(canRegister(member, openEvent(), state({ hasActiveRegistration: true }), NOW).reason).toBe(
        REGISTRATION_REASONS.alreadyRegistered,
      );
      expect(
        canRegister(member, openEvent({ capacity: 2 }), state({ activeRegistrationCount: 2 }), NOW).reason,
      ).toBe(REGISTRATION_REASONS.full);
      expect(
        canRegister(member, openEvent({ capacity: 2 }), state({ activeRegistrationCount: 1 }), NOW).allowed,
      ).toBe(true);
    });

    it('should report the first failing check', () => {
      const event = openEvent({ capacity: 1, registrationOpenDatetime: new Date('2030-05-10T00:00:00.000Z') });
      expect(
        canRegister(member, event, state({ hasActiveRegistration: true, activeRegistrationCount: 1 }), NOW)
          .reason,
      ).toBe(REGISTRATION_REASONS.notOpen);
    });
  });

  describe('fees', () => {
    const fees = [
      { memberTypeId: 1, amount: 40 },
      { memberTypeId: 2, amount: 25 },
      { memberTypeId: 3, amount: 60 },
    ];

    it('should charge the lowest fee among the member types held', () => {
      expect(memberFee([1, 2], fees)).toBe(25);
      expect(memberFee([3], fees)).toBe(60);
    });

    it('should charge nothing without a matching fee', () => {
      expect(memberFee([9], fees)).toBe(0);
      expect(memberFee([], [])).toBe(0);
    });

    it('should add the guest fee per guest', () => {
      expect(amountDue(25, 3, 10)).toBe(55);
      expect(amountDue(0, 0, 10)).toBe(0);
    });
  });

  describe('canViewRegistrants', () => {
    const none = { isContact: false, hasActiveRegistration: false };

    it('should show public lists to anonymous users only', () => {
      expect(canViewRegistrants(null, { registrantListVisibility: 'viewer_public' }, none)).toBe(true);
      expect(canViewRegistrants(null, { registrantListVisibility: 'members' }, none)).toBe(false);
    });

    it('should hide member lists from viewers', () => {
      expect(canViewRegistrants(member, { registrantListVisibility: 'members' }, none)).toBe(true);
      expect(canViewRegistrants(viewer, { registrantListVisibility: 'members' }, none)).toBe(false);
    });

    it('should require an active registration for registered_members_only', () => {
      const event = { registrantListVisibility: 'registered_members_only' as const };
      expect(canViewRegistrants(member, event, none)).toBe(false);
      expect(canViewRegistrants(member, event, { ...none, hasActiveRegistration: true })).toBe(true);
    });

    it('should always show the list to admins and contacts', () => {
      const event = { registrantListVisibility: 'none' as const };
      expect(canViewRegistrants(member, event, none)).toBe(false);
      expect(canViewRegistrants(admin, event, none)).toBe(true);
      expect(canViewRegistrants(member, event, { ...none, isContact: true })).toBe(true);
    });
  });
});
