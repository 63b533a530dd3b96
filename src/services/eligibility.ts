/**
 * Registration rules: who may register, what they owe and who may see the
 * registrant list. Pure functions over already-loaded state.
 */

import type { Event, EventRegistrationFee } from '../db/schema.js';
import { isAdmin, isViewer } from '../models/ClubUser.js';
import { OPEN_REGISTRATION_STATUSES, registrationClosesAt } from '../models/Event.js';
import type { Actor } from './access.js';

export const REGISTRATION_REASONS = {
  notLoggedIn: 'You must be logged in to register.',
  notAvailable: 'Registration is not available for this event.',
  adminsContactsOnly: 'Registration is limited to administrators and event contacts.',
  notOpen: 'Registration has not opened yet.',
  closed: 'Registration is closed.',
  ineligibleType: 'Your membership type is not eligible for this event.',
  alreadyRegistered: 'You are already registered for this event.',
  full: 'This event is full.',
} as const;

export type Eligibility = { allowed: true; reason: null } | { allowed: false; reason: string };

export interface RegistrationState {
  isContact: boolean;
  memberTypeIds: readonly number[];
  allowedMemberTypeIds: readonly number[];
  hasActiveRegistration: boolean;
  activeRegistrationCount: number;
}

type EligibilityEvent = Pick<
  Event,
  | 'registrationStatus'
  | 'registrationOpenDatetime'
  | 'registrationCloseDatetime'
  | 'endDatetime'
  | 'capacity'
>;

const ALLOWED: Eligibility = { allowed: true, reason: null };

function deny(reason: string): Eligibility {
  return { allowed: false, reason };
}

/**
 * Checks run in a fixed order and the first failure wins
 */
export function canRegister(
  user: Actor,
  event: EligibilityEvent,
  state: RegistrationState,
  now: Date = new Date(),
): Eligibility {
  if (!user || !user.isActive) {
    return deny(REGISTRATION_REASONS.notLoggedIn);
  }

  if (event.registrationStatus === 'admins_contacts_only') {
    if (!isAdmin(user) && !state.isContact) {
      return deny(REGISTRATION_REASONS.adminsContactsOnly);
    }
  } else if (!OPEN_REGISTRATION_STATUSES.has(event.registrationStatus)) {
    return deny(REGISTRATION_REASONS.notAvailable);
  }

  if (event.registrationOpenDatetime && now < event.registrationOpenDatetime) {
    return deny(REGISTRATION_REASONS.notOpen);
  }
  const closesAt = registrationClosesAt(event);
  if ((closesAt && now > closesAt) || now > event.endDatetime) {
    return deny(REGISTRATION_REASONS.closed);
  }

  if (state.allowedMemberTypeIds.length > 0) {
    const allowed = new Set(state.allowedMemberTypeIds);
    if (!state.memberTypeIds.some(id => allowed.has(id))) {
      return deny(REGISTRATION_REASONS.ineligibleType);
    }
  }

  if (state.hasActiveRegistration) {
    return deny(REGISTRATION_REASONS.alreadyRegistered);
  }
  if (event.capacity !== null && state.activeRegistrationCount >= event.capacity) {
    return deny(REGISTRATION_REASONS.full);
  }
  return ALLOWED;
}

/**
 * Lowest fee among the member's types that carry one; 0 when none do
 */
export function memberFee(
  memberTypeIds: readonly number[],
  fees: ReadonlyArray<Pick<EventRegistrationFee, 'memberTypeId' | 'amount'>>,
): number {
  const held = new Set(memberTypeIds);
  const matching = fees.filter(fee => held.has(fee.memberTypeId)).map(fee => fee.amount);
  return matching.length > 0 ? Math.min(...matching) : 0;
}

export function amountDue(fee: number, guestCount: number, guestFee: number): number {
  return fee + guestCount * guestFee;
}

export interface VisibilityState {
  isContact: boolean;
  hasActiveRegistration: boolean;
}

export function canViewRegistrants(
  user: Actor,
  event: Pick<Event, 'registrantListVisibility'>,
  state: VisibilityState,
): boolean {
  if (!user || !user.isActive) {
    return event.registrantListVisibility === 'viewer_public';
  }
  if (isAdmin(user) || state.isContact) {
    return true;
  }
  switch (event.registrantListVisibility) {
    case 'viewer_public':
      return true;
    case 'members':
      return !isViewer(user);
    case 'registered_members_only':
      return state.hasActiveRegistration;
    case 'none':
      return false;
  }
}
