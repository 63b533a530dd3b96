/**
 * Event registration: eligibility, sign-up with guests, cancellation and
 * registrant lists
 */

import { z } from 'zod';
import type { DatabaseManager } from '../db/index.js';
import type { Event, EventGuest, EventRegistration } from '../db/schema.js';
import { getDisplayName } from '../models/ClubUser.js';
import type { Repositories } from '../persistence/index.js';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { parseInput } from '../utils/validation.js';
import { requireUser, type Actor } from './access.js';
import {
  amountDue,
  canRegister,
  canViewRegistrants,
  memberFee,
  type Eligibility,
  type RegistrationState,
} from './eligibility.js';

const logger = createLogger('registration-service');

const GuestSchema = z.object({
  firstName: z.string().trim().min(1, 'This field is required.').max(150),
  lastName: z.string().trim().min(1, 'This field is required.').max(150),
  email: z.string().trim().email('Enter a valid email address.').or(z.literal('')).default(''),
});

export const RegisterSchema = z.object({
  notes: z.string().trim().max(2000).default(''),
  guests: z.array(GuestSchema).default([]),
});

const ANONYMOUS_STATE: RegistrationState = {
  isContact: false,
  memberTypeIds: [],
  allowedMemberTypeIds: [],
  hasActiveRegistration: false,
  activeRegistrationCount: 0,
};

export interface Registrant {
  registrationId: number;
  memberId: number;
  displayName: string;
  registeredAt: Date;
  guestCount: number;
}

export interface RegistrationSummary {
  canRegister: boolean;
  reason: string | null;
  isRegistered: boolean;
  registrationCount: number;
  fee: number;
  registrants: Registrant[] | null;
}

export type RegistrationWithGuests = EventRegistration & { guests: EventGuest[] };

export class RegistrationService {
  constructor(
    private readonly repos: Repositories,
    private readonly database: DatabaseManager,
  ) {}

  /**
   * Evaluate whether the user may register right now
   */
  checkEligibility(actor: Actor, event: Event, now: Date = new Date()): Eligibility {
    if (!actor) {
      return canRegister(actor, event, ANONYMOUS_STATE, now);
    }
    const existing = this.repos.registrations.findForMember(event.id, actor.id);
    return canRegister(
      actor,
      event,
      {
        isContact: this.repos.events.isContact(event.id, actor.id),
        memberTypeIds: this.repos.users.memberTypeIdsFor(actor.id),
        allowedMemberTypeIds: this.repos.events.allowedMemberTypeIds(event.id),
        hasActiveRegistration: existing !== undefined && !existing.cancelled,
        activeRegistrationCount: this.repos.registrations.countActive(event.id),
      },
      now,
    );
  }

  /**
   * The fee the user would be charged for themselves, before guests
   */
  feeFor(actor: Actor, eventId: number): number {
    if (!actor) {
      return 0;
    }
    return memberFee(this.repos.users.memberTypeIdsFor(actor.id), this.repos.events.fees(eventId));
  }

  async register(
    actor: Actor,
    eventId: number,
    input: unknown = {},
    now: Date = new Date(),
  ): Promise<RegistrationWithGuests> {
    const user = requireUser(actor);
    const event = this.loadEvent(eventId);
    const { notes, guests } = parseInput(RegisterSchema, input);

    const eligibility = this.checkEligibility(user, event, now);
    if (!eligibility.allowed) {
      throw new PermissionDeniedError(eligibility.reason);
    }
    if (guests.length > 0 && !event.allowGuests) {
      throw ValidationError.forField('guests', 'Guests are not allowed for this event.');
    }
    if (guests.length > event.maxGuestsPerRegistration && event.allowGuests) {
      throw ValidationError.forField(
        'guests',
        `You can bring at most ${event.maxGuestsPerRegistration} guest(s) to this event.`,
      );
    }

    const due = amountDue(this.feeFor(user, event.id), guests.length, event.guestFee);
    const registration = this.database.transaction(tx => {
      const existing = this.repos.registrations.findForMember(event.id, user.id, tx);
      const saved = existing
        ? this.repos.registrations.update(
            existing.id,
            { cancelled: false, cancelledAt: null, registeredAt: now, notes, amountDue: due },
            tx,
          )
        : this.repos.registrations.insert(
            { eventId: event.id, memberId: user.id, registeredAt: now, notes, amountDue: due },
            tx,
          );
      if (!saved) {
        throw new NotFoundError('Registration');
      }
      this.repos.registrations.replaceGuests(saved.id, guests, tx);
      return saved;
    });

    logger.info(`${user.email} registered for event ${event.id} (${event.title})`);
    return { ...registration, guests: this.repos.registrations.guests(registration.id) };
  }

  /**
   * Cancel the user's active registration. The row and its guests are kept.
   */
  async unregister(actor: Actor, eventId: number, now: Date = new Date()): Promise<EventRegistration> {
    const user = requireUser(actor);
    const event = this.loadEvent(eventId);
    const existing = this.repos.registrations.findForMember(event.id, user.id);
    if (!existing || existing.cancelled) {
      throw NotFoundError.withMessage('You are not registered for this event.');
    }
    const cancelled = this.repos.registrations.update(existing.id, {
      cancelled: true,
      cancelledAt: now,
    });
    if (!cancelled) {
      throw new NotFoundError('Registration', existing.id);
    }
    logger.info(`${user.email} unregistered from event ${event.id} (${event.title})`);
    return cancelled;
  }

  canViewRegistrants(actor: Actor, event: Event): boolean {
    if (!actor) {
      return canViewRegistrants(actor, event, { isContact: false, hasActiveRegistration: false });
    }
    const existing = this.repos.registrations.findForMember(event.id, actor.id);
    return canViewRegistrants(actor, event, {
      isContact: this.repos.events.isContact(event.id, actor.id),
      hasActiveRegistration: existing !== undefined && !existing.cancelled,
    });
  }

  async listRegistrants(actor: Actor, eventId: number): Promise<Registrant[]> {
    const event = this.loadEvent(eventId);
    if (!this.canViewRegistrants(actor, event)) {
      throw new PermissionDeniedError();
    }
    return this.registrants(event.id);
  }

  /**
   * Everything the event detail view needs to know about registration
   */
  summarize(actor: Actor, event: Event, now: Date = new Date()): RegistrationSummary {
    const eligibility = this.checkEligibility(actor, event, now);
    const existing = actor ? this.repos.registrations.findForMember(event.id, actor.id) : undefined;
    return {
      canRegister: eligibility.allowed,
      reason: eligibility.reason,
      isRegistered: existing !== undefined && !existing.cancelled,
      registrationCount: this.repos.registrations.countActive(event.id),
      fee: this.feeFor(actor, event.id),
      registrants: this.canViewRegistrants(actor, event) ? this.registrants(event.id) : null,
    };
  }

  private registrants(eventId: number): Registrant[] {
    return this.repos.registrations.activeRegistrants(eventId).map(row => ({
      registrationId: row.id,
      memberId: row.member.id,
      displayName: getDisplayName(row.member),
      registeredAt: row.registeredAt,
      guestCount: row.guestCount,
    }));
  }

  private loadEvent(eventId: number): Event {
    const event = this.repos.events.findById(eventId);
    if (!event) {
      throw new NotFoundError('Event', eventId);
    }
    return event;
  }
}
