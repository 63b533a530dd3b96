/**
 * Calendar events: listing, detail, feed and the create/update/delete flow
 * that writes contacts, fees, allowed member types and the action log in one
 * transaction
 */

import { z } from 'zod';
import { Settings } from '../config/settings.js';
import type { DatabaseManager, DbExecutor } from '../db/index.js';
import {
  REGISTRANT_VISIBILITIES,
  REGISTRATION_STATUSES,
  type Event,
  type EventAction,
  type EventCategory,
  type EventSnapshot,
  type MemberType,
  type NewEvent,
} from '../db/schema.js';
import { hasPermission } from '../models/ClubUser.js';
import {
  durationMinutes,
  getPrimaryContact,
  isAllDay,
  REGISTRATION_STATUS_LABELS,
  sortContacts,
  toCalendarFeedItem,
  type CalendarFeedItem,
  type ContactWithMember,
} from '../models/Event.js';
import type {
  ContactInput,
  EventWithCategory,
  FeeInput,
  FeeWithMemberType,
  Page,
  Repositories,
} from '../persistence/index.js';
import { FieldErrorCollector, NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { dateTime, PageQuerySchema, parseInput } from '../utils/validation.js';
import { requirePermission, type Actor, type RequestContext } from './access.js';
import type { RegistrationService, RegistrationSummary } from './registrationService.js';

const logger = createLogger('event-service');

const INVALID_CHOICE = 'Select a valid choice. That choice is not one of the available choices.';

const ContactSchema = z.object({
  memberId: z.number().int().positive(),
  isPrimary: z.boolean().default(false),
  role: z.string().trim().max(100).default(''),
});

const FeeSchema = z.object({
  memberTypeId: z.number().int().positive(),
  amount: z.number().int().min(0, 'Fee amount cannot be negative.'),
});

const eventFields = {
  title: z.string().trim().min(1, 'This field is required.').max(200),
  shortDescription: z.string().trim().max(500),
  formattedDescription: z.string(),
  categoryId: z.number().int().positive().nullable(),
  startDatetime: dateTime,
  endDatetime: dateTime,
  registrationStatus: z.enum(REGISTRATION_STATUSES),
  registrationOpenDatetime: dateTime.nullable(),
  registrationCloseDatetime: dateTime.nullable(),
  externalRegistrationUrl: z.string().trim().url('Enter a valid URL.').max(500).or(z.literal('')),
  registrantListVisibility: z.enum(REGISTRANT_VISIBILITIES),
  capacity: z.number().int().min(1).nullable(),
  allowGuests: z.boolean(),
  maxGuestsPerRegistration: z.number().int().min(0),
  guestFee: z.number().int().min(0),
  allowedMemberTypeIds: z.array(z.number().int().positive()),
  contacts: z.array(ContactSchema),
  fees: z.array(FeeSchema),
};

export const EventCreateSchema = z.object({
  ...eventFields,
  shortDescription: eventFields.shortDescription.default(''),
  formattedDescription: eventFields.formattedDescription.default(''),
  categoryId: eventFields.categoryId.default(null),
  registrationStatus: eventFields.registrationStatus.default('not_required'),
  registrationOpenDatetime: eventFields.registrationOpenDatetime.default(null),
  registrationCloseDatetime: eventFields.registrationCloseDatetime.default(null),
  externalRegistrationUrl: eventFields.externalRegistrationUrl.default(''),
  registrantListVisibility: eventFields.registrantListVisibility.default('none'),
  capacity: eventFields.capacity.default(null),
  allowGuests: eventFields.allowGuests.default(false),
  maxGuestsPerRegistration: eventFields.maxGuestsPerRegistration.default(0),
  guestFee: eventFields.guestFee.default(0),
  allowedMemberTypeIds: eventFields.allowedMemberTypeIds.default([]),
  contacts: eventFields.contacts.default([]),
  fees: eventFields.fees.default([]),
});

export const EventUpdateSchema = z.object(eventFields).partial();

export const FeedQuerySchema = z.object({
  start: dateTime.optional(),
  end: dateTime.optional(),
});

type EventColumns = Omit<NewEvent, 'id' | 'createdById' | 'createdAt' | 'updatedAt'>;

interface EventRelations {
  allowedMemberTypeIds: number[];
  contacts: ContactInput[];
  fees: FeeInput[];
}

export interface EventDetail {
  event: Event;
  category: EventCategory | null;
  allDay: boolean;
  durationMinutes: number;
  registrationStatusLabel: string;
  contacts: ContactWithMember[];
  primaryContact: ContactWithMember | null;
  fees: FeeWithMemberType[];
  allowedMemberTypes: MemberType[];
  registration: RegistrationSummary;
  permissions: { canEdit: boolean; canDelete: boolean };
}

export function snapshotEvent(event: Event, category: EventCategory | null | undefined): EventSnapshot {
  return {
    title: event.title,
    shortDescription: event.shortDescription,
    category: category?.name ?? null,
    startDatetime: event.startDatetime.toISOString(),
    endDatetime: event.endDatetime.toISOString(),
  };
}

export class EventService {
  constructor(
    private readonly repos: Repositories,
    private readonly database: DatabaseManager,
    private readonly registrations: RegistrationService,
  ) {}

  /**
   * Newest start first, one page at a time
   */
  async listEvents(query: unknown = {}): Promise<Page<EventWithCategory>> {
    const { page } = parseInput(PageQuerySchema, query);
    return this.repos.events.listPage(page, Settings.EVENTS_PER_PAGE);
  }

  async getEventDetail(actor: Actor, id: number, now: Date = new Date()): Promise<EventDetail> {
    const event = this.repos.events.findWithCategory(id);
    if (!event) {
      throw new NotFoundError('Event', id);
    }
    const { category, ...row } = event;
    const contacts = sortContacts(this.repos.events.contacts(id));
    return {
      event: row,
      category,
      allDay: isAllDay(row),
      durationMinutes: durationMinutes(row),
      registrationStatusLabel: REGISTRATION_STATUS_LABELS[row.registrationStatus],
      contacts,
      primaryContact: getPrimaryContact(contacts),
      fees: this.repos.events.fees(id),
      allowedMemberTypes: this.repos.events.allowedMemberTypes(id),
      registration: this.registrations.summarize(actor, row, now),
      permissions: {
        canEdit: actor !== null && hasPermission(actor, 'edit_events'),
        canDelete: actor !== null && hasPermission(actor, 'delete_events'),
      },
    };
  }

  /**
   * Calendar feed items for events overlapping [start, end)
   */
  async feed(query: unknown = {}): Promise<CalendarFeedItem[]> {
    const { start, end } = parseInput(FeedQuerySchema, query);
    return this.repos.events
      .listInRange(start, end)
      .map(event => toCalendarFeedItem(event, event.category));
  }

  async createEvent(actor: Actor, input: unknown, context: RequestContext): Promise<EventDetail> {
    const user = requirePermission(actor, 'create_events');
    const data = parseInput(EventCreateSchema, input);
    const { allowedMemberTypeIds, contacts, fees, ...columns } = data;
    this.validate(columns, { allowedMemberTypeIds, contacts, fees });

    const event = this.database.transaction(tx => {
      const created = this.repos.events.insert({ ...columns, createdById: user.id }, tx);
      this.writeRelations(created.id, { allowedMemberTypeIds, contacts, fees }, tx);
      this.logAction(tx, 'created', created, user.id, context, null);
      return created;
    });

    logger.info(`Event created: "${event.title}" (${event.id}) by ${user.email}`);
    return this.getEventDetail(user, event.id);
  }

  async updateEvent(
    actor: Actor,
    id: number,
    input: unknown,
    context: RequestContext,
  ): Promise<EventDetail> {
    const user = requirePermission(actor, 'edit_events');
    const current = this.repos.events.findById(id);
    if (!current) {
      throw new NotFoundError('Event', id);
    }
    const data = parseInput(EventUpdateSchema, input);
    const { allowedMemberTypeIds, contacts, fees, ...columns } = data;

    const merged: EventColumns = { ...current, ...columns };
    const relations: EventRelations = {
      allowedMemberTypeIds: allowedMemberTypeIds ?? this.repos.events.allowedMemberTypeIds(id),
      contacts:
        contacts ??
        this.repos.events.contacts(id).map(contact => ({
          memberId: contact.memberId,
          isPrimary: contact.isPrimary,
          role: contact.role,
        })),
      fees:
        fees ??
        this.repos.events.fees(id).map(fee => ({ memberTypeId: fee.memberTypeId, amount: fee.amount })),
    };
    this.validate(merged, relations);

    const event = this.database.transaction(tx => {
      const updated = this.repos.events.update(id, columns, tx);
      if (!updated) {
        throw new NotFoundError('Event', id);
      }
      this.writeRelations(id, { allowedMemberTypeIds, contacts, fees }, tx);
      this.logAction(tx, 'updated', updated, user.id, context, null);
      return updated;
    });

    logger.info(`Event updated: "${event.title}" (${event.id}) by ${user.email}`);
    return this.getEventDetail(user, id);
  }

  /**
   * The log entry outlives the event, so it keeps a snapshot instead of a link
   */
  async deleteEvent(actor: Actor, id: number, context: RequestContext): Promise<void> {
    const user = requirePermission(actor, 'delete_events');
    const event = this.repos.events.findWithCategory(id);
    if (!event) {
      throw new NotFoundError('Event', id);
    }
    const { category, ...row } = event;

    this.database.transaction(tx => {
      this.logAction(tx, 'deleted', row, user.id, context, snapshotEvent(row, category));
      this.repos.events.delete(id, tx);
    });

    logger.info(`Event deleted: "${row.title}" (${id}) by ${user.email}`);
  }

  private validate(columns: EventColumns, relations: EventRelations): void {
    const errors = new FieldErrorCollector();

    if (columns.endDatetime <= columns.startDatetime) {
      errors.add('endDatetime', 'End date and time must be after start date and time.');
    }
    if (
      columns.registrationOpenDatetime &&
      columns.registrationCloseDatetime &&
      columns.registrationCloseDatetime < columns.registrationOpenDatetime
    ) {
      errors.add(
        'registrationCloseDatetime',
        'Registration close date and time must be after the open date and time.',
      );
    }
    if (columns.registrationStatus === 'external' && !columns.externalRegistrationUrl) {
      errors.add(
        'externalRegistrationUrl',
        'An external registration URL is required when registration is handled externally.',
      );
    }
    if (
      columns.categoryId !== null &&
      columns.categoryId !== undefined &&
      !this.repos.categories.findById(columns.categoryId)
    ) {
      errors.add('categoryId', INVALID_CHOICE);
    }

    const memberIds = relations.contacts.map(contact => contact.memberId);
    if (new Set(memberIds).size !== memberIds.length) {
      errors.add('contacts', 'A member can only be listed once as a contact for an event.');
    }
    if (relations.contacts.filter(contact => contact.isPrimary).length > 1) {
      errors.add('contacts', 'Only one contact can be marked as primary.');
    }
    if (memberIds.some(memberId => !this.repos.users.findById(memberId))) {
      errors.add('contacts', 'Select a valid member for each contact.');
    }

    const feeTypeIds = relations.fees.map(fee => fee.memberTypeId);
    if (new Set(feeTypeIds).size !== feeTypeIds.length) {
      errors.add('fees', 'Each member type can only have one fee per event.');
    }
    if (relations.fees.some(fee => fee.amount < 0)) {
      errors.add('fees', 'Fee amount cannot be negative.');
    }

    const referencedTypes = new Set([...feeTypeIds, ...relations.allowedMemberTypeIds]);
    if (this.repos.memberTypes.findByIds([...referencedTypes]).length !== referencedTypes.size) {
      errors.add('allowedMemberTypeIds', INVALID_CHOICE);
    }

    errors.throwIfAny();
  }

  /**
   * Replace whichever relation lists were supplied
   */
  private writeRelations(eventId: number, relations: Partial<EventRelations>, tx: DbExecutor): void {
    if (relations.allowedMemberTypeIds !== undefined) {
      this.repos.events.setAllowedMemberTypes(eventId, relations.allowedMemberTypeIds, tx);
    }
    if (relations.contacts !== undefined) {
      this.repos.events.replaceContacts(eventId, relations.contacts, tx);
    }
    if (relations.fees !== undefined) {
      this.repos.events.replaceFees(eventId, relations.fees, tx);
    }
  }

  private logAction(
    tx: DbExecutor,
    action: EventAction,
    event: Event,
    userId: number,
    context: RequestContext,
    snapshot: EventSnapshot | null,
  ): void {
    this.repos.actionLogs.insert(
      {
        eventId: action === 'deleted' ? null : event.id,
        userId,
        action,
        eventTitle: event.title,
        eventData: snapshot,
        ipAddress: context.ipAddress,
        userAgent: context.userAgent.slice(0, 255),
      },
      tx,
    );
  }
}
