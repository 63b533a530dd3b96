/**
 * Repositories for the calendar: categories, events, contacts, fees,
 * registrations, guests and the event action log
 */

import { and, asc, count, desc, eq, gt, inArray, lt, type SQL } from 'drizzle-orm';
import type { DatabaseManager, DbExecutor } from '../db/index.js';
import {
  clubUsers,
  eventActionLogs,
  eventAllowedMemberTypes,
  eventCategories,
  eventContacts,
  eventGuests,
  eventRegistrationFees,
  eventRegistrations,
  events,
  memberTypes,
  type ClubUser,
  type Event,
  type EventAction,
  type EventActionLog,
  type EventCategory,
  type EventGuest,
  type EventRegistration,
  type EventRegistrationFee,
  type MemberType,
  type NewEvent,
  type NewEventActionLog,
  type NewEventCategory,
  type NewEventRegistration,
} from '../db/schema.js';
import type { ContactWithMember } from '../models/Event.js';
import { pageOffset, toPage, type Page } from './queryHelpers.js';

export class CategoryRepository {
  constructor(private readonly database: DatabaseManager) {}

  list(): EventCategory[] {
    return this.database.getDb().select().from(eventCategories).orderBy(asc(eventCategories.name)).all();
  }

  findById(id: number, executor: DbExecutor = this.database.getDb()): EventCategory | undefined {
    return executor.select().from(eventCategories).where(eq(eventCategories.id, id)).get();
  }

  findByName(name: string): EventCategory | undefined {
    return this.database
      .getDb()
      .select()
      .from(eventCategories)
      .where(eq(eventCategories.name, name))
      .get();
  }

  insert(values: NewEventCategory): EventCategory {
    return this.database.getDb().insert(eventCategories).values(values).returning().get();
  }

  update(id: number, values: Partial<NewEventCategory>): EventCategory | undefined {
    return this.database
      .getDb()
      .update(eventCategories)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(eventCategories.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return (
      this.database.getDb().delete(eventCategories).where(eq(eventCategories.id, id)).run()
        .changes > 0
    );
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(eventCategories).get()?.value ?? 0;
  }
}

export type EventWithCategory = Event & { category: EventCategory | null };

export interface ContactInput {
  memberId: number;
  isPrimary: boolean;
  role: string;
}

export interface FeeInput {
  memberTypeId: number;
  amount: number;
}

export type FeeWithMemberType = EventRegistrationFee & { memberType: MemberType };

const contactMemberColumns = {
  id: clubUsers.id,
  firstName: clubUsers.firstName,
  lastName: clubUsers.lastName,
  email: clubUsers.email,
  salutation: clubUsers.salutation,
};

export class EventRepository {
  constructor(private readonly database: DatabaseManager) {}

  findById(id: number, executor: DbExecutor = this.database.getDb()): Event | undefined {
    return executor.select().from(events).where(eq(events.id, id)).get();
  }

  findWithCategory(id: number): EventWithCategory | undefined {
    const row = this.database
      .getDb()
      .select({ event: events, category: eventCategories })
      .from(events)
      .leftJoin(eventCategories, eq(events.categoryId, eventCategories.id))
      .where(eq(events.id, id))
      .get();
    return row ? { ...row.event, category: row.category } : undefined;
  }

  /**
   * Newest start first
   */
  listPage(page: number, pageSize: number): Page<EventWithCategory> {
    const db = this.database.getDb();
    const total = db.select({ value: count() }).from(events).get()?.value ?? 0;
    const rows = db
      .select({ event: events, category: eventCategories })
      .from(events)
      .leftJoin(eventCategories, eq(events.categoryId, eventCategories.id))
      .orderBy(desc(events.startDatetime), desc(events.id))
      .limit(pageSize)
      .offset(pageOffset(page, pageSize))
      .all();
    return toPage(
      rows.map(row => ({ ...row.event, category: row.category })),
      page,
      pageSize,
      total,
    );
  }

  /**
   * Events overlapping [start, end); the whole table when no range is given
   */
  listInRange(start?: Date, end?: Date): EventWithCategory[] {
    const conditions: SQL[] = [];
    if (end) {
      conditions.push(lt(events.startDatetime, end));
    }
    if (start) {
      conditions.push(gt(events.endDatetime, start));
    }
    return this.database
      .getDb()
      .select({ event: events, category: eventCategories })
      .from(events)
      .leftJoin(eventCategories, eq(events.categoryId, eventCategories.id))
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(events.startDatetime))
      .all()
      .map(row => ({ ...row.event, category: row.category }));
  }

  recentlyCreated(limit: number): EventWithCategory[] {
    return this.database
      .getDb()
      .select({ event: events, category: eventCategories })
      .from(events)
      .leftJoin(eventCategories, eq(events.categoryId, eventCategories.id))
      .orderBy(desc(events.createdAt), desc(events.id))
      .limit(limit)
      .all()
      .map(row => ({ ...row.event, category: row.category }));
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(events).get()?.value ?? 0;
  }

  insert(values: NewEvent, executor: DbExecutor): Event {
    return executor.insert(events).values(values).returning().get();
  }

  update(id: number, values: Partial<NewEvent>, executor: DbExecutor): Event | undefined {
    return executor
      .update(events)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(events.id, id))
      .returning()
      .get();
  }

  delete(id: number, executor: DbExecutor): boolean {
    return executor.delete(events).where(eq(events.id, id)).run().changes > 0;
  }

  allowedMemberTypeIds(eventId: number, executor: DbExecutor = this.database.getDb()): number[] {
    return executor
      .select({ memberTypeId: eventAllowedMemberTypes.memberTypeId })
      .from(eventAllowedMemberTypes)
      .where(eq(eventAllowedMemberTypes.eventId, eventId))
      .all()
      .map(row => row.memberTypeId);
  }

  allowedMemberTypes(eventId: number): MemberType[] {
    return this.database
      .getDb()
      .select({ memberType: memberTypes })
      .from(eventAllowedMemberTypes)
      .innerJoin(memberTypes, eq(eventAllowedMemberTypes.memberTypeId, memberTypes.id))
      .where(eq(eventAllowedMemberTypes.eventId, eventId))
      .orderBy(asc(memberTypes.displayOrder), asc(memberTypes.name))
      .all()
      .map(row => row.memberType);
  }

  setAllowedMemberTypes(eventId: number, memberTypeIds: number[], executor: DbExecutor): void {
    executor.delete(eventAllowedMemberTypes).where(eq(eventAllowedMemberTypes.eventId, eventId)).run();
    const unique = [...new Set(memberTypeIds)];
    if (unique.length > 0) {
      executor
        .insert(eventAllowedMemberTypes)
        .values(unique.map(memberTypeId => ({ eventId, memberTypeId })))
        .run();
    }
  }

  contacts(eventId: number, executor: DbExecutor = this.database.getDb()): ContactWithMember[] {
    return executor
      .select({ contact: eventContacts, member: contactMemberColumns })
      .from(eventContacts)
      .innerJoin(clubUsers, eq(eventContacts.memberId, clubUsers.id))
      .where(eq(eventContacts.eventId, eventId))
      .all()
      .map(row => ({ ...row.contact, member: row.member }));
  }

  isContact(eventId: number, memberId: number): boolean {
    return (
      this.database
        .getDb()
        .select({ id: eventContacts.id })
        .from(eventContacts)
        .where(and(eq(eventContacts.eventId, eventId), eq(eventContacts.memberId, memberId)))
        .get() !== undefined
    );
  }

  /**
   * Replace the event's contacts. Primary flags are cleared before any is set,
   * so the one-primary index never sees two at once.
   */
  replaceContacts(eventId: number, contacts: ContactInput[], executor: DbExecutor): void {
    executor.delete(eventContacts).where(eq(eventContacts.eventId, eventId)).run();
    for (const contact of contacts) {
      executor
        .insert(eventContacts)
        .values({ eventId, memberId: contact.memberId, isPrimary: false, role: contact.role })
        .run();
    }
    const primary = contacts.find(contact => contact.isPrimary);
    if (primary) {
      this.setPrimaryContact(eventId, primary.memberId, executor);
    }
  }

  /**
   * Make one contact primary and unset every other primary on the event
   */
  setPrimaryContact(eventId: number, memberId: number, executor: DbExecutor): void {
    executor
      .update(eventContacts)
      .set({ isPrimary: false })
      .where(and(eq(eventContacts.eventId, eventId), eq(eventContacts.isPrimary, true)))
      .run();
    executor
      .update(eventContacts)
      .set({ isPrimary: true })
      .where(and(eq(eventContacts.eventId, eventId), eq(eventContacts.memberId, memberId)))
      .run();
  }

  fees(eventId: number, executor: DbExecutor = this.database.getDb()): FeeWithMemberType[] {
    return executor
      .select({ fee: eventRegistrationFees, memberType: memberTypes })
      .from(eventRegistrationFees)
      .innerJoin(memberTypes, eq(eventRegistrationFees.memberTypeId, memberTypes.id))
      .where(eq(eventRegistrationFees.eventId, eventId))
      .orderBy(asc(memberTypes.displayOrder), asc(memberTypes.name))
      .all()
      .map(row => ({ ...row.fee, memberType: row.memberType }));
  }

  replaceFees(eventId: number, fees: FeeInput[], executor: DbExecutor): void {
    executor.delete(eventRegistrationFees).where(eq(eventRegistrationFees.eventId, eventId)).run();
    if (fees.length > 0) {
      executor
        .insert(eventRegistrationFees)
        .values(fees.map(fee => ({ eventId, memberTypeId: fee.memberTypeId, amount: fee.amount })))
        .run();
    }
  }
}

export type RegistrantRow = EventRegistration & {
  member: Pick<ClubUser, 'id' | 'firstName' | 'lastName' | 'email' | 'salutation'>;
  guestCount: number;
};

export class RegistrationRepository {
  constructor(private readonly database: DatabaseManager) {}

  findById(id: number): EventRegistration | undefined {
    return this.database
      .getDb()
      .select()
      .from(eventRegistrations)
      .where(eq(eventRegistrations.id, id))
      .get();
  }

  findForMember(
    eventId: number,
    memberId: number,
    executor: DbExecutor = this.database.getDb(),
  ): EventRegistration | undefined {
    return executor
      .select()
      .from(eventRegistrations)
      .where(and(eq(eventRegistrations.eventId, eventId), eq(eventRegistrations.memberId, memberId)))
      .get();
  }

  countActive(eventId: number, executor: DbExecutor = this.database.getDb()): number {
    return (
      executor
        .select({ value: count() })
        .from(eventRegistrations)
        .where(and(eq(eventRegistrations.eventId, eventId), eq(eventRegistrations.cancelled, false)))
        .get()?.value ?? 0
    );
  }

  insert(values: NewEventRegistration, executor: DbExecutor): EventRegistration {
    return executor.insert(eventRegistrations).values(values).returning().get();
  }

  update(
    id: number,
    values: Partial<NewEventRegistration>,
    executor: DbExecutor = this.database.getDb(),
  ): EventRegistration | undefined {
    return executor
      .update(eventRegistrations)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(eventRegistrations.id, id))
      .returning()
      .get();
  }

  /**
   * Active registrations in sign-up order, with member names and guest counts
   */
  activeRegistrants(eventId: number): RegistrantRow[] {
    const db = this.database.getDb();
    const rows = db
      .select({ registration: eventRegistrations, member: contactMemberColumns })
      .from(eventRegistrations)
      .innerJoin(clubUsers, eq(eventRegistrations.memberId, clubUsers.id))
      .where(and(eq(eventRegistrations.eventId, eventId), eq(eventRegistrations.cancelled, false)))
      .orderBy(asc(eventRegistrations.registeredAt), asc(eventRegistrations.id))
      .all();

    const guestCounts = this.guestCounts(rows.map(row => row.registration.id));
    return rows.map(row => ({
      ...row.registration,
      member: row.member,
      guestCount: guestCounts.get(row.registration.id) ?? 0,
    }));
  }

  guests(registrationId: number): EventGuest[] {
    return this.database
      .getDb()
      .select()
      .from(eventGuests)
      .where(eq(eventGuests.registrationId, registrationId))
      .orderBy(asc(eventGuests.id))
      .all();
  }

  replaceGuests(
    registrationId: number,
    guests: Array<{ firstName: string; lastName: string; email: string }>,
    executor: DbExecutor,
  ): void {
    executor.delete(eventGuests).where(eq(eventGuests.registrationId, registrationId)).run();
    if (guests.length > 0) {
      executor
        .insert(eventGuests)
        .values(guests.map(guest => ({ registrationId, ...guest })))
        .run();
    }
  }

  private guestCounts(registrationIds: number[]): Map<number, number> {
    const counts = new Map<number, number>();
    if (registrationIds.length === 0) {
      return counts;
    }
    const rows = this.database
      .getDb()
      .select({ registrationId: eventGuests.registrationId, value: count() })
      .from(eventGuests)
      .where(inArray(eventGuests.registrationId, registrationIds))
      .groupBy(eventGuests.registrationId)
      .all();
    for (const row of rows) {
      counts.set(row.registrationId, row.value);
    }
    return counts;
  }
}

export interface ActionLogFilters {
  action?: EventAction;
  eventId?: number;
}

export type ActionLogEntry = EventActionLog & {
  user: Pick<ClubUser, 'id' | 'firstName' | 'lastName' | 'email'> | null;
};

export class ActionLogRepository {
  constructor(private readonly database: DatabaseManager) {}

  insert(values: NewEventActionLog, executor: DbExecutor = this.database.getDb()): EventActionLog {
    return executor.insert(eventActionLogs).values(values).returning().get();
  }

  /**
   * Newest first
   */
  listPage(filters: ActionLogFilters, page: number, pageSize: number): Page<ActionLogEntry> {
    const db = this.database.getDb();
    const conditions: SQL[] = [];
    if (filters.action) {
      conditions.push(eq(eventActionLogs.action, filters.action));
    }
    if (filters.eventId !== undefined) {
      conditions.push(eq(eventActionLogs.eventId, filters.eventId));
    }
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const total = db.select({ value: count() }).from(eventActionLogs).where(where).get()?.value ?? 0;
    const rows = db
      .select({
        log: eventActionLogs,
        user: {
          id: clubUsers.id,
          firstName: clubUsers.firstName,
          lastName: clubUsers.lastName,
          email: clubUsers.email,
        },
      })
      .from(eventActionLogs)
      .leftJoin(clubUsers, eq(eventActionLogs.userId, clubUsers.id))
      .where(where)
      .orderBy(desc(eventActionLogs.timestamp), desc(eventActionLogs.id))
      .limit(pageSize)
      .offset(pageOffset(page, pageSize))
      .all();

    return toPage(
      rows.map(row => ({ ...row.log, user: row.user })),
      page,
      pageSize,
      total,
    );
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(eventActionLogs).get()?.value ?? 0;
  }
}
