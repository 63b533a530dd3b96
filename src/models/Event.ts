/**
 * Event helpers: schedule checks, contact ordering and calendar feed items
 */

import type { ClubUser, Event, EventCategory, EventContact } from '../db/schema.js';
import { Settings } from '../config/settings.js';
import { isMidnight, minutesBetween } from '../utils/dateUtils.js';

export const REGISTRATION_STATUS_LABELS = {
  not_required: 'Not Required',
  recommended: 'Recommended',
  required: 'Required',
  required_by_close_date: 'Required by Close Date',
  admins_contacts_only: 'Admins & Contacts Only',
  temporarily_unavailable: 'Temporarily Unavailable',
  closed: 'Closed',
  external: 'External Registration',
} as const;

/** Statuses under which members may register themselves */
export const OPEN_REGISTRATION_STATUSES = new Set<Event['registrationStatus']>([
  'recommended',
  'required',
  'required_by_close_date',
]);

/**
 * Starts and ends on a midnight boundary (local wall time)
 */
export function isAllDay(event: Pick<Event, 'startDatetime' | 'endDatetime'>): boolean {
  return isMidnight(event.startDatetime) && isMidnight(event.endDatetime);
}

export function durationMinutes(event: Pick<Event, 'startDatetime' | 'endDatetime'>): number {
  return minutesBetween(event.startDatetime, event.endDatetime);
}

/**
 * The moment registration stops. `required_by_close_date` without an explicit
 * close falls back to the event end.
 */
export function registrationClosesAt(
  event: Pick<Event, 'registrationStatus' | 'registrationCloseDatetime' | 'endDatetime'>,
): Date | null {
  if (event.registrationCloseDatetime) {
    return event.registrationCloseDatetime;
  }
  return event.registrationStatus === 'required_by_close_date' ? event.endDatetime : null;
}

export type ContactWithMember = EventContact & {
  member: Pick<ClubUser, 'id' | 'firstName' | 'lastName' | 'email' | 'salutation'>;
};

/**
 * Primary contact first, then by last and first name
 */
export function sortContacts<T extends ContactWithMember>(contacts: T[]): T[] {
  return [...contacts].sort((a, b) => {
    if (a.isPrimary !== b.isPrimary) {
      return a.isPrimary ? -1 : 1;
    }
    return (
      a.member.lastName.localeCompare(b.member.lastName) ||
      a.member.firstName.localeCompare(b.member.firstName)
    );
  });
}

export function getPrimaryContact<T extends ContactWithMember>(contacts: T[]): T | null {
  return contacts.find(contact => contact.isPrimary) ?? null;
}

export interface CalendarFeedItem {
  id: number;
  title: string;
  start: string;
  end: string;
  allDay: boolean;
  description: string;
  url: string;
  color: string;
  category: string;
}

export function toCalendarFeedItem(
  event: Event,
  category: Pick<EventCategory, 'name' | 'color'> | null,
): CalendarFeedItem {
  return {
    id: event.id,
    title: event.title,
    start: event.startDatetime.toISOString(),
    end: event.endDatetime.toISOString(),
    allDay: isAllDay(event),
    description: event.shortDescription,
    url: `/calendar/events/${event.id}`,
    color: category?.color ?? Settings.DEFAULT_CATEGORY_COLOR,
    category: category?.name ?? 'Uncategorized',
  };
}
