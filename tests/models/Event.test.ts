/**
 * Unit tests for event helpers
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
  durationMinutes,
  getPrimaryContact,
  isAllDay,
  registrationClosesAt,
  sortContacts,
  toCalendarFeedItem,
  type ContactWithMember,
} from '../../src/models/Event.js';
import { insertEvent, setupTestContext, type TestContext } from '../db/testSetup.js';

function contact(id: number, lastName: string, firstName: string, isPrimary = false): ContactWithMember {
  return {
    id,
    eventId: 1,
    memberId: id,
    isPrimary,
    role: '',
    createdAt: new Date('2030-01-01T00:00:00Z'),
    member: { id, firstName, lastName, email: `${firstName.toLowerCase()}@example.com`, salutation: '' },
  };
}

describe('Event helpers', () => {
  describe('schedule', () => {
    test('should treat local midnight boundaries as all day', () => {
      const event = {
        startDatetime: new Date(2030, 5, 1, 0, 0, 0),
        endDatetime: new Date(2030, 5, 2, 0, 0, 0),
      };
      expect(isAllDay(event)).toBe(true);
      expect(durationMinutes(event)).toBe(1440);
    });

    test('should not treat timed events as all day', () => {
      const event = {
        startDatetime: new Date(2030, 5, 1, 9, 30, 0),
        endDatetime: new Date(2030, 5, 2, 0, 0, 0),
      };
      expect(isAllDay(event)).toBe(false);
    });
  });

  describe('registrationClosesAt', () => {
    const endDatetime = new Date('2030-06-01T19:00:00.000Z');

    test('should prefer the explicit close', () => {
      const close = new Date('2030-05-20T12:00:00.000Z');
      expect(
        registrationClosesAt({
          registrationStatus: 'required',
          registrationCloseDatetime: close,
          endDatetime,
        }),
      ).toBe(close);
    });

    test('should fall back to the event end when required by close date', () => {
      expect(
        registrationClosesAt({
          registrationStatus: 'required_by_close_date',
          registrationCloseDatetime: null,
          endDatetime,
        }),
      ).toBe(endDatetime);
    });

    test('should have no close for other statuses', () => {
      expect(
        registrationClosesAt({
          registrationStatus: 'recommended',
          registrationCloseDatetime: null,
          endDatetime,
        }),
      ).toBeNull();
    });
  });

  describe('contacts', () => {
    test('should order the primary contact first, then by name', () => {
      const sorted = sortContacts([
        contact(1, 'Smith', 'Zoe'),
        contact(2, 'Adams', 'Beth'),
        contact(3, 'Young', 'Carl', true),
        contact(4, 'Smith', 'Anna'),
      ]);
      expect(sorted.map(entry => entry.id)).toEqual([3, 2, 4, 1]);
    });

    test('should find the primary contact', () => {
      expect(getPrimaryContact([contact(1, 'Smith', 'Zoe'), contact(2, 'Adams', 'Beth', true)])?.id).toBe(2);
      expect(getPrimaryContact([contact(1, 'Smith', 'Zoe')])).toBeNull();
    });
  });

  describe('toCalendarFeedItem', () => {
    let ctx: TestContext;

    beforeEach(async () => {
      ctx = await setupTestContext();
    });

    test('should build a feed item with category colour', () => {
      const event = insertEvent(ctx);
      const item = toCalendarFeedItem(event, { name: 'Racing', color: '#ff0000' });

      expect(item).toEqual({
        id: event.id,
        title: 'Harbor Cleanup',
        start: '2030-06-01T16:00:00.000Z',
        end: '2030-06-01T19:00:00.000Z',
        allDay: false,
        description: 'Annual cleanup of the marina',
        url: `/calendar/events/${event.id}`,
        color: '#ff0000',
        category: 'Racing',
      });
    });

    test('should use defaults without a category', () => {
      const item = toCalendarFeedItem(insertEvent(ctx), null);
      expect(item.color).toBe('#007bff');
      expect(item.category).toBe('Uncategorized');
    });
  });
});
