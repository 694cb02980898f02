/**
 * In-process calendar client for tests.
 *
 * Every method is a vi.fn with canned data so tests can assert calls and
 * override results per test with mockResolvedValueOnce / mockRejectedValueOnce.
 */

import { vi, type Mock } from 'vitest';
import type { CalendarClient, CalendarRecord } from '../../src/domains/calendar/types.js';

export const SAMPLE_BOOKINGS: CalendarRecord[] = [
  {
    uid: 'bk-standup',
    id: 101,
    title: 'Team standup',
    status: 'accepted',
    start: '2025-07-11T09:00:00-07:00',
    end: '2025-07-11T09:15:00-07:00',
    duration: 15,
  },
  {
    uid: 'bk-dentist',
    id: 102,
    title: 'Dentist',
    status: 'accepted',
    start: '2025-07-11T14:00:00-07:00',
    end: '2025-07-11T15:00:00-07:00',
    duration: 60,
  },
];

export interface FakeCalendarClient extends CalendarClient {
  fetchProfile: Mock<CalendarClient['fetchProfile']>;
  listEventTypes: Mock<CalendarClient['listEventTypes']>;
  listBookings: Mock<CalendarClient['listBookings']>;
  listSlots: Mock<CalendarClient['listSlots']>;
  createBooking: Mock<CalendarClient['createBooking']>;
  cancelBooking: Mock<CalendarClient['cancelBooking']>;
}

export function createFakeCalendarClient(): FakeCalendarClient {
  return {
    fetchProfile: vi.fn<CalendarClient['fetchProfile']>(async () => ({
      id: 7,
      username: 'sam',
      email: 'sam@example.com',
      timeZone: 'America/Los_Angeles',
    })),
    listEventTypes: vi.fn<CalendarClient['listEventTypes']>(async () => [
      { id: 11, title: '30 min meeting', slug: '30min', lengthInMinutes: 30 },
    ]),
    listBookings: vi.fn<CalendarClient['listBookings']>(async () => SAMPLE_BOOKINGS),
    listSlots: vi.fn<CalendarClient['listSlots']>(async () => ({
      '2025-07-15': [{ start: '2025-07-15T10:00:00-07:00' }],
    })),
    createBooking: vi.fn<CalendarClient['createBooking']>(async (eventTypeId, startTime) => ({
      uid: 'bk-new',
      id: 201,
      title: '30 min meeting',
      status: 'accepted',
      start: startTime,
      eventTypeId,
    })),
    cancelBooking: vi.fn<CalendarClient['cancelBooking']>(async (uid) => ({ uid, status: 'cancelled' })),
  };
}
