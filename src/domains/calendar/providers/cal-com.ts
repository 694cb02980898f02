/**
 * @fileoverview Cal.com v2 REST client.
 *
 * Each method is a single authenticated call. Responses are unwrapped from
 * the `{ status, data }` envelope and filtered to the fields the assistant
 * shows the model. Non-success responses throw UpstreamError. Only reads
 * are retried.
 */

import { UpstreamError } from '../../../utils/errors.js';
import { fetchWithRetry } from '../../../services/http/fetch-with-retry.js';
import { isRecord } from '../../../capabilities/validation.js';
import type { Attendee, CalendarClient, CalendarProfile, CalendarRecord } from '../types.js';

/** Per-endpoint API versions (sent as the cal-api-version header). */
const API_VERSIONS = {
  me: '2024-08-13',
  eventTypes: '2024-06-14',
  bookings: '2024-08-13',
  slots: '2024-09-04',
} as const;

const EVENT_TYPE_FIELDS = ['id', 'lengthInMinutes', 'title', 'slug', 'description', 'locations'];
const BOOKING_FIELDS = ['uid', 'id', 'title', 'description', 'status', 'start', 'end', 'duration', 'attendees'];

/** Maximum bookings fetched per listBookings call. */
const BOOKINGS_PAGE_SIZE = '100';

export interface CalComClientOptions {
  apiKey: string;
  baseUrl?: string;
  retryDelaysMs?: number[];
}

function pick(record: Record<string, unknown>, keys: string[]): CalendarRecord {
  const picked: CalendarRecord = {};
  for (const key of keys) {
    if (key in record) picked[key] = record[key];
  }
  return picked;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export class CalComClient implements CalendarClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly retryDelaysMs?: number[];

  constructor(options: CalComClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.cal.com/v2').replace(/\/+$/, '');
    this.retryDelaysMs = options.retryDelaysMs;
  }

  /**
   * Issue a request and return the envelope's `data` field.
   * @throws UpstreamError on a non-2xx response
   */
  private async request(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    apiVersion: string,
    options: { query?: Record<string, string | undefined>; body?: unknown } = {}
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      'cal-api-version': apiVersion,
    };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';

    const response = await fetchWithRetry(
      url.toString(),
      {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      },
      `cal.${operation}`,
      // Writes may have been applied before a failure was reported
      method === 'GET' ? this.retryDelaysMs : []
    );

    const text = await response.text();
    if (!response.ok) {
      throw new UpstreamError(response.status, text, `cal.${operation}`);
    }

    const payload: unknown = text ? JSON.parse(text) : null;
    return isRecord(payload) && 'data' in payload ? payload.data : payload;
  }

  async fetchProfile(): Promise<CalendarProfile> {
    const data = await this.request('fetchProfile', 'GET', '/me', API_VERSIONS.me);
    const record = isRecord(data) ? data : {};
    return {
      id: typeof record.id === 'number' ? record.id : null,
      username: stringOrNull(record.username),
      email: stringOrNull(record.email),
      timeZone: stringOrNull(record.timeZone),
    };
  }

  async listEventTypes(user: Pick<CalendarProfile, 'username'>): Promise<CalendarRecord[]> {
    const data = await this.request('listEventTypes', 'GET', '/event-types', API_VERSIONS.eventTypes, {
      query: { username: user.username ?? undefined },
    });
    const items = Array.isArray(data) ? data : [];
    return items.filter(isRecord).map((item) => pick(item, EVENT_TYPE_FIELDS));
  }

  async listBookings(start?: string, end?: string): Promise<CalendarRecord[]> {
    const data = await this.request('listBookings', 'GET', '/bookings', API_VERSIONS.bookings, {
      query: { take: BOOKINGS_PAGE_SIZE, afterStart: start, beforeEnd: end },
    });
    const items = Array.isArray(data) ? data : [];
    return items.filter(isRecord).map((item) => pick(item, BOOKING_FIELDS));
  }

  async listSlots(eventTypeId: number, start: string, end: string): Promise<CalendarRecord> {
    const data = await this.request('listSlots', 'GET', '/slots', API_VERSIONS.slots, {
      query: { eventTypeId: String(eventTypeId), start, end },
    });
    return isRecord(data) ? data : {};
  }

  async createBooking(
    eventTypeId: number,
    startTime: string,
    attendee: Attendee,
    location?: string,
    guestEmails?: string[]
  ): Promise<CalendarRecord> {
    const body: Record<string, unknown> = {
      start: startTime,
      eventTypeId,
      attendee: { ...attendee, language: attendee.language ?? 'en' },
    };
    if (location) body.location = { type: 'integration', integration: location };
    if (guestEmails && guestEmails.length > 0) body.guests = guestEmails;

    const data = await this.request('createBooking', 'POST', '/bookings', API_VERSIONS.bookings, { body });
    return isRecord(data) ? pick(data, BOOKING_FIELDS) : {};
  }

  async cancelBooking(uid: string, reason?: string): Promise<CalendarRecord> {
    const data = await this.request(
      'cancelBooking',
      'POST',
      `/bookings/${encodeURIComponent(uid)}/cancel`,
      API_VERSIONS.bookings,
      { body: reason ? { cancellationReason: reason } : {} }
    );
    return isRecord(data) ? pick(data, BOOKING_FIELDS) : {};
  }
}
