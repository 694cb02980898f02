/**
 * Calendar capabilities.
 *
 * One capability per calendar client operation. Executors receive validated
 * arguments; the current user is looked up through the client rather than
 * captured when the capability is built.
 */

import { DateTime } from 'luxon';
import type { CapabilityArguments, CapabilityDescriptor, FieldSpec } from '../../../capabilities/types.js';
import { isRecord } from '../../../capabilities/validation.js';
import type { CalendarClient } from '../types.js';

/** Capabilities that change the calendar and default to human confirmation. */
export const CALENDAR_WRITE_CAPABILITIES = ['create_booking', 'cancel_booking'] as const;

function isoDateTime(description: string, required: boolean): FieldSpec {
  return {
    type: 'string',
    required,
    description,
    validate: (value) =>
      typeof value === 'string' && DateTime.fromISO(value, { setZone: true }).isValid
        ? null
        : `"${String(value)}" is not an ISO-8601 date-time.`,
  };
}

function readString(args: CapabilityArguments, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value : '';
}

function readOptionalString(args: CapabilityArguments, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function readInteger(args: CapabilityArguments, key: string): number {
  const value = args[key];
  return typeof value === 'number' ? value : Number.NaN;
}

function readStringList(args: CapabilityArguments, key: string): string[] | undefined {
  const value = args[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : undefined;
}

/**
 * Build the calendar capability descriptors over a client.
 */
export function createCalendarCapabilities(client: CalendarClient): CapabilityDescriptor[] {
  const getMyProfile: CapabilityDescriptor = {
    name: 'get_my_profile',
    description: 'Fetch the profile of the authenticated calendar user (username, email, time zone).',
    inputSchema: {},
    executor: async () => client.fetchProfile(),
  };

  const listEventTypes: CapabilityDescriptor = {
    name: 'list_event_types',
    description:
      "List the event types (meeting kinds) on the user's calendar. Booking requires an event type id from this list.",
    inputSchema: {
      username: {
        type: 'string',
        required: false,
        description: "Calendar username. Defaults to the authenticated user's username.",
      },
    },
    executor: async (args) => {
      const username = readOptionalString(args, 'username') ?? (await client.fetchProfile()).username;
      return { eventTypes: await client.listEventTypes({ username }) };
    },
  };

  const listBookings: CapabilityDescriptor = {
    name: 'list_bookings',
    description: "List bookings on the user's calendar, optionally limited to a time range.",
    inputSchema: {
      start: isoDateTime('Only bookings starting at or after this ISO-8601 time.', false),
      end: isoDateTime('Only bookings ending at or before this ISO-8601 time.', false),
    },
    executor: async (args) => ({
      bookings: await client.listBookings(readOptionalString(args, 'start'), readOptionalString(args, 'end')),
    }),
  };

  const listSlots: CapabilityDescriptor = {
    name: 'list_slots',
    description: 'List available time slots for an event type between two ISO-8601 times.',
    inputSchema: {
      event_type_id: { type: 'integer', required: true, description: 'Event type id from list_event_types.' },
      start: isoDateTime('Start of the search window (ISO-8601).', true),
      end: isoDateTime('End of the search window (ISO-8601).', true),
    },
    executor: async (args) => ({
      slots: await client.listSlots(
        readInteger(args, 'event_type_id'),
        readString(args, 'start'),
        readString(args, 'end')
      ),
    }),
  };

  const createBooking: CapabilityDescriptor = {
    name: 'create_booking',
    description:
      'Create a booking for an event type at a given start time. Confirm the details with the user before calling.',
    inputSchema: {
      event_type_id: { type: 'integer', required: true, description: 'Event type id from list_event_types.' },
      start: isoDateTime('Booking start time (ISO-8601 with offset).', true),
      attendee: {
        type: 'object',
        required: true,
        description: 'Person the booking is for.',
        properties: {
          name: { type: 'string', required: true, description: 'Attendee full name.' },
          email: { type: 'string', required: true, description: 'Attendee email address.' },
          time_zone: { type: 'string', required: true, description: 'Attendee IANA time zone.' },
          language: { type: 'string', required: false, description: 'Attendee language code (default "en").' },
        },
      },
      location: {
        type: 'string',
        required: false,
        description: 'Conferencing integration, e.g. "cal-video" or "google-meet".',
      },
      guest_emails: {
        type: 'array',
        required: false,
        description: 'Additional guest email addresses.',
        items: { type: 'string', required: true },
      },
    },
    executor: async (args) => {
      const attendeeArgs = isRecord(args.attendee) ? args.attendee : {};
      const booking = await client.createBooking(
        readInteger(args, 'event_type_id'),
        readString(args, 'start'),
        {
          name: readString(attendeeArgs, 'name'),
          email: readString(attendeeArgs, 'email'),
          timeZone: readString(attendeeArgs, 'time_zone'),
          language: readOptionalString(attendeeArgs, 'language'),
        },
        readOptionalString(args, 'location'),
        readStringList(args, 'guest_emails')
      );
      return { booking };
    },
  };

  const cancelBooking: CapabilityDescriptor = {
    name: 'cancel_booking',
    description: 'Cancel a booking by its uid. Confirm with the user before calling.',
    inputSchema: {
      uid: { type: 'string', required: true, description: 'Booking uid from list_bookings.' },
      reason: { type: 'string', required: false, description: 'Cancellation reason shown to attendees.' },
    },
    executor: async (args) => ({
      booking: await client.cancelBooking(readString(args, 'uid'), readOptionalString(args, 'reason')),
    }),
  };

  return [getMyProfile, listEventTypes, listBookings, listSlots, createBooking, cancelBooking];
}
