/**
 * Calendar domain types.
 */

/**
 * Authenticated calendar user.
 */
export interface CalendarProfile {
  id: number | null;
  username: string | null;
  email: string | null;
  timeZone: string | null;
}

/** Upstream record filtered down to the fields the model needs. */
export type CalendarRecord = Record<string, unknown>;

/**
 * Person the booking is made for.
 */
export interface Attendee {
  name: string;
  email: string;
  timeZone: string;
  language?: string;
}

/**
 * Calendar collaborator. Each method is one authenticated REST call and
 * fails with UpstreamError on a non-success response.
 */
export interface CalendarClient {
  fetchProfile(): Promise<CalendarProfile>;
  listEventTypes(user: Pick<CalendarProfile, 'username'>): Promise<CalendarRecord[]>;
  listBookings(start?: string, end?: string): Promise<CalendarRecord[]>;
  listSlots(eventTypeId: number, start: string, end: string): Promise<CalendarRecord>;
  createBooking(
    eventTypeId: number,
    startTime: string,
    attendee: Attendee,
    location?: string,
    guestEmails?: string[]
  ): Promise<CalendarRecord>;
  cancelBooking(uid: string, reason?: string): Promise<CalendarRecord>;
}
