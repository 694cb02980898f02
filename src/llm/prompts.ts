/**
 * LLM prompts and context builders.
 */

import { DateTime } from 'luxon';

/**
 * Build the time context line for a timezone.
 * Falls back to UTC when the zone is not a valid IANA name.
 */
function buildTimeContext(timezone: string, now: Date = new Date()): string {
  const local = DateTime.fromJSDate(now).setZone(timezone);
  if (!local.isValid) {
    return `Current time: ${now.toISOString()} (UTC - timezone "${timezone}" unknown)`;
  }
  return `Current time: ${local.toFormat("cccc, LLLL d, yyyy h:mm a ZZZZ")} (${timezone}, ${local.toISO()})`;
}

/**
 * System prompt seeded into every new thread.
 */
export function buildSystemPrompt(timezone: string): string {
  return `You are a helpful calendar assistant that can read and change the user's Cal.com calendar.

Current local timezone is ${timezone}.
All time strings use ISO-8601 with an offset, for example 2025-07-10T09:00:00-07:00.
Respond with every time expressed in the current timezone.

## Working with the calendar
- Look up event types with list_event_types before booking; a booking needs an event type id.
- Check availability with list_slots before proposing a time.
- Before creating, cancelling or rescheduling a booking, confirm the details with the user.
- If a tool call fails, explain the problem in plain language and suggest what to do next.
- If the user rejects an action, follow their feedback instead of retrying the same request.`;
}

/**
 * Prefix applied to the stored system prompt when a model call is made.
 */
export function withTimeContext(systemPrompt: string, timezone: string, now?: Date): string {
  return `**${buildTimeContext(timezone, now)}**\n\n${systemPrompt}`;
}
