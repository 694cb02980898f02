/**
 * Capability registry (canonical).
 *
 * Builds the frozen registry the turn controller advertises to the model.
 */

import { createCalendarCapabilities } from '../domains/calendar/runtime/capabilities.js';
import type { CalendarClient } from '../domains/calendar/types.js';
import { CapabilityRegistry } from './registry.js';

export { CapabilityRegistry } from './registry.js';
export { validateArguments, toToolDeclaration } from './validation.js';
export type * from './types.js';

/**
 * Register every calendar capability over the given client and freeze.
 */
export function createCalendarRegistry(client: CalendarClient): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  for (const descriptor of createCalendarCapabilities(client)) {
    registry.register(descriptor);
  }
  return registry.freeze();
}
