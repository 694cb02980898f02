/**
 * Unit tests for capability argument validation and tool declarations.
 */

import { describe, it, expect } from 'vitest';
import { toToolDeclaration, validateArguments } from '../../../src/capabilities/validation.js';
import type { InputSchema } from '../../../src/capabilities/types.js';

describe('validateArguments', () => {
  describe('required fields', () => {
    it('reports a missing required field', () => {
      expect(validateArguments({}, { uid: { type: 'string', required: true } })).toEqual(['uid is required.']);
    });

    it('treats null as missing', () => {
      expect(validateArguments({ uid: null }, { uid: { type: 'string', required: true } })).toEqual([
        'uid is required.',
      ]);
    });

    it('accepts a missing optional field', () => {
      expect(validateArguments({}, { reason: { type: 'string', required: false } })).toEqual([]);
    });
  });

  describe('types', () => {
    it('rejects a non-object argument set', () => {
      expect(validateArguments('uid=1', {})).toEqual(['arguments must be an object.']);
      expect(validateArguments([1], {})).toEqual(['arguments must be an object.']);
    });

    it('distinguishes integers from other numbers', () => {
      const schema: InputSchema = { event_type_id: { type: 'integer', required: true } };

      expect(validateArguments({ event_type_id: 11 }, schema)).toEqual([]);
      expect(validateArguments({ event_type_id: 11.5 }, schema)).toEqual(['event_type_id must be an integer.']);
      expect(validateArguments({ event_type_id: '11' }, schema)).toEqual(['event_type_id must be an integer.']);
    });

    it('checks arrays and their items', () => {
      const schema: InputSchema = {
        guest_emails: { type: 'array', required: false, items: { type: 'string', required: true } },
      };

      expect(validateArguments({ guest_emails: 'a@example.com' }, schema)).toEqual([
        'guest_emails must be an array.',
      ]);
      expect(validateArguments({ guest_emails: ['a@example.com', 7] }, schema)).toEqual([
        'guest_emails[1] must be a string.',
      ]);
    });

    it('checks nested object properties with dotted paths', () => {
      const schema: InputSchema = {
        attendee: {
          type: 'object',
          required: true,
          properties: {
            name: { type: 'string', required: true },
            email: { type: 'string', required: true },
          },
        },
      };

      expect(validateArguments({ attendee: { name: 'Sam', phone: '555' } }, schema)).toEqual([
        'attendee.phone is not a recognized field.',
        'attendee.email is required.',
      ]);
    });
  });

  describe('constraints', () => {
    it('rejects unknown top-level fields', () => {
      expect(validateArguments({ uid: 'bk-1', force: true }, { uid: { type: 'string', required: true } })).toEqual([
        'force is not a recognized field.',
      ]);
    });

    it('rejects blank required strings', () => {
      expect(validateArguments({ uid: '   ' }, { uid: { type: 'string', required: true } })).toEqual([
        'uid must be a non-empty string.',
      ]);
    });

    it('checks enums', () => {
      const schema: InputSchema = { status: { type: 'string', required: true, enum: ['upcoming', 'past'] } };

      expect(validateArguments({ status: 'later' }, schema)).toEqual(['status must be one of: upcoming, past.']);
    });

    it('runs custom validators after the type check', () => {
      const schema: InputSchema = {
        start: {
          type: 'string',
          required: true,
          validate: (value) => (value === 'soon' ? 'start must be a date.' : null),
        },
      };

      expect(validateArguments({ start: 'soon' }, schema)).toEqual(['start must be a date.']);
      expect(validateArguments({ start: 5 }, schema)).toEqual(['start must be a string.']);
    });

    it('collects every issue', () => {
      const schema: InputSchema = {
        uid: { type: 'string', required: true },
        reason: { type: 'string', required: false },
      };

      expect(validateArguments({ reason: 3 }, schema)).toEqual(['uid is required.', 'reason must be a string.']);
    });
  });
});

describe('toToolDeclaration', () => {
  it('renders the input schema as a closed JSON schema', () => {
    const tool = toToolDeclaration({
      name: 'create_booking',
      description: 'Create a booking.',
      inputSchema: {
        event_type_id: { type: 'integer', required: true, description: 'Event type id.' },
        attendee: {
          type: 'object',
          required: true,
          properties: {
            name: { type: 'string', required: true },
            language: { type: 'string', required: false },
          },
        },
        guest_emails: { type: 'array', required: false, items: { type: 'string', required: true } },
      },
      executor: async () => null,
    });

    expect(tool).toEqual({
      name: 'create_booking',
      description: 'Create a booking.',
      input_schema: {
        type: 'object',
        properties: {
          event_type_id: { type: 'integer', description: 'Event type id.' },
          attendee: {
            type: 'object',
            properties: { name: { type: 'string' }, language: { type: 'string' } },
            required: ['name'],
            additionalProperties: false,
          },
          guest_emails: { type: 'array', items: { type: 'string' } },
        },
        required: ['event_type_id', 'attendee'],
        additionalProperties: false,
      },
    });
  });
});
