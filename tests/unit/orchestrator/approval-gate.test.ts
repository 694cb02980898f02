/**
 * Unit tests for the approval gate.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ApprovalGate, NO_RESPONSE_FEEDBACK, type ConfirmationPrompt } from '../../../src/orchestrator/approval-gate.js';
import type { CapabilityInvocationRequest } from '../../../src/capabilities/types.js';

const BOOK: CapabilityInvocationRequest = {
  invocationId: 'call_book',
  capabilityName: 'create_booking',
  arguments: { event_type_id: 11 },
};

const LIST: CapabilityInvocationRequest = {
  invocationId: 'call_list',
  capabilityName: 'list_bookings',
  arguments: {},
};

const POLICIES = { create_booking: 'require_confirmation' } as const;

describe('ApprovalGate', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('policies', () => {
    it('falls back to the default policy for unlisted capabilities', () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000 });
      const strict = new ApprovalGate({ policies: { list_bookings: 'auto' }, defaultPolicy: 'require_confirmation', timeoutMs: 1000 });

      expect(gate.policyFor('create_booking')).toBe('require_confirmation');
      expect(gate.policyFor('list_bookings')).toBe('auto');
      expect(strict.policyFor('list_bookings')).toBe('auto');
      expect(strict.policyFor('cancel_booking')).toBe('require_confirmation');
    });

    it('approves auto capabilities without prompting', async () => {
      const prompt = vi.fn<ConfirmationPrompt>();
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, prompt });

      const verdict = await gate.decide(LIST);

      expect(verdict).toEqual({ status: 'decided', decision: { invocationId: 'call_list', approved: true } });
      expect(prompt).not.toHaveBeenCalled();
    });
  });

  describe('deferred mode', () => {
    it('suspends with a deadline measured from the request time', async () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, now: () => 5_000 });

      expect(gate.isBlocking()).toBe(false);
      expect(await gate.decide(BOOK, 4_500)).toEqual({
        status: 'suspended',
        invocationId: 'call_book',
        expiresAt: 5_500,
      });
    });

    it('rejects with "no response" once the deadline has passed', async () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, now: () => 5_000 });

      expect(await gate.decide(BOOK, 4_000)).toEqual({
        status: 'decided',
        decision: { invocationId: 'call_book', approved: false, humanFeedback: NO_RESPONSE_FEEDBACK },
      });
    });
  });

  describe('resolve', () => {
    it('records trimmed feedback on a rejection', () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, now: () => 0 });

      expect(gate.resolve(BOOK, { approved: false, feedback: '  not on a Monday  ' }, 1000)).toEqual({
        invocationId: 'call_book',
        approved: false,
        humanFeedback: 'not on a Monday',
      });
    });

    it('omits blank feedback', () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, now: () => 0 });

      expect(gate.resolve(BOOK, { approved: false, feedback: '   ' })).toEqual({
        invocationId: 'call_book',
        approved: false,
      });
    });

    it('turns a late approval into a timeout rejection', () => {
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, now: () => 2_000 });

      expect(gate.resolve(BOOK, { approved: true }, 2_000)).toEqual({
        invocationId: 'call_book',
        approved: false,
        humanFeedback: 'no response',
      });
    });
  });

  describe('blocking mode', () => {
    it('uses the prompt reply', async () => {
      const prompt = vi.fn<ConfirmationPrompt>(async () => ({ approved: false, feedback: 'wrong day' }));
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 60_000, prompt, now: () => 1_000 });

      const verdict = await gate.decide(BOOK);

      expect(gate.isBlocking()).toBe(true);
      expect(verdict).toEqual({
        status: 'decided',
        decision: { invocationId: 'call_book', approved: false, humanFeedback: 'wrong day' },
      });
      expect(prompt).toHaveBeenCalledWith(expect.objectContaining({ invocation: BOOK, expiresAt: 61_000 }));
    });

    it('rejects when the prompt does not answer in time and aborts it', async () => {
      vi.useFakeTimers();
      let promptSignal: AbortSignal | undefined;
      const prompt: ConfirmationPrompt = ({ signal }) => {
        promptSignal = signal;
        return new Promise(() => undefined);
      };
      const gate = new ApprovalGate({ policies: POLICIES, timeoutMs: 1000, prompt });

      const pending = gate.decide(BOOK);
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending).toEqual({
        status: 'decided',
        decision: { invocationId: 'call_book', approved: false, humanFeedback: 'no response' },
      });
      expect(promptSignal?.aborted).toBe(true);
    });
  });
});
