/**
 * @fileoverview Thread API routes.
 *
 * Exposes the turn controller's resume contract over HTTP. Approvals are
 * deferred: a turn that needs confirmation returns `awaiting_approval` and
 * the decision arrives on a later POST /threads/:threadId/decisions.
 *
 * If the client disconnects mid-turn the turn is cancelled at the next
 * transition; the thread keeps its last saved state.
 */

import { Router, type Request, type Response } from 'express';
import { randomUUID } from 'crypto';
import { isRecord, validateArguments } from '../capabilities/validation.js';
import type { InputSchema } from '../capabilities/types.js';
import { getTurnController } from '../orchestrator/index.js';
import type { DecisionInput, TurnOutcome } from '../orchestrator/types.js';
import { AppError } from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

const MESSAGE_SCHEMA: InputSchema = {
  text: { type: 'string', required: true },
};

const CREATE_SCHEMA: InputSchema = {
  text: { type: 'string', required: true },
  threadId: { type: 'string', required: false, nonEmpty: true },
};

const DECISIONS_SCHEMA: InputSchema = {
  decisions: {
    type: 'array',
    required: true,
    items: {
      type: 'object',
      required: true,
      properties: {
        invocationId: { type: 'string', required: true },
        approved: { type: 'boolean', required: true },
        feedback: { type: 'string', required: false },
      },
    },
  },
};

/** HTTP status per error code; anything unlisted is a 500. */
const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  THREAD_NOT_FOUND: 404,
  UNKNOWN_INVOCATION: 404,
  THREAD_BUSY: 409,
  INVALID_PHASE: 409,
  RUNAWAY_LOOP: 422,
  DUPLICATE_INVOCATION: 502,
  UPSTREAM_ERROR: 502,
  TURN_CANCELLED: 499,
};

class RequestValidationError extends AppError {
  constructor(issues: string[]) {
    super(issues.join(' '), 'VALIDATION_ERROR', true, { issues });
    this.name = 'RequestValidationError';
  }
}

function requireBody(body: unknown, schema: InputSchema): Record<string, unknown> {
  const issues = validateArguments(body ?? {}, schema);
  if (issues.length > 0 || !isRecord(body)) {
    throw new RequestValidationError(issues.length > 0 ? issues : ['body must be a JSON object.']);
  }
  return body;
}

function readText(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

function readDecisions(body: Record<string, unknown>): DecisionInput[] {
  const items = Array.isArray(body.decisions) ? body.decisions : [];
  return items.filter(isRecord).map((item) => ({
    invocationId: typeof item.invocationId === 'string' ? item.invocationId : '',
    approved: item.approved === true,
    ...(typeof item.feedback === 'string' ? { feedback: item.feedback } : {}),
  }));
}

/**
 * Map an error to its HTTP response.
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof AppError) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    if (status >= 500) {
      logger.error('request_failed', { code: error.code, error: error.message });
    } else {
      logger.warn('request_rejected', { code: error.code, error: error.message });
    }
    if (!res.headersSent) {
      res.status(status).json({ error: { code: error.code, message: error.message } });
    }
    return;
  }

  logger.error('request_failed', { error: error instanceof Error ? error.message : String(error) });
  if (!res.headersSent) {
    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  }
}

/**
 * Run a turn operation with a signal tied to the client connection.
 */
async function runTurn(
  req: Request,
  res: Response,
  operation: (signal: AbortSignal) => Promise<TurnOutcome>
): Promise<void> {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  await withLogContext({ requestId: createRequestId(), operation: `${req.method} ${req.path}` }, async () => {
    try {
      const outcome = await operation(controller.signal);
      res.json(outcome);
    } catch (error) {
      sendError(res, error);
    }
  });
}

/**
 * POST /threads
 * Starts a new thread with its first message.
 */
export async function createThread(req: Request, res: Response): Promise<void> {
  await runTurn(req, res, (signal) => {
    const body = requireBody(req.body, CREATE_SCHEMA);
    const threadId = readText(body, 'threadId') || randomUUID();
    return getTurnController().sendMessage(threadId, readText(body, 'text'), { signal });
  });
}

/**
 * POST /threads/:threadId/messages
 */
export async function postMessage(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  await runTurn(req, res, (signal) => {
    const body = requireBody(req.body, MESSAGE_SCHEMA);
    return getTurnController().sendMessage(req.params.threadId, readText(body, 'text'), { signal });
  });
}

/**
 * POST /threads/:threadId/decisions
 */
export async function postDecisions(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  await runTurn(req, res, (signal) => {
    const body = requireBody(req.body, DECISIONS_SCHEMA);
    return getTurnController().submitDecisions(req.params.threadId, readDecisions(body), { signal });
  });
}

/**
 * POST /threads/:threadId/feedback
 */
export async function postFeedback(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  await runTurn(req, res, (signal) => {
    const body = requireBody(req.body, MESSAGE_SCHEMA);
    return getTurnController().submitFeedback(req.params.threadId, readText(body, 'text'), { signal });
  });
}

/**
 * POST /threads/:threadId/resume
 */
export async function postResume(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  await runTurn(req, res, (signal) => getTurnController().resume(req.params.threadId, { signal }));
}

/**
 * GET /threads/:threadId
 */
export async function getThread(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  try {
    res.json({ thread: await getTurnController().getThread(req.params.threadId) });
  } catch (error) {
    sendError(res, error);
  }
}

/**
 * GET /threads
 */
export async function listThreads(_req: Request, res: Response): Promise<void> {
  try {
    res.json({ threads: await getTurnController().listThreads() });
  } catch (error) {
    sendError(res, error);
  }
}

/**
 * DELETE /threads/:threadId
 */
export async function deleteThread(req: Request<{ threadId: string }>, res: Response): Promise<void> {
  try {
    await getTurnController().deleteThread(req.params.threadId);
    res.status(204).send();
  } catch (error) {
    sendError(res, error);
  }
}

const router = Router();

router.post('/threads', createThread);
router.get('/threads', listThreads);
router.get('/threads/:threadId', getThread);
router.delete('/threads/:threadId', deleteThread);
router.post('/threads/:threadId/messages', postMessage);
router.post('/threads/:threadId/decisions', postDecisions);
router.post('/threads/:threadId/feedback', postFeedback);
router.post('/threads/:threadId/resume', postResume);

export default router;
