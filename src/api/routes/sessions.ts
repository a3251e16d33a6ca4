/**
 * Sessions API Routes
 *
 * Endpoints:
 * - POST /sessions/:id/messages - Send one student message, get the tutor reply
 * - POST /sessions/:id/reset - Clear the conversation and any open question
 * - GET /sessions/:id/state - Thread presence, scaffold level and turn count
 * - GET /sessions/:id/transcript - Retained turns, oldest first
 *
 * Sessions are created by their first message; a client picks its own id.
 * Reading an unknown session answers with an empty state rather than 404.
 * If the client disconnects mid-turn, the request signal aborts the message
 * and the session is left as it was.
 */

import { Hono, type Context } from 'hono';
import type { EvaluationResult, TurnRole, TurnType } from '../../core/models';
import type { TutorOrchestrator } from '../../core/session';
import { validationError } from '../middleware/error-handler';
import { validate } from '../middleware/validate';
import { sendMessageSchema, sessionIdSchema } from '../types';
import { success } from '../utils/response';

/**
 * A turn as it appears in the transcript response.
 */
export interface TranscriptTurn {
  role: TurnRole;
  type: TurnType;
  text: string;
  /** ISO 8601 */
  timestamp: string;
  evaluation?: EvaluationResult;
}

export interface SessionRouteDependencies {
  orchestrator: Pick<
    TutorOrchestrator,
    'handleMessage' | 'reset' | 'getSessionState' | 'getTranscript'
  >;
}

function sessionIdFrom(c: Context): string {
  const result = sessionIdSchema.safeParse(c.req.param('id'));
  if (!result.success) {
    throw validationError('Invalid session ID', { id: c.req.param('id') });
  }
  return result.data;
}

export function sessionRoutes(deps: SessionRouteDependencies): Hono {
  const router = new Hono();
  const { orchestrator } = deps;

  router.post('/:id/messages', validate(sendMessageSchema), async (c) => {
    const sessionId = sessionIdFrom(c);
    const { text } = c.get('validatedBody');
    const outcome = await orchestrator.handleMessage(sessionId, text, { signal: c.req.raw.signal });
    return success(c, outcome);
  });

  router.post('/:id/reset', async (c) => {
    const sessionId = sessionIdFrom(c);
    await orchestrator.reset(sessionId);
    return success(c, await orchestrator.getSessionState(sessionId));
  });

  router.get('/:id/state', async (c) => {
    const sessionId = sessionIdFrom(c);
    return success(c, await orchestrator.getSessionState(sessionId));
  });

  router.get('/:id/transcript', async (c) => {
    const sessionId = sessionIdFrom(c);
    const turns = await orchestrator.getTranscript(sessionId);
    const transcript: TranscriptTurn[] = turns.map((turn) => ({
      role: turn.role,
      type: turn.type,
      text: turn.text,
      timestamp: turn.timestamp.toISOString(),
      ...(turn.evaluation && { evaluation: turn.evaluation }),
    }));
    return success(c, { sessionId, turns: transcript });
  });

  return router;
}
