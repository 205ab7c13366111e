/**
 * Session resolution (X-Session-Id) and session-level routes
 */

import { Router, Request, Response } from 'express';
import type { RaidConfig } from '../config';
import type { RaidSessionState, SessionStorage } from '../storage/SessionStorage';
import { toOverview } from '../views/attendanceView';

export const SESSION_HEADER = 'X-Session-Id';

export interface SessionDeps {
  sessions: SessionStorage;
  config: RaidConfig;
}

function normalizeText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Live session for the request header, or a fresh one. The id always goes back in the response header.
 */
export function resolveSession(sessions: SessionStorage, req: Request, res: Response): RaidSessionState {
  const requested = normalizeText(req.header(SESSION_HEADER)) || undefined;
  const state = sessions.resolve(requested);
  res.setHeader(SESSION_HEADER, state.id);
  return state;
}

/** Read one field of a JSON body without trusting its shape */
export function readField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return undefined;
  return new Map<string, unknown>(Object.entries(body)).get(key);
}

export function readText(body: unknown, key: string): string {
  return normalizeText(readField(body, key));
}

export function createSessionRouter(deps: SessionDeps): Router {
  const router = Router();
  const { sessions, config } = deps;

  // GET /v1/raid/overview
  router.get('/raid/overview', (req: Request, res: Response) => {
    const state = resolveSession(sessions, req, res);
    res.json(toOverview(state, config));
  });

  // DELETE /v1/session
  router.delete('/session', (req: Request, res: Response) => {
    const sessionId = normalizeText(req.header(SESSION_HEADER));
    const ended = sessionId ? sessions.end(sessionId) : false;
    res.json({ ended });
  });

  return router;
}
