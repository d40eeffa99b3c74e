// ============================================================
// /api/session
// Guest sessions and session lookup
// ============================================================

import { Router } from 'express';
import type { Request, Response } from 'express';
import { readBearerToken } from '../session/manager';
import type { AppDeps } from '../app';

/** POST /api/session/guest */
export function handleStartGuest(deps: AppDeps) {
  return (_req: Request, res: Response): void => {
    const session = deps.sessions.createGuest();
    res.status(201).json({ token: session.token, mode: session.context.mode });
  };
}

/** GET /api/session */
export function handleGetSession(deps: AppDeps) {
  return (req: Request, res: Response): void => {
    const session = deps.sessions.resolve(readBearerToken(req.headers.authorization));
    res.json({ mode: session.mode, user: session.identity });
  };
}

export function createSessionRouter(deps: AppDeps): Router {
  const router = Router();
  router.post('/guest', handleStartGuest(deps));
  router.get('/', handleGetSession(deps));
  return router;
}
