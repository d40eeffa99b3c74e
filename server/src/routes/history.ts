// ============================================================
// GET /api/history
// Latest vibes of the logged-in user
// ============================================================

import { Router } from 'express';
import type { Request, Response } from 'express';
import { DEFAULT_CONFIG } from '@shared/types';
import { toHistoryView } from '@presentation/vibe-view';
import { readBearerToken } from '../session/manager';
import type { AppDeps } from '../app';

export function handleListHistory(deps: AppDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const session = deps.sessions.resolve(readBearerToken(req.headers.authorization));

      if (session.mode === 'unauthenticated') {
        res.status(401).json({ error: 'Please log in to see your history.' });
        return;
      }
      if (session.mode === 'guest') {
        res.status(403).json({ error: 'History is only available for registered users.' });
        return;
      }

      const entries = await deps.orchestrator.listRecent(session, DEFAULT_CONFIG.historyLimit);
      res.json({
        entries: entries.slice(0, DEFAULT_CONFIG.historyDisplayLimit).map(toHistoryView),
        total: entries.length,
      });
    } catch (err) {
      console.error('[history] Error:', err instanceof Error ? err.message : err);
      res.status(500).json({ error: 'Unexpected server error' });
    }
  };
}

export function createHistoryRouter(deps: AppDeps): Router {
  const router = Router();
  router.get('/', handleListHistory(deps));
  return router;
}
