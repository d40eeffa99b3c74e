// ============================================================
// POST /api/vibe, POST /api/vibe/check
// Generates a music vibe for the caller's description
// ============================================================

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ErrorKind, VibeRequest } from '@shared/types';
import { checkDescription, createVibeRequest, VibeInputError } from '@vibe/index';
import { toErrorBanner, toVibeView, toWarningBanner } from '@presentation/vibe-view';
import { readBearerToken } from '../session/manager';
import type { AppDeps } from '../app';

const VibeBody = z.object({
  description: z.string().default(''),
});

/** HTTP status for each failure category */
const FAILURE_STATUS: Record<ErrorKind, number> = {
  CredentialError: 502,
  RateLimitError: 429,
  GenericServiceError: 502,
};

export function handleGenerateVibe(deps: AppDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const session = deps.sessions.resolve(readBearerToken(req.headers.authorization));
      if (session.mode === 'unauthenticated') {
        res.status(401).json({ error: 'Please log in or continue as a guest first.' });
        return;
      }

      const body = VibeBody.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: 'description must be a string' });
        return;
      }

      let request: VibeRequest;
      try {
        request = createVibeRequest(body.data.description);
      } catch (err) {
        if (err instanceof VibeInputError) {
          res.status(400).json({ error: err.message });
          return;
        }
        throw err;
      }

      const outcome = await deps.orchestrator.run(request, session);
      const warnings = outcome.warnings.map(toWarningBanner);

      if (outcome.state === 'Failed') {
        res.status(FAILURE_STATUS[outcome.error.kind]).json({
          state: outcome.state,
          error: outcome.error,
          banner: toErrorBanner(outcome.error),
          warnings,
        });
        return;
      }

      res.json({
        state: outcome.state,
        vibe: toVibeView(outcome.result),
        warnings,
        // The write runs in the background; this only says one was attempted
        historyEnabled: session.mode === 'authenticated',
      });
    } catch (err) {
      console.error('[vibe] Error:', err instanceof Error ? err.message : err);
      res.status(500).json({ error: 'Unexpected server error' });
    }
  };
}

/**
 * Short-description check, so the client can warn before it asks for a
 * generation. Needs no session and never calls the model.
 */
export function handleCheckDescription() {
  return async (req: Request, res: Response): Promise<void> => {
    const body = VibeBody.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'description must be a string' });
      return;
    }

    const warning = checkDescription(body.data.description);
    res.json({ warning: warning ? toWarningBanner(warning) : null });
  };
}

export function createVibeRouter(deps: AppDeps): Router {
  const router = Router();
  router.post('/check', handleCheckDescription());
  router.post('/', handleGenerateVibe(deps));
  return router;
}
