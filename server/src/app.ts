// ============================================================
// Vibe Studio - Express Application
// ============================================================

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { EXAMPLE_DESCRIPTIONS } from '@shared/constants';
import type { VibeOrchestrator } from '@vibe/index';
import type { IdentityProvider } from './auth/provider';
import type { SessionManager } from './session/manager';
import { createAuthRouter } from './routes/auth';
import { createHistoryRouter } from './routes/history';
import { createSessionRouter } from './routes/session';
import { createVibeRouter } from './routes/vibe';

export const VERSION = '0.1.0';

/** Collaborators shared by all routes */
export interface AppDeps {
  orchestrator: VibeOrchestrator;
  sessions: SessionManager;
  identity: IdentityProvider;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/auth', createAuthRouter(deps));
  app.use('/api/session', createSessionRouter(deps));
  app.use('/api/vibe', createVibeRouter(deps));
  app.use('/api/history', createHistoryRouter(deps));

  app.get('/api/examples', (_req, res) => {
    res.json({ examples: EXAMPLE_DESCRIPTIONS });
  });

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', version: VERSION });
  });

  return app;
}
