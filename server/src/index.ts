// ============================================================
// Vibe Studio - Express Server Entry Point
// ============================================================

import { VibeOrchestrator, createGenerator } from '@vibe/index';
import { createApp } from './app';
import { InMemoryIdentityProvider } from './auth/provider';
import { ConfigError, loadConfig } from './config';
import { InMemoryHistoryStore } from './history/store';
import { SessionManager } from './session/manager';

function main(): void {
  const config = loadConfig();

  const sessions = new SessionManager(config.sessionTtlMs);
  sessions.startSweeper();

  const orchestrator = new VibeOrchestrator({
    generate: createGenerator(config.generation),
    history: new InMemoryHistoryStore(),
  });

  const app = createApp({
    orchestrator,
    sessions,
    identity: new InMemoryIdentityProvider(),
  });

  app.listen(config.port, () => {
    console.log(`\n  Vibe Studio server running at http://localhost:${config.port}`);
    console.log(`  Provider: ${config.generation.provider}\n`);
  });
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`[server] ${err.message}`);
    process.exit(1);
  }
  throw err;
}
