// ============================================================
// Vibe Studio - Vibe Request Orchestrator
// Description in, VibeResult or classified error out
// ============================================================

import type {
  HistoryEntry,
  HistoryStore,
  SessionContext,
  ValidationWarning,
  VibeOutcome,
  VibeRequest,
  VibeResult,
  VibeState,
} from '@shared/types';
import { DEFAULT_CONFIG } from '@shared/types';
import { buildVibePrompt } from './prompt';
import type { VibePrompt } from './prompt';
import { parseVibeResponse } from './parser';
import { checkDescription, describeFailure, toFailure, VibeInputError } from './errors';

// ------------------------------------------------------------------
// Configuration
// ------------------------------------------------------------------

export interface VibeOrchestratorConfig {
  /** Sends a prompt to the generation service, returns raw text */
  generate: (prompt: VibePrompt) => Promise<string | null>;
  /** Persistence collaborator; without one nothing is saved */
  history?: HistoryStore;
  /** Called on every state transition */
  onStateChange?: (state: VibeState, previous: VibeState) => void;
}

/**
 * Builds an immutable VibeRequest.
 *
 * @throws {VibeInputError} when the description is blank
 */
export function createVibeRequest(description: string): VibeRequest {
  if (description.trim().length === 0) {
    throw new VibeInputError('Please enter a description of yourself.');
  }
  return Object.freeze({ description });
}

// ------------------------------------------------------------------
// Orchestrator
// ------------------------------------------------------------------

/**
 * Runs one vibe request through Building → Calling → Validating and
 * finishes in Succeeded or Failed.
 *
 * Holds no per-request state; every run keeps its state machine on the
 * stack. A successful run for an authenticated session writes history
 * without waiting on it, and a failed write is only logged.
 */
export class VibeOrchestrator {
  private readonly config: VibeOrchestratorConfig;

  constructor(config: VibeOrchestratorConfig) {
    this.config = config;
  }

  async run(request: VibeRequest, session: SessionContext): Promise<VibeOutcome> {
    let state: VibeState = 'Idle';
    const moveTo = (next: VibeState): void => {
      const previous = state;
      state = next;
      this.notify(next, previous);
    };

    // Advisory only: generation goes ahead either way
    const warnings: ValidationWarning[] = [];
    const warning = checkDescription(request.description);
    if (warning) {
      warnings.push(warning);
    }

    moveTo('Building');
    const prompt = buildVibePrompt(request.description);

    let result: VibeResult;
    try {
      moveTo('Calling');
      const raw = await this.config.generate(prompt);

      moveTo('Validating');
      result = parseVibeResponse(raw);
    } catch (err) {
      const error = describeFailure(toFailure(err));
      console.warn(`[vibe] Request failed in ${state} (${error.kind}):`, err instanceof Error ? err.message : err);
      moveTo('Failed');
      return { state: 'Failed', error, warnings };
    }

    moveTo('Succeeded');

    if (session.mode === 'authenticated') {
      this.persist(session.identity.id, request.description, result);
    }

    return { state: 'Succeeded', result, warnings };
  }

  /**
   * Recent history for the session, newest first. Guests and
   * unauthenticated sessions have none.
   */
  async listRecent(
    session: SessionContext,
    limit: number = DEFAULT_CONFIG.historyLimit,
  ): Promise<HistoryEntry[]> {
    const history = this.config.history;
    if (session.mode !== 'authenticated' || !history) {
      return [];
    }

    try {
      return await history.listRecent(session.identity.id, limit);
    } catch (err) {
      console.warn('[history] Failed to get history:', err instanceof Error ? err.message : err);
      return [];
    }
  }

  // ----------------------------------------------------------------
  // Private methods
  // ----------------------------------------------------------------

  /** Fire-and-forget history write. */
  private persist(userId: string, description: string, result: VibeResult): void {
    const history = this.config.history;
    if (!history) return;

    void Promise.resolve()
      .then(() => history.save(userId, description, result))
      .catch((err: unknown) => {
        console.warn('[history] Failed to save vibe:', err instanceof Error ? err.message : err);
      });
  }

  private notify(state: VibeState, previous: VibeState): void {
    const listener = this.config.onStateChange;
    if (!listener) return;

    try {
      listener(state, previous);
    } catch (err) {
      console.warn('[vibe] State listener threw:', err instanceof Error ? err.message : err);
    }
  }
}
