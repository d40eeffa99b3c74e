// ============================================================
// Vibe Studio - Shared Type Definitions
// Core types used across the vibe core, presentation and server
// ============================================================

/** A single generation request. Created per invocation, never shared. */
export interface VibeRequest {
  /** User-supplied self description (non-empty after trimming) */
  readonly description: string;
}

/** The canonical output record produced from a description */
export interface VibeResult {
  mood: string;
  genre: string;
  /** Expected to be low / medium / high; other values pass through */
  energy_level: string;
  aesthetic_keywords: string[];
  /** Artist or song, used verbatim for the search link */
  suggested_music: string;
}

/** Field names the model must return */
export type VibeField = keyof VibeResult;

// ============================================================
// Errors & warnings
// ============================================================

/** User-facing error categories */
export type ErrorKind =
  | 'CredentialError'
  | 'RateLimitError'
  | 'GenericServiceError';

/** A classified failure, safe to render */
export interface VibeError {
  kind: ErrorKind;
  message: string;
}

/** Non-fatal advisory shown before generation */
export interface ValidationWarning {
  kind: 'ValidationWarning';
  message: string;
  wordCount: number;
}

// ============================================================
// Orchestrator state machine
// ============================================================

export type VibeState =
  | 'Idle'
  | 'Building'
  | 'Calling'
  | 'Validating'
  | 'Succeeded'
  | 'Failed';

export type VibeOutcome =
  | { state: 'Succeeded'; result: VibeResult; warnings: ValidationWarning[] }
  | { state: 'Failed'; error: VibeError; warnings: ValidationWarning[] };

// ============================================================
// Session & identity
// ============================================================

export interface UserIdentity {
  /** Opaque user key used for persistence */
  id: string;
  email: string;
  name: string;
}

export type SessionMode = 'authenticated' | 'guest' | 'unauthenticated';

/** Explicit session context passed to the orchestrator and presentation */
export type SessionContext =
  | { mode: 'authenticated'; identity: UserIdentity }
  | { mode: 'guest'; identity: null }
  | { mode: 'unauthenticated'; identity: null };

// ============================================================
// History (owned by the persistence collaborator)
// ============================================================

export interface HistoryEntry extends VibeResult {
  id: string;
  user_id: string;
  description: string;
  /** ISO-8601 timestamp */
  created_at: string;
}

/** Persistence collaborator contract */
export interface HistoryStore {
  save(userId: string, description: string, result: VibeResult): Promise<void>;
  /** Newest first */
  listRecent(userId: string, limit?: number): Promise<HistoryEntry[]>;
}

// ============================================================
// Generation configuration
// ============================================================

export type ProviderId = 'gemini' | 'openai';

export interface GenerationConfig {
  provider: ProviderId;
  apiKey: string;
  /** Model override; provider default when omitted */
  model?: string;
}

export interface VibeDefaults {
  provider: ProviderId;
  /** Entries fetched from the history store */
  historyLimit: number;
  /** Entries shown on the history panel */
  historyDisplayLimit: number;
}

/** Default configuration */
export const DEFAULT_CONFIG: VibeDefaults = {
  provider: 'gemini',
  historyLimit: 10,
  historyDisplayLimit: 5,
};
