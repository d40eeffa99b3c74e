// ============================================================
// Vibe Studio - Failures & Error Classifier
// Maps generation/validation failures to user-facing categories
// ============================================================

import type { ErrorKind, ValidationWarning, VibeError } from '@shared/types';
import {
  API_KEY_HELP_URL,
  CREDENTIAL_MARKERS,
  MIN_DESCRIPTION_WORDS,
  RATE_LIMIT_MARKERS,
} from '@shared/constants';

// ------------------------------------------------------------------
// Failure classes
// ------------------------------------------------------------------

/**
 * The generation service call failed. The transport/SDK error is kept
 * as `cause`.
 */
export class GenerationFailure extends Error {
  /** Machine-readable error code */
  readonly code = 'GENERATION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationFailure';
  }
}

export type SchemaFailureReason = 'empty output' | 'parse error';

/** The raw model output could not be turned into a VibeResult. */
export class SchemaFailure extends Error {
  readonly code = 'SCHEMA_FAILED';
  readonly reason: SchemaFailureReason;
  /** Parser diagnostic, when there is one */
  readonly detail: string | null;

  constructor(reason: SchemaFailureReason, detail: string | null = null) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = 'SchemaFailure';
    this.reason = reason;
    this.detail = detail;
  }
}

/** Blank description passed where a VibeRequest is built. */
export class VibeInputError extends Error {
  readonly code = 'INVALID_DESCRIPTION';

  constructor(message: string) {
    super(message);
    this.name = 'VibeInputError';
  }
}

export type VibeFailure = GenerationFailure | SchemaFailure;

/**
 * Normalizes anything thrown during a call into a VibeFailure.
 */
export function toFailure(err: unknown): VibeFailure {
  if (err instanceof GenerationFailure || err instanceof SchemaFailure) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationFailure(message, { cause: err });
}

// ------------------------------------------------------------------
// Classifier
// ------------------------------------------------------------------

/**
 * Picks an ErrorKind by scanning the failure text (and its cause) for
 * known substrings. Credential markers win over rate-limit markers.
 * A SchemaFailure is scanned on its reason only: the parser diagnostic
 * can quote model output.
 */
export function classifyFailure(failure: VibeFailure): ErrorKind {
  const text = failureText(failure).toLowerCase();

  if (CREDENTIAL_MARKERS.some((marker) => text.includes(marker))) {
    return 'CredentialError';
  }
  if (RATE_LIMIT_MARKERS.some((marker) => text.includes(marker))) {
    return 'RateLimitError';
  }
  return 'GenericServiceError';
}

/**
 * Classifies a failure and attaches the message shown to the user.
 */
export function describeFailure(failure: VibeFailure): VibeError {
  const kind = classifyFailure(failure);

  switch (kind) {
    case 'CredentialError':
      return {
        kind,
        message: `Invalid or missing API key. Get a free key at ${API_KEY_HELP_URL} and check that it is configured correctly.`,
      };
    case 'RateLimitError':
      return {
        kind,
        message: 'API quota exceeded. Please wait a moment and try again later.',
      };
    case 'GenericServiceError':
      return {
        kind,
        message: `Failed to generate music vibe: ${failure.message}. Please check your internet connection and try again.`,
      };
  }
}

// ------------------------------------------------------------------
// Description check
// ------------------------------------------------------------------

/**
 * Returns an advisory warning when the description is short. Never blocks
 * generation.
 */
export function checkDescription(description: string): ValidationWarning | null {
  const wordCount = description.trim().split(/\s+/).filter(Boolean).length;
  if (wordCount >= MIN_DESCRIPTION_WORDS) {
    return null;
  }
  return {
    kind: 'ValidationWarning',
    message: `Your description is quite short (${wordCount} words). Try at least ${MIN_DESCRIPTION_WORDS} words for a more accurate vibe.`,
    wordCount,
  };
}

function failureText(failure: VibeFailure): string {
  if (failure instanceof SchemaFailure) {
    return failure.reason;
  }
  const cause = failure.cause;
  if (cause instanceof Error && cause.message !== failure.message) {
    return `${failure.message} ${cause.message}`;
  }
  return failure.message;
}
