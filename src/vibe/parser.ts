// ============================================================
// Vibe Studio - Response Validator
// Turns raw model output into a VibeResult
// ============================================================

import { z } from 'zod';
import type { VibeResult } from '@shared/types';
import { UNKNOWN_FIELD } from '@shared/constants';
import { SchemaFailure } from './errors';

// ------------------------------------------------------------------
// Schema
// ------------------------------------------------------------------

/** Non-empty string, else the placeholder. No coercion from other types. */
const scalarField = z
  .string()
  .refine((value) => value.trim().length > 0)
  .catch(UNKNOWN_FIELD);

/** Array of non-empty strings; any other entry is dropped. */
const keywordsField = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0),
  );

/**
 * Field-level schema for the model payload. Every field degrades to its
 * placeholder instead of failing; unknown keys are stripped.
 */
export const VibeResponseSchema = z.object({
  mood: scalarField,
  genre: scalarField,
  energy_level: scalarField,
  aesthetic_keywords: keywordsField,
  suggested_music: scalarField,
});

// ------------------------------------------------------------------
// Response Parser
// ------------------------------------------------------------------

/**
 * Parses raw model output into a VibeResult.
 *
 * Missing or mistyped fields fall back to placeholders, but a payload that
 * is not a single JSON object is rejected outright.
 *
 * @throws {SchemaFailure} `empty output` or `parse error`
 */
export function parseVibeResponse(rawText: string | null | undefined): VibeResult {
  if (rawText === null || rawText === undefined || rawText.trim().length === 0) {
    throw new SchemaFailure('empty output');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(rawText));
  } catch (err) {
    throw new SchemaFailure('parse error', err instanceof Error ? err.message : String(err));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SchemaFailure('parse error', `expected a JSON object, got ${describeJsonType(parsed)}`);
  }

  return VibeResponseSchema.parse(parsed);
}

// ------------------------------------------------------------------
// Internal helpers
// ------------------------------------------------------------------

/**
 * Unwraps a response that is entirely a ```json ... ``` block.
 * Text around a fence is left alone and fails to parse.
 */
function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenceMatch = trimmed.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?\s*```$/);
  return fenceMatch ? fenceMatch[1].trim() : trimmed;
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
