// ============================================================
// Vibe Studio - Prompt Builder
// Renders the fixed instruction template around a description
// ============================================================

import type { VibeField } from '@shared/types';

/** A rendered prompt ready for the generation service */
export interface VibePrompt {
  /** Fixed system instruction (identical for every call) */
  system: string;
  /** Task text with the description embedded verbatim */
  user: string;
}

/** Keys the model must return, in output order */
export const VIBE_FIELDS: readonly VibeField[] = [
  'mood',
  'genre',
  'energy_level',
  'aesthetic_keywords',
  'suggested_music',
];

export const SYSTEM_INSTRUCTION =
  'You are a music expert who can analyze personality descriptions and suggest matching music vibes. Always respond with valid JSON.';

const RESPONSE_SCHEMA = `{
    "mood": "string",
    "genre": "string",
    "energy_level": "string",
    "aesthetic_keywords": ["string1", "string2", "string3"],
    "suggested_music": "string"
}`;

// ------------------------------------------------------------------
// Prompt Builder
// ------------------------------------------------------------------

/**
 * Builds the system and user prompt for a vibe request.
 *
 * The description is embedded as-is inside a quoted block; the template
 * around it never varies, so the output is a pure function of the input.
 */
export function buildVibePrompt(description: string): VibePrompt {
  return {
    system: SYSTEM_INSTRUCTION,
    user: buildUserPrompt(description),
  };
}

/**
 * Builds the user message: the five requested fields, the quoted
 * description and the exact JSON shape expected back.
 */
export function buildUserPrompt(description: string): string {
  return `Given the following description of a person, suggest:
1. Mood
2. Music genre
3. Energy level (low, medium, high)
4. Aesthetic keywords (3-5)
5. A matching artist or song

Description: "${description}"

Please respond with a JSON object in this exact format:
${RESPONSE_SCHEMA}

Use exactly these keys: ${VIBE_FIELDS.join(', ')}.
Respond with ONLY the JSON object. No markdown, no commentary.`;
}
