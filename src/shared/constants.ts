// ============================================================
// Vibe Studio - Constants
// ============================================================

/** Placeholder for a scalar field the model left out */
export const UNKNOWN_FIELD = 'Unknown';

/** Descriptions shorter than this (in words) trigger a warning */
export const MIN_DESCRIPTION_WORDS = 10;

/** Default provider models */
export const DEFAULT_MODELS = {
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
} as const;

/** Battery icons per energy level */
export const ENERGY_ICONS: ReadonlyMap<string, string> = new Map([
  ['low', '🔋'],
  ['medium', '🔋🔋'],
  ['high', '🔋🔋🔋'],
]);

export const FALLBACK_ENERGY_ICON = '🔋';

/** Base URL for the "Listen now" search link */
export const SEARCH_URL_BASE = 'https://www.youtube.com/results?search_query=';

/** Substrings that mark a failure as a credential problem */
export const CREDENTIAL_MARKERS = ['api_key', 'unauthorized', 'permission'] as const;

/** Substrings that mark a failure as quota exhaustion */
export const RATE_LIMIT_MARKERS = ['quota', 'limit'] as const;

/** Where users can obtain a Gemini key */
export const API_KEY_HELP_URL = 'https://ai.google.dev/';

/** Sample descriptions offered on the generator page */
export const EXAMPLE_DESCRIPTIONS = [
  'I am a night owl who loves rainy days, old bookstores and long walks with headphones on. I journal a lot and drink too much coffee.',
  'I wake up at 5am to run, I love road trips with the windows down and I am always the one organising the weekend plans for my friends.',
  'Quiet, a bit nostalgic, I collect vinyl and film cameras, spend Sundays baking bread and watching old movies with my cat.',
  'I live for festivals and neon lights, I dance in my kitchen while cooking and I can never sit still for more than ten minutes.',
] as const;
