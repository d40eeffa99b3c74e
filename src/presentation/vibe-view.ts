// ============================================================
// Vibe Studio - Presentation
// View models for vibe cards, history entries and banners
// ============================================================

import type { ErrorKind, HistoryEntry, ValidationWarning, VibeError, VibeResult } from '@shared/types';
import { ENERGY_ICONS, FALLBACK_ENERGY_ICON, SEARCH_URL_BASE } from '@shared/constants';

export interface VibeView {
  mood: string;
  genre: string;
  energy: { label: string; icon: string };
  keywords: string[];
  suggestedMusic: string;
  listenUrl: string;
}

export interface HistoryView {
  id: string;
  /** e.g. "Calm - Jazz (2026-10-19)" */
  title: string;
  description: string;
  vibe: VibeView;
  createdAt: string;
}

export interface Banner {
  level: 'error' | 'warning';
  title: string;
  message: string;
}

const ERROR_TITLES: Record<ErrorKind, string> = {
  CredentialError: 'API Key Problem',
  RateLimitError: 'Rate Limit Reached',
  GenericServiceError: 'Something Went Wrong',
};

// ------------------------------------------------------------------
// Links & labels
// ------------------------------------------------------------------

/**
 * Search link for the suggested track. Spaces and hyphens become `+`;
 * anything else unsafe in a query is percent-encoded.
 */
export function buildSearchUrl(suggestedMusic: string): string {
  const query = suggestedMusic
    .split(/[ -]/)
    .map((part) => encodeURIComponent(part))
    .join('+');
  return `${SEARCH_URL_BASE}${query}`;
}

/** Battery icon for an energy level, falling back for unknown values. */
export function energyIcon(level: string): string {
  return ENERGY_ICONS.get(level.toLowerCase()) ?? FALLBACK_ENERGY_ICON;
}

/** "medium" → "Medium", "hip-hop" → "Hip-Hop" */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(
      /(^|[^\p{L}])(\p{L})/gu,
      (_match, boundary: string, letter: string) => boundary + letter.toUpperCase(),
    );
}

// ------------------------------------------------------------------
// View builders
// ------------------------------------------------------------------

export function toVibeView(result: VibeResult): VibeView {
  return {
    mood: result.mood,
    genre: result.genre,
    energy: {
      label: titleCase(result.energy_level),
      icon: energyIcon(result.energy_level),
    },
    keywords: [...result.aesthetic_keywords],
    suggestedMusic: result.suggested_music,
    listenUrl: buildSearchUrl(result.suggested_music),
  };
}

export function toHistoryView(entry: HistoryEntry): HistoryView {
  return {
    id: entry.id,
    title: `${entry.mood} - ${entry.genre} (${entry.created_at.slice(0, 10)})`,
    description: entry.description,
    vibe: toVibeView(entry),
    createdAt: entry.created_at,
  };
}

export function toErrorBanner(error: VibeError): Banner {
  return { level: 'error', title: ERROR_TITLES[error.kind], message: error.message };
}

export function toWarningBanner(warning: ValidationWarning): Banner {
  return { level: 'warning', title: 'Short Description', message: warning.message };
}
