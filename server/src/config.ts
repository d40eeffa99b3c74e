// ============================================================
// Vibe Studio - Server Configuration
// Environment variables → validated server config
// ============================================================

import { z } from 'zod';
import type { GenerationConfig } from '@shared/types';
import { API_KEY_HELP_URL } from '@shared/constants';

const KEY_PLACEHOLDER = 'your-api-key-here';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3456),
  VIBE_PROVIDER: z.enum(['gemini', 'openai']).default('gemini'),
  VIBE_MODEL: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
});

export interface ServerConfig {
  port: number;
  generation: GenerationConfig;
  /** Idle sessions older than this are dropped */
  sessionTtlMs: number;
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the server configuration. The API key of the selected provider
 * must be set and must not be the sample placeholder.
 *
 * @throws {ConfigError}
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  const keyName = vars.VIBE_PROVIDER === 'gemini' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY';
  const apiKey = vars[keyName]?.trim() ?? '';

  if (!apiKey || apiKey.includes(KEY_PLACEHOLDER)) {
    const hint = vars.VIBE_PROVIDER === 'gemini' ? ` Get a free key at ${API_KEY_HELP_URL}.` : '';
    throw new ConfigError(`${keyName} is not set. Add it to your environment before starting the server.${hint}`);
  }

  return {
    port: vars.PORT,
    generation: {
      provider: vars.VIBE_PROVIDER,
      apiKey,
      model: vars.VIBE_MODEL?.trim() || undefined,
    },
    sessionTtlMs: vars.SESSION_TTL_MS,
  };
}
