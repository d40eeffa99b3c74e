import type { GenerationConfig, ProviderId } from '@shared/types';
import type { VibePrompt } from '../prompt';
import { GenerationFailure } from '../errors';
import { callGemini } from './gemini';
import { callOpenAI } from './openai';

type ProviderCall = (apiKey: string, prompt: VibePrompt, model?: string) => Promise<string | null>;

/** Provider ID → call function */
const PROVIDERS: Record<ProviderId, ProviderCall> = {
  gemini: callGemini,
  openai: callOpenAI,
};

export const PROVIDER_IDS: readonly ProviderId[] = ['gemini', 'openai'];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

/**
 * Sends the prompt to the configured provider. Exactly one request, no
 * retries.
 *
 * @throws {GenerationFailure} wrapping the SDK/transport error
 */
export async function generateRaw(
  config: GenerationConfig,
  prompt: VibePrompt,
): Promise<string | null> {
  if (!isProviderId(config.provider)) {
    throw new GenerationFailure(
      `Unknown generation provider: "${config.provider}". Valid: ${PROVIDER_IDS.join(', ')}`,
    );
  }

  const call = PROVIDERS[config.provider];
  try {
    return await call(config.apiKey, prompt, config.model);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GenerationFailure(message, { cause: err });
  }
}

/**
 * Binds a configuration, giving the orchestrator a prompt → raw text function.
 */
export function createGenerator(config: GenerationConfig): (prompt: VibePrompt) => Promise<string | null> {
  return (prompt) => generateRaw(config, prompt);
}
