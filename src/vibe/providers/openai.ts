// ============================================================
// Vibe Studio - OpenAI Provider
// ============================================================

import OpenAI from 'openai';
import { DEFAULT_MODELS } from '@shared/constants';
import type { VibePrompt } from '../prompt';

/**
 * Single chat completion with `json_object` response format.
 */
export async function callOpenAI(
  apiKey: string,
  prompt: VibePrompt,
  model: string = DEFAULT_MODELS.openai,
): Promise<string | null> {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  const response = await client.chat.completions.create({
    model,
    response_format: { type: 'json_object' },
    messages: [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ],
  });

  return response.choices[0]?.message?.content ?? null;
}
