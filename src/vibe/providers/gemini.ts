// ============================================================
// Vibe Studio - Google Gemini Provider
// ============================================================

import { GoogleGenAI } from '@google/genai';
import { DEFAULT_MODELS } from '@shared/constants';
import type { VibePrompt } from '../prompt';

/**
 * Single Gemini round trip in JSON output mode.
 * Returns the model text, or null when the response carries none.
 */
export async function callGemini(
  apiKey: string,
  prompt: VibePrompt,
  model: string = DEFAULT_MODELS.gemini,
): Promise<string | null> {
  const ai = new GoogleGenAI({ apiKey });

  const response = await ai.models.generateContent({
    model,
    contents: prompt.user,
    config: {
      systemInstruction: prompt.system,
      responseMimeType: 'application/json',
    },
  });

  return response.text ?? null;
}
