import type { Env } from '../env.js';
import { HeuristicInferenceProvider } from './heuristicProvider.js';
import type { InferenceProvider } from './inferenceProvider.js';
import { OpenAIInferenceProvider } from './openaiClient.js';

/**
 * Provider OpenAI dès qu'une clé est configurée, sauf mode hors-ligne explicite.
 */
export function createProvider(env: Env, offline = false): InferenceProvider {
  if (offline) {
    return new HeuristicInferenceProvider();
  }
  if (!env.OPENAI_API_KEY) {
    console.warn('[OPENAI] OPENAI_API_KEY not set, using the offline heuristic provider');
    return new HeuristicInferenceProvider();
  }
  return new OpenAIInferenceProvider({
    apiKey: env.OPENAI_API_KEY,
    strongModel: env.OPENAI_MODEL,
    fastModel: env.OPENAI_MODEL_FAST,
  });
}
