import OpenAI from 'openai';
import { InterviewEngineError } from '../engine/errors.js';
import type { InferenceProvider, InferenceRequest, ModelTier } from './inferenceProvider.js';

const FALLBACK_MODEL = 'gpt-4o-mini';

export interface OpenAIProviderOptions {
  apiKey?: string;
  strongModel: string;
  fastModel: string;
  /** Injecté par les tests ; sinon créé au premier appel */
  client?: OpenAI;
}

function isModelUnavailable(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    return error.code === 'model_not_found' || error.status === 404;
  }
  return false;
}

/**
 * Provider OpenAI : chat completion en mode JSON, sortie parsée puis validée
 * par le schéma zod de la requête.
 */
export class OpenAIInferenceProvider implements InferenceProvider {
  readonly name = 'openai';
  private client: OpenAI | null;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.client = options.client ?? null;
  }

  async infer<T>(request: InferenceRequest<T>): Promise<T> {
    const model = this.modelFor(request.tier);
    let content: string;
    try {
      content = await this.complete(model, request);
    } catch (error) {
      if (!isModelUnavailable(error) || model === FALLBACK_MODEL) {
        throw error;
      }
      console.warn(`[OPENAI] Model ${model} unavailable, falling back to ${FALLBACK_MODEL}`);
      content = await this.complete(FALLBACK_MODEL, request);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new InterviewEngineError(`${request.role}: response is not valid JSON`, 'INVALID_PROVIDER_OUTPUT');
    }

    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InterviewEngineError(
        `${request.role}: ${issue ? `${issue.path.join('.') || 'output'} ${issue.message}` : 'invalid output'}`,
        'INVALID_PROVIDER_OUTPUT',
      );
    }
    return parsed.data;
  }

  private modelFor(tier: ModelTier): string {
    return tier === 'strong' ? this.options.strongModel : this.options.fastModel;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new InterviewEngineError('OPENAI_API_KEY is required for the OpenAI provider', 'PROVIDER_FAILURE');
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  private async complete<T>(model: string, request: InferenceRequest<T>): Promise<string> {
    const response = await this.getClient().chat.completions.create(
      {
        model,
        temperature: request.temperature,
        response_format: { type: 'json_object' },
        messages: [
          {
            role: 'system',
            content: `${request.instructions}\n\nRespond with a single JSON object with these fields:\n${request.responseShape}`,
          },
          {
            role: 'user',
            content: JSON.stringify(request.context, null, 2),
          },
        ],
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new InterviewEngineError(`${request.role}: no response content from OpenAI`, 'PROVIDER_FAILURE');
    }
    return content.trim();
  }
}
