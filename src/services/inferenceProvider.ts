import type { z } from 'zod';

export const AGENT_ROLES = ['router', 'skeptic', 'empath', 'planner', 'voice', 'reporter'] as const;
export type AgentRole = (typeof AGENT_ROLES)[number];

/** fast = appels par tour ; strong = plan initial et rapport final */
export type ModelTier = 'fast' | 'strong';

export type InferenceContextValue = string | number | boolean | null | readonly string[];
export type InferenceContext = Readonly<Record<string, InferenceContextValue>>;

export interface InferenceRequest<T> {
  role: AgentRole;
  instructions: string;
  context: InferenceContext;
  /** Description textuelle des champs JSON attendus */
  responseShape: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  temperature: number;
  tier: ModelTier;
  signal?: AbortSignal;
}

/**
 * Unique point d'accès au langage naturel.
 * Toute sortie est validée par `request.schema` avant d'être rendue.
 */
export interface InferenceProvider {
  readonly name: string;
  infer<T>(request: InferenceRequest<T>): Promise<T>;
}

export interface InterviewAgent<TContext, TResult> {
  readonly role: AgentRole;
  evaluate(context: TContext): Promise<TResult>;
}
