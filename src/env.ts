import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  OPENAI_MODEL_FAST: z.string().min(1).default('gpt-4o-mini'),
  MAX_TURNS: z.coerce.number().int().min(1).default(10),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  REPORT_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  SCORE_POLICY: z.enum(['last', 'mean']).default('last'),
  LOGS_DIR: z.string().min(1).default('logs'),
  SESSION_TTL_MS: z.coerce.number().int().min(0).default(900_000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Lit la configuration depuis l'environnement.
 * Les variables vides sont traitées comme absentes (valeur par défaut).
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const pick = (key: keyof Env): string | undefined => {
    const value = source[key];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  return EnvSchema.parse({
    PORT: pick('PORT'),
    OPENAI_API_KEY: pick('OPENAI_API_KEY'),
    OPENAI_MODEL: pick('OPENAI_MODEL'),
    OPENAI_MODEL_FAST: pick('OPENAI_MODEL_FAST'),
    MAX_TURNS: pick('MAX_TURNS'),
    INFERENCE_TIMEOUT_MS: pick('INFERENCE_TIMEOUT_MS'),
    REPORT_MAX_ATTEMPTS: pick('REPORT_MAX_ATTEMPTS'),
    SCORE_POLICY: pick('SCORE_POLICY'),
    LOGS_DIR: pick('LOGS_DIR'),
    SESSION_TTL_MS: pick('SESSION_TTL_MS'),
  });
}
