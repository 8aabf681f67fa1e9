import type { Intent } from '../types/interview.js';
import { RouterOutputSchema } from '../validators/agentOutputs.js';
import { describeError } from '../engine/errors.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { ROUTER_INSTRUCTIONS, ROUTER_SHAPE } from './prompts.js';

/** Commandes d'arrêt explicites : classées `stop` sans appel au provider */
export const STOP_COMMANDS: readonly string[] = [
  'stop',
  'enough',
  'finish',
  'end interview',
  'стоп',
  'хватит',
  'достаточно',
  'закончим',
];

export interface ClassificationContext {
  message: string;
  pendingQuestion: string;
}

export interface Classification {
  intent: Intent;
  thought: string;
  /** true quand le provider a échoué et que `off_topic` a été retenu */
  fallback: boolean;
}

export function isStopCommand(message: string): boolean {
  const normalized = message
    .trim()
    .toLowerCase()
    .replace(/[.!\s]+$/u, '');
  return STOP_COMMANDS.includes(normalized);
}

export class IntentClassifier extends InferenceAgent implements InterviewAgent<ClassificationContext, Classification> {
  readonly role = 'router';

  async evaluate(context: ClassificationContext): Promise<Classification> {
    if (isStopCommand(context.message)) {
      return { intent: 'stop', thought: 'Explicit stop command.', fallback: false };
    }

    try {
      const output = await this.ask({
        instructions: ROUTER_INSTRUCTIONS,
        context: { message: context.message, pendingQuestion: context.pendingQuestion },
        responseShape: ROUTER_SHAPE,
        schema: RouterOutputSchema,
        temperature: 0,
        tier: 'fast',
      });
      console.log(`[ROUTER] intent=${output.intent}`);
      return { intent: output.intent, thought: output.thought || `Classified as ${output.intent}.`, fallback: false };
    } catch (error) {
      console.warn('[ROUTER] Classification failed, falling back to off_topic:', describeError(error));
      return {
        intent: 'off_topic',
        thought: `Classification unavailable (${describeError(error)}); treated as off_topic.`,
        fallback: true,
      };
    }
  }
}
