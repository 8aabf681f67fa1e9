import type { BehavioralEvaluation } from '../types/evaluation.js';
import { BehavioralOutputSchema } from '../validators/agentOutputs.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { EMPATH_INSTRUCTIONS, EMPATH_SHAPE } from './prompts.js';

export interface BehavioralEvaluationContext {
  message: string;
  pendingQuestion: string;
}

/**
 * Empath : signaux de communication uniquement.
 * Tourne en parallèle du Skeptic et ne lit jamais sa sortie.
 */
export class BehavioralEvaluator
  extends InferenceAgent
  implements InterviewAgent<BehavioralEvaluationContext, BehavioralEvaluation>
{
  readonly role = 'empath';

  async evaluate(context: BehavioralEvaluationContext): Promise<BehavioralEvaluation> {
    const output = await this.ask({
      instructions: EMPATH_INSTRUCTIONS,
      context: { question: context.pendingQuestion, answer: context.message },
      responseShape: EMPATH_SHAPE,
      schema: BehavioralOutputSchema,
      temperature: 0.2,
      tier: 'fast',
    });

    console.log(`[EMPATH] demeanor=${output.demeanor} stress=${output.stressLevel}`);
    return output;
  }
}

export function describeBehavioralEvaluation(evaluation: BehavioralEvaluation): string {
  return (
    `clarity ${evaluation.clarity}/10, honesty ${evaluation.honesty}/10, ` +
    `engagement ${evaluation.engagement}, stress ${evaluation.stressLevel}, ${evaluation.demeanor}. ${evaluation.thought}`
  );
}
