import type { CandidateMetadata } from '../types/interview.js';
import type { TechnicalEvaluation } from '../types/evaluation.js';
import type { TopicDifficulty } from '../types/topic.js';
import { TechnicalOutputSchema } from '../validators/agentOutputs.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { SKEPTIC_INSTRUCTIONS, SKEPTIC_SHAPE } from './prompts.js';

export interface TechnicalContext {
  message: string;
  pendingQuestion: string;
  topic: { label: string; difficulty: TopicDifficulty };
  metadata: CandidateMetadata;
}

/**
 * Skeptic : évalue la justesse technique d'une réponse.
 * Ne touche jamais au SkillTree ; l'orchestrateur applique le résultat.
 * Une sortie invalide (score hors 0-10...) fait échouer l'appel.
 */
export class TechnicalEvaluator extends InferenceAgent implements InterviewAgent<TechnicalContext, TechnicalEvaluation> {
  readonly role = 'skeptic';

  async evaluate(context: TechnicalContext): Promise<TechnicalEvaluation> {
    const output = await this.ask({
      instructions: SKEPTIC_INSTRUCTIONS,
      context: {
        role: context.metadata.role,
        grade: context.metadata.targetGrade,
        topic: context.topic.label,
        difficulty: context.topic.difficulty,
        question: context.pendingQuestion,
        answer: context.message,
      },
      responseShape: SKEPTIC_SHAPE,
      schema: TechnicalOutputSchema,
      temperature: 0.1,
      tier: 'fast',
    });

    console.log(`[SKEPTIC] score=${output.score} accuracy=${output.accuracy} depth=${output.depth}`);
    return output;
  }
}

export function isHallucination(evaluation: TechnicalEvaluation): boolean {
  return evaluation.accuracy === 'hallucinated' || evaluation.fictionalTermDetected;
}

/** Note interne du Skeptic : score, avis, puis signaux d'alerte */
export function describeTechnicalEvaluation(evaluation: TechnicalEvaluation): string {
  const parts = [evaluation.thought];
  if (evaluation.issues.length > 0) {
    parts.push(`Issues: ${evaluation.issues.join('; ')}`);
  }
  if (isHallucination(evaluation)) {
    parts.push('HALLUCINATION');
  }
  if (evaluation.contradictionDetected) {
    parts.push('CONTRADICTION');
  }
  return `[${evaluation.score}/10] ${parts.join(' | ')}`;
}
