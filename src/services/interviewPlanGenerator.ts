import type { CandidateMetadata } from '../types/interview.js';
import type { TopicDraft } from '../types/topic.js';
import { InterviewPlanOutputSchema } from '../validators/agentOutputs.js';
import { describeError } from '../engine/errors.js';
import { INTERVIEW_POLICY } from '../engine/policy.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { buildPlanInstructions, PLAN_SHAPE } from './prompts.js';

const MIN_TOPICS = 6;

export interface InterviewPlan {
  topics: TopicDraft[];
  thought: string;
  fallback: boolean;
}

/** Plan minimal : socle du poste, puis l'expérience déclarée */
export function buildFallbackPlan(metadata: CandidateMetadata): TopicDraft[] {
  return [
    {
      label: `${metadata.role} fundamentals`,
      difficulty: 'easy',
      rationale: 'Core skills expected for the role.',
    },
    {
      label: metadata.experience.trim() || `${metadata.role} in practice`,
      difficulty: 'medium',
      rationale: 'Stated experience of the candidate.',
    },
  ];
}

export class InterviewPlanGenerator extends InferenceAgent implements InterviewAgent<CandidateMetadata, InterviewPlan> {
  readonly role = 'planner';

  async evaluate(metadata: CandidateMetadata): Promise<InterviewPlan> {
    try {
      const output = await this.ask({
        instructions: buildPlanInstructions(MIN_TOPICS, INTERVIEW_POLICY.PLAN.MAX_TOPICS),
        context: {
          name: metadata.name,
          role: metadata.role,
          grade: metadata.targetGrade,
          experience: metadata.experience,
        },
        responseShape: PLAN_SHAPE,
        schema: InterviewPlanOutputSchema,
        temperature: 0.4,
        tier: 'strong',
      });

      const topics = output.topics.slice(0, INTERVIEW_POLICY.PLAN.MAX_TOPICS);
      console.log(`[PLANNER] Interview plan: ${topics.length} topics`);
      return {
        topics,
        thought: `Interview plan: ${topics.map((topic) => topic.label).join(', ')}. ${output.thought}`.trim(),
        fallback: false,
      };
    } catch (error) {
      console.warn('[PLANNER] Plan generation failed, using fallback plan:', describeError(error));
      const topics = buildFallbackPlan(metadata);
      return {
        topics,
        thought: `Plan generation unavailable (${describeError(error)}); fallback plan: ${topics
          .map((topic) => topic.label)
          .join(', ')}.`,
        fallback: true,
      };
    }
  }
}
