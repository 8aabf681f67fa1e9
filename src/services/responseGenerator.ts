import type { CandidateMetadata, Directive, Intent, Protocol } from '../types/interview.js';
import type { TopicDifficulty } from '../types/topic.js';
import { VoiceOutputSchema, type VoiceOutput } from '../validators/agentOutputs.js';
import { InterviewEngineError } from '../engine/errors.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { buildVoiceInstructions, VOICE_SHAPE } from './prompts.js';

export interface ConversationExchange {
  interviewer: string;
  candidate: string;
}

export interface GenerationContext {
  directive: Exclude<Directive, 'terminate'>;
  protocol: Protocol;
  topic: { label: string; difficulty: TopicDifficulty } | null;
  metadata: CandidateMetadata;
  history: ConversationExchange[];
  intent: Intent | null;
  candidateMessage: string | null;
  pendingQuestion: string | null;
  correctAnswer: string | null;
  hallucinationDetected: boolean;
}

/** Voice : rédige le prochain message visible par le candidat */
export class ResponseGenerator extends InferenceAgent implements InterviewAgent<GenerationContext, VoiceOutput> {
  readonly role = 'voice';

  async evaluate(context: GenerationContext): Promise<VoiceOutput> {
    const output = await this.ask({
      instructions: buildVoiceInstructions(context.directive, context.protocol),
      context: {
        directive: context.directive,
        protocol: context.protocol,
        candidateName: context.metadata.name,
        role: context.metadata.role,
        grade: context.metadata.targetGrade,
        topic: context.topic?.label ?? null,
        difficulty: context.topic?.difficulty ?? null,
        history: context.history.map((exchange) => `Interviewer: ${exchange.interviewer}\nCandidate: ${exchange.candidate}`),
        intent: context.intent,
        candidateMessage: context.candidateMessage,
        pendingQuestion: context.pendingQuestion,
        correctAnswer: context.correctAnswer,
        hallucinationDetected: context.hallucinationDetected,
      },
      responseShape: VOICE_SHAPE,
      schema: VoiceOutputSchema,
      temperature: 0.7,
      tier: 'fast',
    });

    // le cœur refuse un message vide
    if (!output.message.trim()) {
      throw new InterviewEngineError('voice: empty message', 'INVALID_PROVIDER_OUTPUT');
    }
    console.log(`[VOICE] ${context.directive} (${output.message.length} chars)`);
    return output;
  }
}
