import type { TerminationReason } from '../types/interview.js';
import type { FinalVerdict } from '../types/report.js';
import type { SessionSnapshot } from '../types/session.js';
import type { TopicScoreSummary } from '../types/topic.js';
import { ReporterOutputSchema, type ReporterOutput } from '../validators/agentOutputs.js';
import { INTERVIEW_POLICY } from '../engine/policy.js';
import { summarizeTopics } from '../engine/skillTree.js';
import { InferenceAgent } from './inferenceAgent.js';
import type { InterviewAgent } from './inferenceProvider.js';
import { REPORTER_INSTRUCTIONS, REPORTER_SHAPE } from './prompts.js';

export function averageTopicScore(summaries: readonly TopicScoreSummary[]): number | null {
  const scored = summaries.flatMap((summary) => (summary.score === null ? [] : [summary.score]));
  if (scored.length === 0) {
    return null;
  }
  return Number((scored.reduce((acc, score) => acc + score, 0) / scored.length).toFixed(1));
}

export function partitionTopics(summaries: readonly TopicScoreSummary[]): {
  confirmedSkills: TopicScoreSummary[];
  knowledgeGaps: TopicScoreSummary[];
} {
  const threshold = INTERVIEW_POLICY.REPORT.CONFIRMED_SKILL_SCORE;
  return {
    confirmedSkills: summaries.filter((topic) => topic.score !== null && topic.score >= threshold),
    knowledgeGaps: summaries.filter((topic) => topic.score !== null && topic.score < threshold),
  };
}

/**
 * Assemble le verdict final. Les scores par thème, compétences confirmées
 * et lacunes viennent toujours du cœur ; `output` null = verdict de repli.
 */
export function composeVerdict(snapshot: SessionSnapshot, output: ReporterOutput | null): FinalVerdict {
  const topicScores = summarizeTopics(snapshot.topics);
  const { confirmedSkills, knowledgeGaps } = partitionTopics(topicScores);

  if (!output) {
    return {
      level: 'unknown',
      recommendation: 'unknown',
      confidence: 0,
      reasoning: 'Report generation failed; only the computed topic scores are available.',
      topicScores,
      confirmedSkills,
      knowledgeGaps,
      softSkills: null,
      roadmap: knowledgeGaps.map((topic) => `Review: ${topic.label}`),
      resources: [],
      fallback: true,
    };
  }

  return {
    level: output.level,
    recommendation: output.recommendation,
    confidence: output.confidence,
    reasoning: output.reasoning,
    topicScores,
    confirmedSkills,
    knowledgeGaps,
    softSkills: {
      clarity: output.clarity,
      honesty: output.honesty,
      engagement: output.engagement,
      notes: output.softSkillsNotes,
    },
    roadmap: output.roadmap,
    resources: output.resources,
    fallback: false,
  };
}

export interface ReportInput {
  snapshot: SessionSnapshot;
  reason: TerminationReason;
}

/** Reporter : lit un instantané en lecture seule de la session terminée */
export class ReportGenerator extends InferenceAgent implements InterviewAgent<ReportInput, ReporterOutput> {
  readonly role = 'reporter';

  async evaluate({ snapshot, reason }: ReportInput): Promise<ReporterOutput> {
    const topicScores = summarizeTopics(snapshot.topics);
    const answeredTurns = snapshot.turns.filter((turn) => turn.intent === 'answer').length;

    const output = await this.ask({
      instructions: REPORTER_INSTRUCTIONS,
      context: {
        name: snapshot.metadata.name,
        role: snapshot.metadata.role,
        grade: snapshot.metadata.targetGrade,
        experience: snapshot.metadata.experience,
        terminationReason: reason,
        dialogue: snapshot.turns.map(
          (turn) => `#${turn.turnId} Interviewer: ${turn.agentVisibleMessage}\nCandidate: ${turn.userMessage ?? '(no reply)'}`,
        ),
        agentNotes: snapshot.turns.flatMap((turn) => turn.internalThoughts.map((note) => `#${turn.turnId} ${note}`)),
        topics: topicScores.map(
          (topic) =>
            `${topic.label}: ${topic.score === null ? 'not scored' : `${topic.score}/10`} ` +
            `(${topic.questionsAsked} questions${topic.covered ? ', covered' : ''})`,
        ),
        knowledgeGaps: partitionTopics(topicScores).knowledgeGaps.map((topic) => topic.label),
        averageScore: averageTopicScore(topicScores),
        answeredTurns,
        hallucinationCount: snapshot.behavior.hallucinationCount,
        contradictionCount: snapshot.behavior.contradictionCount,
        offTopicCount: snapshot.behavior.offTopicCount,
        questionCount: snapshot.behavior.questionCount,
        demeanor: snapshot.behavior.demeanor,
      },
      responseShape: REPORTER_SHAPE,
      schema: ReporterOutputSchema,
      temperature: 0.2,
      tier: 'strong',
    });

    console.log(`[REPORTER] level=${output.level} recommendation=${output.recommendation}`);
    return output;
  }
}
