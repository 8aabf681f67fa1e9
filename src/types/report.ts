import type { TopicScoreSummary } from './topic.js';

export const ASSESSED_LEVELS = ['junior', 'middle', 'senior'] as const;
export type AssessedLevel = (typeof ASSESSED_LEVELS)[number];

export const RECOMMENDATIONS = ['strong_hire', 'hire', 'no_hire'] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

export interface SoftSkillsAssessment {
  clarity: number;
  honesty: number;
  engagement: number;
  notes: string;
}

export interface FinalVerdict {
  level: AssessedLevel | 'unknown';
  recommendation: Recommendation | 'unknown';
  confidence: number;
  reasoning: string;
  topicScores: TopicScoreSummary[];
  confirmedSkills: TopicScoreSummary[];
  knowledgeGaps: TopicScoreSummary[];
  softSkills: SoftSkillsAssessment | null;
  roadmap: string[];
  resources: string[];
  /** true quand le reporter a échoué et que le verdict minimal a été utilisé */
  fallback: boolean;
}
