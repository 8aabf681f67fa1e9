export const ACCURACY_LEVELS = ['accurate', 'partially_correct', 'incorrect', 'hallucinated'] as const;
export type Accuracy = (typeof ACCURACY_LEVELS)[number];

export const DEPTH_LEVELS = ['superficial', 'adequate', 'deep', 'expert'] as const;
export type Depth = (typeof DEPTH_LEVELS)[number];

export const LEVELS = ['low', 'medium', 'high'] as const;
export type Level = (typeof LEVELS)[number];

export const DEMEANORS = ['normal', 'verbose', 'silent', 'arrogant', 'stuck', 'nervous'] as const;
export type Demeanor = (typeof DEMEANORS)[number];

export interface TechnicalEvaluation {
  score: number;
  accuracy: Accuracy;
  depth: Depth;
  thought: string;
  issues: string[];
  correctAnswer: string | null;
  contradictionDetected: boolean;
  fictionalTermDetected: boolean;
}

export interface BehavioralEvaluation {
  clarity: number;
  honesty: number;
  engagement: Level;
  stressLevel: Level;
  demeanor: Demeanor;
  thought: string;
}

/** Contexte comportemental cumulé sur la session (lu par le reporter) */
export interface BehavioralContext {
  demeanor: Demeanor;
  stressLevel: Level;
  hallucinationCount: number;
  contradictionCount: number;
  offTopicCount: number;
  questionCount: number;
}

export type EvaluationOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'failed'; reason: string };
