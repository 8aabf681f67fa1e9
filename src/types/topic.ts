export const TOPIC_DIFFICULTIES = ['easy', 'medium', 'hard', 'expert'] as const;
export type TopicDifficulty = (typeof TOPIC_DIFFICULTIES)[number];

/** Nombre de questions posées par thème avant de le considérer couvert */
export const REQUIRED_QUESTIONS_PER_TOPIC = 2;

export type ScorePolicy = 'last' | 'mean';

export interface Topic {
  id: number;
  label: string;
  difficulty: TopicDifficulty;
  rationale: string;
  requiredQuestions: number;
  questionsAsked: number;
  /** null tant qu'aucune évaluation n'a été appliquée */
  score: number | null;
  scoreHistory: number[];
  covered: boolean;
  feedback: string;
  correctAnswer: string | null;
}

export interface TopicDraft {
  label: string;
  difficulty: TopicDifficulty;
  rationale: string;
}

export interface TopicScoreSummary {
  topicId: number;
  label: string;
  score: number | null;
  questionsAsked: number;
  covered: boolean;
}
