import {
  REQUIRED_QUESTIONS_PER_TOPIC,
  type ScorePolicy,
  type Topic,
  type TopicDraft,
  type TopicScoreSummary,
} from '../types/topic.js';
import { InterviewEngineError } from './errors.js';

/**
 * Index du prochain thème non couvert strictement après `from`,
 * ou topics.length si aucun ne reste.
 */
export function nextUncoveredIndex(topics: readonly Readonly<Topic>[], from: number): number {
  let next = from + 1;
  while (next < topics.length && topics[next].covered) {
    next++;
  }
  return next;
}

export function summarizeTopics(topics: readonly Readonly<Topic>[]): TopicScoreSummary[] {
  return topics.map((topic) => ({
    topicId: topic.id,
    label: topic.label,
    score: topic.score,
    questionsAsked: topic.questionsAsked,
    covered: topic.covered,
  }));
}

export interface TopicEvaluationRecord {
  score: number;
  feedback: string;
  correctAnswer: string | null;
}

/**
 * Liste ordonnée des thèmes du plan d'entretien + curseur sur le thème actif.
 *
 * Invariants :
 * - le curseur pointe sur un thème non couvert, ou hors bornes (tout est couvert)
 * - le curseur ne recule jamais
 * - questionsAsked <= requiredQuestions, covered <=> questionsAsked === requiredQuestions
 */
export class SkillTree {
  private readonly topics: Topic[];
  private cursorIndex = 0;

  constructor(
    drafts: TopicDraft[],
    private readonly scorePolicy: ScorePolicy = 'last',
  ) {
    this.topics = drafts.map((draft, index) => ({
      id: index + 1,
      label: draft.label,
      difficulty: draft.difficulty,
      rationale: draft.rationale,
      requiredQuestions: REQUIRED_QUESTIONS_PER_TOPIC,
      questionsAsked: 0,
      score: null,
      scoreHistory: [],
      covered: false,
      feedback: '',
      correctAnswer: null,
    }));
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  activeTopic(): Readonly<Topic> | null {
    return this.topics[this.cursorIndex] ?? null;
  }

  list(): readonly Readonly<Topic>[] {
    return this.topics;
  }

  /**
   * Applique une évaluation technique au thème actif.
   * Réservé au résultat du TechnicalEvaluator, appliqué par l'orchestrateur.
   */
  recordEvaluation(record: TopicEvaluationRecord): Readonly<Topic> {
    const topic = this.topics[this.cursorIndex];
    if (!topic) {
      throw new InterviewEngineError('No active topic to evaluate', 'INVALID_TOPIC_UPDATE');
    }
    if (topic.covered || topic.questionsAsked >= topic.requiredQuestions) {
      throw new InterviewEngineError(
        `Topic ${topic.id} already covered (${topic.questionsAsked}/${topic.requiredQuestions})`,
        'INVALID_TOPIC_UPDATE',
      );
    }

    topic.questionsAsked += 1;
    topic.scoreHistory.push(record.score);
    topic.score = this.aggregate(topic.scoreHistory);
    topic.feedback = record.feedback;
    if (record.correctAnswer) {
      topic.correctAnswer = record.correctAnswer;
    }
    topic.covered = topic.questionsAsked === topic.requiredQuestions;
    return topic;
  }

  /**
   * Déplace le curseur. Réservé aux décisions du StrategicPlanner.
   */
  moveCursor(index: number): void {
    if (index === this.cursorIndex) {
      return;
    }
    if (index < this.cursorIndex) {
      throw new InterviewEngineError(
        `Cursor cannot move backwards (${this.cursorIndex} -> ${index})`,
        'TRANSITION_FORBIDDEN',
      );
    }
    if (index < this.topics.length && this.topics[index].covered) {
      throw new InterviewEngineError(`Topic ${index + 1} is already covered`, 'TRANSITION_FORBIDDEN');
    }
    this.cursorIndex = Math.min(index, this.topics.length);
  }

  private aggregate(history: number[]): number {
    if (this.scorePolicy === 'mean') {
      const sum = history.reduce((acc, value) => acc + value, 0);
      return Number((sum / history.length).toFixed(1));
    }
    return history[history.length - 1];
  }
}
