import lexicon from './heuristicLexicon.json';
import { DIRECTIVES, type Directive } from '../types/interview.js';
import type { TopicDifficulty } from '../types/topic.js';
import { INTERVIEW_POLICY } from '../engine/policy.js';
import type {
  AgentRole,
  InferenceContext,
  InferenceProvider,
  InferenceRequest,
} from './inferenceProvider.js';

const SCORING = INTERVIEW_POLICY.HEURISTIC_SCORING;
const TRACKS = ['backend', 'frontend', 'data', 'devops', 'mobile'] as const;
type Track = (typeof TRACKS)[number] | 'default';

const STOP_WORDS = new Set(lexicon.stopWords);
const TECHNICAL_TERMS = new Set(lexicon.technicalTerms);
const OFF_TOPIC_MARKERS = new Set(lexicon.offTopicMarkers);

// --- lecture du contexte ---

function text(context: InferenceContext, key: string): string {
  const value = context[key];
  return typeof value === 'string' ? value : '';
}

function num(context: InferenceContext, key: string): number | null {
  const value = context[key];
  return typeof value === 'number' ? value : null;
}

function list(context: InferenceContext, key: string): readonly string[] {
  const value = context[key];
  return Array.isArray(value) ? value : [];
}

export function tokenize(value: string): string[] {
  return value
    .toLowerCase()
    .split(/[^\p{L}\p{N}#+]+/u)
    .filter(Boolean);
}

function containsHedge(message: string): boolean {
  const lower = message.toLowerCase().replace(/’/g, "'");
  return lexicon.hedges.some((hedge) => lower.includes(hedge));
}

/** Mots-clés significatifs d'un texte (thème, question) */
export function extractKeywords(value: string): Set<string> {
  return new Set(tokenize(value).filter((token) => token.length >= 4 && !STOP_WORDS.has(token)));
}

export interface HeuristicScore {
  score: number;
  hits: number;
  hedged: boolean;
}

/**
 * Score déterministe : base + points par concept retrouvé + bonus de longueur,
 * plafonné sous la note parfaite.
 */
export function scoreAnswer(answer: string, reference: string): HeuristicScore {
  const trimmed = answer.trim();
  const hedged = containsHedge(trimmed);
  if (hedged && trimmed.length < SCORING.LENGTH_THRESHOLD_CHARS) {
    return { score: 1, hits: 0, hedged };
  }

  const answerTokens = new Set(tokenize(trimmed));
  const matched = new Set<string>();
  for (const keyword of extractKeywords(reference)) {
    if (answerTokens.has(keyword)) {
      matched.add(keyword);
    }
  }
  for (const token of answerTokens) {
    if (TECHNICAL_TERMS.has(token)) {
      matched.add(token);
    }
  }

  let score: number = SCORING.BASE_SCORE + matched.size * SCORING.KEYWORD_MATCH_VALUE;
  if (trimmed.length >= SCORING.LENGTH_THRESHOLD_CHARS) {
    score += SCORING.LENGTH_BONUS;
  }
  return { score: Math.min(score, SCORING.MAX_SCORE), hits: matched.size, hedged };
}

/** Piste de thèmes la plus proche du poste (plus grand nombre d'alias reconnus) */
export function resolveTrack(role: string): Track {
  const lower = role.toLowerCase();
  const words = new Set(tokenize(role));
  let best: Track = 'default';
  let bestHits = 0;
  for (const track of TRACKS) {
    const aliases: readonly string[] = lexicon.roleAliases[track];
    const hits = aliases.filter((alias) => (alias.length >= 4 ? lower.includes(alias) : words.has(alias))).length;
    if (hits > bestHits) {
      best = track;
      bestHits = hits;
    }
  }
  return best;
}

const JUNIOR_LADDER: readonly TopicDifficulty[] = ['easy', 'easy', 'medium', 'medium', 'hard', 'hard'];
const SENIOR_LADDER: readonly TopicDifficulty[] = ['medium', 'medium', 'hard', 'hard', 'expert', 'expert'];

/**
 * Provider hors-ligne : règles déterministes pour chaque rôle d'agent.
 * Sert au mode `--offline`, aux démos et aux tests ; la sortie passe par le
 * même schéma zod que celle d'un modèle.
 */
export class HeuristicInferenceProvider implements InferenceProvider {
  readonly name = 'heuristic';

  async infer<T>(request: InferenceRequest<T>): Promise<T> {
    return request.schema.parse(this.respond(request.role, request.context));
  }

  private respond(role: AgentRole, context: InferenceContext): Record<string, unknown> {
    switch (role) {
      case 'router':
        return this.route(context);
      case 'skeptic':
        return this.judge(context);
      case 'empath':
        return this.observe(context);
      case 'planner':
        return this.plan(context);
      case 'voice':
        return this.speak(context);
      case 'reporter':
        return this.report(context);
    }
  }

  private route(context: InferenceContext): Record<string, unknown> {
    const message = text(context, 'message').trim();
    if (message.endsWith('?')) {
      return { intent: 'question', thought: '[Heuristic] Message ends with a question mark.' };
    }

    const tokens = tokenize(message);
    const keywords = extractKeywords(text(context, 'pendingQuestion'));
    const relevant = tokens.some((token) => keywords.has(token) || TECHNICAL_TERMS.has(token));
    if (!relevant && tokens.some((token) => OFF_TOPIC_MARKERS.has(token))) {
      return { intent: 'off_topic', thought: '[Heuristic] Unrelated vocabulary, no link to the question.' };
    }
    return { intent: 'answer', thought: '[Heuristic] Treated as an answer attempt.' };
  }

  private judge(context: InferenceContext): Record<string, unknown> {
    const answer = text(context, 'answer').trim();
    const { score, hits, hedged } = scoreAnswer(answer, `${text(context, 'topic')} ${text(context, 'question')}`);

    const depth =
      score >= SCORING.MAX_SCORE && answer.length >= SCORING.DEEP_ANSWER_CHARS
        ? 'deep'
        : score >= 6
          ? 'adequate'
          : 'superficial';
    const accuracy = score >= 7 ? 'accurate' : score >= 4 ? 'partially_correct' : 'incorrect';

    return {
      score,
      accuracy,
      depth,
      thought: hedged
        ? '[Heuristic] Candidate says they do not know.'
        : `[Heuristic] ${hits} relevant concepts, ${answer.length} chars.`,
      issues: hits === 0 ? ['No relevant technical terminology'] : [],
      correctAnswer: null,
      contradictionDetected: false,
      fictionalTermDetected: false,
    };
  }

  private observe(context: InferenceContext): Record<string, unknown> {
    const answer = text(context, 'answer').trim();
    const hedged = containsHedge(answer);
    const demeanor = answer.length < 20 ? 'silent' : answer.length > 800 ? 'verbose' : hedged ? 'stuck' : 'normal';

    return {
      clarity: demeanor === 'silent' ? 4 : demeanor === 'verbose' ? 5 : 7,
      honesty: hedged ? 8 : 7,
      engagement: answer.length < 20 ? 'low' : answer.length > 150 ? 'high' : 'medium',
      stressLevel: hedged ? 'medium' : 'low',
      demeanor,
      thought: `[Heuristic] ${demeanor} answer of ${answer.length} chars.`,
    };
  }

  private plan(context: InferenceContext): Record<string, unknown> {
    const track = resolveTrack(text(context, 'role'));
    const grade = text(context, 'grade').toLowerCase();
    const ladder = /senior|lead|principal/.test(grade) ? SENIOR_LADDER : JUNIOR_LADDER;
    const labels: readonly string[] = lexicon.roleTracks[track];

    return {
      topics: labels.map((label, index) => ({
        label,
        difficulty: ladder[Math.min(index, ladder.length - 1)],
        rationale: `Standard ${track} track.`,
      })),
      thought: `[Heuristic] ${track} track, ${ladder === SENIOR_LADDER ? 'senior' : 'base'} difficulty ladder.`,
    };
  }

  private speak(context: InferenceContext): Record<string, unknown> {
    const directive = text(context, 'directive');
    const topic = text(context, 'topic') || 'your recent experience';
    const pending = text(context, 'pendingQuestion') || 'Could you answer the previous question?';
    const name = text(context, 'candidateName') || 'there';

    let correction = '';
    const correctAnswer = text(context, 'correctAnswer');
    if (correctAnswer) {
      correction = `A quick correction: ${correctAnswer} `;
    } else if (context.hallucinationDetected === true) {
      correction = 'That does not match how it actually works. ';
    }

    return {
      message: correction + voiceTemplate(directive, { topic, pending, name }),
      thought: `[Heuristic] Template for ${directive || 'unknown directive'}.`,
    };
  }

  private report(context: InferenceContext): Record<string, unknown> {
    const average = num(context, 'averageScore');
    const answered = num(context, 'answeredTurns') ?? 0;
    const hallucinations = num(context, 'hallucinationCount') ?? 0;
    const gaps = list(context, 'knowledgeGaps');

    const level = average === null ? 'junior' : average >= 8 ? 'senior' : average >= 6 ? 'middle' : 'junior';
    const recommendation =
      hallucinations > 0 || average === null
        ? 'no_hire'
        : average >= 8
          ? 'strong_hire'
          : average >= 6
            ? 'hire'
            : 'no_hire';

    return {
      level,
      recommendation,
      confidence: answered >= 3 ? 80 : answered >= 1 ? 60 : 40,
      reasoning:
        average === null
          ? '[Heuristic] No scored answers; not enough evidence.'
          : `[Heuristic] Average topic score ${average}/10 over ${answered} answers.`,
      clarity: 7,
      honesty: hallucinations > 0 ? 3 : 8,
      engagement: answered > 0 ? 7 : 3,
      softSkillsNotes: '',
      roadmap: gaps.map((gap) => `Deepen ${gap} with a hands-on project`),
      resources: gaps.length > 0 ? ['Official documentation of the technologies discussed'] : [],
      thought: '[Heuristic] Verdict derived from average topic score.',
    };
  }
}

function voiceTemplate(directive: string, slots: { topic: string; pending: string; name: string }): string {
  const templates: Record<Directive, string> = {
    open_interview: `Hello ${slots.name}! Let's start with ${slots.topic}. Can you explain its key ideas and where you have applied them?`,
    ask_followup: `Let's go deeper into ${slots.topic}. What trade-offs or pitfalls have you run into?`,
    advance_topic: `Thank you. Next topic: ${slots.topic}. How would you explain its core concepts?`,
    rescue: `No problem, let's simplify. In ${slots.topic}, could you describe one basic concept you have used in practice?`,
    speedrun_next: `Good. ${slots.topic}: what is the hardest problem you have solved in this area?`,
    stress_probe: `Suppose something around ${slots.topic} fails under heavy production load. How do you diagnose and fix it?`,
    answer_question: `Good question; the hiring team will share those details after the interview. Back to our question: ${slots.pending}`,
    redirect: `Let's stay focused on the interview. ${slots.pending}`,
    terminate: `Thank you for your time, ${slots.name}. The interview is over.`,
  };
  const known = DIRECTIVES.find((candidate) => candidate === directive);
  return templates[known ?? 'ask_followup'];
}
