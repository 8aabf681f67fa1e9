import type { Directive, Intent, Protocol, TerminationReason } from '../types/interview.js';
import type { Depth, TechnicalEvaluation } from '../types/evaluation.js';
import type { Topic } from '../types/topic.js';
import { DEGRADED_MARKER, INTERVIEW_POLICY } from './policy.js';
import { nextUncoveredIndex } from './skillTree.js';

export interface PlannerInput {
  intent: Intent;
  protocol: Protocol;
  /** Tours candidat déjà clos avant celui-ci */
  turnCounter: number;
  maxTurns: number;
  cursor: number;
  /** Vue des thèmes AVANT application de l'évaluation du tour */
  topics: readonly Readonly<Topic>[];
  scoreWindow: readonly number[];
  depthWindow: readonly (Depth | null)[];
  /** null pour un `answer` = évaluation technique indisponible */
  technical: TechnicalEvaluation | null;
}

/** Directives qui produisent un nouveau message du Voice */
export type ContinueDirective = Exclude<Directive, 'open_interview' | 'terminate'>;

interface DecisionState {
  protocol: Protocol;
  cursor: number;
  scoreWindow: number[];
  depthWindow: (Depth | null)[];
  degraded: boolean;
  thought: string;
}

export type PlannerDecision = DecisionState &
  (
    | { directive: 'terminate'; terminationReason: TerminationReason }
    | { directive: ContinueDirective; terminationReason: null }
  );

const { WINDOW_SIZE, RESCUE_MAX_SCORE, SPEEDRUN_MIN_SCORE, STANDARD_BAND, NEUTRAL_SCORE } =
  INTERVIEW_POLICY.PROTOCOL;

function pushWindow<T>(window: readonly T[], value: T): T[] {
  return [...window, value].slice(-WINDOW_SIZE);
}

/**
 * Transition de protocole, évaluée à chaque `answer`, avant le curseur.
 * La fenêtre glissante couvre plusieurs thèmes (jamais remise à zéro).
 */
export function nextProtocol(
  current: Protocol,
  scoreWindow: readonly number[],
  depthWindow: readonly (Depth | null)[],
): Protocol {
  if (scoreWindow.length < WINDOW_SIZE) {
    return current;
  }

  if (scoreWindow.every((score) => score <= RESCUE_MAX_SCORE)) {
    return 'rescue';
  }

  // stress_test ne s'obtient que depuis speedrun, sur profondeur experte répétée
  if (
    current === 'speedrun' &&
    depthWindow.length === WINDOW_SIZE &&
    depthWindow.every((depth) => depth === 'expert')
  ) {
    return 'stress_test';
  }

  if (scoreWindow.every((score) => score >= SPEEDRUN_MIN_SCORE) && current !== 'stress_test') {
    return 'speedrun';
  }

  if (scoreWindow.every((score) => score >= STANDARD_BAND.MIN && score <= STANDARD_BAND.MAX)) {
    return 'standard';
  }

  return current;
}

function followupDirective(protocol: Protocol): ContinueDirective {
  switch (protocol) {
    case 'rescue':
      return 'rescue';
    case 'stress_test':
      return 'stress_probe';
    case 'standard':
    case 'speedrun':
      return 'ask_followup';
  }
}

function advanceDirective(protocol: Protocol): ContinueDirective {
  return protocol === 'speedrun' || protocol === 'stress_test' ? 'speedrun_next' : 'advance_topic';
}

interface CursorProjection {
  hasActiveTopic: boolean;
  covered: boolean;
  cursor: number;
}

/**
 * Projette la couverture du thème actif après application de l'évaluation
 * du tour et calcule la position suivante du curseur.
 */
function projectCursor(input: PlannerInput, degraded: boolean): CursorProjection {
  const active = input.topics[input.cursor];
  if (!active) {
    return { hasActiveTopic: false, covered: false, cursor: input.cursor };
  }

  const asked = active.questionsAsked + (degraded ? 0 : 1);
  if (asked < active.requiredQuestions) {
    return { hasActiveTopic: true, covered: false, cursor: input.cursor };
  }

  return { hasActiveTopic: true, covered: true, cursor: nextUncoveredIndex(input.topics, input.cursor) };
}

/**
 * Décision stratégique d'un tour. Fonction pure de l'état de session et
 * des résultats du tour ; l'orchestrateur applique la décision.
 */
export function planNextStep(input: PlannerInput): PlannerDecision {
  const unchanged = {
    protocol: input.protocol,
    cursor: input.cursor,
    scoreWindow: [...input.scoreWindow],
    depthWindow: [...input.depthWindow],
    degraded: false,
  };
  const atTurnLimit = input.turnCounter + 1 >= input.maxTurns;
  const limitThought = `Turn limit reached (${input.turnCounter + 1}/${input.maxTurns}); requesting final report.`;

  if (input.intent === 'stop') {
    return {
      ...unchanged,
      directive: 'terminate',
      terminationReason: 'candidate_stop',
      thought: 'Candidate asked to stop; requesting final report.',
    };
  }

  if (input.intent === 'question' || input.intent === 'off_topic') {
    if (atTurnLimit) {
      return { ...unchanged, directive: 'terminate', terminationReason: 'turn_limit', thought: limitThought };
    }
    return input.intent === 'question'
      ? {
          ...unchanged,
          directive: 'answer_question',
          terminationReason: null,
          thought: 'Candidate asked a question; answer briefly and re-pose the pending question.',
        }
      : {
          ...unchanged,
          directive: 'redirect',
          terminationReason: null,
          thought: 'Off-topic message; redirect to the active topic.',
        };
  }

  const degraded = input.technical === null;
  const projection = projectCursor(input, degraded);
  const thoughts: string[] = [];
  if (degraded) {
    thoughts.push(DEGRADED_MARKER);
  }

  if (atTurnLimit) {
    thoughts.push(limitThought);
    return {
      ...unchanged,
      cursor: projection.cursor,
      degraded,
      directive: 'terminate',
      terminationReason: 'turn_limit',
      thought: thoughts.join(' '),
    };
  }

  const scoreWindow = pushWindow(input.scoreWindow, input.technical?.score ?? NEUTRAL_SCORE);
  const depthWindow = pushWindow<Depth | null>(input.depthWindow, input.technical?.depth ?? null);
  const protocol = nextProtocol(input.protocol, scoreWindow, depthWindow);
  if (protocol !== input.protocol) {
    thoughts.push(`Protocol ${input.protocol} -> ${protocol} (last scores ${scoreWindow.join(', ')}).`);
  }

  const decided = { protocol, cursor: projection.cursor, scoreWindow, depthWindow, degraded };

  if (!projection.hasActiveTopic) {
    thoughts.push('No active topic left in the plan.');
    return { ...decided, directive: 'terminate', terminationReason: 'plan_complete', thought: thoughts.join(' ') };
  }

  if (!projection.covered) {
    thoughts.push('Topic not covered yet; probing the same topic again.');
    return {
      ...decided,
      directive: followupDirective(protocol),
      terminationReason: null,
      thought: thoughts.join(' '),
    };
  }

  if (projection.cursor >= input.topics.length) {
    thoughts.push('All topics covered.');
    return { ...decided, directive: 'terminate', terminationReason: 'plan_complete', thought: thoughts.join(' ') };
  }

  const nextTopic = input.topics[projection.cursor];
  thoughts.push(`Topic covered; moving to "${nextTopic.label}".`);
  return {
    ...decided,
    directive: advanceDirective(protocol),
    terminationReason: null,
    thought: thoughts.join(' '),
  };
}
