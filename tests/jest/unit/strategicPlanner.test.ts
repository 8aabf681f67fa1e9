import { nextProtocol, planNextStep, type PlannerInput } from '../../../src/engine/strategicPlanner';
import { DEGRADED_MARKER } from '../../../src/engine/policy';
import type { Depth, TechnicalEvaluation } from '../../../src/types/evaluation';
import type { Topic } from '../../../src/types/topic';

function topic(id: number, questionsAsked = 0): Topic {
  return {
    id,
    label: `Topic ${id}`,
    difficulty: 'medium',
    rationale: '',
    requiredQuestions: 2,
    questionsAsked,
    score: null,
    scoreHistory: [],
    covered: questionsAsked === 2,
    feedback: '',
    correctAnswer: null,
  };
}

function technical(score: number, depth: Depth = 'adequate'): TechnicalEvaluation {
  return {
    score,
    accuracy: 'partially_correct',
    depth,
    thought: 'ok',
    issues: [],
    correctAnswer: null,
    contradictionDetected: false,
    fictionalTermDetected: false,
  };
}

function input(overrides: Partial<PlannerInput> = {}): PlannerInput {
  return {
    intent: 'answer',
    protocol: 'standard',
    turnCounter: 0,
    maxTurns: 10,
    cursor: 0,
    topics: [topic(1), topic(2)],
    scoreWindow: [],
    depthWindow: [],
    technical: technical(5),
    ...overrides,
  };
}

describe('planNextStep: intents', () => {
  test('stop terminates with candidate_stop and keeps protocol and windows', () => {
    const decision = planNextStep(
      input({ intent: 'stop', protocol: 'speedrun', scoreWindow: [9, 9], depthWindow: ['deep', 'deep'], technical: null }),
    );
    expect(decision.directive).toBe('terminate');
    expect(decision.terminationReason).toBe('candidate_stop');
    expect(decision.protocol).toBe('speedrun');
    expect(decision.scoreWindow).toEqual([9, 9]);
    expect(decision.cursor).toBe(0);
  });

  test('stop wins over the turn limit', () => {
    const decision = planNextStep(input({ intent: 'stop', turnCounter: 9, technical: null }));
    expect(decision.terminationReason).toBe('candidate_stop');
  });

  test('question answers and leaves cursor, protocol and windows unchanged', () => {
    const decision = planNextStep(
      input({ intent: 'question', protocol: 'rescue', scoreWindow: [2], depthWindow: ['superficial'], technical: null }),
    );
    expect(decision).toMatchObject({
      directive: 'answer_question',
      protocol: 'rescue',
      cursor: 0,
      scoreWindow: [2],
      depthWindow: ['superficial'],
      terminationReason: null,
      degraded: false,
    });
  });

  test('off_topic redirects', () => {
    const decision = planNextStep(input({ intent: 'off_topic', technical: null }));
    expect(decision.directive).toBe('redirect');
    expect(decision.terminationReason).toBeNull();
  });

  test('any intent terminates once the turn limit is reached', () => {
    const decision = planNextStep(input({ intent: 'off_topic', turnCounter: 9, technical: null }));
    expect(decision.directive).toBe('terminate');
    expect(decision.terminationReason).toBe('turn_limit');
  });
});

describe('planNextStep: answers', () => {
  test('first answer on a topic asks a follow-up', () => {
    const decision = planNextStep(input());
    expect(decision.directive).toBe('ask_followup');
    expect(decision.scoreWindow).toEqual([5]);
    expect(decision.depthWindow).toEqual(['adequate']);
    expect(decision.cursor).toBe(0);
  });

  test('second answer covers the topic and advances the cursor', () => {
    const decision = planNextStep(input({ topics: [topic(1, 1), topic(2)], scoreWindow: [5], depthWindow: ['adequate'] }));
    expect(decision.directive).toBe('advance_topic');
    expect(decision.cursor).toBe(1);
  });

  test('covering the last topic completes the plan', () => {
    const decision = planNextStep(input({ cursor: 1, topics: [topic(1, 2), topic(2, 1)] }));
    expect(decision.directive).toBe('terminate');
    expect(decision.terminationReason).toBe('plan_complete');
    expect(decision.cursor).toBe(2);
  });

  test('an empty plan completes immediately', () => {
    const decision = planNextStep(input({ topics: [] }));
    expect(decision.terminationReason).toBe('plan_complete');
  });

  test('the turn limit still advances past a topic covered this turn', () => {
    const decision = planNextStep(
      input({ turnCounter: 9, topics: [topic(1, 1), topic(2)], scoreWindow: [9], depthWindow: ['deep'], technical: technical(9) }),
    );
    expect(decision.terminationReason).toBe('turn_limit');
    expect(decision.cursor).toBe(1);
    expect(decision.protocol).toBe('standard');
    expect(decision.scoreWindow).toEqual([9]);
  });

  test('two weak answers switch to rescue', () => {
    const decision = planNextStep(input({ scoreWindow: [2], depthWindow: ['superficial'], technical: technical(3) }));
    expect(decision.protocol).toBe('rescue');
    expect(decision.directive).toBe('rescue');
  });

  test('two strong answers switch to speedrun', () => {
    const decision = planNextStep(input({ scoreWindow: [9], depthWindow: ['deep'], technical: technical(8, 'deep') }));
    expect(decision.protocol).toBe('speedrun');
    expect(decision.directive).toBe('ask_followup');
  });

  test('speedrun advances with speedrun_next', () => {
    const decision = planNextStep(
      input({
        protocol: 'speedrun',
        topics: [topic(1, 1), topic(2)],
        scoreWindow: [9],
        depthWindow: ['deep'],
        technical: technical(9, 'deep'),
      }),
    );
    expect(decision.directive).toBe('speedrun_next');
    expect(decision.cursor).toBe(1);
  });

  test('two expert answers under speedrun switch to stress_test', () => {
    const decision = planNextStep(
      input({ protocol: 'speedrun', scoreWindow: [9], depthWindow: ['expert'], technical: technical(10, 'expert') }),
    );
    expect(decision.protocol).toBe('stress_test');
    expect(decision.directive).toBe('stress_probe');
  });

  test('degraded turn substitutes a neutral score and keeps the topic open', () => {
    const decision = planNextStep(
      input({ topics: [topic(1, 1), topic(2)], scoreWindow: [9], depthWindow: ['deep'], technical: null }),
    );
    expect(decision.degraded).toBe(true);
    expect(decision.scoreWindow).toEqual([9, 5]);
    expect(decision.depthWindow).toEqual(['deep', null]);
    expect(decision.cursor).toBe(0);
    expect(decision.directive).toBe('ask_followup');
    expect(decision.thought).toContain(DEGRADED_MARKER);
  });

  test('windows keep only the last two entries', () => {
    const decision = planNextStep(input({ scoreWindow: [4, 5], depthWindow: ['adequate', 'adequate'], technical: technical(6) }));
    expect(decision.scoreWindow).toEqual([5, 6]);
  });
});

describe('nextProtocol', () => {
  test('needs a full window', () => {
    expect(nextProtocol('standard', [1], ['superficial'])).toBe('standard');
  });

  test('returns to standard from rescue in the 4-7 band', () => {
    expect(nextProtocol('rescue', [5, 6], ['adequate', 'adequate'])).toBe('standard');
  });

  test('stress_test is not downgraded by strong answers', () => {
    expect(nextProtocol('stress_test', [9, 9], ['deep', 'deep'])).toBe('stress_test');
  });

  test('stress_test falls back to rescue on weak answers', () => {
    expect(nextProtocol('stress_test', [2, 1], ['superficial', 'superficial'])).toBe('rescue');
  });

  test('expert depth outside speedrun does not start a stress test', () => {
    expect(nextProtocol('standard', [9, 9], ['expert', 'expert'])).toBe('speedrun');
  });

  test('mixed scores keep the current protocol', () => {
    expect(nextProtocol('rescue', [2, 6], ['superficial', 'adequate'])).toBe('rescue');
  });
});
