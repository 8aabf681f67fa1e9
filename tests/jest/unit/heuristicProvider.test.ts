import {
  HeuristicInferenceProvider,
  resolveTrack,
  scoreAnswer,
  tokenize,
} from '../../../src/services/heuristicProvider';
import {
  BehavioralOutputSchema,
  InterviewPlanOutputSchema,
  ReporterOutputSchema,
  RouterOutputSchema,
  TechnicalOutputSchema,
  VoiceOutputSchema,
} from '../../../src/validators/agentOutputs';
import type { z } from 'zod';
import type { AgentRole, InferenceContext } from '../../../src/services/inferenceProvider';

const provider = new HeuristicInferenceProvider();

function request<T>(role: AgentRole, schema: z.ZodType<T, z.ZodTypeDef, unknown>, context: InferenceContext) {
  return { role, schema, context, instructions: '', responseShape: '', temperature: 0, tier: 'fast' as const };
}

describe('scoreAnswer', () => {
  test('gives 1 to a short admission of not knowing', () => {
    expect(scoreAnswer("I don't know", 'What is a database index?')).toEqual({ score: 1, hits: 0, hedged: true });
  });

  test('adds two points per concept found', () => {
    expect(scoreAnswer('It uses an index.', 'What is a database index?')).toEqual({ score: 6, hits: 1, hedged: false });
  });

  test('adds the length bonus without concepts', () => {
    const answer = 'Honestly I would look at the documentation and ask a colleague for advice first.';
    expect(scoreAnswer(answer, 'What is a database index?')).toEqual({ score: 5, hits: 0, hedged: false });
  });

  test('never reaches a perfect score', () => {
    const answer =
      'An index is a B-tree structure: lookups become logarithmic, and a cache of hot pages keeps latency low during search.';
    expect(scoreAnswer(answer, 'What is a database index?').score).toBe(8);
  });
});

describe('resolveTrack', () => {
  test.each([
    ['Senior Python Backend Developer', 'backend'],
    ['Frontend JavaScript Engineer', 'frontend'],
    ['iOS developer', 'mobile'],
    ['SRE', 'devops'],
    ['Accountant', 'default'],
  ])('maps "%s" to %s', (role, track) => {
    expect(resolveTrack(role)).toBe(track);
  });

  test('tokenize keeps letters, digits and language suffixes', () => {
    expect(tokenize('C# and B-tree, HTTP/2')).toEqual(['c#', 'and', 'b', 'tree', 'http', '2']);
  });
});

describe('HeuristicInferenceProvider', () => {
  test('router: question mark means question', async () => {
    const output = await provider.infer(request('router', RouterOutputSchema, { message: 'What is the salary?' }));
    expect(output.intent).toBe('question');
  });

  test('router: unrelated vocabulary means off_topic', async () => {
    const output = await provider.infer(
      request('router', RouterOutputSchema, {
        message: 'Did you watch the football game yesterday',
        pendingQuestion: 'Explain database indexes',
      }),
    );
    expect(output.intent).toBe('off_topic');
  });

  test('router: anything else is an answer', async () => {
    const output = await provider.infer(
      request('router', RouterOutputSchema, { message: 'Indexes speed up reads', pendingQuestion: 'Explain database indexes' }),
    );
    expect(output.intent).toBe('answer');
  });

  test('skeptic: maps the score to accuracy and depth', async () => {
    const output = await provider.infer(
      request('skeptic', TechnicalOutputSchema, {
        topic: 'Databases',
        question: 'What is a database index?',
        answer: 'It uses an index.',
      }),
    );
    expect(output).toEqual({
      score: 6,
      accuracy: 'partially_correct',
      depth: 'adequate',
      thought: '[Heuristic] 1 relevant concepts, 17 chars.',
      issues: [],
      correctAnswer: null,
      contradictionDetected: false,
      fictionalTermDetected: false,
    });
  });

  test('empath: very short answers read as silent', async () => {
    const output = await provider.infer(request('empath', BehavioralOutputSchema, { answer: 'idk' }));
    expect(output).toEqual({
      clarity: 4,
      honesty: 7,
      engagement: 'low',
      stressLevel: 'low',
      demeanor: 'silent',
      thought: '[Heuristic] silent answer of 3 chars.',
    });
  });

  test('planner: senior grade shifts the difficulty ladder', async () => {
    const output = await provider.infer(
      request('planner', InterviewPlanOutputSchema, { role: 'Python developer', grade: 'Senior' }),
    );
    expect(output.topics).toHaveLength(6);
    expect(output.topics[0]).toEqual({
      label: 'Language fundamentals and data structures',
      difficulty: 'medium',
      rationale: 'Standard backend track.',
    });
    expect(output.topics[5].difficulty).toBe('expert');
  });

  test('voice: redirect re-asks the pending question', async () => {
    const output = await provider.infer(
      request('voice', VoiceOutputSchema, { directive: 'redirect', pendingQuestion: 'What is an index?' }),
    );
    expect(output.message).toBe("Let's stay focused on the interview. What is an index?");
  });

  test('voice: a correct answer is stated before the follow-up', async () => {
    const output = await provider.infer(
      request('voice', VoiceOutputSchema, { directive: 'ask_followup', topic: 'SQL', correctAnswer: 'JOINs combine rows.' }),
    );
    expect(output.message).toBe(
      "A quick correction: JOINs combine rows. Let's go deeper into SQL. What trade-offs or pitfalls have you run into?",
    );
  });

  test('reporter: high average without hallucinations is a strong hire', async () => {
    const output = await provider.infer(
      request('reporter', ReporterOutputSchema, {
        averageScore: 8.5,
        answeredTurns: 4,
        hallucinationCount: 0,
        knowledgeGaps: [],
      }),
    );
    expect(output).toMatchObject({ level: 'senior', recommendation: 'strong_hire', confidence: 80, roadmap: [], resources: [] });
  });

  test('reporter: a hallucination means no hire', async () => {
    const output = await provider.infer(
      request('reporter', ReporterOutputSchema, {
        averageScore: 6.5,
        answeredTurns: 2,
        hallucinationCount: 1,
        knowledgeGaps: ['SQL'],
      }),
    );
    expect(output).toMatchObject({
      level: 'middle',
      recommendation: 'no_hire',
      confidence: 60,
      honesty: 3,
      roadmap: ['Deepen SQL with a hands-on project'],
    });
  });
});
