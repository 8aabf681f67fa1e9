import { formatReport } from '../../../src/services/reportFormatter';
import type { FinalVerdict } from '../../../src/types/report';
import type { TopicScoreSummary } from '../../../src/types/topic';

function topic(topicId: number, label: string, score: number | null, questionsAsked: number): TopicScoreSummary {
  return { topicId, label, score, questionsAsked, covered: questionsAsked >= 2 };
}

const python = topic(0, 'Python basics', 8, 2);
const databases = topic(1, 'Databases', 4, 1);
const design = topic(2, 'System design', null, 0);

function verdict(overrides: Partial<FinalVerdict> = {}): FinalVerdict {
  return {
    level: 'middle',
    recommendation: 'hire',
    confidence: 70,
    reasoning: 'Solid basics.',
    topicScores: [python, databases, design],
    confirmedSkills: [python],
    knowledgeGaps: [databases],
    softSkills: { clarity: 7, honesty: 8, engagement: 6, notes: 'Clear speaker.' },
    roadmap: ['Practice SQL joins'],
    resources: ['PostgreSQL docs'],
    fallback: false,
    ...overrides,
  };
}

describe('formatReport', () => {
  test('renders every section in order', () => {
    expect(formatReport(verdict()).split('\n')).toEqual([
      'Final interview report',
      '',
      'Verdict:',
      '  Level: middle',
      '  Recommendation: Hire',
      '  Confidence: 70%',
      '  Reasoning: Solid basics.',
      '',
      'Hard skills:',
      '  Confirmed skills:',
      '    - Python basics: 8/10',
      '  Knowledge gaps:',
      '    - Databases: 4/10',
      '  Not reached: System design',
      '',
      'Soft skills:',
      '  Clarity: 7/10',
      '  Honesty: 8/10',
      '  Engagement: 6/10',
      '  Notes: Clear speaker.',
      '',
      'Roadmap:',
      '  1. Practice SQL joins',
      '',
      'Resources:',
      '  - PostgreSQL docs',
    ]);
  });

  test('flags the fallback verdict and omits missing sections', () => {
    const text = formatReport(
      verdict({
        level: 'unknown',
        recommendation: 'unknown',
        confidence: 0,
        reasoning: 'Report generation failed; only the computed topic scores are available.',
        topicScores: [design],
        confirmedSkills: [],
        knowledgeGaps: [],
        softSkills: null,
        roadmap: [],
        resources: [],
        fallback: true,
      }),
    );
    expect(text).toBe(
      [
        'Final interview report',
        '',
        'Verdict:',
        '  Level: unknown',
        '  Recommendation: Unknown',
        '  Confidence: 0%',
        '  Reasoning: Report generation failed; only the computed topic scores are available.',
        '  (fallback verdict: report generation failed)',
        '',
        'Hard skills:',
        '  (not enough data to assess)',
        '  Not reached: System design',
      ].join('\n'),
    );
  });

  test('caps the roadmap and the resources', () => {
    const lines = formatReport(
      verdict({
        roadmap: ['a', 'b', 'c', 'd', 'e', 'f'],
        resources: ['r1', 'r2', 'r3', 'r4'],
      }),
    ).split('\n');
    expect(lines.filter((line) => /^ {2}\d\. /.test(line))).toEqual(['  1. a', '  2. b', '  3. c', '  4. d', '  5. e']);
    expect(lines.slice(-3)).toEqual(['  - r1', '  - r2', '  - r3']);
  });
});
