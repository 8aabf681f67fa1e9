import type { FinalVerdict } from '../types/report.js';
import type { TopicScoreSummary } from '../types/topic.js';

const ROADMAP_LIMIT = 5;
const RESOURCES_LIMIT = 3;

const RECOMMENDATION_LABELS: Record<FinalVerdict['recommendation'], string> = {
  strong_hire: 'Strong Hire',
  hire: 'Hire',
  no_hire: 'No Hire',
  unknown: 'Unknown',
};

function formatScore(topic: TopicScoreSummary): string {
  return topic.score === null ? 'not scored' : `${topic.score}/10`;
}

/**
 * Rendu texte du verdict final (CLI, réponse HTTP).
 * Format brut, sans couleurs ni emoji.
 */
export function formatReport(verdict: FinalVerdict): string {
  const lines = [
    'Final interview report',
    '',
    'Verdict:',
    `  Level: ${verdict.level}`,
    `  Recommendation: ${RECOMMENDATION_LABELS[verdict.recommendation]}`,
    `  Confidence: ${verdict.confidence}%`,
    `  Reasoning: ${verdict.reasoning}`,
  ];

  if (verdict.fallback) {
    lines.push('  (fallback verdict: report generation failed)');
  }

  lines.push('', 'Hard skills:');
  if (verdict.confirmedSkills.length > 0) {
    lines.push('  Confirmed skills:');
    verdict.confirmedSkills.forEach((topic) => lines.push(`    - ${topic.label}: ${formatScore(topic)}`));
  }
  if (verdict.knowledgeGaps.length > 0) {
    lines.push('  Knowledge gaps:');
    verdict.knowledgeGaps.forEach((topic) => lines.push(`    - ${topic.label}: ${formatScore(topic)}`));
  }
  if (verdict.confirmedSkills.length === 0 && verdict.knowledgeGaps.length === 0) {
    lines.push('  (not enough data to assess)');
  }

  const untouched = verdict.topicScores.filter((topic) => topic.questionsAsked === 0);
  if (untouched.length > 0) {
    lines.push(`  Not reached: ${untouched.map((topic) => topic.label).join(', ')}`);
  }

  if (verdict.softSkills) {
    lines.push(
      '',
      'Soft skills:',
      `  Clarity: ${verdict.softSkills.clarity}/10`,
      `  Honesty: ${verdict.softSkills.honesty}/10`,
      `  Engagement: ${verdict.softSkills.engagement}/10`,
    );
    if (verdict.softSkills.notes) {
      lines.push(`  Notes: ${verdict.softSkills.notes}`);
    }
  }

  if (verdict.roadmap.length > 0) {
    lines.push('', 'Roadmap:');
    verdict.roadmap.slice(0, ROADMAP_LIMIT).forEach((item, index) => lines.push(`  ${index + 1}. ${item}`));
  }

  if (verdict.resources.length > 0) {
    lines.push('', 'Resources:');
    verdict.resources.slice(0, RESOURCES_LIMIT).forEach((item) => lines.push(`  - ${item}`));
  }

  return lines.join('\n');
}
