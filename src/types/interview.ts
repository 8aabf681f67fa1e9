// ============================================
// VARIANTES FERMÉES DU PROTOCOLE D'ENTRETIEN
// ============================================

export const INTENTS = ['answer', 'question', 'off_topic', 'stop'] as const;
export type Intent = (typeof INTENTS)[number];

export const PROTOCOLS = ['standard', 'rescue', 'speedrun', 'stress_test'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

/**
 * Instruction émise par le planner pour la prochaine action externe.
 * `answer_question` et `redirect` couvrent les intents question / off_topic,
 * `open_interview` n'est utilisé que pour le premier message.
 */
export const DIRECTIVES = [
  'open_interview',
  'ask_followup',
  'advance_topic',
  'rescue',
  'speedrun_next',
  'stress_probe',
  'answer_question',
  'redirect',
  'terminate',
] as const;
export type Directive = (typeof DIRECTIVES)[number];

export type OrchestratorPhase =
  | 'awaiting_input'
  | 'classifying'
  | 'evaluating'
  | 'planning'
  | 'generating'
  | 'terminal';

export type TerminationReason =
  | 'candidate_stop'
  | 'turn_limit'
  | 'plan_complete'
  | 'generation_failure'
  | 'external_close';

export interface CandidateMetadata {
  name: string;
  role: string;
  targetGrade: string;
  experience: string;
}
