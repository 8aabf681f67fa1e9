/**
 * Format JSON des logs de session (snake_case, stable pour les outils externes)
 */
import type { FinalVerdict } from './report.js';
import type { TerminationReason } from './interview.js';

export interface TurnLogRecord {
  turn_id: number;
  agent_visible_message: string;
  user_message?: string;
  internal_thoughts: string[];
}

export interface SessionLogDocument {
  participant_name: string;
  session_start: string;
  metadata: {
    role: string;
    target_grade: string;
    experience: string;
  };
  turns: TurnLogRecord[];
  final_feedback: FinalVerdict | null;
  termination_reason: TerminationReason | null;
}
