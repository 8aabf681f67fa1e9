import type { CandidateMetadata, Intent, OrchestratorPhase, Protocol, TerminationReason } from './interview.js';
import type { BehavioralContext, Depth } from './evaluation.js';
import type { FinalVerdict } from './report.js';
import type { Topic } from './topic.js';

export interface TurnRecord {
  turnId: number;
  agentVisibleMessage: string;
  /** Absent uniquement pour le dernier tour, clos sans réponse du candidat */
  userMessage?: string;
  intent: Intent | null;
  internalThoughts: readonly string[];
  degraded: boolean;
}

export interface SessionSnapshot {
  sessionId: string;
  metadata: Readonly<CandidateMetadata>;
  topics: readonly Readonly<Topic>[];
  cursor: number;
  protocol: Protocol;
  phase: OrchestratorPhase;
  turnCounter: number;
  maxTurns: number;
  scoreWindow: readonly number[];
  depthWindow: readonly (Depth | null)[];
  behavior: Readonly<BehavioralContext>;
  turns: readonly TurnRecord[];
  startedAt: Date;
  closedAt: Date | null;
  terminationReason: TerminationReason | null;
  finalFeedback: FinalVerdict | null;
}
