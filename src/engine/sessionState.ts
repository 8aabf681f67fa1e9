import { v4 as uuidv4 } from 'uuid';
import type {
  CandidateMetadata,
  Intent,
  OrchestratorPhase,
  Protocol,
  TerminationReason,
} from '../types/interview.js';
import type { BehavioralContext, Depth } from '../types/evaluation.js';
import type { FinalVerdict } from '../types/report.js';
import type { SessionSnapshot, TurnRecord } from '../types/session.js';
import type { ScorePolicy, TopicDraft } from '../types/topic.js';
import { InterviewEngineError } from './errors.js';
import { INTERVIEW_POLICY } from './policy.js';
import { SkillTree, type TopicEvaluationRecord } from './skillTree.js';

/**
 * Tampon de notes internes d'un tour en cours.
 * Append-only ; figé à la clôture du tour.
 */
export class TurnDraft {
  private readonly notes: string[] = [];
  private closed = false;
  degraded = false;
  intent: Intent | null = null;

  constructor(
    readonly turnId: number,
    readonly agentVisibleMessage: string,
    readonly userMessage: string | undefined,
  ) {}

  note(agent: string, thought: string): void {
    if (this.closed) {
      throw new InterviewEngineError(`Turn ${this.turnId} is closed`, 'TRANSITION_FORBIDDEN');
    }
    const text = thought.trim();
    if (text) {
      this.notes.push(`[${agent}]: ${text}`);
    }
  }

  close(): TurnRecord {
    this.closed = true;
    const record: TurnRecord = {
      turnId: this.turnId,
      agentVisibleMessage: this.agentVisibleMessage,
      intent: this.intent,
      internalThoughts: Object.freeze([...this.notes]),
      degraded: this.degraded,
    };
    if (this.userMessage !== undefined) {
      record.userMessage = this.userMessage;
    }
    return Object.freeze(record);
  }
}

export interface SessionStateInit {
  metadata: CandidateMetadata;
  topics: TopicDraft[];
  maxTurns: number;
  scorePolicy?: ScorePolicy;
  sessionId?: string;
}

/**
 * Agrégat unique de la session d'entretien.
 * Chaque champ a un seul écrivain (voir orchestrator.ts) ; une fois la
 * session close, toute mutation lève SESSION_CLOSED.
 */
export class SessionState {
  readonly sessionId: string;
  readonly metadata: Readonly<CandidateMetadata>;
  readonly skillTree: SkillTree;
  readonly maxTurns: number;
  readonly startedAt = new Date();

  private readonly turnRecords: TurnRecord[] = [];
  private currentProtocol: Protocol = 'standard';
  private currentPhase: OrchestratorPhase = 'generating';
  private scores: number[] = [];
  private depths: (Depth | null)[] = [];
  private pending: string | null = null;
  private closedOn: Date | null = null;
  private reason: TerminationReason | null = null;
  private feedback: FinalVerdict | null = null;
  private readonly behaviorContext: BehavioralContext = {
    demeanor: 'normal',
    stressLevel: 'low',
    hallucinationCount: 0,
    contradictionCount: 0,
    offTopicCount: 0,
    questionCount: 0,
  };

  constructor(init: SessionStateInit) {
    this.sessionId = init.sessionId ?? uuidv4();
    this.metadata = Object.freeze({ ...init.metadata });
    this.skillTree = new SkillTree(init.topics, init.scorePolicy);
    this.maxTurns = init.maxTurns;
  }

  get protocol(): Protocol {
    return this.currentProtocol;
  }

  get phase(): OrchestratorPhase {
    return this.currentPhase;
  }

  /** Nombre de tours candidat déjà clos */
  get turnCounter(): number {
    return this.turnRecords.filter((turn) => turn.userMessage !== undefined).length;
  }

  get turns(): readonly TurnRecord[] {
    return this.turnRecords;
  }

  get scoreWindow(): readonly number[] {
    return this.scores;
  }

  get depthWindow(): readonly (Depth | null)[] {
    return this.depths;
  }

  get behavior(): Readonly<BehavioralContext> {
    return this.behaviorContext;
  }

  get pendingMessage(): string | null {
    return this.pending;
  }

  get closedAt(): Date | null {
    return this.closedOn;
  }

  get isClosed(): boolean {
    return this.closedOn !== null;
  }

  get terminationReason(): TerminationReason | null {
    return this.reason;
  }

  get finalFeedback(): FinalVerdict | null {
    return this.feedback;
  }

  setPhase(phase: OrchestratorPhase): void {
    this.assertOpen();
    this.currentPhase = phase;
  }

  openTurn(userMessage: string | undefined): TurnDraft {
    this.assertOpen();
    return new TurnDraft(this.turnRecords.length + 1, this.pending ?? '', userMessage);
  }

  closeTurn(draft: TurnDraft): TurnRecord {
    this.assertOpen();
    if (draft.turnId !== this.turnRecords.length + 1) {
      throw new InterviewEngineError(
        `Turn ${draft.turnId} out of sequence (expected ${this.turnRecords.length + 1})`,
        'TRANSITION_FORBIDDEN',
      );
    }
    const record = draft.close();
    this.turnRecords.push(record);
    return record;
  }

  setPendingMessage(message: string | null): void {
    this.assertOpen();
    this.pending = message;
  }

  /** Seule voie d'écriture des scores de thème (résultat du TechnicalEvaluator) */
  applyTechnicalEvaluation(record: TopicEvaluationRecord): void {
    this.assertOpen();
    this.skillTree.recordEvaluation(record);
  }

  applyProtocolDecision(decision: {
    protocol: Protocol;
    cursor: number;
    scoreWindow: readonly number[];
    depthWindow: readonly (Depth | null)[];
  }): void {
    this.assertOpen();
    this.currentProtocol = decision.protocol;
    this.skillTree.moveCursor(decision.cursor);
    this.scores = decision.scoreWindow.slice(-INTERVIEW_POLICY.PROTOCOL.WINDOW_SIZE);
    this.depths = decision.depthWindow.slice(-INTERVIEW_POLICY.PROTOCOL.WINDOW_SIZE);
  }

  updateBehavior(patch: Partial<BehavioralContext>): void {
    this.assertOpen();
    Object.assign(this.behaviorContext, patch);
  }

  close(reason: TerminationReason, feedback: FinalVerdict): void {
    this.assertOpen();
    this.reason = reason;
    this.feedback = feedback;
    this.pending = null;
    this.currentPhase = 'terminal';
    this.closedOn = new Date();
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      metadata: this.metadata,
      topics: this.skillTree.list().map((topic) => ({ ...topic, scoreHistory: [...topic.scoreHistory] })),
      cursor: this.skillTree.cursor,
      protocol: this.currentProtocol,
      phase: this.currentPhase,
      turnCounter: this.turnCounter,
      maxTurns: this.maxTurns,
      scoreWindow: [...this.scores],
      depthWindow: [...this.depths],
      behavior: { ...this.behaviorContext },
      turns: [...this.turnRecords],
      startedAt: this.startedAt,
      closedAt: this.closedOn,
      terminationReason: this.reason,
      finalFeedback: this.feedback,
    };
  }

  private assertOpen(): void {
    if (this.closedOn !== null) {
      throw new InterviewEngineError(`Session ${this.sessionId} is closed`, 'SESSION_CLOSED');
    }
  }
}
