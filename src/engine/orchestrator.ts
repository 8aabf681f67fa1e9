import type { CandidateMetadata, OrchestratorPhase, Intent, TerminationReason } from '../types/interview.js';
import type { BehavioralEvaluation, TechnicalEvaluation } from '../types/evaluation.js';
import type { FinalVerdict } from '../types/report.js';
import type { SessionSnapshot, TurnRecord } from '../types/session.js';
import type { SessionLogDocument } from '../types/log.js';
import type { ScorePolicy } from '../types/topic.js';
import type { InferenceProvider } from '../services/inferenceProvider.js';
import { IntentClassifier } from '../services/intentClassifier.js';
import {
  TechnicalEvaluator,
  describeTechnicalEvaluation,
  isHallucination,
} from '../services/technicalEvaluator.js';
import { BehavioralEvaluator, describeBehavioralEvaluation } from '../services/behavioralEvaluator.js';
import { InterviewPlanGenerator } from '../services/interviewPlanGenerator.js';
import {
  ResponseGenerator,
  type ConversationExchange,
  type GenerationContext,
} from '../services/responseGenerator.js';
import { ReportGenerator, composeVerdict } from '../services/reportGenerator.js';
import { formatReport } from '../services/reportFormatter.js';
import { toSessionLogDocument, type SessionLogSink } from '../services/sessionLogWriter.js';
import { InterviewEngineError, describeError } from './errors.js';
import { FALLBACK_MARKER, INTERVIEW_POLICY } from './policy.js';
import { SessionState, type TurnDraft } from './sessionState.js';
import { planNextStep, type PlannerDecision } from './strategicPlanner.js';

export interface OrchestratorDeps {
  provider: InferenceProvider;
  logSink?: SessionLogSink;
}

export interface OrchestratorOptions {
  maxTurns: number;
  inferenceTimeoutMs: number;
  reportMaxAttempts: number;
  scorePolicy?: ScorePolicy;
  sessionId?: string;
}

export interface ContinueOutcome {
  kind: 'continue';
  turn: TurnRecord;
  message: string;
}

export interface TerminatedOutcome {
  kind: 'terminated';
  /** null quand la session se ferme sans tour à clore */
  turn: TurnRecord | null;
  reason: TerminationReason;
  verdict: FinalVerdict;
  report: string;
}

export type TurnOutcome = ContinueOutcome | TerminatedOutcome;

interface InterviewAgents {
  classifier: IntentClassifier;
  technical: TechnicalEvaluator;
  behavioral: BehavioralEvaluator;
  planGenerator: InterviewPlanGenerator;
  voice: ResponseGenerator;
  reporter: ReportGenerator;
}

type GenerationResult = { ok: true; message: string; thought: string } | { ok: false; reason: string };

function createAgents(provider: InferenceProvider, timeoutMs: number): InterviewAgents {
  return {
    classifier: new IntentClassifier(provider, timeoutMs),
    technical: new TechnicalEvaluator(provider, timeoutMs),
    behavioral: new BehavioralEvaluator(provider, timeoutMs),
    planGenerator: new InterviewPlanGenerator(provider, timeoutMs),
    voice: new ResponseGenerator(provider, timeoutMs),
    reporter: new ReportGenerator(provider, timeoutMs),
  };
}

/**
 * Machine à états d'une session d'entretien.
 *
 * awaiting_input → classifying → evaluating → planning → generating → awaiting_input
 * Toute fin de session passe par `terminal`.
 *
 * Les résultats d'un tour (classification, évaluations, décision) sont
 * appliqués en un seul commit synchrone après le planner ; un appel en échec
 * ou en timeout ne laisse qu'une note.
 */
export class InterviewOrchestrator {
  /** Notes produites avant le premier tour (plan, message d'ouverture) */
  private carried: Array<{ agent: string; thought: string }> = [];

  private constructor(
    private readonly state: SessionState,
    private readonly agents: InterviewAgents,
    private readonly logSink: SessionLogSink | null,
    private readonly options: OrchestratorOptions,
  ) {}

  /**
   * Crée la session : plan d'entretien, puis message d'ouverture.
   * Si l'ouverture échoue deux fois, la session est close (generation_failure).
   */
  static async start(
    metadata: CandidateMetadata,
    deps: OrchestratorDeps,
    options: OrchestratorOptions,
  ): Promise<InterviewOrchestrator> {
    const agents = createAgents(deps.provider, options.inferenceTimeoutMs);
    const plan = await agents.planGenerator.evaluate(metadata);

    const state = new SessionState({
      metadata,
      topics: plan.topics,
      maxTurns: options.maxTurns,
      scorePolicy: options.scorePolicy,
      sessionId: options.sessionId,
    });
    const orchestrator = new InterviewOrchestrator(state, agents, deps.logSink ?? null, options);
    orchestrator.carry('Planner', plan.fallback ? `${FALLBACK_MARKER} ${plan.thought}` : plan.thought);
    console.log(`[ORCHESTRATOR] Session ${state.sessionId} started (${deps.provider.name}, ${plan.topics.length} topics)`);

    await orchestrator.open();
    return orchestrator;
  }

  get sessionId(): string {
    return this.state.sessionId;
  }

  get phase(): OrchestratorPhase {
    return this.state.phase;
  }

  get pendingMessage(): string | null {
    return this.state.pendingMessage;
  }

  get isClosed(): boolean {
    return this.state.isClosed;
  }

  get closedAt(): Date | null {
    return this.state.closedAt;
  }

  get terminationReason(): TerminationReason | null {
    return this.state.terminationReason;
  }

  get finalFeedback(): FinalVerdict | null {
    return this.state.finalFeedback;
  }

  snapshot(): SessionSnapshot {
    return this.state.snapshot();
  }

  async processMessage(text: string): Promise<TurnOutcome> {
    if (this.state.isClosed) {
      throw new InterviewEngineError(`Session ${this.state.sessionId} is closed`, 'SESSION_CLOSED');
    }
    if (this.state.phase !== 'awaiting_input') {
      throw new InterviewEngineError(
        `Cannot process a message in phase ${this.state.phase}`,
        'TRANSITION_FORBIDDEN',
      );
    }
    const message = text.trim();
    if (!message) {
      throw new InterviewEngineError('Message is empty', 'EMPTY_MESSAGE');
    }

    const pendingQuestion = this.state.pendingMessage ?? '';
    const draft = this.openDraft(message);
    this.state.setPhase('classifying');

    const classification = await this.agents.classifier.evaluate({ message, pendingQuestion });
    draft.intent = classification.intent;
    draft.note(
      'Router',
      `${classification.fallback ? `${FALLBACK_MARKER} ` : ''}${classification.intent}. ${classification.thought}`,
    );

    let technical: TechnicalEvaluation | null = null;
    let behavioral: BehavioralEvaluation | null = null;
    if (classification.intent === 'answer') {
      this.state.setPhase('evaluating');
      [technical, behavioral] = await this.evaluate(draft, message, pendingQuestion);
    }

    this.state.setPhase('planning');
    const decision = planNextStep({
      intent: classification.intent,
      protocol: this.state.protocol,
      turnCounter: this.state.turnCounter,
      maxTurns: this.state.maxTurns,
      cursor: this.state.skillTree.cursor,
      topics: this.state.skillTree.list(),
      scoreWindow: this.state.scoreWindow,
      depthWindow: this.state.depthWindow,
      technical,
    });
    this.commit(draft, classification.intent, technical, behavioral, decision);
    console.log(`[PLANNER] Turn ${draft.turnId}: ${decision.directive} (${decision.protocol})`);

    if (decision.directive === 'terminate') {
      const turn = this.state.closeTurn(draft);
      return this.terminate(turn, decision.terminationReason);
    }

    this.state.setPhase('generating');
    const topic = this.state.skillTree.activeTopic();
    const generation = await this.generate({
      directive: decision.directive,
      protocol: this.state.protocol,
      topic: topic ? { label: topic.label, difficulty: topic.difficulty } : null,
      metadata: this.state.metadata,
      history: this.history(),
      intent: classification.intent,
      candidateMessage: message,
      pendingQuestion,
      correctAnswer: technical?.correctAnswer ?? null,
      hallucinationDetected: technical ? isHallucination(technical) : false,
    });

    if (!generation.ok) {
      draft.note('Voice', `Generation failed after retry (${generation.reason}); terminating: generation_failure.`);
      const turn = this.state.closeTurn(draft);
      return this.terminate(turn, 'generation_failure');
    }

    draft.note('Voice', generation.thought);
    const turn = this.state.closeTurn(draft);
    this.state.setPendingMessage(generation.message);
    this.state.setPhase('awaiting_input');
    await this.persist();
    return { kind: 'continue', turn, message: generation.message };
  }

  /**
   * Fermeture externe (interruption CLI, route HTTP). Le message en attente
   * de réponse est consigné dans un dernier tour sans réponse du candidat.
   */
  async finish(reason: TerminationReason = 'external_close'): Promise<TerminatedOutcome> {
    if (this.state.isClosed) {
      throw new InterviewEngineError(`Session ${this.state.sessionId} is closed`, 'SESSION_CLOSED');
    }
    if (this.state.phase !== 'awaiting_input') {
      throw new InterviewEngineError(`Cannot finish in phase ${this.state.phase}`, 'TRANSITION_FORBIDDEN');
    }

    let turn: TurnRecord | null = null;
    if (this.state.pendingMessage !== null) {
      const draft = this.openDraft(undefined);
      draft.note('Orchestrator', `Session closed (${reason}) before the candidate replied.`);
      turn = this.state.closeTurn(draft);
    }
    return this.terminate(turn, reason);
  }

  exportSessionLog(): SessionLogDocument {
    return toSessionLogDocument(this.state.snapshot());
  }

  /** Notes internes du dernier tour clos (affichage debug) */
  getAgentThoughts(): readonly string[] {
    const turns = this.state.turns;
    return turns.length > 0 ? turns[turns.length - 1].internalThoughts : [];
  }

  // ============================================
  // ÉTAPES DU TOUR
  // ============================================

  private async open(): Promise<void> {
    const topic = this.state.skillTree.activeTopic();
    const generation = await this.generate({
      directive: 'open_interview',
      protocol: this.state.protocol,
      topic: topic ? { label: topic.label, difficulty: topic.difficulty } : null,
      metadata: this.state.metadata,
      history: [],
      intent: null,
      candidateMessage: null,
      pendingQuestion: null,
      correctAnswer: null,
      hallucinationDetected: false,
    });

    if (!generation.ok) {
      console.error(`[ORCHESTRATOR] Opening message failed: ${generation.reason}`);
      await this.terminate(null, 'generation_failure');
      return;
    }

    this.carry('Voice', generation.thought);
    this.state.setPendingMessage(generation.message);
    this.state.setPhase('awaiting_input');
    await this.persist();
  }

  /** Skeptic et Empath en parallèle ; les deux sont réglés avant le planner */
  private async evaluate(
    draft: TurnDraft,
    message: string,
    pendingQuestion: string,
  ): Promise<[TechnicalEvaluation | null, BehavioralEvaluation | null]> {
    const topic = this.state.skillTree.activeTopic();
    const [technicalResult, behavioralResult] = await Promise.allSettled([
      topic
        ? this.agents.technical.evaluate({
            message,
            pendingQuestion,
            topic: { label: topic.label, difficulty: topic.difficulty },
            metadata: this.state.metadata,
          })
        : Promise.reject(new InterviewEngineError('No active topic to evaluate', 'INVALID_TOPIC_UPDATE')),
      this.agents.behavioral.evaluate({ message, pendingQuestion }),
    ]);

    let technical: TechnicalEvaluation | null = null;
    if (technicalResult.status === 'fulfilled') {
      technical = technicalResult.value;
      draft.note('Skeptic', describeTechnicalEvaluation(technical));
    } else {
      console.warn('[SKEPTIC] Evaluation failed:', describeError(technicalResult.reason));
      draft.note('Skeptic', `Evaluation failed: ${describeError(technicalResult.reason)}`);
    }

    let behavioral: BehavioralEvaluation | null = null;
    if (behavioralResult.status === 'fulfilled') {
      behavioral = behavioralResult.value;
      draft.note('Empath', describeBehavioralEvaluation(behavioral));
    } else {
      console.warn('[EMPATH] Evaluation failed:', describeError(behavioralResult.reason));
      draft.note('Empath', `Evaluation failed: ${describeError(behavioralResult.reason)}`);
    }

    return [technical, behavioral];
  }

  /** Commit synchrone de tout ce que le tour a produit */
  private commit(
    draft: TurnDraft,
    intent: Intent,
    technical: TechnicalEvaluation | null,
    behavioral: BehavioralEvaluation | null,
    decision: PlannerDecision,
  ): void {
    if (technical) {
      this.state.applyTechnicalEvaluation({
        score: technical.score,
        feedback: technical.thought,
        correctAnswer: technical.correctAnswer,
      });
    }
    this.state.applyProtocolDecision(decision);

    const behavior = this.state.behavior;
    this.state.updateBehavior({
      questionCount: behavior.questionCount + (intent === 'question' ? 1 : 0),
      offTopicCount: behavior.offTopicCount + (intent === 'off_topic' ? 1 : 0),
      hallucinationCount: behavior.hallucinationCount + (technical && isHallucination(technical) ? 1 : 0),
      contradictionCount: behavior.contradictionCount + (technical?.contradictionDetected ? 1 : 0),
      ...(behavioral ? { demeanor: behavioral.demeanor, stressLevel: behavioral.stressLevel } : {}),
    });

    draft.degraded = decision.degraded;
    draft.note('Planner', `${decision.directive} [${decision.protocol}] ${decision.thought}`);
  }

  /** 1 tentative + 1 retry avec la même directive */
  private async generate(context: GenerationContext): Promise<GenerationResult> {
    const failures: string[] = [];
    for (let attempt = 1; attempt <= INTERVIEW_POLICY.GENERATION.MAX_ATTEMPTS; attempt++) {
      try {
        const output = await this.agents.voice.evaluate(context);
        const thought = output.thought || `${context.directive} message generated.`;
        return { ok: true, message: output.message, thought: attempt > 1 ? `${thought} (attempt ${attempt})` : thought };
      } catch (error) {
        console.warn(`[VOICE] Attempt ${attempt} failed:`, describeError(error));
        failures.push(describeError(error));
      }
    }
    return { ok: false, reason: failures.join('; ') };
  }

  private async terminate(turn: TurnRecord | null, reason: TerminationReason): Promise<TerminatedOutcome> {
    this.state.setPhase('terminal');
    const verdict = await this.report(reason);
    this.state.close(reason, verdict);
    await this.persist();
    console.log(`[ORCHESTRATOR] Session ${this.state.sessionId} closed (${reason})`);
    return { kind: 'terminated', turn, reason, verdict, report: formatReport(verdict) };
  }

  private async report(reason: TerminationReason): Promise<FinalVerdict> {
    const snapshot = this.state.snapshot();
    for (let attempt = 1; attempt <= this.options.reportMaxAttempts; attempt++) {
      try {
        const output = await this.agents.reporter.evaluate({ snapshot, reason });
        return composeVerdict(snapshot, output);
      } catch (error) {
        console.warn(`[REPORTER] Attempt ${attempt}/${this.options.reportMaxAttempts} failed:`, describeError(error));
      }
    }
    console.error('[REPORTER] All attempts failed, using fallback verdict');
    return composeVerdict(snapshot, null);
  }

  // ============================================
  // UTILITAIRES
  // ============================================

  private carry(agent: string, thought: string): void {
    this.carried.push({ agent, thought });
  }

  private openDraft(userMessage: string | undefined): TurnDraft {
    const draft = this.state.openTurn(userMessage);
    for (const { agent, thought } of this.carried) {
      draft.note(agent, thought);
    }
    this.carried = [];
    return draft;
  }

  private history(): ConversationExchange[] {
    return this.state.turns
      .flatMap((turn) =>
        turn.userMessage === undefined ? [] : [{ interviewer: turn.agentVisibleMessage, candidate: turn.userMessage }],
      )
      .slice(-INTERVIEW_POLICY.GENERATION.HISTORY_TURNS);
  }

  private async persist(): Promise<void> {
    if (!this.logSink) {
      return;
    }
    try {
      await this.logSink.write(this.state.sessionId, this.exportSessionLog());
    } catch (error) {
      console.error('[ORCHESTRATOR] Session log write failed:', describeError(error));
    }
  }
}
