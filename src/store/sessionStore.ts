import type { CandidateMetadata } from '../types/interview.js';
import { InterviewEngineError } from '../engine/errors.js';
import {
  InterviewOrchestrator,
  type OrchestratorDeps,
  type OrchestratorOptions,
} from '../engine/orchestrator.js';

export const DEFAULT_CLOSED_SESSION_TTL_MS = 15 * 60_000;

/**
 * Registre en mémoire des sessions actives.
 * Une session = un orchestrateur ; les sessions ne partagent aucun état.
 * Une session close reste consultable `closedSessionTtlMs`, puis est retirée
 * (le log JSON en garde la trace).
 */
export class InterviewSessionStore {
  private sessions: Map<string, InterviewOrchestrator> = new Map();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: Omit<OrchestratorOptions, 'sessionId'>,
    private readonly closedSessionTtlMs: number = DEFAULT_CLOSED_SESSION_TTL_MS,
  ) {}

  async create(metadata: CandidateMetadata, sessionId?: string): Promise<InterviewOrchestrator> {
    this.prune();
    if (sessionId && this.sessions.has(sessionId)) {
      throw new InterviewEngineError(`Session ${sessionId} already exists`, 'TRANSITION_FORBIDDEN');
    }
    const orchestrator = await InterviewOrchestrator.start(metadata, this.deps, { ...this.options, sessionId });
    this.sessions.set(orchestrator.sessionId, orchestrator);
    console.log('[STORE] Session created:', orchestrator.sessionId, `(${this.sessions.size} active)`);
    return orchestrator;
  }

  get(sessionId: string): InterviewOrchestrator | undefined {
    return this.sessions.get(sessionId);
  }

  /** Comme get, mais lève SESSION_NOT_FOUND */
  require(sessionId: string): InterviewOrchestrator {
    const orchestrator = this.sessions.get(sessionId);
    if (!orchestrator) {
      throw new InterviewEngineError(`Session ${sessionId} not found`, 'SESSION_NOT_FOUND');
    }
    return orchestrator;
  }

  /** Retire les sessions closes depuis au moins closedSessionTtlMs ; renvoie le nombre retiré */
  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [sessionId, orchestrator] of this.sessions) {
      const closedAt = orchestrator.closedAt;
      if (closedAt && now - closedAt.getTime() >= this.closedSessionTtlMs) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[STORE] Pruned ${removed} closed sessions (${this.sessions.size} active)`);
    }
    return removed;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
