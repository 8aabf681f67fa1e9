import { withTimeout } from '../utils/withTimeout.js';
import type { AgentRole, InferenceProvider, InferenceRequest } from './inferenceProvider.js';

/**
 * Base des agents adossés au provider : chaque appel part sous échéance
 * `timeoutMs`, un dépassement compte comme un échec de l'appel.
 */
export abstract class InferenceAgent {
  abstract readonly role: AgentRole;

  constructor(
    protected readonly provider: InferenceProvider,
    protected readonly timeoutMs: number,
  ) {}

  protected ask<T>(request: Omit<InferenceRequest<T>, 'role' | 'signal'>): Promise<T> {
    return withTimeout(
      (signal) => this.provider.infer({ ...request, role: this.role, signal }),
      this.timeoutMs,
      this.role,
    );
  }
}
