export type InterviewEngineErrorCode =
  | 'TRANSITION_FORBIDDEN'
  | 'SESSION_CLOSED'
  | 'SESSION_NOT_FOUND'
  | 'EMPTY_MESSAGE'
  | 'INVALID_TOPIC_UPDATE'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_FAILURE'
  | 'INVALID_PROVIDER_OUTPUT';

export class InterviewEngineError extends Error {
  constructor(
    message: string,
    public readonly code: InterviewEngineErrorCode,
  ) {
    super(message);
    this.name = 'InterviewEngineError';
  }
}

export function isInterviewEngineError(error: unknown): error is InterviewEngineError {
  return error instanceof InterviewEngineError;
}

/** Message court et lisible pour les notes internes d'un tour */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.slice(0, 120);
  }
  return String(error).slice(0, 120);
}
