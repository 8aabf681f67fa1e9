import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { SessionLogDocument } from '../types/log.js';
import type { SessionSnapshot } from '../types/session.js';

export interface SessionLogSink {
  write(sessionId: string, document: SessionLogDocument): Promise<void>;
}

/** Conversion de l'instantané de session vers le format JSON des logs */
export function toSessionLogDocument(snapshot: SessionSnapshot): SessionLogDocument {
  return {
    participant_name: snapshot.metadata.name,
    session_start: snapshot.startedAt.toISOString(),
    metadata: {
      role: snapshot.metadata.role,
      target_grade: snapshot.metadata.targetGrade,
      experience: snapshot.metadata.experience,
    },
    turns: snapshot.turns.map((turn) => ({
      turn_id: turn.turnId,
      agent_visible_message: turn.agentVisibleMessage,
      ...(turn.userMessage !== undefined ? { user_message: turn.userMessage } : {}),
      internal_thoughts: [...turn.internalThoughts],
    })),
    final_feedback: snapshot.finalFeedback,
    termination_reason: snapshot.terminationReason,
  };
}

export function sessionLogPath(logsDir: string, sessionId: string): string {
  return path.join(logsDir, `interview_log_${sessionId}.json`);
}

/** Écrit `<logsDir>/interview_log_<sessionId>.json`, réécrit à chaque tour */
export class SessionLogWriter implements SessionLogSink {
  constructor(private readonly logsDir: string) {}

  async write(sessionId: string, document: SessionLogDocument): Promise<void> {
    await mkdir(this.logsDir, { recursive: true });
    await writeFile(sessionLogPath(this.logsDir, sessionId), `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  }
}
