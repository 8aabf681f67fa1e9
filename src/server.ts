import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { isInterviewEngineError, type InterviewEngineErrorCode } from './engine/errors.js';
import type { TurnOutcome } from './engine/orchestrator.js';
import type { InterviewSessionStore } from './store/sessionStore.js';

const CreateInterviewBodySchema = z.object({
  name: z.string().trim().min(1),
  role: z.string().trim().min(1),
  grade: z.string().trim().min(1),
  experience: z.string().trim().default(''),
});

const MessageBodySchema = z.object({
  message: z.string(),
});

const STATUS_BY_CODE: Partial<Record<InterviewEngineErrorCode, number>> = {
  EMPTY_MESSAGE: 400,
  SESSION_NOT_FOUND: 404,
  TRANSITION_FORBIDDEN: 409,
  SESSION_CLOSED: 409,
};

function sendError(res: Response, error: unknown): Response {
  if (isInterviewEngineError(error)) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    return res.status(status).json({ error: error.code, message: error.message });
  }
  console.error('[SERVER] Unexpected error:', error);
  return res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
}

function sendBadRequest(res: Response, error: z.ZodError): Response {
  const issue = error.issues[0];
  return res.status(400).json({
    error: 'BAD_REQUEST',
    message: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid body',
  });
}

function serializeOutcome(outcome: TurnOutcome) {
  if (outcome.kind === 'continue') {
    return { kind: outcome.kind, turnId: outcome.turn.turnId, message: outcome.message, phase: 'awaiting_input' };
  }
  return {
    kind: outcome.kind,
    turnId: outcome.turn?.turnId ?? null,
    reason: outcome.reason,
    verdict: outcome.verdict,
    report: outcome.report,
    phase: 'terminal',
  };
}

export function buildServer(store: InterviewSessionStore): Express {
  const app = express();

  app.use(express.json());
  app.use(
    cors({
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  );

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, sessions: store.size });
  });

  app.post('/interviews', async (req: Request, res: Response) => {
    const parsed = CreateInterviewBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, parsed.error);
    }

    try {
      const orchestrator = await store.create(
        {
          name: parsed.data.name,
          role: parsed.data.role,
          targetGrade: parsed.data.grade,
          experience: parsed.data.experience,
        },
        uuidv4(),
      );
      return res.status(201).json({
        sessionId: orchestrator.sessionId,
        message: orchestrator.pendingMessage,
        phase: orchestrator.phase,
        terminationReason: orchestrator.terminationReason,
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post('/interviews/:id/messages', async (req: Request, res: Response) => {
    const parsed = MessageBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, parsed.error);
    }

    try {
      const orchestrator = store.require(req.params.id);
      const outcome = await orchestrator.processMessage(parsed.data.message);
      return res.status(200).json(serializeOutcome(outcome));
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get('/interviews/:id', (req: Request, res: Response) => {
    try {
      const orchestrator = store.require(req.params.id);
      return res.status(200).json(orchestrator.exportSessionLog());
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post('/interviews/:id/finish', async (req: Request, res: Response) => {
    try {
      const orchestrator = store.require(req.params.id);
      const outcome = await orchestrator.finish('external_close');
      return res.status(200).json(serializeOutcome(outcome));
    } catch (error) {
      return sendError(res, error);
    }
  });

  return app;
}
