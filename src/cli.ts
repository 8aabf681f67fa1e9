#!/usr/bin/env node
import * as readline from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { loadEnv } from './env.js';
import { InterviewOrchestrator } from './engine/orchestrator.js';
import { describeError } from './engine/errors.js';
import type { CandidateMetadata } from './types/interview.js';
import { formatReport } from './services/reportFormatter.js';
import { createProvider } from './services/providerFactory.js';
import { SessionLogWriter, sessionLogPath } from './services/sessionLogWriter.js';

const MaxTurnsSchema = z.coerce.number().int().min(1);

const RULE = '='.repeat(60);

function printPanel(title: string, content: string): void {
  console.log(`\n${RULE}\n  ${title}\n${RULE}\n${content}\n${RULE}\n`);
}

/** Saisie multi-ligne : une ligne vide envoie. null si interrompu (Ctrl+C). */
async function readMessage(rl: readline.Interface, signal: AbortSignal): Promise<string | null> {
  const lines: string[] = [];
  for (;;) {
    let line: string;
    try {
      line = await rl.question(lines.length === 0 ? 'You > ' : '... ', { signal });
    } catch (error) {
      if (signal.aborted) {
        return null;
      }
      throw error;
    }
    if (line.trim() === '') {
      if (lines.length > 0) {
        return lines.join('\n');
      }
      continue;
    }
    lines.push(line);
  }
}

async function askRequired(rl: readline.Interface, label: string, signal: AbortSignal): Promise<string> {
  for (;;) {
    const value = (await rl.question(`${label}: `, { signal })).trim();
    if (value) {
      return value;
    }
  }
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      name: { type: 'string', short: 'n' },
      role: { type: 'string', short: 'r' },
      grade: { type: 'string', short: 'g' },
      experience: { type: 'string', short: 'e' },
      debug: { type: 'boolean', short: 'd', default: false },
      offline: { type: 'boolean', default: false },
      'max-turns': { type: 'string' },
    },
  });

  const env = loadEnv();
  const maxTurns = values['max-turns'] === undefined ? env.MAX_TURNS : MaxTurnsSchema.parse(values['max-turns']);
  const provider = createProvider(env, values.offline);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const interrupt = new AbortController();
  const onInterrupt = (): void => interrupt.abort();
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);

  try {
    console.log('\nTechnical interview simulator\n');
    const metadata: CandidateMetadata = {
      name: values.name ?? (await askRequired(rl, 'Candidate name', interrupt.signal)),
      role: values.role ?? (await askRequired(rl, 'Role', interrupt.signal)),
      targetGrade: values.grade ?? (await askRequired(rl, 'Target grade', interrupt.signal)),
      experience: values.experience ?? (await rl.question('Experience (optional): ', { signal: interrupt.signal })),
    };

    console.log('\nPreparing the interview plan...\n');
    const orchestrator = await InterviewOrchestrator.start(
      metadata,
      { provider, logSink: new SessionLogWriter(env.LOGS_DIR) },
      {
        maxTurns,
        inferenceTimeoutMs: env.INFERENCE_TIMEOUT_MS,
        reportMaxAttempts: env.REPORT_MAX_ATTEMPTS,
        scorePolicy: env.SCORE_POLICY,
      },
    );
    console.log(`Log file: ${sessionLogPath(env.LOGS_DIR, orchestrator.sessionId)}`);

    if (orchestrator.pendingMessage !== null) {
      printPanel('Interviewer', orchestrator.pendingMessage);
    }

    while (!orchestrator.isClosed && !interrupt.signal.aborted) {
      const message = await readMessage(rl, interrupt.signal);
      if (message === null) {
        break;
      }

      console.log('\nAgents are reviewing the answer...\n');
      const outcome = await orchestrator.processMessage(message);
      if (values.debug) {
        printPanel('Internal thoughts', orchestrator.getAgentThoughts().join('\n'));
      }

      if (outcome.kind === 'continue') {
        printPanel('Interviewer', outcome.message);
      } else {
        printPanel(`Interview finished (${outcome.reason})`, outcome.report);
      }
    }

    if (!orchestrator.isClosed) {
      console.log('\nInterview interrupted, writing the final report...\n');
      const outcome = await orchestrator.finish('external_close');
      printPanel('Interview finished (external_close)', outcome.report);
    } else if (orchestrator.snapshot().turns.length === 0) {
      const verdict = orchestrator.finalFeedback;
      if (verdict) {
        printPanel(`Interview finished (${orchestrator.terminationReason ?? 'unknown'})`, formatReport(verdict));
      }
    }

    console.log(`Log saved: ${sessionLogPath(env.LOGS_DIR, orchestrator.sessionId)}`);
    console.log(`Turns: ${orchestrator.snapshot().turns.length}`);
  } finally {
    process.off('SIGINT', onInterrupt);
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error('[CLI] Fatal error:', describeError(error));
  process.exitCode = 1;
});
