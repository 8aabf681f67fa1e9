/**
 * Script de démonstration hors-ligne : un entretien complet joué contre le
 * provider heuristique, sans clé API.
 *
 * Ce script vérifie que :
 * - le plan est généré pour le poste
 * - chaque réponse produit un tour clos avec ses notes internes
 * - la session se termine avec un verdict et un log JSON
 */

import { InterviewOrchestrator } from '../src/engine/orchestrator.js';
import { HeuristicInferenceProvider } from '../src/services/heuristicProvider.js';
import { SessionLogWriter, sessionLogPath } from '../src/services/sessionLogWriter.js';

const LOGS_DIR = 'logs';

const ANSWERS = [
  'Lists are mutable and tuples are immutable; tuples can be used as dictionary keys because they are hashable.',
  "I don't know.",
  'What is the team size?',
  'REST uses HTTP verbs on resources; idempotent methods like PUT can be retried safely after a timeout.',
  'Did you watch the football game yesterday',
  'An index is a B-tree that speeds up search on a column, at the cost of slower writes and more memory.',
  'stop',
];

async function simulateInterview(): Promise<void> {
  console.log('🔍 Simulation of an offline interview\n');

  const orchestrator = await InterviewOrchestrator.start(
    { name: 'Demo Candidate', role: 'Python Backend Developer', targetGrade: 'Junior', experience: 'Django' },
    { provider: new HeuristicInferenceProvider(), logSink: new SessionLogWriter(LOGS_DIR) },
    { maxTurns: 10, inferenceTimeoutMs: 5_000, reportMaxAttempts: 1 },
  );

  const topics = orchestrator.snapshot().topics.map((topic) => `${topic.label} (${topic.difficulty})`);
  console.log('1️⃣ Plan:', topics.join(', '));
  console.log('\nInterviewer >', orchestrator.pendingMessage);

  for (const answer of ANSWERS) {
    if (orchestrator.isClosed) {
      break;
    }
    console.log('\nCandidate   >', answer);
    const outcome = await orchestrator.processMessage(answer);
    for (const thought of orchestrator.getAgentThoughts()) {
      console.log('   ', thought);
    }
    if (outcome.kind === 'continue') {
      console.log('Interviewer >', outcome.message);
    } else {
      console.log(`\n2️⃣ Interview finished (${outcome.reason})\n`);
      console.log(outcome.report);
    }
  }

  if (!orchestrator.isClosed) {
    await orchestrator.finish('external_close');
  }

  const turns = orchestrator.snapshot().turns;
  if (turns.some((turn, index) => turn.turnId !== index + 1)) {
    throw new Error('❌ Turn ids are not contiguous');
  }
  console.log(`\n✅ ${turns.length} turns, log: ${sessionLogPath(LOGS_DIR, orchestrator.sessionId)}`);
}

simulateInterview().catch((error: unknown) => {
  console.error('❌ Simulation failed:', error);
  process.exitCode = 1;
});
