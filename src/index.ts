import { loadEnv } from './env.js';
import { buildServer } from './server.js';
import { createProvider } from './services/providerFactory.js';
import { SessionLogWriter } from './services/sessionLogWriter.js';
import { InterviewSessionStore } from './store/sessionStore.js';

const env = loadEnv();

const store = new InterviewSessionStore(
  {
    provider: createProvider(env),
    logSink: new SessionLogWriter(env.LOGS_DIR),
  },
  {
    maxTurns: env.MAX_TURNS,
    inferenceTimeoutMs: env.INFERENCE_TIMEOUT_MS,
    reportMaxAttempts: env.REPORT_MAX_ATTEMPTS,
    scorePolicy: env.SCORE_POLICY,
  },
  env.SESSION_TTL_MS,
);

// balayage périodique des sessions closes
const PRUNE_INTERVAL_MS = 60_000;
setInterval(() => store.prune(), PRUNE_INTERVAL_MS).unref();

const app = buildServer(store);

app.listen(env.PORT, '0.0.0.0', () => {
  console.log(`[SERVER] Listening on port ${env.PORT}`);
});
