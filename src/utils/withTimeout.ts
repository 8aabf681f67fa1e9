import { InterviewEngineError } from '../engine/errors.js';

/**
 * Exécute `run` avec une échéance. À l'échéance, le signal est annulé et la
 * promesse rejetée avec PROVIDER_TIMEOUT. Le timer est libéré dans tous les cas.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new InterviewEngineError(`${label} timed out after ${timeoutMs}ms`, 'PROVIDER_TIMEOUT'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
