import { withTimeout } from '../../../src/utils/withTimeout';

describe('withTimeout', () => {
  test('resolves with the value of a fast call', async () => {
    await expect(withTimeout(async () => 42, 100, 'fast')).resolves.toBe(42);
  });

  test('aborts the signal and rejects with PROVIDER_TIMEOUT', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout(
      (signal) => {
        seen.signal = signal;
        return new Promise<never>(() => undefined);
      },
      20,
      'slow',
    );

    await expect(pending).rejects.toMatchObject({ code: 'PROVIDER_TIMEOUT', message: 'slow timed out after 20ms' });
    expect(seen.signal?.aborted).toBe(true);
  });
});
