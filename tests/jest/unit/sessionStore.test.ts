import { InterviewSessionStore } from '../../../src/store/sessionStore';
import { ScriptedProvider, silenceConsole } from '../helpers/scriptedProvider';

const metadata = { name: 'Alex', role: 'Backend Developer', targetGrade: 'Junior', experience: '' };

describe('InterviewSessionStore', () => {
  silenceConsole();

  function createStore(closedSessionTtlMs?: number): InterviewSessionStore {
    return new InterviewSessionStore(
      { provider: new ScriptedProvider() },
      { maxTurns: 10, inferenceTimeoutMs: 1000, reportMaxAttempts: 1 },
      closedSessionTtlMs,
    );
  }

  test('keeps sessions independent', async () => {
    const store = createStore();
    const first = await store.create(metadata, 'a');
    const second = await store.create(metadata, 'b');

    await first.processMessage('An answer.');

    expect(store.size).toBe(2);
    expect(store.require('a').snapshot().turns).toHaveLength(1);
    expect(second.snapshot().turns).toHaveLength(0);
  });

  test('refuses a duplicate id', async () => {
    const store = createStore();
    await store.create(metadata, 'a');
    await expect(store.create(metadata, 'a')).rejects.toMatchObject({ code: 'TRANSITION_FORBIDDEN' });
  });

  test('require throws SESSION_NOT_FOUND after delete', async () => {
    const store = createStore();
    await store.create(metadata, 'a');

    expect(store.delete('a')).toBe(true);
    expect(store.get('a')).toBeUndefined();
    expect(() => store.require('a')).toThrow('Session a not found');
  });

  test('prune removes closed sessions once their retention has passed', async () => {
    const store = createStore(60_000);
    for (const id of ['a', 'b', 'c', 'd', 'e']) {
      const orchestrator = await store.create(metadata, id);
      await orchestrator.processMessage('stop');
    }
    await store.create(metadata, 'open');

    const closedAt = store.require('a').closedAt;
    expect(closedAt).not.toBeNull();
    const base = closedAt?.getTime() ?? 0;

    expect(store.prune(base)).toBe(0);
    expect(store.size).toBe(6);

    expect(store.prune(base + 120_000)).toBe(5);
    expect(store.size).toBe(1);
    expect(store.get('open')?.isClosed).toBe(false);
  });

  test('create prunes closed sessions without retention', async () => {
    const store = createStore(0);
    const first = await store.create(metadata, 'a');
    await first.processMessage('stop');
    expect(store.size).toBe(1);

    await store.create(metadata, 'b');

    expect(store.size).toBe(1);
    expect(store.get('a')).toBeUndefined();
  });
});
