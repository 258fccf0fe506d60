import { describe, it, expect, vi, afterEach } from 'vitest';
import { RecognitionSession, SessionState } from '../session';
import { SessionRegistry } from '../session-registry';
import { silentLogger } from '../utils/logger';
import { FakeSTTProvider } from './helpers/fake-stt';

function makeRegistry(clock: { now: number } = { now: 0 }, provider = new FakeSTTProvider()) {
  const createSession = vi.fn(
    (id: string) =>
      new RecognitionSession({
        id,
        provider,
        connectTimeoutMs: 1000,
        finalResultTimeoutMs: 1000,
        logger: silentLogger,
        now: () => clock.now,
      }),
  );
  const registry = new SessionRegistry({
    createSession,
    idleTimeoutMs: 500,
    sweepIntervalMs: 100,
    logger: silentLogger,
    now: () => clock.now,
  });
  return { registry, createSession, provider };
}

describe('SessionRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('getOrCreate is idempotent per client id', () => {
    const { registry, createSession } = makeRegistry();

    const a = registry.getOrCreate('client-a');
    const again = registry.getOrCreate('client-a');
    const b = registry.getOrCreate('client-b');

    expect(again).toBe(a);
    expect(b).not.toBe(a);
    expect(createSession).toHaveBeenCalledTimes(2);
    expect(registry.size).toBe(2);
    expect(registry.list()).toEqual([a, b]);
  });

  it('remove closes the session and ignores unknown ids', async () => {
    const { registry, provider } = makeRegistry();
    const session = registry.getOrCreate('client-a');
    session.start();
    await session.flush();

    await registry.remove('client-a');
    await registry.remove('client-a');
    await registry.remove('never-seen');

    expect(registry.size).toBe(0);
    expect(registry.get('client-a')).toBeUndefined();
    expect(session.state).toBe(SessionState.CLOSING);
    expect(provider.last.terminated).toBe(true);
  });

  it('creates a fresh session for an id after removal', async () => {
    const { registry } = makeRegistry();
    const first = registry.getOrCreate('client-a');
    await registry.remove('client-a');

    const second = registry.getOrCreate('client-a');

    expect(second).not.toBe(first);
    expect(second.isClosed).toBe(false);
  });

  it('sweep evicts only sessions idle past the timeout', async () => {
    const clock = { now: 0 };
    const { registry } = makeRegistry(clock);
    const stale = registry.getOrCreate('stale');
    clock.now = 1000;
    const fresh = registry.getOrCreate('fresh');
    clock.now = 1200;

    const evicted = await registry.sweep();

    expect(evicted).toBe(1);
    expect(stale.isClosed).toBe(true);
    expect(fresh.isClosed).toBe(false);
    expect(registry.list()).toEqual([fresh]);
  });

  it('client activity keeps a session from being evicted', async () => {
    const clock = { now: 0 };
    const { registry } = makeRegistry(clock);
    const session = registry.getOrCreate('client-a');
    clock.now = 400;
    session.stop();
    clock.now = 800;

    expect(await registry.sweep()).toBe(0);
    expect(registry.size).toBe(1);
  });

  it('runs the sweep on its interval until stopped', () => {
    vi.useFakeTimers();
    const { registry } = makeRegistry();
    const sweep = vi.spyOn(registry, 'sweep').mockResolvedValue(0);

    registry.startSweep();
    registry.startSweep();
    vi.advanceTimersByTime(250);
    expect(sweep).toHaveBeenCalledTimes(2);

    registry.stopSweep();
    vi.advanceTimersByTime(500);
    expect(sweep).toHaveBeenCalledTimes(2);
  });

  it('drain closes every session', async () => {
    const { registry } = makeRegistry();
    const sessions = [registry.getOrCreate('a'), registry.getOrCreate('b'), registry.getOrCreate('c')];

    await registry.drain();

    expect(registry.size).toBe(0);
    expect(sessions.every((s) => s.isClosed)).toBe(true);
  });
});
