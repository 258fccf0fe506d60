import { describe, it, expect, vi } from 'vitest';
import { RecognitionError, type RecognitionEvent } from '@asr-gateway/types';
import { RecognitionSession, SessionState } from '../session';
import type { FinalTranscript, TranscriptSink } from '../transcript-sink';
import { silentLogger } from '../utils/logger';
import { FakeSTTProvider, pcmFrame, waitFor } from './helpers/fake-stt';

interface Harness {
  session: RecognitionSession;
  provider: FakeSTTProvider;
  events: RecognitionEvent[];
  states: SessionState[];
  delivered: FinalTranscript[];
}

function makeSession(
  provider = new FakeSTTProvider(),
  overrides: { connectTimeoutMs?: number; finalResultTimeoutMs?: number; sink?: TranscriptSink } = {},
): Harness {
  const events: RecognitionEvent[] = [];
  const states: SessionState[] = [];
  const delivered: FinalTranscript[] = [];
  const sink: TranscriptSink = overrides.sink ?? {
    deliver: async (t) => {
      delivered.push(t);
    },
  };
  const session = new RecognitionSession({
    id: 's1',
    provider,
    connectTimeoutMs: overrides.connectTimeoutMs ?? 1000,
    finalResultTimeoutMs: overrides.finalResultTimeoutMs ?? 1000,
    transcriptSink: sink,
    onStateChange: (state) => states.push(state),
    logger: silentLogger,
  });
  session.attach((event) => events.push(event));
  return { session, provider, events, states, delivered };
}

describe('RecognitionSession', () => {
  it('enters RECORDING only once the upstream is open', async () => {
    const { session, provider, events } = makeSession();

    expect(session.state).toBe(SessionState.IDLE);
    expect(session.hasUpstream).toBe(false);

    session.start();
    await session.flush();

    expect(session.state).toBe(SessionState.RECORDING);
    expect(session.hasUpstream).toBe(true);
    expect(provider.connectCalls).toBe(1);
    expect(events).toEqual([]);
  });

  it('numbers and forwards frames in arrival order', async () => {
    const { session, provider } = makeSession();
    session.start();
    session.feed(pcmFrame(160));
    session.feed(pcmFrame(320));
    session.feed(pcmFrame(480));
    await session.flush();

    expect(session.sequenceCounter).toBe(3);
    expect(provider.last.audio.map((b) => b.length)).toEqual([320, 640, 960]);
  });

  it('forwards frames whose client seq does not increase and counts them', async () => {
    const { session, provider } = makeSession();
    session.start();
    session.feed({ ...pcmFrame(160), seq: 1 });
    session.feed({ ...pcmFrame(320), seq: 3 });
    session.feed({ ...pcmFrame(480), seq: 2 });
    session.feed({ ...pcmFrame(160), seq: 2 });
    session.feed(pcmFrame(160));
    await session.flush();

    expect(provider.last.audio.map((b) => b.length)).toEqual([320, 640, 960, 320, 320]);
    expect(session.sequenceCounter).toBe(5);
    expect(session.outOfOrderFrames).toBe(2);
  });

  it('starts client seq tracking afresh for each utterance', async () => {
    const { session, provider } = makeSession();
    session.start();
    session.feed({ ...pcmFrame(), seq: 41 });
    await session.flush();
    provider.last.final('first');
    await waitFor(() => session.state === SessionState.IDLE);

    session.start();
    session.feed({ ...pcmFrame(), seq: 0 });
    await session.flush();

    expect(session.outOfOrderFrames).toBe(0);
    expect(provider.last.audio).toHaveLength(1);
  });

  it('drops and counts frames outside RECORDING without reporting an error', async () => {
    const { session, events } = makeSession();

    session.feed(pcmFrame());
    session.feed(pcmFrame());
    await session.flush();

    expect(session.droppedFrames).toBe(2);
    expect(session.sequenceCounter).toBe(0);
    expect(session.state).toBe(SessionState.IDLE);
    expect(events).toEqual([]);
  });

  it('answers a second start with exactly one SessionBusy', async () => {
    const { session, provider, events } = makeSession();

    session.start();
    session.start();
    await session.flush();

    expect(events).toEqual([
      { kind: 'error', code: 'SessionBusy', message: 'an utterance is already in progress' },
    ]);
    expect(provider.connectCalls).toBe(1);
    expect(session.state).toBe(SessionState.RECORDING);
  });

  it('treats stop as a no-op when idle or already awaiting the final', async () => {
    const { session, provider, events } = makeSession();

    session.stop();
    await session.flush();
    expect(session.state).toBe(SessionState.IDLE);

    session.start();
    session.stop();
    session.stop();
    await session.flush();

    expect(session.state).toBe(SessionState.AWAITING_FINAL);
    expect(provider.last.finishCalls).toBe(1);
    expect(events).toEqual([]);
  });

  it('streams partials and one final for a normal utterance', async () => {
    const { session, provider, events, states, delivered } = makeSession();

    session.start('chat-1');
    session.feed(pcmFrame());
    session.feed(pcmFrame());
    session.feed(pcmFrame());
    await session.flush();

    provider.last.partial('hel');
    provider.last.partial('hello');
    await waitFor(() => events.length === 2);
    expect(session.pendingPartial).toBe('hello');

    session.stop();
    await session.flush();
    provider.last.final('hello world');
    await waitFor(() => session.state === SessionState.IDLE);

    expect(events).toEqual([
      { kind: 'partial', text: 'hel' },
      { kind: 'partial', text: 'hello' },
      { kind: 'final', text: 'hello world' },
    ]);
    expect(states).toEqual([SessionState.RECORDING, SessionState.AWAITING_FINAL, SessionState.IDLE]);
    expect(provider.last.terminated).toBe(true);
    expect(session.hasUpstream).toBe(false);
    expect(session.pendingPartial).toBe('');
    await waitFor(() => delivered.length === 1);
    expect(delivered).toEqual([{ chatSessionId: 'chat-1', sessionId: 's1', text: 'hello world' }]);
  });

  it('reports UpstreamUnavailable and stays out of RECORDING', async () => {
    const provider = new FakeSTTProvider({
      failWith: new RecognitionError('UpstreamUnavailable', 'connection refused'),
    });
    const { session, events, states } = makeSession(provider);

    session.start();
    session.feed(pcmFrame());
    await session.flush();

    expect(events).toEqual([{ kind: 'error', code: 'UpstreamUnavailable', message: 'connection refused' }]);
    expect(states).toEqual([SessionState.ERROR, SessionState.IDLE]);
    expect(session.state).toBe(SessionState.IDLE);
    expect(session.hasUpstream).toBe(false);
    expect(session.droppedFrames).toBe(1);
  });

  it('times out a missing final and returns to IDLE', async () => {
    const { session, provider, events, states, delivered } = makeSession(undefined, { finalResultTimeoutMs: 30 });

    session.start();
    session.stop();
    await waitFor(() => session.state === SessionState.IDLE && events.length === 1);

    expect(events).toEqual([{ kind: 'error', code: 'FinalTimeout', message: 'no final result within 30ms' }]);
    expect(states).toEqual([
      SessionState.RECORDING,
      SessionState.AWAITING_FINAL,
      SessionState.ERROR,
      SessionState.IDLE,
    ]);
    expect(provider.last.terminated).toBe(true);
    expect(delivered).toEqual([]);
  });

  it('reports an upstream drop mid-utterance as UpstreamClosed', async () => {
    const { session, provider, events } = makeSession();
    session.start();
    await session.flush();

    provider.last.drop();
    await waitFor(() => events.length === 1);

    expect(events).toEqual([
      { kind: 'error', code: 'UpstreamClosed', message: 'upstream closed before a final result (code 1006)' },
    ]);
    expect(session.state).toBe(SessionState.IDLE);
  });

  it('accepts a final the upstream sends while still RECORDING', async () => {
    const { session, provider, events } = makeSession();
    session.start();
    await session.flush();

    provider.last.final('done already');
    await waitFor(() => session.state === SessionState.IDLE);

    expect(events).toEqual([{ kind: 'final', text: 'done already' }]);
  });

  it('sends empty finals to the client but not to the transcript sink', async () => {
    const { session, provider, events, delivered } = makeSession();
    session.start();
    session.stop();
    await session.flush();

    provider.last.final('');
    await waitFor(() => session.state === SessionState.IDLE);

    expect(events).toEqual([{ kind: 'final', text: '' }]);
    expect(delivered).toEqual([]);
  });

  it('runs consecutive utterances on fresh upstream connections', async () => {
    const { session, provider, events, delivered } = makeSession();

    session.start();
    await session.flush();
    provider.last.final('one');
    await waitFor(() => session.state === SessionState.IDLE);

    session.start();
    await session.flush();
    expect(provider.connections).toHaveLength(2);
    provider.last.final('two');
    await waitFor(() => events.length === 2);

    expect(events).toEqual([
      { kind: 'final', text: 'one' },
      { kind: 'final', text: 'two' },
    ]);
    await waitFor(() => delivered.length === 2);
    expect(delivered.map((t) => t.chatSessionId)).toEqual(['s1', 's1']);
  });

  it('keeps working when transcript delivery fails', async () => {
    const deliver = vi.fn().mockRejectedValue(new Error('chat service down'));
    const { session, provider, events } = makeSession(undefined, { sink: { deliver } });

    session.start();
    await session.flush();
    provider.last.final('hello');
    await waitFor(() => session.state === SessionState.IDLE);

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(events).toEqual([{ kind: 'final', text: 'hello' }]);

    session.start();
    await session.flush();
    expect(session.state).toBe(SessionState.RECORDING);
  });

  it('disconnect during a pending open aborts it without reporting', async () => {
    const { session, provider, events } = makeSession(new FakeSTTProvider({ hang: true }));

    session.start();
    await waitFor(() => provider.connectCalls === 1);
    await session.forceClose();

    expect(provider.abortedConnects).toBe(1);
    expect(session.state).toBe(SessionState.CLOSING);
    expect(session.isClosed).toBe(true);
    expect(events).toEqual([]);
  });

  it('settles a flush still queued when the session is torn down', async () => {
    const { session, provider } = makeSession(new FakeSTTProvider({ hang: true }));

    session.start();
    await waitFor(() => provider.connectCalls === 1);
    const flushed = session.flush();
    await session.forceClose();

    await expect(flushed).resolves.toBeUndefined();
    expect(provider.abortedConnects).toBe(1);
  });

  it('disconnect while recording releases the upstream and ignores later commands', async () => {
    const { session, provider, events } = makeSession();
    session.start();
    await session.flush();

    await session.forceClose();
    await session.forceClose();

    expect(provider.last.terminated).toBe(true);
    expect(session.state).toBe(SessionState.CLOSING);

    session.start();
    provider.last.partial('too late');
    await session.flush();
    expect(provider.connectCalls).toBe(1);
    expect(events).toEqual([]);
  });
});
