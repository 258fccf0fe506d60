import { describe, it, expect, afterEach } from 'vitest';
import { DashScopeSTT } from '../providers/stt/dashscope';
import type { DashScopeConfig } from '../gateway-config';
import { isRecord } from '../utils/ws-data';
import { FakeUpstreamServer, recordingSink, type UpstreamPeer } from './helpers/fake-upstream';
import { waitFor } from './helpers/fake-stt';

const OPTIONS = { sampleRate: 16000, channels: 1, sessionId: 'conn_1' };

function config(baseUrl: string): DashScopeConfig {
  return { apiKey: 'test-secret', model: 'paraformer-realtime-v2', baseUrl };
}

function taskIdOf(msg: string): string {
  const parsed: unknown = JSON.parse(msg);
  if (isRecord(parsed) && isRecord(parsed.header) && typeof parsed.header.task_id === 'string') {
    return parsed.header.task_id;
  }
  throw new Error(`no task_id in ${msg}`);
}

function event(peer: UpstreamPeer, taskId: string, name: string, extra: Record<string, unknown> = {}): void {
  peer.socket.send(JSON.stringify({ header: { task_id: taskId, event: name, ...extra }, payload: {} }));
}

function sentence(peer: UpstreamPeer, taskId: string, text: string, sentenceEnd: boolean): void {
  peer.socket.send(JSON.stringify({
    header: { task_id: taskId, event: 'result-generated' },
    payload: { output: { sentence: { begin_time: 0, text, sentence_end: sentenceEnd } } },
  }));
}

// Acknowledges run-task; answers finish-task with one last sentence and task-finished
function scriptedService(peer: UpstreamPeer, msg: string): void {
  const taskId = taskIdOf(msg);
  if (msg.includes('"run-task"')) {
    event(peer, taskId, 'task-started');
  } else if (msg.includes('"finish-task"')) {
    sentence(peer, taskId, 'See you.', true);
    event(peer, taskId, 'task-finished');
  }
}

describe('DashScopeSTT', () => {
  let upstream: FakeUpstreamServer | null = null;

  afterEach(async () => {
    await upstream?.close();
    upstream = null;
  });

  it('builds a duplex run-task for 16 kHz pcm', () => {
    const stt = new DashScopeSTT(config('wss://dashscope.example.test/api-ws/v1/inference'));

    expect(stt.buildRunTask('task1', OPTIONS)).toEqual({
      header: { action: 'run-task', task_id: 'task1', streaming: 'duplex' },
      payload: {
        task_group: 'audio',
        task: 'asr',
        function: 'recognition',
        model: 'paraformer-realtime-v2',
        parameters: { format: 'pcm', sample_rate: 16000, semantic_punctuation_enabled: true },
        input: {},
      },
    });
  });

  it('waits for task-started before resolving and sends audio as binary', async () => {
    upstream = await FakeUpstreamServer.start(scriptedService);
    const stt = new DashScopeSTT(config(upstream.url));
    const { sink } = recordingSink();

    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    const peer = upstream.last;
    conn.sendAudio(Buffer.alloc(3200));
    await waitFor(() => peer.binary.length === 1);

    expect(peer.request.headers.authorization).toBe('bearer test-secret');
    expect(peer.request.headers['x-dashscope-datainspection']).toBe('enable');
    expect(peer.text).toHaveLength(1);
    expect(taskIdOf(peer.text[0] ?? '')).toMatch(/^[0-9a-f]{32}$/);
    expect(peer.binary[0]?.length).toBe(3200);
    conn.terminate();
  });

  it('commits finished sentences and emits the final on task-finished', async () => {
    upstream = await FakeUpstreamServer.start(scriptedService);
    const stt = new DashScopeSTT(config(upstream.url));
    const { calls, sink } = recordingSink();
    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    const peer = upstream.last;
    const taskId = taskIdOf(peer.text[0] ?? '');

    sentence(peer, taskId, 'Hello', false);
    sentence(peer, taskId, 'Hello there.', true);
    sentence(peer, taskId, 'How', false);
    await waitFor(() => calls.length === 3);
    conn.finish();
    await waitFor(() => calls.some((c) => c.startsWith('final:')));

    expect(calls).toEqual([
      'partial:Hello',
      'partial:Hello there.',
      'partial:Hello there.How',
      'partial:Hello there.See you.',
      'final:Hello there.See you.',
    ]);
    expect(JSON.parse(peer.text[1] ?? '')).toEqual({
      header: { action: 'finish-task', task_id: taskId, streaming: 'duplex' },
      payload: { input: {} },
    });
    conn.terminate();
  });

  it('delivers a result that arrives right behind task-started', async () => {
    upstream = await FakeUpstreamServer.start((peer, msg) => {
      const taskId = taskIdOf(msg);
      if (msg.includes('"run-task"')) {
        event(peer, taskId, 'task-started');
        sentence(peer, taskId, 'early', false);
      }
    });
    const stt = new DashScopeSTT(config(upstream.url));
    const { calls, sink } = recordingSink();

    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    await waitFor(() => calls.length === 1);

    expect(calls).toEqual(['partial:early']);
    conn.terminate();
  });

  it('reports a close that follows task-started to the sink', async () => {
    upstream = await FakeUpstreamServer.start((peer, msg) => {
      if (msg.includes('"run-task"')) {
        event(peer, taskIdOf(msg), 'task-started');
        peer.socket.close(1011, 'overloaded');
      }
    });
    const stt = new DashScopeSTT(config(upstream.url));
    const { calls, sink } = recordingSink();

    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    await waitFor(() => calls.length === 1);

    expect(calls).toEqual(['close:1011']);
    expect(conn.isOpen).toBe(false);
  });

  it('skips result events whose sentence has no text', async () => {
    upstream = await FakeUpstreamServer.start(scriptedService);
    const stt = new DashScopeSTT(config(upstream.url));
    const { calls, sink } = recordingSink();
    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    const peer = upstream.last;
    const taskId = taskIdOf(peer.text[0] ?? '');

    peer.socket.send(JSON.stringify({
      header: { task_id: taskId, event: 'result-generated' },
      payload: { output: { sentence: { begin_time: 0, sentence_end: false } } },
    }));
    sentence(peer, taskId, 'Hi', false);
    await waitFor(() => calls.length === 1);

    expect(calls).toEqual(['partial:Hi']);
    conn.terminate();
  });

  it('reports task-failed during recognition as UpstreamClosed', async () => {
    upstream = await FakeUpstreamServer.start(scriptedService);
    const stt = new DashScopeSTT(config(upstream.url));
    const { calls, sink } = recordingSink();
    const conn = await stt.connect(OPTIONS, sink, new AbortController().signal);
    const peer = upstream.last;

    event(peer, taskIdOf(peer.text[0] ?? ''), 'task-failed', {
      error_code: 'ResponseTimeout',
      error_message: 'no audio received',
    });
    await waitFor(() => calls.length === 1);

    expect(calls).toEqual(['error:UpstreamClosed:dashscope task failed: ResponseTimeout no audio received']);
    conn.terminate();
  });

  it('rejects with UpstreamUnavailable when the task cannot start', async () => {
    upstream = await FakeUpstreamServer.start((peer, msg) => {
      event(peer, taskIdOf(msg), 'task-failed', { error_code: 'InvalidParameter', error_message: 'bad model' });
    });
    const stt = new DashScopeSTT(config(upstream.url));

    await expect(stt.connect(OPTIONS, recordingSink().sink, new AbortController().signal)).rejects.toMatchObject({
      code: 'UpstreamUnavailable',
      message: 'dashscope task failed: InvalidParameter bad model',
    });
  });

  it('rejects when aborted while waiting for task-started', async () => {
    upstream = await FakeUpstreamServer.start();
    const stt = new DashScopeSTT(config(upstream.url));
    const abort = new AbortController();
    const server = upstream;

    const connecting = stt.connect(OPTIONS, recordingSink().sink, abort.signal);
    await waitFor(() => server.peers.length === 1 && server.last.text.length === 1);
    abort.abort();

    await expect(connecting).rejects.toMatchObject({ code: 'UpstreamUnavailable', message: 'upstream connect aborted' });
  });
});
