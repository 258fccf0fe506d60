import type WebSocket from 'ws';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { RecognitionError } from '@asr-gateway/types';
import type { DashScopeConfig } from '../../gateway-config';
import { createLogger, errorMessage, type Logger } from '../../utils/logger';
import type { RecognizerConnection, RecognizerSink, STTConnectionOptions, STTProvider } from './base';
import { RecognizerStream, openSocket } from './stream';
import { rawToString } from '../../utils/ws-data';

const TaskHeaderSchema = z.object({
  event: z.string(),
  task_id: z.string().optional(),
  error_code: z.string().optional(),
  error_message: z.string().optional(),
});
type TaskHeader = z.infer<typeof TaskHeaderSchema>;

const SentenceSchema = z.object({
  text: z.string(),
  sentence_end: z.boolean().optional(),
});

const TaskEventSchema = z.object({
  header: TaskHeaderSchema,
  payload: z
    .object({
      output: z.object({ sentence: SentenceSchema.optional() }).optional(),
    })
    .optional(),
});
type TaskEvent = z.infer<typeof TaskEventSchema>;

function parseTaskEvent(msg: unknown): TaskEvent | null {
  const parsed = TaskEventSchema.safeParse(msg);
  return parsed.success ? parsed.data : null;
}

function describeFailure(header: TaskHeader): string {
  return `dashscope task failed: ${header.error_code ?? 'unknown'} ${header.error_message ?? ''}`.trim();
}

/**
 * DashScope realtime recognition task over the duplex inference socket.
 * Sentences flagged `sentence_end` are committed; `finish-task` makes the
 * service flush and answer with `task-finished`.
 */
class DashScopeStream extends RecognizerStream {
  constructor(ws: WebSocket, sink: RecognizerSink, log: Logger, private readonly taskId: string) {
    super(ws, sink, log, '');
  }

  protected finishMessage(): string {
    return JSON.stringify({
      header: { action: 'finish-task', task_id: this.taskId, streaming: 'duplex' },
      payload: { input: {} },
    });
  }

  protected handleMessage(msg: unknown): void {
    const event = parseTaskEvent(msg);
    if (!event) {
      this.log.debug('Ignoring malformed task event');
      return;
    }
    const { header } = event;
    switch (header.event) {
      case 'result-generated': {
        const sentence = event.payload?.output?.sentence;
        if (!sentence) return;
        if (sentence.sentence_end === true) {
          this.commit(sentence.text);
        } else {
          this.emitPartial(sentence.text);
        }
        return;
      }
      case 'task-finished':
        this.emitFinal();
        return;
      case 'task-failed':
        this.emitError(new RecognitionError('UpstreamClosed', describeFailure(header)));
        return;
      default:
        this.log.debug('Ignoring task event', header.event);
    }
  }
}

export class DashScopeSTT implements STTProvider {
  name = 'DashScope Paraformer';
  type = 'dashscope' as const;
  private log = createLogger('dashscope');

  constructor(private readonly config: DashScopeConfig) {}

  buildRunTask(taskId: string, opts: STTConnectionOptions): Record<string, unknown> {
    return {
      header: { action: 'run-task', task_id: taskId, streaming: 'duplex' },
      payload: {
        task_group: 'audio',
        task: 'asr',
        function: 'recognition',
        model: this.config.model,
        parameters: {
          format: 'pcm',
          sample_rate: opts.sampleRate,
          semantic_punctuation_enabled: true,
        },
        input: {},
      },
    };
  }

  async connect(options: STTConnectionOptions, sink: RecognizerSink, signal: AbortSignal): Promise<RecognizerConnection> {
    const taskId = randomUUID().replace(/-/g, '');
    return await openSocket(
      this.config.baseUrl,
      { Authorization: `bearer ${this.config.apiKey}`, 'X-DashScope-DataInspection': 'enable' },
      signal,
      this.log,
      (ws) => {
        this.log.debug('Socket open for session', options.sessionId, 'starting task', taskId);
        return this.startTask(ws, taskId, options, sink, signal);
      },
    );
  }

  // The socket is only ready for audio once the service acknowledges run-task.
  // The stream takes over the socket inside the task-started handler, so
  // results that arrive right behind it reach the sink.
  private startTask(
    ws: WebSocket,
    taskId: string,
    options: STTConnectionOptions,
    sink: RecognizerSink,
    signal: AbortSignal,
  ): Promise<DashScopeStream> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        signal.removeEventListener('abort', onAbort);
        ws.off('message', onMessage);
        ws.off('close', onClose);
        ws.off('error', onError);
      };
      const fail = (message: string, cause?: unknown) => {
        cleanup();
        ws.on('error', (e: Error) => this.log.debug('Socket error after task start failure:', e.message));
        ws.terminate();
        reject(new RecognitionError('UpstreamUnavailable', message, cause));
      };
      const onAbort = () => fail('upstream connect aborted');
      const onClose = (code: number) => fail(`upstream closed before task start (code ${code})`);
      const onError = (e: Error) => fail(`upstream error before task start: ${e.message}`, e);
      const onMessage = (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) return;
        let event: TaskEvent | null;
        try {
          event = parseTaskEvent(JSON.parse(rawToString(data)));
        } catch (e: unknown) {
          this.log.warn('Ignoring non-JSON message before task start:', errorMessage(e));
          return;
        }
        if (!event) return;
        if (event.header.event === 'task-started') {
          cleanup();
          resolve(new DashScopeStream(ws, sink, this.log, taskId));
        } else if (event.header.event === 'task-failed') {
          fail(describeFailure(event.header));
        }
      };

      if (signal.aborted) {
        fail('upstream connect aborted');
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      ws.on('message', onMessage);
      ws.on('close', onClose);
      ws.on('error', onError);
      ws.send(JSON.stringify(this.buildRunTask(taskId, options)));
    });
  }
}
