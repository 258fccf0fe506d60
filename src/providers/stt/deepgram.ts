import type WebSocket from 'ws';
import { z } from 'zod';
import { RecognitionError } from '@asr-gateway/types';
import type { DeepgramConfig } from '../../gateway-config';
import { createLogger, type Logger } from '../../utils/logger';
import type { RecognizerConnection, RecognizerSink, STTConnectionOptions, STTProvider } from './base';
import { RecognizerStream, openSocket } from './stream';

// Deepgram drops a live stream after ~10s without audio or a KeepAlive.
// A tick with no audio since the previous one sends a KeepAlive, so the
// longest silence the service sees is just under two intervals.
const KEEPALIVE_INTERVAL_MS = 4000;

const ResultsSchema = z.object({
  type: z.literal('Results'),
  is_final: z.boolean().optional(),
  channel: z.object({
    alternatives: z.array(z.object({ transcript: z.string() })),
  }),
});

const MetadataSchema = z.object({
  type: z.literal('Metadata'),
  request_id: z.string().optional(),
});

const ErrorSchema = z.object({
  type: z.literal('Error'),
  description: z.string().optional(),
});

const DeepgramMessageSchema = z.discriminatedUnion('type', [ResultsSchema, MetadataSchema, ErrorSchema]);

/**
 * Deepgram live transcription stream.
 *
 * `is_final` results are committed segments of the utterance; interim results
 * replace each other. End-of-utterance is `CloseStream`, after which Deepgram
 * flushes its remaining results, sends `Metadata` and closes the socket.
 */
class DeepgramStream extends RecognizerStream {
  private keepAlive: NodeJS.Timeout | null = null;
  private audioSinceTick = false;

  constructor(ws: WebSocket, sink: RecognizerSink, log: Logger) {
    super(ws, sink, log, ' ');
    this.keepAlive = setInterval(() => {
      if (!this.audioSinceTick && !this.finishing) {
        this.sendJson({ type: 'KeepAlive' });
      }
      this.audioSinceTick = false;
    }, KEEPALIVE_INTERVAL_MS);
    this.keepAlive.unref();
  }

  sendAudio(pcm: Buffer): void {
    super.sendAudio(pcm);
    this.audioSinceTick = true;
  }

  protected finishMessage(): string {
    return JSON.stringify({ type: 'CloseStream' });
  }

  protected handleMessage(raw: unknown): void {
    const parsed = DeepgramMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.debug('Ignoring upstream message', describeType(raw));
      return;
    }
    const msg = parsed.data;
    switch (msg.type) {
      case 'Results': {
        const transcript = msg.channel.alternatives[0]?.transcript ?? '';
        if (msg.is_final === true) {
          this.commit(transcript);
        } else {
          this.emitPartial(transcript);
        }
        return;
      }
      case 'Metadata':
        // Sent once the stream has been fully flushed after CloseStream
        if (this.finishing) this.emitFinal();
        return;
      case 'Error':
        this.emitError(new RecognitionError('UpstreamClosed', `deepgram: ${msg.description ?? 'upstream error'}`));
        return;
    }
  }

  protected onSocketClosed(code: number): void {
    this.clearKeepAlive();
    // A clean close after CloseStream means every result has been delivered
    if (this.finishing && code === 1000) this.emitFinal();
  }

  terminate(): void {
    this.clearKeepAlive();
    super.terminate();
  }

  private clearKeepAlive(): void {
    if (this.keepAlive) {
      clearInterval(this.keepAlive);
      this.keepAlive = null;
    }
  }
}

function describeType(msg: unknown): string {
  const typed = z.object({ type: z.string() }).safeParse(msg);
  return typed.success ? typed.data.type : 'without a type';
}

export class DeepgramSTT implements STTProvider {
  name = 'Deepgram STT';
  type = 'deepgram' as const;
  private log = createLogger('deepgram');

  constructor(private readonly config: DeepgramConfig) {}

  buildWebSocketUrl(opts: STTConnectionOptions): string {
    const params = new URLSearchParams({
      encoding: 'linear16',
      sample_rate: String(opts.sampleRate),
      channels: String(opts.channels),
      punctuate: 'true',
      interim_results: 'true',
      endpointing: String(this.config.endpointingMs),
      language: this.config.language,
      model: this.config.model,
      smart_format: 'true',
    });
    return `${this.config.baseUrl}?${params.toString()}`;
  }

  async connect(options: STTConnectionOptions, sink: RecognizerSink, signal: AbortSignal): Promise<RecognizerConnection> {
    const url = this.buildWebSocketUrl(options);
    this.log.debug('Connecting for session', options.sessionId, 'to', url);
    const stream = await openSocket(
      url,
      { Authorization: `Token ${this.config.apiKey}` },
      signal,
      this.log,
      (ws) => new DeepgramStream(ws, sink, this.log),
    );
    this.log.debug('Stream open for session', options.sessionId);
    return stream;
  }
}
