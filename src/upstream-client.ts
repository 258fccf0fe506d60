import { AUDIO_FORMAT, RecognitionError, type RecognitionEvent } from '@asr-gateway/types';
import type { RecognizerConnection, RecognizerSink, STTProvider } from './providers/stt/base';
import { AsyncQueue } from './utils/async-queue';
import { createLogger, errorMessage, type Logger } from './utils/logger';

export type UpstreamState = 'new' | 'opening' | 'open' | 'finishing' | 'closed';

export interface UpstreamClientOptions {
  provider: STTProvider;
  sessionId: string;
  connectTimeoutMs: number;
  finalResultTimeoutMs: number;
  logger?: Logger;
}

/**
 * One outbound recognition stream for a single utterance.
 *
 * Results are exposed as `events`: zero or more partials followed by exactly
 * one final or error, in upstream order. After the terminal event the stream
 * is released and the sequence ends.
 */
export class UpstreamRecognitionClient {
  private readonly queue = new AsyncQueue<RecognitionEvent>();
  private connection: RecognizerConnection | null = null;
  private connectAbort: AbortController | null = null;
  private finalTimer: NodeJS.Timeout | null = null;
  private terminalSeen = false;
  private _state: UpstreamState = 'new';
  private framesSent = 0;
  private readonly log: Logger;

  constructor(private readonly opts: UpstreamClientOptions) {
    this.log = opts.logger ?? createLogger('upstream');
  }

  get state(): UpstreamState {
    return this._state;
  }

  get events(): AsyncIterable<RecognitionEvent> {
    return this.queue;
  }

  get sentFrames(): number {
    return this.framesSent;
  }

  /**
   * Opens the upstream stream, bounded by `connectTimeoutMs`.
   * Throws `UpstreamUnavailable`; the half-open socket is always released.
   */
  async open(): Promise<void> {
    if (this._state !== 'new') {
      throw new RecognitionError('UpstreamUnavailable', `cannot open upstream in state ${this._state}`);
    }
    this._state = 'opening';
    const abort = new AbortController();
    this.connectAbort = abort;
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      abort.abort();
    }, this.opts.connectTimeoutMs);

    try {
      const connection = await this.opts.provider.connect(
        { sampleRate: AUDIO_FORMAT.sampleRate, channels: AUDIO_FORMAT.channels, sessionId: this.opts.sessionId },
        this.createSink(),
        abort.signal,
      );
      if (this._state !== 'opening') {
        // close() ran while the handshake was in flight
        connection.terminate();
        throw new RecognitionError('UpstreamUnavailable', 'upstream closed while opening');
      }
      this.connection = connection;
      this._state = 'open';
      this.log.debug(`[${this.opts.sessionId}] upstream ready via ${this.opts.provider.name}`);
    } catch (e: unknown) {
      this.release();
      if (timedOut) {
        throw new RecognitionError('UpstreamUnavailable', `upstream connect timed out after ${this.opts.connectTimeoutMs}ms`, e);
      }
      if (e instanceof RecognitionError) throw e;
      throw new RecognitionError('UpstreamUnavailable', errorMessage(e), e);
    } finally {
      clearTimeout(timer);
      this.connectAbort = null;
    }
  }

  /** Forwards one frame; the socket buffers it. Throws `UpstreamClosed` once terminated. */
  send(pcm: Buffer): void {
    if (this._state !== 'open' || !this.connection) {
      throw new RecognitionError('UpstreamClosed', `upstream is ${this._state === 'finishing' ? 'finishing' : 'closed'}`);
    }
    this.connection.sendAudio(pcm);
    this.framesSent++;
  }

  /**
   * Signals end of utterance and arms the final-result timer. Calling it again,
   * or after the stream closed, does nothing.
   */
  requestFinal(): void {
    if (this._state !== 'open' || !this.connection) return;
    this._state = 'finishing';
    // Armed first: a provider may answer synchronously from finish()
    this.finalTimer = setTimeout(() => {
      this.finalTimer = null;
      this.log.warn(`[${this.opts.sessionId}] no final result within ${this.opts.finalResultTimeoutMs}ms`);
      this.terminal({
        kind: 'error',
        code: 'FinalTimeout',
        message: `no final result within ${this.opts.finalResultTimeoutMs}ms`,
      });
    }, this.opts.finalResultTimeoutMs);
    this.connection.finish();
  }

  /** Releases the upstream on any path, including a pending `open()`. Idempotent. */
  close(): void {
    if (this._state === 'closed') return;
    this.connectAbort?.abort();
    this.release();
  }

  private release(): void {
    this._state = 'closed';
    if (this.finalTimer) {
      clearTimeout(this.finalTimer);
      this.finalTimer = null;
    }
    const connection = this.connection;
    this.connection = null;
    connection?.terminate();
    this.queue.close();
  }

  private terminal(event: RecognitionEvent): void {
    if (this.terminalSeen) return;
    this.terminalSeen = true;
    this.queue.push(event);
    this.release();
  }

  private createSink(): RecognizerSink {
    return {
      onPartial: (text) => {
        if (this.terminalSeen || this._state === 'closed') return;
        this.queue.push({ kind: 'partial', text });
      },
      onFinal: (text) => {
        if (this._state === 'closed') return;
        this.terminal({ kind: 'final', text });
      },
      onError: (err) => {
        if (this._state === 'closed') return;
        this.terminal({ kind: 'error', code: err.code, message: err.message });
      },
      onClose: (code, reason) => {
        if (this._state === 'closed' || this._state === 'opening') return;
        this.log.debug(`[${this.opts.sessionId}] upstream socket closed`, code, reason);
        this.terminal({
          kind: 'error',
          code: 'UpstreamClosed',
          message: `upstream closed before a final result (code ${code}${reason ? `, ${reason}` : ''})`,
        });
      },
    };
  }
}
