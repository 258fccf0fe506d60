import {
  RecognitionError,
  errorEvent,
  toRecognitionError,
  type PcmFrame,
  type RecognitionEvent,
} from '@asr-gateway/types';
import type { STTProvider } from './providers/stt/base';
import type { TranscriptSink } from './transcript-sink';
import { UpstreamRecognitionClient } from './upstream-client';
import { AsyncQueue } from './utils/async-queue';
import { createLogger, errorMessage, type Logger } from './utils/logger';

export enum SessionState {
  IDLE = 'IDLE',
  RECORDING = 'RECORDING',
  AWAITING_FINAL = 'AWAITING_FINAL',
  CLOSING = 'CLOSING',
  ERROR = 'ERROR',
}

type SessionCommand =
  | { kind: 'start'; chatSessionId?: string }
  | { kind: 'audio'; frame: PcmFrame }
  | { kind: 'stop' }
  | { kind: 'upstream'; utterance: number; event: RecognitionEvent }
  | { kind: 'flush'; done: () => void }
  | { kind: 'disconnect'; reason: string };

export type SessionOutput = (event: RecognitionEvent) => void;

export interface SessionOptions {
  id: string;
  provider: STTProvider;
  connectTimeoutMs: number;
  finalResultTimeoutMs: number;
  transcriptSink?: TranscriptSink;
  chatSessionId?: string;
  onStateChange?: (state: SessionState, previous: SessionState) => void;
  logger?: Logger;
  now?: () => number;
}

/**
 * Per-client recognition session.
 *
 * Every command and every upstream event goes through one mailbox drained by
 * the session's own task, so state transitions never interleave.
 */
export class RecognitionSession {
  readonly id: string;
  readonly createdAt: number;
  lastActivityAt: number;
  chatSessionId: string | undefined;

  private _state = SessionState.IDLE;
  private _pendingPartial = '';
  private _sequenceCounter = 0;
  private _droppedFrames = 0;
  private _outOfOrderFrames = 0;
  private lastClientSeq: number | null = null;

  private readonly mailbox = new AsyncQueue<SessionCommand>();
  private upstream: UpstreamRecognitionClient | null = null;
  private opening: UpstreamRecognitionClient | null = null;
  private utterance = 0;
  private closed = false;
  private output: SessionOutput | null = null;
  private readonly task: Promise<void>;
  private readonly pumps = new Set<Promise<void>>();
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly opts: SessionOptions) {
    this.id = opts.id;
    this.now = opts.now ?? Date.now;
    this.createdAt = this.now();
    this.lastActivityAt = this.createdAt;
    this.chatSessionId = opts.chatSessionId;
    this.log = opts.logger ?? createLogger('session');
    this.task = this.run();
  }

  get state(): SessionState {
    return this._state;
  }

  get pendingPartial(): string {
    return this._pendingPartial;
  }

  get sequenceCounter(): number {
    return this._sequenceCounter;
  }

  get droppedFrames(): number {
    return this._droppedFrames;
  }

  /** Frames whose client `seq` did not increase; they are still forwarded as received. */
  get outOfOrderFrames(): number {
    return this._outOfOrderFrames;
  }

  get hasUpstream(): boolean {
    return this.upstream !== null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Routes outbound events to the current transport. Replaces any previous output. */
  attach(output: SessionOutput): void {
    this.output = output;
  }

  start(chatSessionId?: string): void {
    this.submit({ kind: 'start', chatSessionId });
  }

  feed(frame: PcmFrame): void {
    this.submit({ kind: 'audio', frame });
  }

  stop(): void {
    this.submit({ kind: 'stop' });
  }

  /** Resolves once every command submitted so far has been processed. */
  flush(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.mailbox.push({ kind: 'flush', done: resolve })) resolve();
    });
  }

  /**
   * Tears the session down: aborts a pending upstream open, discards queued
   * commands and events, releases the upstream. Safe to call more than once.
   */
  async forceClose(reason = 'disconnect'): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.opening?.close();
      const dropped = this.mailbox.clear();
      for (const cmd of dropped) {
        if (cmd.kind === 'flush') cmd.done();
      }
      if (dropped.length > 0) this.log.debug(`[${this.id}] discarded ${dropped.length} pending commands`);
      this.mailbox.push({ kind: 'disconnect', reason });
    }
    await this.task;
  }

  private submit(cmd: SessionCommand): void {
    if (this.closed) {
      this.log.debug(`[${this.id}] ignoring ${cmd.kind} on closed session`);
      return;
    }
    this.lastActivityAt = this.now();
    this.mailbox.push(cmd);
  }

  private async run(): Promise<void> {
    for await (const cmd of this.mailbox) {
      try {
        await this.handle(cmd);
      } catch (e: unknown) {
        this.log.error(`[${this.id}] ${cmd.kind} handler failed:`, errorMessage(e));
      }
    }
    await Promise.all(this.pumps);
  }

  private async handle(cmd: SessionCommand): Promise<void> {
    switch (cmd.kind) {
      case 'start':
        return this.handleStart(cmd.chatSessionId);
      case 'audio':
        return this.handleAudio(cmd.frame);
      case 'stop':
        return this.handleStop();
      case 'upstream':
        return this.handleUpstreamEvent(cmd.utterance, cmd.event);
      case 'flush':
        cmd.done();
        return;
      case 'disconnect':
        return this.handleDisconnect(cmd.reason);
    }
  }

  private async handleStart(chatSessionId: string | undefined): Promise<void> {
    if (this._state === SessionState.RECORDING || this._state === SessionState.AWAITING_FINAL) {
      this.emit(errorEvent(new RecognitionError('SessionBusy', 'an utterance is already in progress')));
      return;
    }
    if (this._state !== SessionState.IDLE) return;

    if (chatSessionId) this.chatSessionId = chatSessionId;
    this.utterance++;
    this._pendingPartial = '';
    this.lastClientSeq = null;

    const client = new UpstreamRecognitionClient({
      provider: this.opts.provider,
      sessionId: this.id,
      connectTimeoutMs: this.opts.connectTimeoutMs,
      finalResultTimeoutMs: this.opts.finalResultTimeoutMs,
      logger: this.log,
    });
    this.opening = client;
    try {
      await client.open();
    } catch (e: unknown) {
      client.close();
      if (this.closed) return;
      const err = toRecognitionError(e, 'UpstreamUnavailable');
      this.log.warn(`[${this.id}] upstream unavailable:`, err.message);
      this.setState(SessionState.ERROR);
      this.emit(errorEvent(err));
      this.setState(SessionState.IDLE);
      return;
    } finally {
      this.opening = null;
    }

    if (this.closed) {
      client.close();
      return;
    }
    this.upstream = client;
    this.setState(SessionState.RECORDING);
    this.watch(client, this.utterance);
  }

  private handleAudio(frame: PcmFrame): void {
    if (this._state !== SessionState.RECORDING || !this.upstream) {
      this._droppedFrames++;
      this.log.debug(`[${this.id}] dropped frame in ${this._state} (${this._droppedFrames} total)`);
      return;
    }
    const seq = ++this._sequenceCounter;
    this.observeClientSeq(frame.seq);
    try {
      this.upstream.send(frame.pcm);
    } catch (e: unknown) {
      this.log.warn(`[${this.id}] frame ${seq} not forwarded:`, errorMessage(e));
      this.fail(toRecognitionError(e, 'UpstreamClosed'));
    }
  }

  private observeClientSeq(seq: number | undefined): void {
    if (seq === undefined) return;
    if (this.lastClientSeq !== null && seq <= this.lastClientSeq) {
      this._outOfOrderFrames++;
      this.log.warn(`[${this.id}] client seq ${seq} after ${this.lastClientSeq}, forwarded as received`);
    }
    this.lastClientSeq = seq;
  }

  private handleStop(): void {
    if (this._state !== SessionState.RECORDING || !this.upstream) return;
    this.setState(SessionState.AWAITING_FINAL);
    this.upstream.requestFinal();
  }

  private handleUpstreamEvent(utterance: number, event: RecognitionEvent): void {
    if (utterance !== this.utterance || !this.upstream) {
      this.log.debug(`[${this.id}] ignoring stale ${event.kind} from utterance ${utterance}`);
      return;
    }
    switch (event.kind) {
      case 'partial':
        this._pendingPartial = event.text;
        this.emit(event);
        return;
      case 'final':
        this.emit(event);
        this.deliverTranscript(event.text);
        this.finishUtterance();
        this.setState(SessionState.IDLE);
        return;
      case 'error':
        this.setState(SessionState.ERROR);
        this.emit(event);
        this.finishUtterance();
        this.setState(SessionState.IDLE);
        return;
    }
  }

  private handleDisconnect(reason: string): void {
    this.setState(SessionState.CLOSING);
    this.finishUtterance();
    this.mailbox.close();
    this.log.debug(`[${this.id}] closed (${reason})`);
  }

  private fail(err: RecognitionError): void {
    this.setState(SessionState.ERROR);
    this.emit(errorEvent(err));
    this.finishUtterance();
    this.setState(SessionState.IDLE);
  }

  private finishUtterance(): void {
    const client = this.upstream;
    this.upstream = null;
    this._pendingPartial = '';
    client?.close();
  }

  // Upstream events re-enter the mailbox tagged with their utterance
  private watch(client: UpstreamRecognitionClient, utterance: number): void {
    const pump = (async () => {
      try {
        for await (const event of client.events) {
          this.mailbox.push({ kind: 'upstream', utterance, event });
        }
      } catch (e: unknown) {
        this.log.error(`[${this.id}] upstream event stream failed:`, errorMessage(e));
      }
    })();
    this.pumps.add(pump);
    void pump.finally(() => this.pumps.delete(pump));
  }

  private deliverTranscript(text: string): void {
    const sink = this.opts.transcriptSink;
    if (!sink || !text.trim()) return;
    const chatSessionId = this.chatSessionId ?? this.id;
    void sink.deliver({ chatSessionId, sessionId: this.id, text }).catch((e: unknown) => {
      this.log.warn(`[${this.id}] transcript delivery failed:`, errorMessage(e));
    });
  }

  private emit(event: RecognitionEvent): void {
    if (this.closed || !this.output) return;
    try {
      this.output(event);
    } catch (e: unknown) {
      this.log.warn(`[${this.id}] failed to deliver ${event.kind}:`, errorMessage(e));
    }
  }

  private setState(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.log.debug(`[${this.id}] ${previous} -> ${next}`);
    this.opts.onStateChange?.(next, previous);
  }
}
