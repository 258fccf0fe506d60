import WebSocket from 'ws';
import { RecognitionError } from '@asr-gateway/types';
import type { RecognizerConnection, RecognizerSink } from './base';
import { errorMessage, type Logger } from '../../utils/logger';
import { rawToString } from '../../utils/ws-data';

/**
 * Opens an outbound WebSocket and resolves with `attach(ws)` once the
 * handshake completes. `attach` runs inside the `open` handler, so whatever it
 * registers on the socket is in place before the next frame is dispatched.
 * Rejects with `UpstreamUnavailable` if the socket errors or closes first,
 * or if `signal` aborts (the half-open socket is terminated).
 */
export function openSocket<T>(
  url: string,
  headers: Record<string, string>,
  signal: AbortSignal,
  log: Logger,
  attach: (ws: WebSocket) => T,
): Promise<T> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new RecognitionError('UpstreamUnavailable', 'upstream connect aborted'));
      return;
    }

    const ws = new WebSocket(url, { headers, perMessageDeflate: false });

    const fail = (message: string, cause?: unknown) => {
      signal.removeEventListener('abort', onAbort);
      ws.removeAllListeners();
      // A late socket error must not surface as an unhandled 'error' event
      ws.on('error', (e: Error) => log.debug('Socket error after connect failure:', e.message));
      try { ws.terminate(); } catch (e: unknown) {
        log.warn('Failed to terminate half-open socket:', errorMessage(e));
      }
      reject(new RecognitionError('UpstreamUnavailable', message, cause));
    };

    const onAbort = () => fail('upstream connect aborted');
    signal.addEventListener('abort', onAbort, { once: true });

    ws.once('open', () => {
      signal.removeEventListener('abort', onAbort);
      ws.removeAllListeners();
      resolve(attach(ws));
    });
    ws.once('error', (e: Error) => fail(`upstream connect failed: ${e.message}`, e));
    ws.once('close', (code: number) => fail(`upstream closed during connect (code ${code})`));
  });
}

/**
 * Shared plumbing for a provider stream on an open socket: routes messages to
 * `handleMessage`, assembles the utterance transcript from committed segments
 * plus the current interim, and makes sure the sink sees at most one terminal.
 */
export abstract class RecognizerStream implements RecognizerConnection {
  private committed: string[] = [];
  private lastPartial = '';
  private terminalSent = false;
  protected finishing = false;

  constructor(
    protected readonly ws: WebSocket,
    protected readonly sink: RecognizerSink,
    protected readonly log: Logger,
    private readonly joiner: string,
  ) {
    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      let msg: unknown;
      try {
        msg = JSON.parse(rawToString(data));
      } catch (e: unknown) {
        this.log.warn('Ignoring non-JSON upstream message:', errorMessage(e));
        return;
      }
      this.handleMessage(msg);
    });

    ws.on('error', (e: Error) => {
      this.log.error('Upstream socket error:', e.message);
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.onSocketClosed(code);
      this.sink.onClose(code, reason.toString());
    });
  }

  protected abstract handleMessage(msg: unknown): void;

  /** Message the provider expects as end-of-utterance. */
  protected abstract finishMessage(): string;

  /** Called before `onClose` is forwarded; the default does nothing. */
  protected onSocketClosed(_code: number): void {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  sendAudio(pcm: Buffer): void {
    if (!this.isOpen) {
      throw new RecognitionError('UpstreamClosed', 'upstream connection is not open');
    }
    this.ws.send(pcm);
  }

  finish(): void {
    if (this.finishing) return;
    this.finishing = true;
    if (this.isOpen) {
      this.ws.send(this.finishMessage());
    }
  }

  terminate(): void {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    try { this.ws.terminate(); } catch (e: unknown) {
      this.log.warn('Failed to terminate upstream socket:', errorMessage(e));
    }
  }

  protected sendJson(msg: Record<string, unknown>): void {
    if (this.isOpen) this.ws.send(JSON.stringify(msg));
  }

  protected get transcript(): string {
    return this.committed.join(this.joiner).trim();
  }

  /** Commits a finalized segment and re-emits the running transcript. */
  protected commit(segment: string): void {
    const text = segment.trim();
    if (text) this.committed.push(text);
    this.emitPartial('');
  }

  /** Emits the committed text plus the current interim, skipping repeats. */
  protected emitPartial(interim: string): void {
    if (this.terminalSent) return;
    const text = [this.transcript, interim.trim()].filter(Boolean).join(this.joiner);
    if (!text || text === this.lastPartial) return;
    this.lastPartial = text;
    this.sink.onPartial(text);
  }

  protected emitFinal(): void {
    if (this.terminalSent) return;
    this.terminalSent = true;
    this.sink.onFinal(this.transcript);
  }

  protected emitError(err: RecognitionError): void {
    if (this.terminalSent) return;
    this.terminalSent = true;
    this.sink.onError(err);
  }
}
