// STT provider base interface
// Wraps realtime streaming recognizers behind a common connect/send/finish API

import type { RecognitionError } from '@asr-gateway/types';
import type { STTType } from '../../gateway-config';

export interface STTConnectionOptions {
  sampleRate: number;
  channels: number;
  /** Correlates upstream logs with the client session. */
  sessionId: string;
}

/**
 * Receives upstream results for one utterance. A provider calls `onFinal` or
 * `onError` at most once; `onClose` fires when the socket is gone, whatever the cause.
 */
export interface RecognizerSink {
  onPartial(text: string): void;
  onFinal(text: string): void;
  onError(error: RecognitionError): void;
  onClose(code: number, reason: string): void;
}

/** An upstream stream that has confirmed readiness. */
export interface RecognizerConnection {
  /** Throws once the socket is no longer open. */
  sendAudio(pcm: Buffer): void;
  /** Signals end of utterance; the provider answers with a final result. */
  finish(): void;
  /** Tears the socket down immediately. Safe to call more than once. */
  terminate(): void;
  readonly isOpen: boolean;
}

export interface STTProvider {
  name: string;
  type: STTType;

  /**
   * Resolves once the upstream is ready to take audio. Rejects with
   * `UpstreamUnavailable` on failure; an abort of `signal` terminates the
   * half-open socket and rejects.
   */
  connect(options: STTConnectionOptions, sink: RecognizerSink, signal: AbortSignal): Promise<RecognizerConnection>;
}
