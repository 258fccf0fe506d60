import { createLogger, type Logger } from './utils/logger';

export interface FinalTranscript {
  chatSessionId: string;
  sessionId: string;
  text: string;
}

/** Receives the final transcript of each completed utterance. */
export interface TranscriptSink {
  deliver(transcript: FinalTranscript): Promise<void>;
}

export class NoopTranscriptSink implements TranscriptSink {
  private log = createLogger('transcript');

  async deliver(transcript: FinalTranscript): Promise<void> {
    this.log.debug(`[${transcript.sessionId}] final transcript (${transcript.text.length} chars), no chat webhook configured`);
  }
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WebhookSinkOptions {
  url: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Posts each final transcript to the chat pipeline as a user turn.
 */
export class WebhookTranscriptSink implements TranscriptSink {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(opts: WebhookSinkOptions) {
    this.url = opts.url;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = opts.logger ?? createLogger('transcript');
  }

  async deliver(transcript: FinalTranscript): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chatSessionId: transcript.chatSessionId,
        role: 'user',
        content: transcript.text,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Chat webhook error: ${response.status} ${detail}`.trim());
    }
    this.log.debug(`[${transcript.sessionId}] delivered final transcript to chat session ${transcript.chatSessionId}`);
  }
}

export function createTranscriptSink(chatWebhookUrl: string | null): TranscriptSink {
  return chatWebhookUrl ? new WebhookTranscriptSink({ url: chatWebhookUrl }) : new NoopTranscriptSink();
}
