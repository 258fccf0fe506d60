// ===== ERROR CODES =====
// Every code is session-local and recoverable: the client sees one `error`
// event and may send a new `start`.

export const ERROR_CODES = [
  'MalformedFrame',
  'MalformedMessage',
  'SessionBusy',
  'UpstreamUnavailable',
  'UpstreamClosed',
  'FinalTimeout',
  'SessionNotFound',
] as const;

export type RecognitionErrorCode = typeof ERROR_CODES[number];

export class RecognitionError extends Error {
  public readonly code: RecognitionErrorCode;
  public cause?: unknown;

  constructor(code: RecognitionErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'RecognitionError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * Wraps anything thrown by an upstream call into a RecognitionError with the
 * given fallback code, keeping the original as `cause`.
 */
export function toRecognitionError(err: unknown, fallback: RecognitionErrorCode): RecognitionError {
  if (err instanceof RecognitionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new RecognitionError(fallback, message, err);
}
