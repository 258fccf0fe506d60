import type { RecognitionEvent } from '@asr-gateway/types';

/**
 * Rate-limits partial events to one per `intervalMs` per connection. Within a
 * window only the latest partial is kept; it goes out when the window closes,
 * or immediately before the next final/error so output order never changes.
 * An interval of 0 passes everything straight through.
 */
export class PartialThrottle {
  private lastPartialAt = Number.NEGATIVE_INFINITY;
  private pending: RecognitionEvent | null = null;
  private timer: NodeJS.Timeout | null = null;
  private disposed = false;

  constructor(
    private readonly write: (event: RecognitionEvent) => void,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  push(event: RecognitionEvent): void {
    if (this.disposed) return;
    if (event.kind !== 'partial' || this.intervalMs <= 0) {
      this.flush();
      this.write(event);
      return;
    }

    if (this.timer) {
      this.pending = event;
      return;
    }
    const elapsed = this.now() - this.lastPartialAt;
    if (elapsed >= this.intervalMs) {
      this.lastPartialAt = this.now();
      this.write(event);
      return;
    }
    this.pending = event;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.intervalMs - elapsed);
  }

  /** Writes the held partial, if any. */
  flush(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const event = this.pending;
    this.pending = null;
    if (event) {
      this.lastPartialAt = this.now();
      this.write(event);
    }
  }

  dispose(): void {
    this.disposed = true;
    this.pending = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
