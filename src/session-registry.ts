import type { RecognitionSession } from './session';
import { createLogger, errorMessage, type Logger } from './utils/logger';

export type SessionFactory = (clientId: string) => RecognitionSession;

export interface SessionRegistryOptions {
  createSession: SessionFactory;
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Process-wide map of live sessions keyed by client id.
 *
 * The map is only mutated synchronously; closing a removed session happens
 * afterwards, so a slow upstream never holds up other clients.
 */
export class SessionRegistry {
  private sessions = new Map<string, RecognitionSession>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly opts: SessionRegistryOptions) {
    this.log = opts.logger ?? createLogger('registry');
    this.now = opts.now ?? Date.now;
  }

  getOrCreate(clientId: string): RecognitionSession {
    const existing = this.sessions.get(clientId);
    if (existing) return existing;
    const session = this.opts.createSession(clientId);
    this.sessions.set(clientId, session);
    this.log.debug(`Session ${clientId} created (${this.sessions.size} active)`);
    return session;
  }

  get(clientId: string): RecognitionSession | undefined {
    return this.sessions.get(clientId);
  }

  /** Removes and force-closes the session. Removing an unknown id does nothing. */
  async remove(clientId: string, reason = 'disconnect'): Promise<void> {
    const session = this.sessions.get(clientId);
    if (!session) return;
    this.sessions.delete(clientId);
    this.log.debug(`Session ${clientId} removed: ${reason} (${this.sessions.size} active)`);
    await session.forceClose(reason);
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): RecognitionSession[] {
    return Array.from(this.sessions.values());
  }

  startSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((e: unknown) => {
        this.log.error('Idle sweep failed:', errorMessage(e));
      });
    }, this.opts.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Evicts sessions idle longer than `idleTimeoutMs`; returns how many were evicted. */
  async sweep(): Promise<number> {
    const cutoff = this.now() - this.opts.idleTimeoutMs;
    const idle: RecognitionSession[] = [];
    for (const [id, session] of this.sessions) {
      if (session.lastActivityAt < cutoff) {
        this.sessions.delete(id);
        idle.push(session);
      }
    }
    if (idle.length === 0) return 0;
    this.log.info(`Evicting ${idle.length} idle session(s)`);
    await Promise.all(idle.map((s) => s.forceClose('idle timeout')));
    return idle.length;
  }

  /** Force-closes every session; used at shutdown. */
  async drain(): Promise<void> {
    this.stopSweep();
    const all = this.list();
    this.sessions.clear();
    if (all.length > 0) this.log.info(`Draining ${all.length} session(s)`);
    await Promise.all(all.map((s) => s.forceClose('shutdown')));
  }
}
