import {
  OverloadedError,
  RequestCancelledError,
  SessionError,
  describeError,
  isTrackingError,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { BrowserSession, SessionLauncher } from './session.js';

export interface SessionPoolOptions {
  maxSessions: number;
  /** How long a caller may wait for a free slot; 0 rejects at once. */
  queueTimeoutMs: number;
  launch: SessionLauncher;
  logger: Logger;
}

export interface SessionPoolStats {
  maxSessions: number;
  active: number;
  waiting: number;
  opened: number;
  closed: number;
}

export interface SessionLease {
  readonly session: BrowserSession;
  /** Closes the session and frees its slot. Safe to call more than once. */
  release(): Promise<void>;
}

interface Waiter {
  grant(): void;
  fail(err: Error): void;
}

/**
 * Bounded set of live browser sessions. Sessions are never shared: each
 * lease launches its own browser and closes it on release. Callers beyond
 * `maxSessions` queue in FIFO order for at most `queueTimeoutMs`.
 */
export class SessionPool {
  private active = 0;
  private opened = 0;
  private closed = 0;
  private closing = false;
  private readonly waiters: Waiter[] = [];
  private drained: (() => void) | null = null;
  private draining: Promise<void> | null = null;

  constructor(private readonly options: SessionPoolOptions) {}

  stats(): SessionPoolStats {
    return {
      maxSessions: this.options.maxSessions,
      active: this.active,
      waiting: this.waiters.length,
      opened: this.opened,
      closed: this.closed,
    };
  }

  async acquire(signal?: AbortSignal): Promise<SessionLease> {
    await this.admit(signal);

    let session: BrowserSession;
    try {
      session = await this.options.launch();
    } catch (err) {
      this.freeSlot();
      throw isTrackingError(err)
        ? err
        : new SessionError(`Failed to start browser session: ${describeError(err)}`, { cause: err });
    }
    this.opened++;

    if (signal?.aborted) {
      await this.closeSession(session);
      this.freeSlot();
      throw new RequestCancelledError();
    }

    let released: Promise<void> | null = null;
    return {
      session,
      release: () => {
        released ??= this.closeSession(session).then(() => this.freeSlot());
        return released;
      },
    };
  }

  /**
   * Run `fn` with an exclusively owned session. The session is closed on
   * every exit path, and immediately when `signal` aborts.
   */
  async use<T>(fn: (session: BrowserSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const lease = await this.acquire(signal);

    const onAbort = () => {
      this.options.logger.debug('Caller went away, closing session early', { sessionId: lease.session.id });
      void lease.release();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await fn(lease.session);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await lease.release();
    }
  }

  /**
   * Stop admitting callers, fail everyone still queued and resolve once
   * every active session has been released.
   */
  close(): Promise<void> {
    this.closing = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.fail(new OverloadedError('Session pool is shutting down'));
    }
    if (this.active === 0) return Promise.resolve();
    this.draining ??= new Promise<void>((resolve) => {
      this.drained = resolve;
    });
    return this.draining;
  }

  private admit(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError());
    }
    if (this.closing) {
      return Promise.reject(new OverloadedError('Session pool is shutting down'));
    }
    if (this.active < this.options.maxSessions) {
      this.active++;
      return Promise.resolve();
    }
    if (this.options.queueTimeoutMs <= 0) {
      return Promise.reject(
        new OverloadedError(`All ${this.options.maxSessions} browser sessions are busy`)
      );
    }

    return new Promise<void>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
      };
      const waiter: Waiter = {
        // The slot is handed over by freeSlot(); `active` is already counted.
        grant: () => {
          settle();
          resolve();
        },
        fail: (err) => {
          settle();
          reject(err);
        },
      };
      const onAbort = () => waiter.fail(new RequestCancelledError());
      const timer = setTimeout(
        () =>
          waiter.fail(
            new OverloadedError(
              `No browser session became free within ${this.options.queueTimeoutMs}ms`
            )
          ),
        this.options.queueTimeoutMs
      );

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private freeSlot(): void {
    const next = this.waiters[0];
    if (next && !this.closing) {
      next.grant();
      return;
    }
    this.active--;
    if (this.active === 0 && this.drained) {
      this.drained();
      this.drained = null;
    }
  }

  private async closeSession(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      this.options.logger.warn('Session close failed', {
        sessionId: session.id,
        error: describeError(err),
      });
    } finally {
      this.closed++;
    }
  }
}
