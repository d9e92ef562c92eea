import type { SessionPool } from './browser/pool.js';
import {
  RequestCancelledError,
  ValidationError,
  isTrackingError,
  type TrackingErrorKind,
} from './errors.js';
import type { Logger } from './logger.js';
import { normalize } from './normalize.js';
import type { CarrierRegistry } from './registry.js';
import type { TrackingRequest, TrackingResult } from './types/tracking.js';
import { withRetry } from './utils/retry.js';

export interface TrackingServiceOptions {
  registry: CarrierRegistry;
  pool: SessionPool;
  logger: Logger;
  /** Total scrape attempts, first one included. */
  attempts: number;
  retryDelayMs: number;
  header?: readonly [string, string, string];
}

export interface TrackOptions {
  /** Aborts when the caller disconnects. */
  signal?: AbortSignal;
  logger?: Logger;
}

const RETRYABLE: ReadonlySet<TrackingErrorKind> = new Set<TrackingErrorKind>(['timeout', 'session']);

export function isRetryableFailure(err: unknown): boolean {
  return isTrackingError(err) && RETRYABLE.has(err.kind);
}

/**
 * Orchestrates one lookup: resolve carrier, take a session from the pool,
 * scrape, normalize. The session is back in the pool before this resolves
 * or rejects.
 */
export class TrackingService {
  constructor(private readonly options: TrackingServiceOptions) {}

  async track(request: TrackingRequest, trackOptions: TrackOptions = {}): Promise<TrackingResult> {
    const { signal } = trackOptions;
    const log = (trackOptions.logger ?? this.options.logger).child({
      trackingNumber: request.trackingNumber,
    });

    const carrier = this.options.registry.resolve(request.carrier);
    if (!carrier) {
      throw new ValidationError(`Invalid request. Unknown carrier '${request.carrier ?? ''}'.`);
    }
    log.debug('Request validated', { carrier: carrier.code });

    try {
      const rawEvents = await withRetry(
        (attempt) =>
          this.options.pool.use(async (session) => {
            log.debug('Session acquired, scraping', { sessionId: session.id, attempt });
            return carrier.lookup(session, request.trackingNumber);
          }, signal),
        {
          maxAttempts: this.options.attempts,
          initialBackoffMs: this.options.retryDelayMs,
          isRetryable: isRetryableFailure,
          signal,
          onRetry: (attempt, error, delay) =>
            log.warn('Scrape attempt failed, retrying', {
              attempt,
              delayMs: Math.round(delay),
              kind: isTrackingError(error) ? error.kind : 'unclassified',
            }),
        }
      );
      log.debug('Session released, scrape succeeded', { events: rawEvents.length });

      return normalize(request.trackingNumber, rawEvents, {
        columns: carrier.columns,
        header: this.options.header,
      });
    } catch (err) {
      // Failures caused by tearing down the session for a departed caller
      // are not carrier or browser faults.
      if (signal?.aborted && !(err instanceof RequestCancelledError)) {
        throw new RequestCancelledError();
      }
      throw err;
    }
  }
}
