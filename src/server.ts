import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { requestId, type RequestIdVariables } from 'hono/request-id';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import type { SessionPool } from './browser/pool.js';
import { ValidationError, isTrackingError } from './errors.js';
import type { LogLevel, Logger } from './logger.js';
import type { CarrierRegistry } from './registry.js';
import type { TrackingService } from './tracking.js';
import type { TrackingRequest, TrackingResponseBody, TrackingResult } from './types/tracking.js';

export const SERVICE_NAME = 'parcel-scrape';
export const MAX_TRACKING_NUMBER_LENGTH = 64;

export const MESSAGES = {
  required: "Invalid request. 'tracking_number' field is required.",
  tooLong: `Invalid request. 'tracking_number' must be at most ${MAX_TRACKING_NUMBER_LENGTH} characters.`,
  badCarrier: "Invalid request. 'carrier' must be a non-empty string.",
  notFound: 'Failed to retrieve tracking data or ID not found.',
  timeout: 'Timed out waiting for the carrier tracking page.',
  upstream: 'Failed to read tracking data from the carrier.',
  session: 'Browser session failed. Please retry later.',
  overloaded: 'Service is busy. Please retry later.',
  cancelled: 'Request cancelled.',
  internal: 'Internal server error.',
  route: 'Not found.',
} as const;

const PUBLIC_MESSAGES: ReadonlySet<string> = new Set(Object.values(MESSAGES));

/** 499: client closed request. Never seen by the caller, only in logs. */
const CLIENT_CLOSED_REQUEST = 499;

export interface AppDeps {
  service: TrackingService;
  registry: CarrierRegistry;
  pool: SessionPool;
  logger: Logger;
  /** Seconds advertised in Retry-After when the pool is saturated. */
  retryAfterSeconds?: number;
}

type AppEnv = {
  Variables: RequestIdVariables & { log: Logger };
};

const trackBodySchema = z.object({
  tracking_number: z
    .string({ required_error: MESSAGES.required, invalid_type_error: MESSAGES.required })
    .trim()
    .min(1, MESSAGES.required)
    .max(MAX_TRACKING_NUMBER_LENGTH, MESSAGES.tooLong),
  carrier: z
    .string({ invalid_type_error: MESSAGES.badCarrier })
    .trim()
    .toLowerCase()
    .min(1, MESSAGES.badCarrier)
    .optional(),
});

export function parseTrackRequest(body: unknown): TrackingRequest {
  const parsed = trackBodySchema.safeParse(body);
  if (!parsed.success) {
    const known = parsed.error.issues.find((issue) => PUBLIC_MESSAGES.has(issue.message));
    const message = known?.message ?? MESSAGES.required;
    throw new ValidationError(message, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return {
    trackingNumber: parsed.data.tracking_number,
    ...(parsed.data.carrier !== undefined && { carrier: parsed.data.carrier }),
  };
}

export function toResponseBody(result: TrackingResult): TrackingResponseBody {
  return {
    title: result.title,
    header: [...result.header],
    statuses: result.events.map((event) => ({
      date_time: event.timestamp,
      area: event.location,
      details: event.detail,
    })),
  };
}

interface ErrorMapping {
  status: ContentfulStatusCode | typeof CLIENT_CLOSED_REQUEST;
  message: string;
  level: LogLevel;
}

export function mapError(err: unknown): ErrorMapping {
  if (!isTrackingError(err)) {
    return { status: 500, message: MESSAGES.internal, level: 'error' };
  }
  switch (err.kind) {
    case 'validation':
      return {
        status: 400,
        message: err instanceof ValidationError ? err.publicMessage : MESSAGES.required,
        level: 'info',
      };
    case 'not_found':
      return { status: 404, message: MESSAGES.notFound, level: 'info' };
    case 'timeout':
      return { status: 504, message: MESSAGES.timeout, level: 'warn' };
    case 'structural_mismatch':
      return { status: 502, message: MESSAGES.upstream, level: 'error' };
    case 'session':
      return { status: 502, message: MESSAGES.session, level: 'error' };
    case 'overloaded':
      return { status: 503, message: MESSAGES.overloaded, level: 'warn' };
    case 'cancelled':
      return { status: CLIENT_CLOSED_REQUEST, message: MESSAGES.cancelled, level: 'info' };
  }
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const retryAfter = String(deps.retryAfterSeconds ?? 5);

  // --- Middleware ---
  app.use('*', requestId());
  app.use('*', async (c, next) => {
    c.set('log', deps.logger.child({ requestId: c.get('requestId') }));
    await next();
  });
  app.use('*', logger((message) => deps.logger.info(message)));

  // --- Routes ---
  app.get('/', (c) =>
    c.json({
      service: SERVICE_NAME,
      carriers: deps.registry.list(),
      defaultCarrier: deps.registry.defaultCarrier,
    })
  );

  app.get('/health', (c) => c.json({ status: 'ok', sessions: deps.pool.stats() }));

  app.post('/track', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      throw new ValidationError(MESSAGES.required, `Body is not valid JSON: ${String(err)}`);
    }

    const request = parseTrackRequest(body);
    const result = await deps.service.track(request, {
      signal: c.req.raw.signal,
      logger: c.get('log'),
    });
    return c.json(toResponseBody(result), 200);
  });

  app.notFound((c) => c.json({ error: MESSAGES.route }, 404));

  app.onError((err, c) => {
    const mapping = mapError(err);
    const log = c.get('log') ?? deps.logger;
    const kind = isTrackingError(err) ? err.kind : 'unclassified';
    log.log(mapping.level, `${c.req.method} ${c.req.path} failed`, { kind, status: mapping.status }, err);

    const body = { error: mapping.message };
    if (mapping.status === CLIENT_CLOSED_REQUEST) {
      return new Response(JSON.stringify(body), {
        status: CLIENT_CLOSED_REQUEST,
        headers: { 'Content-Type': 'application/json' },
      });
    }
    if (mapping.status === 503) {
      c.header('Retry-After', retryAfter);
    }
    return c.json(body, mapping.status);
  });

  return app;
}
