import { describe, expect, it } from 'vitest';
import { SessionPool } from '../src/browser/pool.js';
import type { BrowserSession } from '../src/browser/session.js';
import {
  NotFoundError,
  OverloadedError,
  SessionError,
  StructuralMismatchError,
  TimeoutError,
} from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { CarrierRegistry } from '../src/registry.js';
import { MESSAGES, createApp, mapError, parseTrackRequest } from '../src/server.js';
import { TrackingService } from '../src/tracking.js';
import type { RawTrackingEvent } from '../src/types/tracking.js';
import { createFakeLauncher, stubCarrier } from './helpers/fakes.js';

type Lookup = (session: BrowserSession, trackingNumber: string) => Promise<RawTrackingEvent[]>;

const TWO_EVENTS: RawTrackingEvent[] = [
  { Location: 'Berlin', Status: 'Delivered', Date: '2024-05-02 10:00' },
  { Location: 'Hamburg', Status: 'In transit', Date: '2024-05-01 08:00' },
];

function buildApp(lookup: Lookup) {
  const launcher = createFakeLauncher();
  const pool = new SessionPool({
    maxSessions: 2,
    queueTimeoutMs: 100,
    launch: launcher.launch,
    logger: silentLogger,
  });
  const registry = new CarrierRegistry();
  registry.register(stubCarrier(lookup));
  registry.register(stubCarrier(lookup, 'other-post'));
  const service = new TrackingService({
    registry,
    pool,
    logger: silentLogger,
    attempts: 1,
    retryDelayMs: 1,
  });
  const app = createApp({ service, registry, pool, logger: silentLogger, retryAfterSeconds: 7 });
  return { app, pool, launcher };
}

function postTrack(app: ReturnType<typeof buildApp>['app'], body: string) {
  return app.request('/track', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('POST /track', () => {
  it('returns the normalized result for a known tracking number', async () => {
    const { app, pool } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'TEST12345' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      title: 'Tracking Result for TEST12345',
      header: ['Date', 'Location', 'Status'],
      statuses: [
        { date_time: '2024-05-02 10:00', area: 'Berlin', details: 'Delivered' },
        { date_time: '2024-05-01 08:00', area: 'Hamburg', details: 'In transit' },
      ],
    });
    expect(pool.stats()).toMatchObject({ active: 0, opened: 1, closed: 1 });
  });

  it('trims the tracking number before looking it up', async () => {
    const seen: string[] = [];
    const { app } = buildApp(async (_session, trackingNumber) => {
      seen.push(trackingNumber);
      return TWO_EVENTS;
    });

    const res = await postTrack(app, JSON.stringify({ tracking_number: '  TEST12345 ' }));

    expect(res.status).toBe(200);
    expect(seen).toEqual(['TEST12345']);
  });

  it('routes to the requested carrier', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'AB1', carrier: 'Other-Post' }));

    expect(res.status).toBe(200);
  });

  it.each([
    ['an empty object', '{}'],
    ['an empty tracking number', JSON.stringify({ tracking_number: '' })],
    ['a blank tracking number', JSON.stringify({ tracking_number: '   ' })],
    ['a numeric tracking number', JSON.stringify({ tracking_number: 12345 })],
    ['a null body', 'null'],
    ['an array body', '[]'],
    ['malformed JSON', '{"tracking_number":'],
  ])('answers 400 for %s', async (_name, body) => {
    const { app, launcher } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, body);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request. 'tracking_number' field is required." });
    expect(launcher.sessions).toHaveLength(0);
  });

  it('answers 400 for an overlong tracking number', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'X'.repeat(65) }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request. 'tracking_number' must be at most 64 characters.",
    });
  });

  it('answers 400 for an unknown carrier', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'AB1', carrier: 'nope' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request. Unknown carrier 'nope'." });
  });

  it('answers 404 when the carrier does not know the tracking number', async () => {
    const { app, pool } = buildApp(async () => {
      throw new NotFoundError('Stub Post reports no shipment');
    });

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'NOPE1' }));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Failed to retrieve tracking data or ID not found.' });
    expect(pool.stats()).toMatchObject({ active: 0, opened: 1, closed: 1 });
  });

  it.each([
    ['Timeout', () => new TimeoutError('No result within 15000ms'), 504, MESSAGES.timeout],
    ['StructuralMismatch', () => new StructuralMismatchError('#result th missing'), 502, MESSAGES.upstream],
    ['SessionError', () => new SessionError('chromium crashed'), 502, MESSAGES.session],
    ['an unclassified error', () => new Error('undefined is not a function'), 500, MESSAGES.internal],
  ])('maps %s to %i without leaking internals', async (_name, makeError, status, message) => {
    const { app, pool } = buildApp(async () => {
      throw makeError();
    });

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'AB1' }));

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: message });
    expect(pool.stats()).toMatchObject({ active: 0, opened: 1, closed: 1 });
  });

  it('answers 503 with Retry-After when no session frees up in time', async () => {
    const launcher = createFakeLauncher();
    const pool = new SessionPool({ maxSessions: 1, queueTimeoutMs: 0, launch: launcher.launch, logger: silentLogger });
    const registry = new CarrierRegistry();
    registry.register(stubCarrier(async () => TWO_EVENTS));
    const service = new TrackingService({ registry, pool, logger: silentLogger, attempts: 1, retryDelayMs: 1 });
    const app = createApp({ service, registry, pool, logger: silentLogger, retryAfterSeconds: 7 });

    const lease = await pool.acquire();
    const res = await postTrack(app, JSON.stringify({ tracking_number: 'AB1' }));
    await lease.release();

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBe('7');
    expect(await res.json()).toEqual({ error: 'Service is busy. Please retry later.' });
  });

  it('tags responses with a request id', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await postTrack(app, JSON.stringify({ tracking_number: 'AB1' }));

    expect(res.headers.get('X-Request-Id')).toMatch(/\S+/);
  });
});

describe('other routes', () => {
  it('lists carriers on the index route', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await app.request('/');

    expect(await res.json()).toEqual({
      service: 'parcel-scrape',
      carriers: ['stub-post', 'other-post'],
      defaultCarrier: 'stub-post',
    });
  });

  it('reports pool statistics on /health', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await app.request('/health');

    expect(await res.json()).toEqual({
      status: 'ok',
      sessions: { maxSessions: 2, active: 0, waiting: 0, opened: 0, closed: 0 },
    });
  });

  it('answers 404 for unknown routes', async () => {
    const { app } = buildApp(async () => TWO_EVENTS);

    const res = await app.request('/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found.' });
  });
});

describe('parseTrackRequest', () => {
  it('lowercases the carrier code and omits it when absent', () => {
    expect(parseTrackRequest({ tracking_number: 'AB1', carrier: ' Stub-Post ' })).toEqual({
      trackingNumber: 'AB1',
      carrier: 'stub-post',
    });
    expect(parseTrackRequest({ tracking_number: 'AB1' })).toEqual({ trackingNumber: 'AB1' });
  });

  it('rejects an empty carrier', () => {
    expect(() => parseTrackRequest({ tracking_number: 'AB1', carrier: '' })).toThrow(
      "Invalid request. 'carrier' must be a non-empty string."
    );
  });
});

describe('mapError', () => {
  it('maps overload and cancellation', () => {
    expect(mapError(new OverloadedError('busy'))).toEqual({
      status: 503,
      message: MESSAGES.overloaded,
      level: 'warn',
    });
    expect(mapError(new SessionError('crash')).level).toBe('error');
    expect(mapError(new StructuralMismatchError('drift')).level).toBe('error');
  });
});
