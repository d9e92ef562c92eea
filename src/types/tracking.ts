import type { BrowserSession } from '../browser/session.js';

export type CarrierCode = string;

export interface TrackingRequest {
  trackingNumber: string;
  carrier?: CarrierCode;
}

/** One extracted row, keyed by the carrier's own column labels. */
export type RawTrackingEvent = Record<string, string>;

export interface TrackingEvent {
  timestamp: string;
  location: string;
  detail: string;
}

export interface TrackingResult {
  title: string;
  header: readonly string[];
  /** Carrier-reported order, never re-sorted. */
  events: readonly TrackingEvent[];
}

export type EventField = keyof TrackingEvent;

/** Label aliases, per field, that identify a carrier's columns. */
export type ColumnMap = Record<EventField, string[]>;

export interface Carrier {
  code: CarrierCode;
  name: string;
  columns: ColumnMap;
  lookup(session: BrowserSession, trackingNumber: string): Promise<RawTrackingEvent[]>;
}

export interface TrackingStatusBody {
  date_time: string;
  area: string;
  details: string;
}

export interface TrackingResponseBody {
  title: string;
  header: string[];
  statuses: TrackingStatusBody[];
}
