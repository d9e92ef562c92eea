import { DEFAULT_RESULT_HEADER } from './config.js';
import { StructuralMismatchError } from './errors.js';
import type {
  ColumnMap,
  EventField,
  RawTrackingEvent,
  TrackingEvent,
  TrackingResult,
} from './types/tracking.js';

export const DEFAULT_COLUMNS: ColumnMap = {
  timestamp: ['Date', 'Date/Time', 'Time'],
  location: ['Location', 'Place', 'Area'],
  detail: ['Status', 'Details', 'Event', 'Description'],
};

export interface NormalizeOptions {
  columns?: ColumnMap;
  header?: readonly [string, string, string];
}

const FIELDS: readonly EventField[] = ['timestamp', 'location', 'detail'];

function fold(label: string): string {
  return label.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Value of every column whose label matches one of the aliases, joined in
 * alias order, so split Date and Time columns both land in the timestamp.
 */
function pick(raw: RawTrackingEvent, aliases: readonly string[]): string | undefined {
  const matched: string[] = [];
  for (const alias of new Set(aliases.map(fold))) {
    for (const [label, value] of Object.entries(raw)) {
      if (fold(label) === alias) matched.push(value);
    }
  }
  if (matched.length === 0) return undefined;
  return matched.filter((value) => value.trim() !== '').join(' ');
}

/**
 * Map raw carrier rows onto the fixed result schema. Pure: same input, same
 * output, no I/O. Event order is the carrier's.
 */
export function normalize(
  trackingNumber: string,
  rawEvents: readonly RawTrackingEvent[],
  options: NormalizeOptions = {}
): TrackingResult {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const header = options.header ?? DEFAULT_RESULT_HEADER;

  const events = rawEvents.map((raw, index): TrackingEvent => {
    const event: TrackingEvent = { timestamp: '', location: '', detail: '' };
    for (const field of FIELDS) {
      const value = pick(raw, columns[field]);
      if (value === undefined) {
        throw new StructuralMismatchError(
          `Event ${index} has no ${field} column (looked for ${columns[field].join(', ')}; got ${Object.keys(raw).join(', ')})`
        );
      }
      event[field] = value.replace(/\s+/g, ' ').trim();
    }
    return Object.freeze(event);
  });

  return Object.freeze({
    title: `Tracking Result for ${trackingNumber}`,
    header: Object.freeze([...header]),
    events: Object.freeze(events),
  });
}
