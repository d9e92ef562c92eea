import type { BrowserSession, ScrapePage } from '../browser/session.js';
import { NotFoundError, SessionError, StructuralMismatchError, TimeoutError } from '../errors.js';
import type { Carrier, RawTrackingEvent } from '../types/tracking.js';
import { TRACKING_NUMBER_PLACEHOLDER, type CarrierProfile } from './profile.js';

export interface SelectorCarrierOptions {
  /** Upper bound on waiting for the result or not-found marker. */
  resultTimeoutMs: number;
}

const RESULT = 0;
const NOT_FOUND = 1;

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

async function interact(step: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    // A missing form control is a page change, not a slow carrier.
    if (err instanceof TimeoutError) {
      throw new StructuralMismatchError(`Could not ${step}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/** Replace the tracking number, raw or URL-encoded, with the URL placeholder. */
export function redactTrackingNumber(text: string, trackingNumber: string): string {
  if (trackingNumber === '') return text;
  return text
    .replaceAll(encodeURIComponent(trackingNumber), TRACKING_NUMBER_PLACEHOLDER)
    .replaceAll(trackingNumber, TRACKING_NUMBER_PLACEHOLDER);
}

async function navigate(
  page: ScrapePage,
  profile: CarrierProfile,
  url: string,
  trackingNumber: string
): Promise<void> {
  try {
    await page.goto(url);
  } catch (err) {
    // Driver messages quote the full URL, so the cause is not kept.
    if (err instanceof TimeoutError) {
      throw new TimeoutError(`Loading ${profile.url} timed out: ${redactTrackingNumber(err.message, trackingNumber)}`);
    }
    if (err instanceof SessionError) {
      throw new SessionError(`Loading ${profile.url} failed: ${redactTrackingNumber(err.message, trackingNumber)}`);
    }
    throw err;
  }
}

async function dismissConsent(page: ScrapePage, consent: string): Promise<void> {
  if ((await page.count(consent)) === 0) return;
  try {
    await page.click(consent);
  } catch (err) {
    // Banner went away between the count and the click.
    if (!(err instanceof TimeoutError)) throw err;
  }
}

async function submitTrackingNumber(
  page: ScrapePage,
  profile: CarrierProfile,
  trackingNumber: string
): Promise<void> {
  const { input, submit } = profile.selectors;
  if (!input) {
    throw new StructuralMismatchError(`Carrier ${profile.code} has no input selector`);
  }

  await interact('fill tracking number input', () => page.fill(input, trackingNumber));
  if (submit) {
    await interact('click submit button', () => page.click(submit));
  } else {
    await interact('submit tracking form', () => page.press(input, 'Enter'));
  }
}

async function extractRows(page: ScrapePage, profile: CarrierProfile): Promise<RawTrackingEvent[]> {
  const { headerCell, row, cell } = profile.selectors;

  const header = (await page.texts(headerCell)).map(cleanText);
  if (header.length === 0 || header.some((label) => label === '')) {
    throw new StructuralMismatchError(
      `Result table header (${headerCell}) missing or has blank labels on ${profile.code}`
    );
  }

  const rows = (await page.rows(row, cell))
    .map((cells) => cells.map(cleanText))
    .filter((cells) => cells.some((text) => text !== ''));

  if (rows.length === 0) {
    throw new StructuralMismatchError(`Result container on ${profile.code} holds no event rows`);
  }

  return rows.map((cells, index) => {
    if (cells.length !== header.length) {
      throw new StructuralMismatchError(
        `Row ${index} on ${profile.code} has ${cells.length} cells, header has ${header.length}`
      );
    }
    const event: RawTrackingEvent = {};
    header.forEach((label, column) => {
      event[label] = cells[column] ?? '';
    });
    return event;
  });
}

/**
 * Scraper driven entirely by a CarrierProfile: every selector the carrier
 * page is coupled to lives in the profile, none in code.
 */
export function createSelectorCarrier(
  profile: CarrierProfile,
  options: SelectorCarrierOptions
): Carrier {
  const directUrl = profile.url.includes(TRACKING_NUMBER_PLACEHOLDER);

  return {
    code: profile.code,
    name: profile.name,
    columns: profile.columns,

    async lookup(session: BrowserSession, trackingNumber: string): Promise<RawTrackingEvent[]> {
      const { page } = session;
      const { selectors } = profile;

      const url = directUrl
        ? profile.url.replaceAll(TRACKING_NUMBER_PLACEHOLDER, encodeURIComponent(trackingNumber))
        : profile.url;
      await navigate(page, profile, url, trackingNumber);

      if (selectors.consent) {
        await dismissConsent(page, selectors.consent);
      }

      if (!directUrl) {
        await submitTrackingNumber(page, profile, trackingNumber);
      }

      let outcome: number;
      try {
        outcome = await page.waitForFirst([selectors.results, selectors.notFound], options.resultTimeoutMs);
      } catch (err) {
        if (err instanceof TimeoutError) {
          throw new TimeoutError(
            `No result from ${profile.code} within ${options.resultTimeoutMs}ms`,
            { cause: err }
          );
        }
        throw err;
      }

      if (outcome === NOT_FOUND) {
        throw new NotFoundError(`${profile.name} reports no shipment for this tracking number`);
      }
      if (outcome !== RESULT) {
        throw new StructuralMismatchError(`Unexpected wait outcome ${outcome} on ${profile.code}`);
      }

      return extractRows(page, profile);
    },
  };
}
