import { chromium, errors } from 'playwright-core';
import type { Browser, LaunchOptions, Page } from 'playwright-core';
import type { BrowserConfig } from '../config.js';
import {
  SessionError,
  StructuralMismatchError,
  TimeoutError,
  describeError,
  isTrackingError,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { BrowserSession, ScrapePage, SessionLauncher } from './session.js';

const SANDBOX_DISABLED_ARGS = ['--no-sandbox', '--disable-setuid-sandbox'];

/**
 * Translate a driver failure into the service's error taxonomy: bounded
 * waits that expire become TimeoutError, everything else means the browser
 * itself is unusable.
 */
export function mapDriverError(err: unknown): Error {
  if (isTrackingError(err)) return err;
  if (err instanceof errors.TimeoutError) {
    return new TimeoutError(err.message, { cause: err });
  }
  return new SessionError(`Browser operation failed: ${describeError(err)}`, { cause: err });
}

async function guard<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw mapDriverError(err);
  }
}

/** The slice of a Playwright Locator the adapter drives. */
export interface DriverLocator {
  first(): DriverLocator;
  filter(options: { visible: boolean }): DriverLocator;
  or(other: DriverLocator): DriverLocator;
  locator(selector: string): DriverLocator;
  waitFor(options: { state: 'visible'; timeout: number }): Promise<void>;
  isVisible(): Promise<boolean>;
  count(): Promise<number>;
  fill(value: string): Promise<void>;
  click(): Promise<void>;
  press(key: string): Promise<void>;
  allInnerTexts(): Promise<string[]>;
  all(): Promise<DriverLocator[]>;
}

/** The slice of a Playwright Page the adapter drives. */
export interface DriverPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded' }): Promise<unknown>;
  locator(selector: string): DriverLocator;
}

/** ScrapePage over a Playwright page. Selectors only ever match visible elements. */
export class PlaywrightScrapePage implements ScrapePage {
  constructor(private readonly page: DriverPage) {}

  private visible(selector: string): DriverLocator {
    return this.page.locator(selector).filter({ visible: true });
  }

  goto(url: string): Promise<void> {
    return guard(async () => {
      await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    });
  }

  fill(selector: string, value: string): Promise<void> {
    return guard(() => this.visible(selector).first().fill(value));
  }

  click(selector: string): Promise<void> {
    return guard(() => this.visible(selector).first().click());
  }

  press(selector: string, key: string): Promise<void> {
    return guard(() => this.visible(selector).first().press(key));
  }

  count(selector: string): Promise<number> {
    return guard(() => this.visible(selector).count());
  }

  waitForFirst(selectors: readonly string[], timeoutMs: number): Promise<number> {
    return guard(async () => {
      const candidates = selectors.map((selector) => this.visible(selector));
      const [head, ...rest] = candidates;
      if (!head) {
        throw new StructuralMismatchError('waitForFirst needs at least one selector');
      }
      const either = rest.reduce((union, candidate) => union.or(candidate), head);
      await either.first().waitFor({ state: 'visible', timeout: timeoutMs });

      for (const [index, candidate] of candidates.entries()) {
        if (await candidate.first().isVisible()) return index;
      }
      throw new StructuralMismatchError(`Element matching ${selectors.join(' | ')} detached after appearing`);
    });
  }

  texts(selector: string): Promise<string[]> {
    return guard(() => this.visible(selector).allInnerTexts());
  }

  rows(rowSelector: string, cellSelector: string): Promise<string[][]> {
    return guard(async () => {
      const rows = await this.visible(rowSelector).all();
      return Promise.all(rows.map((row) => row.locator(cellSelector).allInnerTexts()));
    });
  }
}

export function buildLaunchOptions(config: BrowserConfig): LaunchOptions {
  return {
    headless: config.headless,
    chromiumSandbox: config.sandbox,
    timeout: config.launchTimeoutMs,
    args: [...(config.sandbox ? [] : SANDBOX_DISABLED_ARGS), ...config.args],
    ...(config.executablePath ? { executablePath: config.executablePath } : {}),
    ...(config.channel ? { channel: config.channel } : {}),
  };
}

async function closeQuietly(browser: Browser, logger: Logger): Promise<void> {
  try {
    await browser.close();
  } catch (err) {
    logger.warn('Browser close failed', { error: describeError(err) });
  }
}

/**
 * One Chromium process per session, with a single context and page. The
 * returned close() is idempotent.
 */
export function createChromiumLauncher(config: BrowserConfig, logger: Logger): SessionLauncher {
  const options = buildLaunchOptions(config);
  let sequence = 0;

  return async (): Promise<BrowserSession> => {
    const id = `session-${++sequence}`;
    const log = logger.child({ sessionId: id });

    let browser: Browser;
    try {
      browser = await chromium.launch(options);
    } catch (err) {
      throw new SessionError(`Failed to launch browser: ${describeError(err)}`, { cause: err });
    }

    browser.on('disconnected', () => log.debug('Browser disconnected'));

    let page: Page;
    try {
      const context = await browser.newContext();
      page = await context.newPage();
    } catch (err) {
      await closeQuietly(browser, log);
      throw new SessionError(`Failed to open browser page: ${describeError(err)}`, { cause: err });
    }
    page.setDefaultTimeout(config.actionTimeoutMs);
    page.setDefaultNavigationTimeout(config.navigationTimeoutMs);

    let closing: Promise<void> | null = null;
    return {
      id,
      page: new PlaywrightScrapePage(page),
      close: () => {
        closing ??= closeQuietly(browser, log);
        return closing;
      },
    };
  };
}
