import { errors } from 'playwright-core';
import { describe, expect, it } from 'vitest';
import { PlaywrightScrapePage, buildLaunchOptions, mapDriverError } from '../../src/browser/playwright.js';
import type { BrowserConfig } from '../../src/config.js';
import { NotFoundError, SessionError, StructuralMismatchError, TimeoutError } from '../../src/errors.js';
import { FakeDom, type FakeElement } from '../helpers/fakeDriver.js';

const baseConfig: BrowserConfig = {
  headless: true,
  sandbox: false,
  args: ['--disable-gpu'],
  launchTimeoutMs: 1_000,
  navigationTimeoutMs: 2_000,
  actionTimeoutMs: 500,
};

describe('mapDriverError', () => {
  it('turns driver timeouts into TimeoutError', () => {
    const mapped = mapDriverError(new errors.TimeoutError('Timeout 500ms exceeded.'));

    expect(mapped).toBeInstanceOf(TimeoutError);
    expect(mapped.message).toBe('Timeout 500ms exceeded.');
  });

  it('treats any other driver failure as a session failure', () => {
    const mapped = mapDriverError(new Error('Target page, context or browser has been closed'));

    expect(mapped).toBeInstanceOf(SessionError);
    expect(mapped.message).toBe(
      'Browser operation failed: Target page, context or browser has been closed'
    );
  });

  it('passes service errors through untouched', () => {
    const original = new NotFoundError('gone');

    expect(mapDriverError(original)).toBe(original);
  });
});

describe('buildLaunchOptions', () => {
  it('adds the no-sandbox flags when sandboxing is off', () => {
    expect(buildLaunchOptions(baseConfig)).toEqual({
      headless: true,
      chromiumSandbox: false,
      timeout: 1_000,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-gpu'],
    });
  });

  it('passes the executable path and channel through', () => {
    const options = buildLaunchOptions({
      ...baseConfig,
      sandbox: true,
      executablePath: '/usr/bin/chromium',
      channel: 'chrome',
    });

    expect(options).toEqual({
      headless: true,
      chromiumSandbox: true,
      timeout: 1_000,
      args: ['--disable-gpu'],
      executablePath: '/usr/bin/chromium',
      channel: 'chrome',
    });
  });
});

describe('PlaywrightScrapePage', () => {
  const OUTCOMES = ['#result table', '.tracking-error'];

  function element(id: string, selector: string, visible: boolean, extra: Partial<FakeElement> = {}): FakeElement {
    return { id, matches: [selector], visible, ...extra };
  }

  function pageOver(dom: FakeDom): PlaywrightScrapePage {
    return new PlaywrightScrapePage(dom.page());
  }

  it('finds the results table behind a hidden error template', async () => {
    const dom = new FakeDom([
      element('error', '.tracking-error', false),
      element('table', '#result table', true),
    ]);

    await expect(pageOver(dom).waitForFirst(OUTCOMES, 100)).resolves.toBe(0);
  });

  it('reports the visible not-found marker over a hidden results template', async () => {
    const dom = new FakeDom([
      element('table', '#result table', false),
      element('error', '.tracking-error', true),
    ]);

    await expect(pageOver(dom).waitForFirst(OUTCOMES, 100)).resolves.toBe(1);
  });

  it('prefers the earlier selector when both are showing', async () => {
    const dom = new FakeDom([
      element('error', '.tracking-error', true),
      element('table', '#result table', true),
    ]);

    await expect(pageOver(dom).waitForFirst(OUTCOMES, 100)).resolves.toBe(0);
  });

  it('times out when every candidate stays hidden', async () => {
    const dom = new FakeDom([
      element('error', '.tracking-error', false),
      element('table', '#result table', false),
    ]);

    const wait = pageOver(dom).waitForFirst(OUTCOMES, 100);

    await expect(wait).rejects.toBeInstanceOf(TimeoutError);
    await expect(wait).rejects.toThrow('locator.waitFor: Timeout 100ms exceeded.');
  });

  it('reports a structural mismatch when the match is gone after the wait', async () => {
    const table = element('table', '#result table', true);
    const dom = new FakeDom([table]);
    dom.afterWait = () => {
      table.visible = false;
    };

    const wait = pageOver(dom).waitForFirst(OUTCOMES, 100);

    await expect(wait).rejects.toBeInstanceOf(StructuralMismatchError);
    await expect(wait).rejects.toThrow('Element matching #result table | .tracking-error detached after appearing');
  });

  it('counts only visible elements', async () => {
    const dom = new FakeDom([element('banner', '#consent', false)]);

    await expect(pageOver(dom).count('#consent')).resolves.toBe(0);
  });

  it('acts on the visible element when a hidden duplicate comes first', async () => {
    const dom = new FakeDom([
      element('tn-template', '#tn', false),
      element('tn', '#tn', true),
      element('go', '#go', true),
    ]);
    const page = pageOver(dom);

    await page.goto('https://tracking.test/track');
    await page.fill('#tn', 'X1');
    await page.click('#go');
    await page.press('#tn', 'Enter');

    expect(dom.actions).toEqual([
      'goto https://tracking.test/track domcontentloaded',
      'fill tn X1',
      'click go',
      'press tn Enter',
    ]);
  });

  it('maps a missing control to TimeoutError', async () => {
    const dom = new FakeDom([element('go', '#go', false)]);

    await expect(pageOver(dom).click('#go')).rejects.toBeInstanceOf(TimeoutError);
  });

  it('maps navigation failures to session errors', async () => {
    const dom = new FakeDom([]);
    dom.gotoError = new Error('net::ERR_NAME_NOT_RESOLVED');

    await expect(pageOver(dom).goto('https://tracking.test/track')).rejects.toThrow(
      'Browser operation failed: net::ERR_NAME_NOT_RESOLVED'
    );
  });

  it('reads header texts and row cells from visible elements only', async () => {
    const cell = (id: string, text: string) => element(id, 'td', true, { text });
    const dom = new FakeDom([
      element('th-template', 'th', false, { text: 'Template' }),
      element('th-date', 'th', true, { text: 'Date' }),
      element('th-status', 'th', true, { text: 'Status' }),
      element('row-template', 'tr', false, { children: [cell('t1', '{date}'), cell('t2', '{status}')] }),
      element('row-1', 'tr', true, { children: [cell('c1', '2024-05-01'), cell('c2', 'Delivered')] }),
    ]);
    const page = pageOver(dom);

    await expect(page.texts('th')).resolves.toEqual(['Date', 'Status']);
    await expect(page.rows('tr', 'td')).resolves.toEqual([['2024-05-01', 'Delivered']]);
  });
});
