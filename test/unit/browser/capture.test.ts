import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import type { LaunchOptions } from 'playwright-core';
import { BrowserCapture, VIEWPORT } from '../../../src/browser/capture.js';
import type { BrowserLauncher, CaptureBrowser, CaptureContext, CapturePage } from '../../../src/browser/capture.js';
import { ResultStore } from '../../../src/results/store.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

class FakePage implements CapturePage {
  readonly visited: string[] = [];
  failNext: Error | null = null;

  async goto(url: string): Promise<{ status(): number } | null> {
    this.throwIfFailing();
    this.visited.push(url);
    return { status: () => 200 };
  }
  async waitForSelector(): Promise<unknown> {
    this.throwIfFailing();
    return {};
  }
  async waitForLoadState(): Promise<void> {}
  async screenshot(options: { path: string; fullPage: boolean }): Promise<unknown> {
    await fs.writeFile(options.path, options.fullPage ? 'full' : 'viewport');
    return undefined;
  }
  async click(): Promise<void> {
    this.throwIfFailing();
  }
  async fill(): Promise<void> {}
  async textContent(): Promise<string | null> {
    return null;
  }
  async evaluate(expression: string): Promise<unknown> {
    return expression === 'document.title' ? 'Projects' : undefined;
  }
  async content(): Promise<string> {
    return '<html><body></body></html>';
  }
  url(): string {
    return this.visited[this.visited.length - 1] ?? 'about:blank';
  }

  private throwIfFailing(): void {
    const err = this.failNext;
    this.failNext = null;
    if (err) throw err;
  }
}

class FakeBrowser implements CaptureBrowser {
  readonly page = new FakePage();
  viewport: { width: number; height: number } | null = null;
  timeouts: number[] = [];
  closed = 0;

  async newContext(options: { viewport: { width: number; height: number } }): Promise<CaptureContext> {
    this.viewport = options.viewport;
    return {
      setDefaultTimeout: ms => this.timeouts.push(ms),
      setDefaultNavigationTimeout: ms => this.timeouts.push(ms),
      newPage: async () => this.page,
      close: async () => undefined,
    };
  }
  async close(): Promise<void> {
    this.closed++;
  }
}

describe('BrowserCapture', () => {
  let root: string;
  let store: ResultStore;
  let browser: FakeBrowser;
  let launched: LaunchOptions[];
  let launcher: BrowserLauncher;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-browser-'));
    store = await ResultStore.create(root, 'ui', 'dashboard');
    browser = new FakeBrowser();
    launched = [];
    launcher = async options => {
      launched.push(options);
      return browser;
    };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('launches headless with the sandbox flags and a fixed viewport', async () => {
    await BrowserCapture.launch('http://127.0.0.1:19001/', store, {
      timeoutMs: 60_000,
      launcher,
      env: { CHROME_BIN: '/usr/bin/chromium' },
    });

    expect(launched).toEqual([
      {
        headless: true,
        args: ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'],
        executablePath: '/usr/bin/chromium',
        timeout: 60_000,
      },
    ]);
    expect(browser.viewport).toEqual(VIEWPORT);
    expect(browser.timeouts).toEqual([60_000, 60_000]);
  });

  it('prefers TESTBED_CHROME_BIN over CHROME_BIN', async () => {
    await BrowserCapture.launch('http://x', store, {
      timeoutMs: 1000,
      launcher,
      env: { TESTBED_CHROME_BIN: '/opt/chrome', CHROME_BIN: '/usr/bin/chromium' },
    });
    expect(launched[0].executablePath).toBe('/opt/chrome');
  });

  it('reports a browser that cannot launch as unavailable', async () => {
    const failing: BrowserLauncher = async () => {
      throw new Error("Executable doesn't exist at /nowhere\nmore detail");
    };
    await expect(BrowserCapture.launch('http://x', store, { timeoutMs: 1000, launcher: failing, env: {} })).rejects.toMatchObject({
      code: HarnessErrorCode.ENVIRONMENT_UNAVAILABLE,
      message: "Headless browser unavailable: Executable doesn't exist at /nowhere",
    });
  });

  it('captures before and after screenshots into the results dir', async () => {
    const capture = await BrowserCapture.launch('http://127.0.0.1:19001/', store, { timeoutMs: 1000, launcher, env: {} });
    store.requireScreenshots('before', 'after');

    const before = await capture.navigateAndScreenshot('/web/', 'before');
    await capture.click('#refresh');
    const after = await capture.screenshot('after');

    expect(browser.page.visited).toEqual(['http://127.0.0.1:19001/web/']);
    expect(before).toBe(path.join(store.dir, 'before.png'));
    expect(await fs.readFile(before, 'utf-8')).toBe('full');
    expect(await fs.readFile(after, 'utf-8')).toBe('viewport');

    const summary = await store.writeSummary(true, 5, 'refreshed');
    expect(summary.passed).toBe(true);
    expect(summary.screenshots).toEqual(['after.png', 'before.png']);
  });

  it('maps playwright timeouts to REQUEST_TIMEOUT', async () => {
    const capture = await BrowserCapture.launch('http://x', store, { timeoutMs: 1000, launcher, env: {} });
    const timeout = new Error('Timeout 1000ms exceeded.');
    timeout.name = 'TimeoutError';
    browser.page.failNext = timeout;

    await expect(capture.navigate('/web/')).rejects.toMatchObject({
      code: HarnessErrorCode.REQUEST_TIMEOUT,
      message: 'Browser navigate http://x/web/ timed out after 1000ms',
    });
  });

  it('maps other failures to REQUEST_FAILED', async () => {
    const capture = await BrowserCapture.launch('http://x', store, { timeoutMs: 1000, launcher, env: {} });
    browser.page.failNext = new Error('element is detached');
    await expect(capture.click('#gone')).rejects.toMatchObject({
      code: HarnessErrorCode.REQUEST_FAILED,
      message: 'Browser click #gone failed: element is detached',
    });
  });

  it('reads text and evaluates expressions', async () => {
    const capture = await BrowserCapture.launch('http://x', store, { timeoutMs: 1000, launcher, env: {} });
    expect(await capture.text('h1')).toBe('');
    expect(await capture.evaluate('document.title')).toBe('Projects');
  });

  it('closes the browser once', async () => {
    const capture = await BrowserCapture.launch('http://x', store, { timeoutMs: 1000, launcher, env: {} });
    await capture.close();
    await capture.close();
    expect(browser.closed).toBe(1);
  });
});
