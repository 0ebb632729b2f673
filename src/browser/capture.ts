import { chromium } from 'playwright-core';
import type { LaunchOptions } from 'playwright-core';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import type { ResultStore } from '../results/store.js';

export const VIEWPORT = { width: 1280, height: 800 };
const LAUNCH_ARGS = ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'];

// The slice of playwright's Browser/BrowserContext/Page that capture uses.
export interface CapturePage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options: { state: 'attached' | 'visible'; timeout: number }): Promise<unknown>;
  waitForLoadState(state: 'networkidle', options: { timeout: number }): Promise<void>;
  screenshot(options: { path: string; fullPage: boolean; timeout: number }): Promise<unknown>;
  click(selector: string, options: { timeout: number }): Promise<void>;
  fill(selector: string, value: string, options: { timeout: number }): Promise<void>;
  textContent(selector: string, options: { timeout: number }): Promise<string | null>;
  evaluate(expression: string): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
}

export interface CaptureContext {
  setDefaultTimeout(timeout: number): void;
  setDefaultNavigationTimeout(timeout: number): void;
  newPage(): Promise<CapturePage>;
  close(): Promise<void>;
}

export interface CaptureBrowser {
  newContext(options: { viewport: { width: number; height: number } }): Promise<CaptureContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<CaptureBrowser>;

const launchChromium: BrowserLauncher = options => chromium.launch(options);

export interface BrowserCaptureOptions {
  timeoutMs: number;
  launcher?: BrowserLauncher;
  // Falls back to TESTBED_CHROME_BIN, then CHROME_BIN.
  executablePath?: string;
  env?: NodeJS.ProcessEnv;
}

function chromePath(options: BrowserCaptureOptions): string | undefined {
  const env = options.env ?? process.env;
  return options.executablePath ?? env['TESTBED_CHROME_BIN'] ?? env['CHROME_BIN'] ?? undefined;
}

/**
 * Headless Chromium bound to one results directory. Screenshots land there as
 * <name>.png, and every page action is bounded by the same timeout.
 */
export class BrowserCapture {
  private closed = false;

  private constructor(
    private readonly browser: CaptureBrowser,
    private readonly context: CaptureContext,
    readonly page: CapturePage,
    private readonly baseUrl: string,
    private readonly store: ResultStore,
    private readonly timeoutMs: number
  ) {}

  static async launch(baseUrl: string, store: ResultStore, options: BrowserCaptureOptions): Promise<BrowserCapture> {
    const executablePath = chromePath(options);
    const launch = options.launcher ?? launchChromium;
    let browser: CaptureBrowser;
    try {
      browser = await launch({ headless: true, args: LAUNCH_ARGS, executablePath, timeout: options.timeoutMs });
    } catch (err) {
      throw new HarnessError(
        HarnessErrorCode.ENVIRONMENT_UNAVAILABLE,
        `Headless browser unavailable: ${errorMessage(err).split('\n')[0]}`,
        { executablePath },
        { cause: err }
      );
    }
    try {
      const context = await browser.newContext({ viewport: VIEWPORT });
      context.setDefaultTimeout(options.timeoutMs);
      context.setDefaultNavigationTimeout(options.timeoutMs);
      const page = await context.newPage();
      store.log('Browser launched (%s)', executablePath ?? 'bundled chromium');
      return new BrowserCapture(browser, context, page, baseUrl.replace(/\/+$/, ''), store, options.timeoutMs);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  /** Loads `path` relative to the service and waits for the body element. */
  navigate(path: string): Promise<void> {
    return this.navigateAbsolute(`${this.baseUrl}${path}`);
  }

  async navigateAbsolute(url: string): Promise<void> {
    this.store.log('Navigate: %s', url);
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
      await this.page.waitForSelector('body', { state: 'attached', timeout: this.timeoutMs });
      this.store.log('Navigated: %s (%s)', url, response ? response.status() : 'no response');
    } catch (err) {
      throw this.failure('navigate', url, err);
    }
  }

  screenshot(name: string): Promise<string> {
    return this.capture(name, false);
  }

  fullPageScreenshot(name: string): Promise<string> {
    return this.capture(name, true);
  }

  async navigateAndScreenshot(path: string, name: string, fullPage = true): Promise<string> {
    await this.navigate(path);
    return this.capture(name, fullPage);
  }

  async waitVisible(selector: string): Promise<void> {
    try {
      await this.page.waitForSelector(selector, { state: 'visible', timeout: this.timeoutMs });
    } catch (err) {
      throw this.failure('waitVisible', selector, err);
    }
  }

  /** Waits until the document has finished loading and the network is idle. */
  async waitReady(): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: this.timeoutMs });
    } catch (err) {
      throw this.failure('waitReady', this.page.url(), err);
    }
  }

  async click(selector: string): Promise<void> {
    this.store.log('Click: %s', selector);
    try {
      await this.page.click(selector, { timeout: this.timeoutMs });
    } catch (err) {
      throw this.failure('click', selector, err);
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    this.store.log('Fill: %s', selector);
    try {
      await this.page.fill(selector, value, { timeout: this.timeoutMs });
    } catch (err) {
      throw this.failure('fill', selector, err);
    }
  }

  async text(selector: string): Promise<string> {
    try {
      return (await this.page.textContent(selector, { timeout: this.timeoutMs })) ?? '';
    } catch (err) {
      throw this.failure('text', selector, err);
    }
  }

  html(): Promise<string> {
    return this.page.content();
  }

  /** Evaluates a JavaScript expression in the page. */
  evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }

  private async capture(name: string, fullPage: boolean): Promise<string> {
    const file = this.store.screenshotPath(name);
    try {
      await this.page.screenshot({ path: file, fullPage, timeout: this.timeoutMs });
    } catch (err) {
      throw this.failure('screenshot', name, err);
    }
    this.store.log('Screenshot: %s%s', name, fullPage ? ' (full page)' : '');
    return file;
  }

  private failure(action: string, target: string, err: unknown): HarnessError {
    const timedOut = err instanceof Error && err.name === 'TimeoutError';
    const message = `Browser ${action} ${target} ${timedOut ? `timed out after ${this.timeoutMs}ms` : `failed: ${errorMessage(err)}`}`;
    this.store.log('Error: %s', message);
    return new HarnessError(timedOut ? HarnessErrorCode.REQUEST_TIMEOUT : HarnessErrorCode.REQUEST_FAILED, message, { action, target }, {
      cause: err,
    });
  }
}
