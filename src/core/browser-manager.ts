/**
 * Browser Manager - Playwright launch and the page adapter the pipeline drives
 *
 * Playwright is loaded lazily on the first launch. A missing install or a
 * browser that cannot start is a FatalEnvironmentError: retrying the job on
 * the same host cannot fix it.
 */

import type { Browser, BrowserContext, Page } from 'playwright';
import * as fs from 'fs';
import type {
  BrowserLauncher,
  ConsolePage,
  ElementProbe,
  IsolatedContext,
  LaunchedBrowser,
  LoadState,
  StorageSnapshot,
  TappedPage,
} from './console-page.js';
import { FatalEnvironmentError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { BrowserConfig } from '../utils/config-schemas.js';

const log = logger.browser;

// Lazy-loaded Playwright reference
let playwrightModule: typeof import('playwright') | null = null;
let playwrightLoadAttempted = false;
let playwrightLoadError: string | null = null;

/**
 * Try to load Playwright dynamically
 */
async function tryLoadPlaywright(): Promise<typeof import('playwright') | null> {
  if (playwrightLoadAttempted) {
    return playwrightModule;
  }

  playwrightLoadAttempted = true;

  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    playwrightLoadError = error instanceof Error ? error.message : 'Failed to load Playwright';
    log.error('Playwright not available', { error });
    return null;
  }
}

/**
 * Get the Playwright load error if any
 */
export function getPlaywrightError(): string | null {
  return playwrightLoadError;
}

/**
 * Flags for a containerised host: no sandbox, no shared-memory reliance,
 * nothing the automation does not need.
 */
export const LAUNCH_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-default-apps',
  '--disable-sync',
  '--no-first-run',
  '--no-default-browser-check',
  '--mute-audio',
];

const CONTEXT_OPTIONS = {
  viewport: { width: 1920, height: 1080 },
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  ignoreHTTPSErrors: true,
  permissions: ['clipboard-read', 'clipboard-write'],
};

export type BrowserLaunchConfig = Pick<BrowserConfig, 'headless' | 'slowMo' | 'launchTimeoutMs'> &
  Partial<Pick<BrowserConfig, 'executablePath' | 'screenshotDir'>>;

const DEFAULT_CONFIG: BrowserLaunchConfig = {
  headless: true,
  slowMo: 0,
  launchTimeoutMs: 30000,
};

/**
 * Launches a fresh Chromium per call.
 */
export class PlaywrightLauncher implements BrowserLauncher {
  private readonly config: BrowserLaunchConfig;

  constructor(config: Partial<BrowserLaunchConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Ensure Playwright is available, throwing a helpful error if not
   */
  private async ensurePlaywright(): Promise<typeof import('playwright')> {
    const pw = await tryLoadPlaywright();
    if (!pw) {
      throw new FatalEnvironmentError(
        'Playwright is not installed. ' +
          'Install it with: npm install playwright && npx playwright install chromium' +
          (playwrightLoadError ? ` (${playwrightLoadError})` : '')
      );
    }
    return pw;
  }

  async launch(): Promise<LaunchedBrowser> {
    const pw = await this.ensurePlaywright();
    const startTime = Date.now();

    let browser: Browser;
    try {
      browser = await pw.chromium.launch({
        headless: this.config.headless,
        slowMo: this.config.slowMo,
        timeout: this.config.launchTimeoutMs,
        executablePath: this.config.executablePath,
        args: [...LAUNCH_ARGS],
      });
    } catch (error) {
      throw new FatalEnvironmentError('Browser process could not be started', { cause: error });
    }

    // Ensure screenshot directory exists
    if (this.config.screenshotDir) {
      fs.mkdirSync(this.config.screenshotDir, { recursive: true });
    }

    log.timed('Browser launched', startTime, { headless: this.config.headless });
    return new PlaywrightBrowser(browser);
  }
}

class PlaywrightBrowser implements LaunchedBrowser {
  constructor(private readonly browser: Browser) {}

  async newContext(): Promise<IsolatedContext> {
    const context = await this.browser.newContext(CONTEXT_OPTIONS);
    return new PlaywrightContext(context);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

class PlaywrightContext implements IsolatedContext {
  constructor(private readonly context: BrowserContext) {}

  async newPage(): Promise<TappedPage> {
    return new PlaywrightConsolePage(await this.context.newPage());
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * ConsolePage over a Playwright Page.
 */
export class PlaywrightConsolePage implements ConsolePage, TappedPage {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string, options: { waitUntil: LoadState; timeout: number }): Promise<void> {
    await this.page.goto(url, options);
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout: timeoutMs });
  }

  locator(selector: string): ElementProbe {
    return this.page.locator(selector);
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async readStorage(): Promise<StorageSnapshot> {
    return this.page.evaluate(() => {
      const dump = (store: Storage): Record<string, string> => {
        const entries: Record<string, string> = {};
        for (let i = 0; i < store.length; i++) {
          const key = store.key(i);
          if (key !== null) {
            entries[key] = store.getItem(key) ?? '';
          }
        }
        return entries;
      };
      return { local: dump(window.localStorage), session: dump(window.sessionStorage) };
    });
  }

  async readClipboard(): Promise<string | null> {
    return this.page.evaluate(async () => {
      try {
        return await navigator.clipboard.readText();
      } catch {
        return null;
      }
    });
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  onRequest(listener: (headers: Record<string, string>, url: string) => void): void {
    this.page.on('request', (request) => listener(request.headers(), request.url()));
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
