/**
 * In-process stand-ins for the browser: a scriptable page whose elements are
 * keyed by selector, and a launcher that counts open processes.
 */

import type {
  BrowserLauncher,
  ElementProbe,
  IsolatedContext,
  LaunchedBrowser,
  LoadState,
  StorageSnapshot,
  TappedPage,
} from '../../src/core/console-page.js';

export interface FakeElement {
  count?: number;
  visible?: boolean;
  text?: string | null;
  value?: string;
  onClick?: (index: number) => void;
  onFill?: (value: string, index: number) => void;
  onPress?: (key: string, value: string) => void;
  /** Every interaction throws this instead */
  error?: Error;
}

class ElementTimeoutError extends Error {
  constructor(selector: string) {
    super(`Timed out waiting for ${selector}`);
    this.name = 'TimeoutError';
  }
}

export class FakeProbe implements ElementProbe {
  constructor(
    private readonly page: FakeConsolePage,
    private readonly selector: string,
    private readonly index = 0
  ) {}

  private element(): FakeElement {
    const element = this.page.elements.get(this.selector);
    if (!element || this.index >= (element.count ?? 1)) {
      throw new ElementTimeoutError(this.selector);
    }
    if (element.error) {
      throw element.error;
    }
    return element;
  }

  async count(): Promise<number> {
    const element = this.page.elements.get(this.selector);
    return element ? (element.count ?? 1) : 0;
  }

  first(): ElementProbe {
    return new FakeProbe(this.page, this.selector, 0);
  }

  nth(index: number): ElementProbe {
    return new FakeProbe(this.page, this.selector, index);
  }

  async waitFor(options: { state: 'attached' | 'visible'; timeout: number }): Promise<void> {
    this.page.waits.push(this.selector);
    const element = this.element();
    if (options.state === 'visible' && element.visible === false) {
      throw new ElementTimeoutError(this.selector);
    }
  }

  async isVisible(): Promise<boolean> {
    const element = this.page.elements.get(this.selector);
    return element !== undefined && element.visible !== false;
  }

  async click(): Promise<void> {
    const element = this.element();
    this.page.clicks.push(this.selector);
    element.onClick?.(this.index);
  }

  async fill(value: string): Promise<void> {
    const element = this.element();
    this.page.fills.push({ selector: this.selector, index: this.index, value });
    element.value = value;
    element.onFill?.(value, this.index);
  }

  async press(key: string): Promise<void> {
    const element = this.element();
    element.onPress?.(key, element.value ?? '');
  }

  async textContent(): Promise<string | null> {
    return this.element().text ?? null;
  }

  async inputValue(): Promise<string> {
    return this.element().value ?? '';
  }
}

export class FakeConsolePage implements TappedPage {
  currentUrl = 'about:blank';
  readonly elements = new Map<string, FakeElement>();
  readonly visited: string[] = [];
  readonly clicks: string[] = [];
  readonly fills: Array<{ selector: string; index: number; value: string }> = [];
  readonly waits: string[] = [];
  readonly pauses: number[] = [];
  readonly screenshots: string[] = [];
  storage: StorageSnapshot = { local: {}, session: {} };
  clipboard: string | null = null;
  closed = false;
  onGoto?: (url: string) => void;
  private readonly listeners: Array<(headers: Record<string, string>, url: string) => void> = [];

  show(selector: string, element: FakeElement = {}): void {
    this.elements.set(selector, element);
  }

  hide(...selectors: string[]): void {
    for (const selector of selectors) {
      this.elements.delete(selector);
    }
  }

  /** Simulates an outgoing request from the console's own scripts */
  emitRequest(headers: Record<string, string>, url = `${this.currentUrl}api`): void {
    for (const listener of this.listeners) {
      listener(headers, url);
    }
  }

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string, _options: { waitUntil: LoadState; timeout: number }): Promise<void> {
    this.currentUrl = url;
    this.visited.push(url);
    this.onGoto?.(url);
  }

  async waitForLoadState(_state: LoadState, _timeoutMs: number): Promise<void> {}

  locator(selector: string): ElementProbe {
    return new FakeProbe(this, selector);
  }

  async pause(ms: number): Promise<void> {
    this.pauses.push(ms);
  }

  async readStorage(): Promise<StorageSnapshot> {
    return this.storage;
  }

  async readClipboard(): Promise<string | null> {
    return this.clipboard;
  }

  async screenshot(path: string): Promise<void> {
    this.screenshots.push(path);
  }

  onRequest(listener: (headers: Record<string, string>, url: string) => void): void {
    this.listeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface FakeLauncherOptions {
  failLaunch?: Error;
  failContext?: Error;
  /** Builds the page for each session; defaults to a blank FakeConsolePage */
  pageFactory?: () => FakeConsolePage;
}

/**
 * Records teardown order so tests can assert page → context → browser.
 */
export class FakeLauncher implements BrowserLauncher {
  launched = 0;
  openBrowsers = 0;
  readonly closeOrder: string[] = [];
  readonly pages: FakeConsolePage[] = [];

  constructor(private readonly options: FakeLauncherOptions = {}) {}

  async launch(): Promise<LaunchedBrowser> {
    if (this.options.failLaunch) {
      throw this.options.failLaunch;
    }
    this.launched++;
    this.openBrowsers++;
    const browserNumber = this.launched;

    const context: IsolatedContext = {
      newPage: async () => {
        const page = this.options.pageFactory?.() ?? new FakeConsolePage();
        const close = page.close.bind(page);
        page.close = async () => {
          this.closeOrder.push(`page-${browserNumber}`);
          await close();
        };
        this.pages.push(page);
        return page;
      },
      close: async () => {
        this.closeOrder.push(`context-${browserNumber}`);
      },
    };

    return {
      newContext: async () => {
        if (this.options.failContext) {
          throw this.options.failContext;
        }
        return context;
      },
      close: async () => {
        this.closeOrder.push(`browser-${browserNumber}`);
        this.openBrowsers--;
      },
    };
  }
}
