/**
 * The slice of a browser page the provisioning pipeline drives.
 *
 * Playwright's Locator satisfies ElementProbe structurally; ConsolePage is
 * implemented over a Playwright Page by PlaywrightConsolePage in
 * browser-manager.ts and by in-process fakes in tests.
 */

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface ElementProbe {
  count(): Promise<number>;
  first(): ElementProbe;
  nth(index: number): ElementProbe;
  waitFor(options: { state: 'attached' | 'visible'; timeout: number }): Promise<void>;
  isVisible(): Promise<boolean>;
  click(options: { timeout: number }): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
  press(key: string, options: { timeout: number }): Promise<void>;
  textContent(options: { timeout: number }): Promise<string | null>;
  inputValue(options: { timeout: number }): Promise<string>;
}

export interface StorageSnapshot {
  local: Record<string, string>;
  session: Record<string, string>;
}

export interface ConsolePage {
  url(): string;
  goto(url: string, options: { waitUntil: LoadState; timeout: number }): Promise<void>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
  locator(selector: string): ElementProbe;
  /** Fixed pause that lets the console react; suspends only this job */
  pause(ms: number): Promise<void>;
  readStorage(): Promise<StorageSnapshot>;
  /** Clipboard text, or null when the page may not read it */
  readClipboard(): Promise<string | null>;
  screenshot(path: string): Promise<void>;
}

/**
 * A page that also exposes its outgoing-request tap and its own teardown.
 */
export interface TappedPage extends ConsolePage {
  onRequest(listener: (headers: Record<string, string>, url: string) => void): void;
  close(): Promise<void>;
}

export interface IsolatedContext {
  newPage(): Promise<TappedPage>;
  close(): Promise<void>;
}

export interface LaunchedBrowser {
  newContext(): Promise<IsolatedContext>;
  close(): Promise<void>;
}

/**
 * Starts one browser process per call.
 */
export interface BrowserLauncher {
  launch(): Promise<LaunchedBrowser>;
}
