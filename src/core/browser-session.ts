/**
 * Browser Session Controller
 *
 * One job gets one browser process, one isolated context and one page, with
 * the token interceptor wired to the page's request tap before the first
 * navigation. Teardown closes page, then context, then browser on every exit
 * path (success, thrown error, abort) and is safe to call more than once.
 */

import { join } from 'path';
import type { BrowserLauncher, IsolatedContext, LaunchedBrowser, TappedPage } from './console-page.js';
import { TokenInterceptor } from './token-interceptor.js';
import { FatalEnvironmentError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

export interface BrowserSession {
  jobId: string;
  page: TappedPage;
  interceptor: TokenInterceptor;
  /** Idempotent; never rejects */
  release(): Promise<void>;
  readonly released: boolean;
}

export interface SessionControllerOptions {
  /** Where a full-page screenshot goes when a job fails; unset disables it */
  screenshotDir?: string;
}

export class BrowserSessionController {
  private readonly log = logger.session;
  private open = 0;

  constructor(
    private readonly launcher: BrowserLauncher,
    private readonly options: SessionControllerOptions = {}
  ) {}

  /**
   * Sessions acquired and not yet released.
   */
  get openSessions(): number {
    return this.open;
  }

  async acquire(jobId: string): Promise<BrowserSession> {
    const log = this.log.child({ jobId });

    let browser: LaunchedBrowser;
    try {
      browser = await this.launcher.launch();
    } catch (error) {
      throw error instanceof FatalEnvironmentError
        ? error
        : new FatalEnvironmentError('Browser launch failed', { cause: error });
    }

    let context: IsolatedContext | null = null;
    try {
      context = await browser.newContext();
      const page = await context.newPage();
      return this.track(jobId, log, browser, context, page);
    } catch (error) {
      const partial = context;
      await closeStep(log, 'context', () => partial?.close() ?? Promise.resolve());
      await closeStep(log, 'browser', () => browser.close());
      throw new FatalEnvironmentError('Browser context could not be created', { cause: error });
    }
  }

  private track(
    jobId: string,
    log: Logger,
    browser: LaunchedBrowser,
    context: IsolatedContext,
    page: TappedPage
  ): BrowserSession {
    const interceptor = new TokenInterceptor(jobId);
    page.onRequest((headers, url) => interceptor.observe(headers, url));

    this.open++;
    log.info('Browser session acquired', { openSessions: this.open });

    let releasing: Promise<void> | null = null;
    return {
      jobId,
      page,
      interceptor,
      get released() {
        return releasing !== null;
      },
      release: () => {
        if (!releasing) {
          releasing = (async () => {
            await closeStep(log, 'page', () => page.close());
            await closeStep(log, 'context', () => context.close());
            await closeStep(log, 'browser', () => browser.close());
            this.open--;
            log.info('Browser session released', { openSessions: this.open });
          })();
        }
        return releasing;
      },
    };
  }

  /**
   * Run `fn` inside a fresh session. The session is released however `fn`
   * ends. Aborting the signal rejects with the signal's reason without
   * waiting for `fn`, and still releases.
   */
  async withSession<T>(
    jobId: string,
    fn: (session: BrowserSession) => Promise<T>,
    options: { signal?: AbortSignal } = {}
  ): Promise<T> {
    const session = await this.acquire(jobId);
    try {
      return await raceAbort(fn(session), options.signal, this.log);
    } catch (error) {
      await this.captureFailure(session, error);
      throw error;
    } finally {
      await session.release();
    }
  }

  private async captureFailure(session: BrowserSession, error: unknown): Promise<void> {
    if (!this.options.screenshotDir || session.released) {
      return;
    }
    const path = join(this.options.screenshotDir, `${session.jobId}-failure-${Date.now()}.png`);
    try {
      await session.page.screenshot(path);
      this.log.info('Failure screenshot saved', {
        jobId: session.jobId,
        path,
        errorName: error instanceof Error ? error.name : typeof error,
      });
    } catch (screenshotError) {
      this.log.warn('Failure screenshot could not be taken', {
        jobId: session.jobId,
        errorName: screenshotError instanceof Error ? screenshotError.name : typeof screenshotError,
      });
    }
  }
}

async function closeStep(log: Logger, what: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (error) {
    // Teardown continues with the next layer
    log.warn('Close failed during teardown', { what, error: error instanceof Error ? error.message : String(error) });
  }
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal | undefined, log: Logger): Promise<T> {
  if (!signal) {
    return work;
  }
  if (signal.aborted) {
    work.catch((error: unknown) => log.debug('Work settled after abort', { errorName: errorName(error) }));
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
