import { setTimeout as sleep } from 'node:timers/promises';
import { chromium, type Page } from 'playwright-core';
import { ConnectionError, errorMessage } from '../../errors/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';

/**
 * Attaches to a Chromium the operator started with --remote-debugging-port.
 * Only one pipeline should drive a given endpoint at a time.
 */

export interface DebugEndpoint {
  host: string;
  port: number;
}

export const DEFAULT_ENDPOINT: DebugEndpoint = { host: 'localhost', port: 9222 };

/** The parts of Playwright's Browser/BrowserContext/Page the connector touches */
export interface CdpPage {
  url(): string;
  close(): Promise<void>;
}

export interface CdpContext<P extends CdpPage> {
  pages(): P[];
  newPage(): Promise<P>;
}

export interface CdpBrowser<P extends CdpPage> {
  contexts(): CdpContext<P>[];
  close(): Promise<void>;
}

export type CdpConnector<P extends CdpPage> = (endpointUrl: string, options: { timeout: number }) => Promise<CdpBrowser<P>>;

export interface ConnectOptions {
  /** Bound on each connection attempt */
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  /** A tab already on this origin is reused instead of opening a new one */
  targetOrigin?: string;
  logger?: Logger;
}

export interface ReleaseOptions {
  closeOpenedPage?: boolean;
}

export interface BrowserHandle<P extends CdpPage = Page> {
  readonly endpointUrl: string;
  readonly browser: CdpBrowser<P>;
  readonly page: P;
  /** True when the connector opened `page` itself */
  readonly openedPage: boolean;
  release(options?: ReleaseOptions): Promise<void>;
}

export function endpointUrl(endpoint: DebugEndpoint | string): string {
  const raw = typeof endpoint === 'string' ? endpoint.trim() : `http://${endpoint.host}:${endpoint.port}`;
  const withScheme = /^[a-z]+:\/\//i.test(raw) ? raw : `http://${raw}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (err) {
    throw new ConnectionError(`invalid debug endpoint: ${raw}`, { endpoint: raw }, { cause: err });
  }
  if (!url.port) {
    throw new ConnectionError(`debug endpoint has no port: ${raw}`, { endpoint: raw });
  }
  return `${url.protocol}//${url.host}`;
}

function onOrigin(pageUrl: string, origin: string): boolean {
  try {
    return new URL(pageUrl).origin === new URL(origin).origin;
  } catch {
    return false;
  }
}

/** Same as `connect`, with the CDP client supplied by the caller. */
export async function connectWith<P extends CdpPage>(
  connector: CdpConnector<P>,
  endpoint: DebugEndpoint | string,
  options: ConnectOptions = {},
): Promise<BrowserHandle<P>> {
  const url = endpointUrl(endpoint);
  const timeoutMs = options.timeoutMs ?? 10000;
  const attempts = Math.max(1, options.retries ?? 5);
  const retryDelayMs = options.retryDelayMs ?? 3000;
  const logger = options.logger ?? createLogger('session-connector');

  let browser: CdpBrowser<P> | null = null;
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      browser = await connector(url, { timeout: timeoutMs });
      logger.info('connected to browser', { endpoint: url, attempt });
      break;
    } catch (err) {
      lastError = err;
      logger.warn('connection attempt failed', { endpoint: url, attempt, attempts, error: errorMessage(err) });
      if (attempt < attempts) await sleep(retryDelayMs);
    }
  }
  if (!browser) {
    throw new ConnectionError(
      `could not connect to ${url} after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      { endpoint: url, attempts },
      { cause: lastError },
    );
  }

  const [context] = browser.contexts();
  if (!context) {
    await browser.close();
    throw new ConnectionError(`browser at ${url} exposes no context`, { endpoint: url });
  }

  const pages = context.pages();
  const origin = options.targetOrigin;
  let page = origin ? pages.find((candidate) => onOrigin(candidate.url(), origin)) : pages[0];
  const openedPage = !page;
  if (!page) {
    try {
      page = await context.newPage();
    } catch (err) {
      await browser.close();
      throw new ConnectionError(`browser at ${url} could not open a tab: ${errorMessage(err)}`, { endpoint: url }, { cause: err });
    }
    logger.info('opened a new tab', { endpoint: url });
  }

  const connected = browser;
  const target = page;
  let released = false;
  return {
    endpointUrl: url,
    browser: connected,
    page: target,
    openedPage,
    async release(releaseOptions: ReleaseOptions = {}): Promise<void> {
      if (released) return;
      released = true;
      if (openedPage && releaseOptions.closeOpenedPage) {
        await target.close();
      }
      // over CDP this only disconnects; the operator's browser keeps running
      await connected.close();
      logger.debug('released browser', { endpoint: url });
    },
  };
}

export function connect(endpoint: DebugEndpoint | string = DEFAULT_ENDPOINT, options: ConnectOptions = {}): Promise<BrowserHandle<Page>> {
  return connectWith<Page>((url, connectOptions) => chromium.connectOverCDP(url, connectOptions), endpoint, options);
}
