import type { Page } from 'playwright-core';
import type { SessionContext } from './SessionContext.js';

export interface PlaywrightSessionOptions {
  shouldStop?: () => boolean;
}

/** Wrap a Playwright page as a SessionContext. */
export function createPlaywrightSession(page: Page, opts: PlaywrightSessionOptions = {}): SessionContext {
  return {
    pageSource: () => page.content(),
    currentUrl: async () => page.url(),
    shouldStop: opts.shouldStop,
  };
}
