export type { SessionContext } from './SessionContext.js';
export { createPlaywrightSession, type PlaywrightSessionOptions } from './playwrightSession.js';
