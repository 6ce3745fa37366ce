/**
 * Page access for one automation session.
 *
 * Every component that needs to look at the live page receives this object
 * explicitly; there is no module-level driver handle.
 */
export interface SessionContext {
  /** Full HTML (or visible text) of the current page */
  pageSource(): Promise<string>;

  /** URL the browser is currently on */
  currentUrl(): Promise<string>;

  /**
   * Cooperative stop flag. Polled between attempts and after every backoff
   * sleep; a sleep already in progress is not interrupted.
   */
  shouldStop?(): boolean;
}
