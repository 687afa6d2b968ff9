/**
 * Time source for polling loops and session ageing
 * Injected so timeout paths can be driven deterministically in tests
 */
export interface IClock {
  /**
   * Current time in milliseconds since the epoch
   */
  now(): number;

  /**
   * Suspends the caller for the given number of milliseconds
   */
  sleep(ms: number): Promise<void>;
}
