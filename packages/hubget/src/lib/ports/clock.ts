/**
 * Abstraction for reading the current time.
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
}
