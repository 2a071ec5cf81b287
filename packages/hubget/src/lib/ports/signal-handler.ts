/**
 * Abstraction for process interrupt handling.
 * Allows testing cancellation without sending real signals.
 */
export interface SignalHandler {
  /**
   * Register a callback for the first SIGINT/SIGTERM.
   * A second signal terminates the process.
   */
  onInterrupt(callback: (signal: NodeJS.Signals) => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
