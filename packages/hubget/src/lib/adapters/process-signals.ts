import type { SignalHandler } from "../ports/signal-handler.js";
import { EXIT_CANCELLED } from "../errors/catalog.js";

/**
 * Create a signal handler for SIGINT/SIGTERM.
 * The first signal runs the callbacks so the transfer can stop at the next
 * chunk; the second one exits immediately.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => void> = [];
  let received = 0;

  const handleSignal = (signal: NodeJS.Signals) => {
    received++;
    if (received > 1) {
      exit(EXIT_CANCELLED);
      return;
    }
    for (const handler of handlers) {
      handler(signal);
    }
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      received = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}
