import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

/** The slice of `process` the handler needs */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
  exit(code: number): void;
}

/**
 * Create a signal handler for SIGINT/SIGTERM.
 * The first signal runs the callbacks; a second one exits immediately.
 */
export function createProcessSignalHandler(
  proc: SignalSource = process
): SignalHandler {
  const callbacks: Array<() => void> = [];
  let interrupted = false;

  const handleSignal = () => {
    if (interrupted) {
      proc.exit(INTERRUPTED_EXIT_CODE);
      return;
    }
    interrupted = true;
    for (const callback of callbacks) {
      callback();
    }
  };

  return {
    onInterrupt(callback) {
      callbacks.push(callback);
      if (callbacks.length === 1) {
        proc.on("SIGTERM", handleSignal);
        proc.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      callbacks.length = 0;
      proc.off("SIGTERM", handleSignal);
      proc.off("SIGINT", handleSignal);
    },
  };
}
