/**
 * Abstraction for process signal handling.
 * Allows testing interrupt logic without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for the first SIGINT/SIGTERM */
  onInterrupt(callback: () => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
