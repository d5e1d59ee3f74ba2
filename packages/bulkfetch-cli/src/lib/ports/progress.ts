/**
 * Abstraction for progress display.
 * Allows testing the batch loop without a terminal.
 */
export interface ProgressReporter {
  start(total: number): void;
  /** Called once per entry after it has been handled */
  advance(current: number, total: number, label: string): void;
  /** Print a line without corrupting the progress display */
  log(line: string): void;
  stop(): void;
}
