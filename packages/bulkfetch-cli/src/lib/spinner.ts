/**
 * Spinner wrapper that respects the output mode.
 */

import ora, { type Ora } from "ora";
import type { OutputMode } from "./output/mode.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  /** Erase the current frame so other output can be written */
  clear(): Spinner;
  /** Redraw the current frame */
  render(): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for static/JSON mode.
 */
export class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }

  warn(_text?: string): Spinner {
    return this;
  }

  clear(): Spinner {
    return this;
  }

  render(): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }

  warn(text?: string): Spinner {
    this.ora.warn(text);
    return this;
  }

  clear(): Spinner {
    this.ora.clear();
    return this;
  }

  render(): Spinner {
    this.ora.render();
    return this;
  }
}

/**
 * Create a spinner; only interactive mode gets a live one.
 */
export function createSpinner(mode: OutputMode, text?: string): Spinner {
  if (mode !== "interactive") {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
