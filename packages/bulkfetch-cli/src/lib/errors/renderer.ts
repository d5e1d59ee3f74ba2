import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the human-readable lines for an error.
 */
export function formatStaticError(error: CLIError, width = Math.min(getTerminalWidth(), 80)): string[] {
  const output: string[] = [""];

  const errorLines = wrapText(error.message, width - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, width - 4, "  ")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * JSON shape for an error; undefined fields are dropped.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(JSON.stringify({ success: false, error: formatJsonError(error) }, null, 2));
      break;
    case "static":
    case "interactive":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isCLIError(error)) {
    renderError(error, mode);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    const cliError = new CLIError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    });
    renderError(cliError, mode);
  }
}
