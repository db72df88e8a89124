/**
 * Picks the OutputPort for a CLI run.
 */

import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

export interface CliOutputOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  /** True when the report is printed on stdout */
  reportOnStdout?: boolean;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Clack on an interactive terminal, plain stderr output otherwise.
 * A report printed on stdout always gets the plain adapter so it is not
 * interleaved with progress output.
 */
export function createCliOutput(options: CliOutputOptions = {}): OutputPort {
  if (options.reportOnStdout || !detectInteractive(options.interactive)) {
    return consoleOutput;
  }
  cachedClackOutput ??= createClackOutput();
  return cachedClackOutput;
}
