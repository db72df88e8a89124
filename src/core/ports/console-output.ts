/**
 * Console Output Adapter (Default/CI)
 * 
 * Plain console-based implementation of OutputPort.
 * Safe for CI/CD pipelines and headless environments. Everything goes to
 * stderr so that a report printed on stdout stays machine readable.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  step(message: string): void {
    console.error(message);
  },

  success(message: string): void {
    console.error(`✓ ${message}`);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.error(`\n${title}\n${content}`);
    } else {
      console.error(`\n${content}`);
    }
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.error(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.error(`✓ ${finalMessage ?? msg}`);
      },
      message(text: string) {
        msg = text;
      },
    };
  },
};
