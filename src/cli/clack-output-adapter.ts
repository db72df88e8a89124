/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for rich interactive terminal UI.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 * Clack writes to stdout, so only use it when the report goes to a file.
 */
export function createClackOutput(): OutputPort {
  return {
    step(message: string): void {
      log.step(message);
    },

    success(message: string): void {
      log.success(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        }
      };
    }
  };
}
