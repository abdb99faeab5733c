import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, ProgressSpinner } from '../core/ports/output.js';

/**
 * Spinner that tolerates stop() without start(), which happens when a
 * package fails before its progress line is shown
 */
function createClackSpinner(): ProgressSpinner {
  const inner = spinner();
  let running = false;
  return {
    start(message) {
      if (running) {
        inner.message(message);
        return;
      }
      inner.start(message);
      running = true;
    },
    message(text) {
      if (running) inner.message(text);
    },
    stop(finalMessage) {
      if (!running) return;
      inner.stop(finalMessage);
      running = false;
    }
  };
}

/**
 * OutputPort for interactive terminals, rendered by @clack/prompts
 */
export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    step: message => log.step(message),
    message: message => log.message(message),
    success: message => log.success(message),
    error: message => log.error(message),
    warn: message => log.warn(message),
    note: (content, title) => note(content, title),
    spinner: createClackSpinner
  };
}
