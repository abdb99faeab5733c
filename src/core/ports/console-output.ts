import type { OutputPort, ProgressSpinner } from './output.js';

/**
 * Plain line output for pipes and CI logs. Warnings and errors go to
 * stderr so that list output stays machine readable.
 */
export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  step: message => console.log(`> ${message}`),
  message: message => console.log(message),
  success: message => console.log(`✓ ${message}`),
  error: message => console.error(`✗ ${message}`),
  warn: message => console.error(`⚠ ${message}`),

  note(content, title) {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  // Spinners do not animate here; only the outcome is printed
  spinner(): ProgressSpinner {
    let current = '';
    return {
      start: message => {
        current = message;
      },
      message: text => {
        current = text;
      },
      stop: finalMessage => {
        console.log(finalMessage ?? current);
      }
    };
  }
};
