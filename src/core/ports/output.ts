/**
 * Output port
 *
 * Everything numpkg tells the user goes through an OutputPort. Pipelines
 * receive one on the ExecutionContext; the CLI picks the clack adapter for
 * terminals and the console adapter for pipes and CI.
 */

export interface ProgressSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** One step of a longer operation, e.g. a package about to be updated */
  step(message: string): void;
  /** Unadorned line, used for tables and plain values */
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  /** Titled block, one per described package */
  note(content: string, title?: string): void;
  spinner(): ProgressSpinner;
}
