import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

/**
 * Diagnostic logger. Writes to stderr only, so command output on stdout is
 * never interleaved with diagnostics. User-facing messages go through the
 * OutputPort instead.
 *
 * The level comes from NUMPKG_LOG_LEVEL, or DEBUG when NUMPKG_VERBOSE=1;
 * `--verbose` raises it for one command.
 */

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const LEVEL_TAGS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info ',
  [LogLevel.WARN]: 'warn ',
  [LogLevel.ERROR]: 'error'
};

function renderMeta(meta: unknown): string {
  if (meta === undefined || meta === null || meta === '') return '';
  if (typeof meta !== 'object') return ` ${String(meta)}`;
  // Errors have no enumerable fields of their own
  const value = meta instanceof Error ? { name: meta.name, message: meta.message, stack: meta.stack } : meta;
  try {
    return `\n${JSON.stringify(value, (_key, field: unknown) => (field instanceof Error ? field.message : field), 2)}`;
  } catch {
    return ' [unserializable metadata]';
  }
}

class ConsoleLogger implements Logger {
  constructor(private level: LogLevel) {}

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) return;
    console.error(`numpkg ${LEVEL_TAGS[level]} ${message}${renderMeta(meta)}`);
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') return LogLevel.DEBUG;
  const requested = LEVEL_ORDER.find(level => level === env[ENV_VARS.LOG_LEVEL]?.toLowerCase());
  return requested ?? LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnv(process.env));
