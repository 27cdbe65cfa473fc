import { Logger, LogLevel } from '../types/index.js';

// JSON.stringify(new Error()) is {}, including when nested in meta
function expandErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { ...value, name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Render one diagnostic line. Object meta is appended as indented JSON on the
 * following lines; other non-empty meta is appended after a space.
 */
export function formatLogLine(level: LogLevel, message: string, meta?: unknown, time: Date = new Date()): string {
  let formatted = `${time.toISOString()} [${level.toUpperCase()}] ${message}`;

  if (meta && typeof meta === 'object') {
    formatted += `\n${JSON.stringify(meta, expandErrors, 2)}`;
  } else if (meta !== undefined && meta !== null && meta !== '') {
    formatted += ` ${String(meta)}`;
  }

  return formatted;
}

/**
 * Diagnostics go to stderr so they never mix with command output.
 * Debug lines are written only when TYPM_VERBOSE=1.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly verbose: boolean) {}

  debug(message: string, meta?: unknown): void {
    if (this.verbose) {
      console.error(formatLogLine(LogLevel.DEBUG, message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    console.error(formatLogLine(LogLevel.ERROR, message, meta));
  }
}

export const logger: Logger = new ConsoleLogger(process.env.TYPM_VERBOSE === '1');
