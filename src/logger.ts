/**
 * Logging for the Replicant server and CLI.
 * Everything goes to stderr so command output on stdout stays clean.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVELS: Record<LogLevel, { rank: number; color: string }> = {
  debug: { rank: 0, color: '\x1b[2m' },
  info: { rank: 1, color: '\x1b[36m' },
  warn: { rank: 2, color: '\x1b[33m' },
  error: { rank: 3, color: '\x1b[31m' },
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function parseLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

// REPLICANT_LOG_LEVEL wins; REPLICANT_DEBUG is the short switch
const currentLevel: LogLevel = parseLevel(process.env.REPLICANT_LOG_LEVEL) ??
  (process.env.REPLICANT_DEBUG ? 'debug' : 'info');

const useColor = process.stderr.isTTY === true && !process.env.NO_COLOR;

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level].rank >= LEVELS[currentLevel].rank;
}

function fieldValue(value: unknown): string {
  if (typeof value === 'string') {
    return /^[\w.:/@+-]*$/.test(value) && value !== '' ? value : JSON.stringify(value);
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * `HH:mm:ss.SSS LEVEL message key=value ...`; strings with spaces or
 * quotes are JSON-quoted, objects are JSON.
 */
export function formatLine(
  level: LogLevel,
  message: string,
  fields?: LogFields,
  options: { now?: Date; color?: boolean } = {}
): string {
  const time = (options.now ?? new Date()).toISOString().slice(11, 23);
  const label = level.toUpperCase().padEnd(5);
  const pairs = Object.entries(fields ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${fieldValue(value)}`)
    .join(' ');

  if (!options.color) {
    return `${time} ${label} ${message}${pairs ? ` ${pairs}` : ''}`;
  }
  return `${DIM}${time}${RESET} ${LEVELS[level].color}${label}${RESET} ${message}` +
    (pairs ? ` ${DIM}${pairs}${RESET}` : '');
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (shouldLog(level)) {
    console.error(formatLine(level, message, fields, { color: useColor }));
  }
}

export const logger = {
  debug(message: string, fields?: LogFields): void {
    write('debug', message, fields);
  },

  info(message: string, fields?: LogFields): void {
    write('info', message, fields);
  },

  warn(message: string, fields?: LogFields): void {
    write('warn', message, fields);
  },

  error(message: string, error?: unknown, fields?: LogFields): void {
    if (error instanceof Error) {
      write('error', message, { ...fields, error: error.message, stack: error.stack });
    } else if (error !== undefined) {
      write('error', message, { ...fields, error: String(error) });
    } else {
      write('error', message, fields);
    }
  },

  /** One line per HTTP request */
  request(method: string, path: string, status: number, ms: number): void {
    write(status >= 500 ? 'error' : 'info', `${method} ${path} ${status}`, { ms });
  },
};
