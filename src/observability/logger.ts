/**
 * Console Logger
 *
 * Scoped, level-filtered log lines: `[scope] message key=value ...`.
 * debug/info go to stdout, warn/error to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type LogWriter = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleWriter: LogWriter = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(`${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`);
  }
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = 'info',
    private readonly write: LogWriter = consoleWriter
  ) {}

  /** Same level and writer, nested scope (`scan:amadeus`). */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level, this.write);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, error?: unknown, fields?: LogFields): void {
    const detail = error === undefined ? undefined : error instanceof Error ? error.message : String(error);
    this.log('error', message, detail === undefined ? fields : { ...fields, error: detail });
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;
    this.write(level, `[${this.scope}] ${message}${formatFields(fields)}`);
  }
}

/** Logger that drops everything; for library callers that pass none. */
export const silentLogger = new Logger('silent', 'error', () => undefined);
