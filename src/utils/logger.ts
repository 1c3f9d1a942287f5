export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prepended to every message, e.g. `loader`. */
  scope?: string;
  /** Defaults to process.stderr. */
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.level];
  }

  child(scope: string): Logger {
    const nested = this.opts.scope ? `${this.opts.scope}:${scope}` : scope;
    return new Logger({ ...this.opts, scope: nested });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, scope, message, data }));
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    write(data === undefined ? head : `${head} ${safeJson(data)}`);
  }
}

/** A logger that drops everything; the default for library callers that pass none. */
export const silentLogger = new Logger({ level: 'silent' });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
