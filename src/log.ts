export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Logger with the same level and sink whose lines carry `[scope]`. */
  child(scope: string): Logger;
}

/** Where formatted lines go. Errors and warnings use `stderr`. */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface LoggerOptions {
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

const consoleSink: LogSink = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export function createLogger(level: LogLevel = 'info', opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? consoleSink;
  const now = opts.now ?? (() => new Date());
  const scope = opts.scope;

  const child = (name: string) =>
    createLogger(level, { ...opts, scope: scope ? `${scope}:${name}` : name });

  if (level === 'silent') {
    return {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child,
    };
  }

  const threshold = ORDER[level];
  const prefix = (lvl: string) =>
    `${now().toISOString()} ${lvl.toUpperCase()} ${scope ? `[${scope}] ` : ''}`;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) sink.stderr(prefix('error') + msg + fmtMeta(meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) sink.stderr(prefix('warn') + msg + fmtMeta(meta));
    },
    info: (msg, meta) => {
      if (can('info')) sink.stdout(prefix('info') + msg + fmtMeta(meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) sink.stdout(prefix('debug') + msg + fmtMeta(meta));
    },
    child,
  };
}
