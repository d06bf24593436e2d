export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

export type LoggerOptions = {
  service: string;
  level?: LogLevel;
  base?: LogFields;
  sink?: LogSink;
};

export type Logger = {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (fields: LogFields) => Logger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function normalizeFields(fields?: LogFields): LogFields {
  if (!fields) return {};
  const out: LogFields = {};
  Object.entries(fields).forEach(([key, value]) => {
    if (value !== undefined) {
      out[key] = value;
    }
  });
  return out;
}

export function serializeError(error: unknown): LogFields {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return {
    errorMessage: String(error),
  };
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
};

export function createLogger(options: LoggerOptions): Logger {
  const base = normalizeFields(options.base);
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      service: options.service,
      message,
      ...base,
      ...normalizeFields(fields),
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (message: string, fields?: LogFields) => write('debug', message, fields),
    info: (message: string, fields?: LogFields) => write('info', message, fields),
    warn: (message: string, fields?: LogFields) => write('warn', message, fields),
    error: (message: string, fields?: LogFields) => write('error', message, fields),
    child: (fields: LogFields) => createLogger({
      ...options,
      base: {
        ...base,
        ...normalizeFields(fields),
      },
    }),
  };
}

/** Logger that drops everything; handy where a collaborator needs one but output is noise. */
export function createSilentLogger(service = 'silent'): Logger {
  return createLogger({ service, sink: () => undefined });
}
