export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type LogRecord = {
  level: LogLevel;
  tag: string;
  message: string;
  meta?: LogMeta;
};

export type LogSink = (record: LogRecord) => void;

export type Logger = {
  readonly tag: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(tag: string): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const safeJson = (meta?: LogMeta): string => {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' {"meta":"<unserializable>"}';
  }
};

export const consoleSink: LogSink = (record) => {
  const line = `[${record.tag}] ${record.message}${safeJson(record.meta)}`;
  if (record.level === 'error') {
    console.error(line);
  } else if (record.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export type LoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

export const resolveLogLevel = (raw: string | undefined = process.env.MOTIONVIS_LOG_LEVEL): LogLevel => {
  const normalized = raw?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
};

export const createLogger = (tag: string, options: LoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? resolveLogLevel()];
  const sink = options.sink ?? consoleSink;
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({ level, tag, message, meta });
  };
  return {
    tag,
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (childTag) => createLogger(`${tag}:${childTag}`, { level: options.level, sink }),
  };
};

/** Collects records in memory; used where diagnostics must be inspected. */
export const createMemorySink = (): { sink: LogSink; records: LogRecord[] } => {
  const records: LogRecord[] = [];
  return { sink: (record) => records.push(record), records };
};
