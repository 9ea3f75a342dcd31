type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

let threshold: LogLevel = process.env.LOG_LEVEL === 'debug' ? 'DEBUG' : 'INFO';

function describe(meta: unknown): unknown {
  if (meta instanceof Error) return `${meta.name}: ${meta.message}`;
  return meta ?? '';
}

function emit(level: LogLevel, msg: string, meta?: unknown) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const line = `[${level}] ${new Date().toISOString()}: ${msg}`;
  const sink = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
  sink(line, describe(meta));
}

export const Logger = {
  debug: (msg: string, meta?: unknown) => emit('DEBUG', msg, meta),
  info: (msg: string, meta?: unknown) => emit('INFO', msg, meta),
  warn: (msg: string, meta?: unknown) => emit('WARN', msg, meta),
  error: (msg: string, err?: unknown) => emit('ERROR', msg, err),
  setLevel: (level: LogLevel) => {
    threshold = level;
  },
};
