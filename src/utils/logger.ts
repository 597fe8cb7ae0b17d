import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogFormat = 'text' | 'json';
type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Errors stringify to `{}` under JSON.stringify; flatten them first. */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if ('stderr' in value && typeof value.stderr === 'string' && value.stderr.length > 0) {
      out['stderr'] = value.stderr;
    }
    return out;
  }
  return value;
}

function serializeMeta(meta: LogMeta): LogMeta {
  return Object.fromEntries(Object.entries(meta).map(([k, v]) => [k, serializeValue(v)]));
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta | undefined,
  format: LogFormat,
  ts: string,
): string {
  const clean = meta ? serializeMeta(meta) : undefined;
  if (format === 'json') return JSON.stringify({ timestamp: ts, level, message, ...clean });
  return clean
    ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(clean)}`
    : `[${ts}] [${level.toUpperCase()}] ${message}`;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const out = formatLogLine(level, message, meta, env.LOG_FORMAT, new Date().toISOString());
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: LogMeta) => log('debug', msg, meta),
  info:  (msg: string, meta?: LogMeta) => log('info',  msg, meta),
  warn:  (msg: string, meta?: LogMeta) => log('warn',  msg, meta),
  error: (msg: string, meta?: LogMeta) => log('error', msg, meta),
};
