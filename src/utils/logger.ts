import { inspect } from 'util';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

function defaultLevel(): LogLevel {
  if (process.env.NODE_ENV === 'production') return 'info';
  // Jest sets NODE_ENV=test; keep test output to real problems.
  if (process.env.NODE_ENV === 'test') return 'error';
  return 'debug';
}

const rawLevel = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
const envLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : defaultLevel();
const currentLevel = levelOrder[envLevel];

const REDACT_KEYS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'apikey',
  'api-key',
  'password',
]);

function redactValue(key: string, value: unknown): unknown {
  const lowered = key.toLowerCase();
  if (REDACT_KEYS.has(lowered)) {
    return '[REDACTED]';
  }
  if (lowered.includes('token') || lowered.includes('secret')) {
    return '[REDACTED]';
  }
  return value;
}

export function redact(value: unknown, depth = 0): unknown {
  if (value == null || typeof value !== 'object') return value;
  if (depth > 4) return '[Object]';
  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1));

  const out: LogMeta = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = redactValue(key, redact(entry, depth + 1));
  }
  return out;
}

function redactMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, entry] of Object.entries(meta)) {
    out[key] = redactValue(key, redact(entry, 1));
  }
  return out;
}

function readProperty(source: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key) ? Reflect.get(source, key) : undefined;
}

function serializeError(err: unknown): LogMeta {
  if (!err) return { message: 'Unknown error' };
  if (err instanceof Error) {
    return redactMeta({
      name: err.name,
      message: err.message,
      stack: err.stack,
      code: readProperty(err, 'code'),
      kind: readProperty(err, 'kind'),
      statusCode: readProperty(err, 'statusCode'),
    });
  }
  if (typeof err === 'object') return redactMeta({ ...err });
  return { message: String(err) };
}

function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (levelOrder[level] > currentLevel) return;
  const time = new Date().toISOString();
  const base: LogMeta = { level, time, msg };
  const payload = meta ? { ...base, ...redactMeta(meta) } : base;
  if (process.env.NODE_ENV === 'production') {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(payload));
  } else {
    // eslint-disable-next-line no-console
    console.log(`[${time}] ${level.toUpperCase()} ${msg}`, inspect(payload, { depth: 4, colors: false }));
  }
}

export const logger = {
  level: envLevel,
  fatal: (msg: string, meta?: LogMeta) => log('fatal', msg, meta),
  error: (msg: string, meta?: LogMeta) => log('error', msg, meta),
  warn: (msg: string, meta?: LogMeta) => log('warn', msg, meta),
  info: (msg: string, meta?: LogMeta) => log('info', msg, meta),
  debug: (msg: string, meta?: LogMeta) => log('debug', msg, meta),
  trace: (msg: string, meta?: LogMeta) => log('trace', msg, meta),
  serializeError,
};

export type Logger = typeof logger;
