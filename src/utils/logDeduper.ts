import { logger, type LogLevel, type LogMeta } from './logger';

interface State {
  lastLoggedAt: number;
  suppressed: number;
}

const states = new Map<string, State>();
const DEFAULT_INTERVAL_MS = Number(process.env.LOG_DEDUPE_INTERVAL_MS || 60000);

/**
 * Logs `msg` at most once per `minIntervalMs` for a given key. The next
 * emitted line reports how many repeats were swallowed in between.
 *
 * Returns true when the line was written.
 */
export function dedupedLog(
  key: string,
  level: LogLevel,
  msg: string,
  meta?: LogMeta,
  minIntervalMs: number = DEFAULT_INTERVAL_MS,
  now: number = Date.now()
): boolean {
  const st = states.get(key);

  if (!st) {
    states.set(key, { lastLoggedAt: now, suppressed: 0 });
    logger[level](msg, meta);
    return true;
  }

  if (now - st.lastLoggedAt >= minIntervalMs) {
    const suppressedInfo = st.suppressed > 0 ? ` (suppressed ${st.suppressed} repeats)` : '';
    st.lastLoggedAt = now;
    st.suppressed = 0;
    logger[level](`${msg}${suppressedInfo}`, meta);
    return true;
  }

  st.suppressed += 1;
  return false;
}

export function resetDedupedLogs(): void {
  states.clear();
}
