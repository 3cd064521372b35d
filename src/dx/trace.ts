import { performance } from 'node:perf_hooks';

/** Most severe first; a configured level lets through itself and everything before it. */
const TRACE_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type TraceLevel = (typeof TRACE_LEVELS)[number];

export type TracePayload = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: string;
  data?: unknown;
};

function isTraceLevel(v: string): v is TraceLevel {
  return TRACE_LEVELS.some((level) => level === v);
}

/** Threshold from RUSTEXT_TRACE / RUSTEXT_TRACE_LEVEL, or null when tracing is off. */
function traceThreshold(): TraceLevel | null {
  const on = process.env.RUSTEXT_TRACE;
  if (on !== '1' && on !== 'true' && on !== 'yes') return null;
  const level = (process.env.RUSTEXT_TRACE_LEVEL ?? '').toLowerCase();
  return isTraceLevel(level) ? level : 'info';
}

export function shouldTrace(level: TraceLevel): boolean {
  const threshold = traceThreshold();
  return threshold !== null && TRACE_LEVELS.indexOf(level) <= TRACE_LEVELS.indexOf(threshold);
}

/** One JSON line per event on stdout, for piping builds into log tooling. */
export function trace(level: TraceLevel, event: string, data?: unknown) {
  if (!shouldTrace(level)) return;

  const payload: TracePayload = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) payload.data = data;

  // eslint-disable-next-line no-console
  console.log('[rustext:trace]', JSON.stringify(payload));
}

export const traceError = (event: string, data?: unknown) => trace('error', event, data);
export const traceWarn = (event: string, data?: unknown) => trace('warn', event, data);
export const traceInfo = (event: string, data?: unknown) => trace('info', event, data);
export const traceDebug = (event: string, data?: unknown) => trace('debug', event, data);
