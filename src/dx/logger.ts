export type LogLevel = 'debug' | 'info' | 'warn';

let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.RUSTEXT_DEBUG === '1';
}

/**
 * Enable/disable rustext debug logging programmatically.
 *
 * Used by the CLI (`--verbose`, config `debug: true`) and by tests.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[rustext]', ...args);
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[rustext]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[rustext]', ...args);
}

/**
 * User-facing build output (the cargo command line and its captured output).
 *
 * Not gated on debug: callers decide via the extension's `quiet` flag.
 * Goes to stderr so stdout stays clean for hosts that parse it.
 */
export function echo(text: string) {
  if (!text) return;
  process.stderr.write(text.endsWith('\n') ? text : `${text}\n`);
}
