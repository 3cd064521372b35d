import { describe, it, expect, afterEach, vi } from 'vitest';

import { setDebugEnabled } from './logger.js';
import { warn } from './warnings.js';

describe('dx warnings', () => {
  const prevDebug = process.env.RUSTEXT_DEBUG;
  const prevTrace = process.env.RUSTEXT_TRACE;
  const prevLevel = process.env.RUSTEXT_TRACE_LEVEL;

  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
    if (prevDebug == null) delete process.env.RUSTEXT_DEBUG;
    else process.env.RUSTEXT_DEBUG = prevDebug;
    if (prevTrace == null) delete process.env.RUSTEXT_TRACE;
    else process.env.RUSTEXT_TRACE = prevTrace;
    if (prevLevel == null) delete process.env.RUSTEXT_TRACE_LEVEL;
    else process.env.RUSTEXT_TRACE_LEVEL = prevLevel;
  });

  it('stays silent without debug logging or tracing', () => {
    delete process.env.RUSTEXT_DEBUG;
    delete process.env.RUSTEXT_TRACE;
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    warn({ code: 'DERIVED_EXTENSION_NAME', message: 'using demo' });

    expect(log).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('prints the code and hint with debug logging on', () => {
    delete process.env.RUSTEXT_TRACE;
    setDebugEnabled(true);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    warn({ code: 'AMBIGUOUS_ARTIFACT', message: 'found 2 *.so files', hint: 'run `rustext clean`' });

    expect(warnSpy).toHaveBeenCalledWith(
      '[rustext]',
      'warning(AMBIGUOUS_ARTIFACT): found 2 *.so files Hint: run `rustext clean`',
    );
  });

  it('records a warn-level trace event', () => {
    delete process.env.RUSTEXT_DEBUG;
    process.env.RUSTEXT_TRACE = '1';
    delete process.env.RUSTEXT_TRACE_LEVEL;
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    warn({ code: 'AMBIGUOUS_ARTIFACT', message: 'found 2 *.so files' });

    expect(log).toHaveBeenCalledTimes(1);
    const [prefix, json] = log.mock.calls[0];
    expect(prefix).toBe('[rustext:trace]');
    const payload = JSON.parse(String(json));
    expect(payload.level).toBe('warn');
    expect(payload.event).toBe('warning.AMBIGUOUS_ARTIFACT');
    expect(payload.data).toEqual({ message: 'found 2 *.so files' });
  });
});
