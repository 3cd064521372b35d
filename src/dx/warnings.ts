import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type RustextWarningCode = 'AMBIGUOUS_ARTIFACT' | 'DERIVED_EXTENSION_NAME';

export type RustextWarning = {
  code: RustextWarningCode;
  message: string;
  hint?: string;
};

/**
 * Report something worth knowing that does not fail the build.
 *
 * Printed only with debug logging on; always recorded as a `warning.<code>`
 * trace event so traced runs keep it even when the log is quiet.
 */
export function warn(w: RustextWarning): void {
  traceWarn(`warning.${w.code}`, { message: w.message, hint: w.hint });
  logWarn(`warning(${w.code}): ${w.message}${w.hint ? ` Hint: ${w.hint}` : ''}`);
}
