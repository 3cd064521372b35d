export type RustcLevel = 'error' | 'warning';

/** One rustc message as cargo prints it in its human-readable output. */
export type RustcDiagnostic = {
  level: RustcLevel;
  /** Lint or error code, e.g. `E0425`. */
  code?: string;
  message: string;
  /** Primary span from the `-->` line that follows the header. */
  span?: { file: string; line: number; col: number };
};

const HEADER_RE = /^(error|warning)(?:\[([A-Za-z0-9_:-]+)\])?: (.+)$/;
const SPAN_RE = /^\s*--> (.+):(\d+):(\d+)$/;

/**
 * Extract rustc diagnostics from cargo output.
 *
 * A header line (`error[E0425]: message`) opens a diagnostic; the first
 * `--> file:line:col` before the next header is its primary span. Everything
 * else (source excerpts, `Compiling` lines, build script noise) is skipped.
 */
export function parseDiagnostics(text: string): RustcDiagnostic[] {
  const out: RustcDiagnostic[] = [];
  let open: RustcDiagnostic | undefined;

  for (const line of text.split(/\r?\n/)) {
    const header = HEADER_RE.exec(line);
    if (header) {
      open = { level: header[1] === 'warning' ? 'warning' : 'error', message: header[3] };
      if (header[2]) open.code = header[2];
      out.push(open);
      continue;
    }

    const span = SPAN_RE.exec(line);
    if (span && open && !open.span) {
      open.span = { file: span[1], line: Number(span[2]), col: Number(span[3]) };
    }
  }

  return out;
}

export function formatDiagnostic(d: RustcDiagnostic): string {
  const head = d.code ? `${d.level}[${d.code}]` : d.level;
  const where = d.span ? `${d.span.file}:${d.span.line}:${d.span.col} ` : '';
  return `${where}${head}: ${d.message}`;
}

/** Errors only; cargo output is full of warnings that would bury the cause. */
export function summarizeErrors(output: string): string {
  return parseDiagnostics(output)
    .filter((d) => d.level === 'error')
    .map(formatDiagnostic)
    .join('\n');
}
