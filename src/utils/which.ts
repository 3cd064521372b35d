import { accessSync, constants } from 'fs';
import { delimiter, isAbsolute, join } from 'path';

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolve `cmd` against PATH (and PATHEXT on Windows); null when not found. */
export function which(cmd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (isAbsolute(cmd) || cmd.includes('/')) return isExecutable(cmd) ? cmd : null;

  const pathVar = env.PATH ?? env.Path ?? '';
  const exts = process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of pathVar.split(delimiter)) {
    if (!dir) continue;
    for (const ext of exts) {
      const full = join(dir, `${cmd}${ext}`);
      if (isExecutable(full)) return full;
    }
  }
  return null;
}
