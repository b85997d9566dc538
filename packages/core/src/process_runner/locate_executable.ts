import { promises as fs, constants } from 'fs';
import * as path from 'path';
import { GitNotFoundError } from './errors';

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, process.platform === 'win32' ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves an executable name to an absolute path by walking `PATH`.
 *
 * A name that already contains a path separator is checked as is.
 * On Windows every `PATHEXT` extension is tried as well.
 *
 * @throws GitNotFoundError when no executable match exists
 *
 * @example
 * const git = await locateExecutable('git');
 * // => "/usr/bin/git"
 */
export async function locateExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const extensions = process.platform === 'win32'
    ? ['', ...(env['PATHEXT'] ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
    : [''];

  if (name.includes('/') || name.includes(path.sep)) {
    for (const ext of extensions) {
      const candidate = path.resolve(name + ext);
      if (await isExecutable(candidate)) return candidate;
    }
    throw new GitNotFoundError(name);
  }

  const directories = (env['PATH'] ?? '').split(path.delimiter).filter(Boolean);

  for (const dir of directories) {
    for (const ext of extensions) {
      const candidate = path.resolve(dir, name + ext);
      if (await isExecutable(candidate)) return candidate;
    }
  }

  throw new GitNotFoundError(name);
}
