/**
 * Path helpers: normalization, containment, the config file location, and
 * display-safe paths for error messages.
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Config file looked up in the working directory */
export const CONFIG_FILE_NAME = 'syntree-comments.json';

const isWindows = process.platform === 'win32';

function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Absolute, normalized path without a trailing separator (roots keep theirs)
 *
 * @example
 * ```typescript
 * normalizePath('./src/')   // => '/home/dev/crate/src'
 * ```
 */
export function normalizePath(inputPath: string): string {
  const resolved = path.resolve(inputPath);
  return resolved === path.parse(resolved).root ? resolved : resolved.replace(/[\\/]+$/, '');
}

/**
 * `absolutePath` relative to `basePath`, always with forward slashes
 */
export function toRelativePath(absolutePath: string, basePath: string): string {
  return toForwardSlashes(path.relative(normalizePath(basePath), normalizePath(absolutePath)));
}

/**
 * True when `targetPath` is `directoryPath` or lies beneath it.
 * Case-insensitive on Windows.
 */
export function isWithinDirectory(targetPath: string, directoryPath: string): boolean {
  let target = normalizePath(targetPath);
  let dir = normalizePath(directoryPath);
  if (isWindows) {
    target = target.toLowerCase();
    dir = dir.toLowerCase();
  }
  return target === dir || target.startsWith(dir.endsWith(path.sep) ? dir : dir + path.sep);
}

export function expandTilde(inputPath: string): string {
  return inputPath.startsWith('~') ? path.join(os.homedir(), inputPath.slice(1)) : inputPath;
}

export function getConfigPath(directory: string): string {
  return path.join(normalizePath(directory), CONFIG_FILE_NAME);
}

/**
 * Shorten a path for messages: `./rel` inside `basePath`, `~/rel` inside
 * the home directory, otherwise the normalized path.
 *
 * @example
 * ```typescript
 * sanitizePath('/home/ana/crate/src/lib.rs', '/home/ana/crate')   // => './src/lib.rs'
 * sanitizePath('/home/ana/notes/a.rs')                           // => '~/notes/a.rs'
 * ```
 */
export function sanitizePath(fullPath: string, basePath?: string): string {
  if (!fullPath) {
    return '<unknown>';
  }

  if (basePath && isWithinDirectory(fullPath, basePath)) {
    return `./${toRelativePath(fullPath, basePath)}`;
  }

  const home = os.homedir();
  if (isWithinDirectory(fullPath, home)) {
    return `~/${toRelativePath(fullPath, home)}`;
  }

  return toForwardSlashes(normalizePath(fullPath));
}
