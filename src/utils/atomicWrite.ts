/**
 * Atomic Write Utilities
 *
 * Output files are written to a temp file beside the target and renamed
 * into place, so a reader never sees a partly written tree. The temp name
 * carries the PID and a timestamp.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ErrorCode, wrapError } from '../errors/index.js';
import { sanitizePath } from './paths.js';

/**
 * Atomically write content to a file, creating parent directories.
 * The temp file is removed if any step fails.
 *
 * @example
 * ```typescript
 * await atomicWrite('/out/lib.json', '{"items":[]}\n');
 * ```
 */
export async function atomicWrite(
  targetPath: string,
  content: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = `${targetPath}.tmp.${Date.now()}.${process.pid}`;

  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.promises.writeFile(tempPath, content, encoding);
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    try {
      await fs.promises.unlink(tempPath);
    } catch {
      // Temp file was never created
    }
    throw error;
  }
}

/**
 * Write command output, ending it with a newline.
 *
 * @throws SyntreeError WRITE_FAILED when the file cannot be written
 */
export async function writeOutputFile(targetPath: string, content: string): Promise<void> {
  try {
    await atomicWrite(targetPath, content.endsWith('\n') ? content : content + '\n');
  } catch (error) {
    throw wrapError(error, ErrorCode.WRITE_FAILED, `Failed to write ${sanitizePath(targetPath)}`);
  }
}
