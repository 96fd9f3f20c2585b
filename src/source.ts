/**
 * Source Reader
 * Loads a source file as UTF-8 text. The only fatal error in the pipeline.
 */

import { type FileHandle, open } from 'node:fs/promises';
import { SourceReadError } from './types.js';

function describeFailure(err: unknown): string {
  if (err instanceof Error && 'code' in err) {
    if (err.code === 'ENOENT') return 'file not found';
    if (err.code === 'EISDIR') return 'path is a directory';
    if (err.code === 'EACCES') return 'permission denied';
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read the whole file. The handle is closed on every path out.
 *
 * @throws {SourceReadError} When the file cannot be opened or read
 */
export async function readSourceFile(path: string): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new SourceReadError(path, describeFailure(err));
  }

  try {
    return await handle.readFile({ encoding: 'utf-8' });
  } catch (err) {
    throw new SourceReadError(path, describeFailure(err));
  } finally {
    await handle.close();
  }
}
