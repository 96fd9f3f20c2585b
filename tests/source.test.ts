/**
 * Source Reader Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readSourceFile, SourceReadError } from '../src/index.js';

describe('readSourceFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'xpresso-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the file as UTF-8 text', async () => {
    const path = join(dir, 'shop.xp');
    await writeFile(path, 'class Café { }\n', 'utf-8');

    await expect(readSourceFile(path)).resolves.toBe('class Café { }\n');
  });

  it('raises SourceReadError for a missing file', async () => {
    const path = join(dir, 'missing.xp');

    await expect(readSourceFile(path)).rejects.toThrow(SourceReadError);
    await expect(readSourceFile(path)).rejects.toThrow(
      `Cannot read source file ${path}: file not found`
    );
  });

  it('raises SourceReadError for a directory', async () => {
    await expect(readSourceFile(dir)).rejects.toMatchObject({
      name: 'SourceReadError',
      path: dir,
      code: 'SOURCE_READ',
    });
  });
});
