import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadIgnoredNamesCsv } from '../src/analyzer/ignoreCsv.js';
import { makeTmpDir } from './fixtures.js';

describe('loadIgnoredNamesCsv', () => {
  it('reads non-empty names and ignores the reason column', async () => {
    const dir = await makeTmpDir();
    const filePath = path.join(dir, 'ignored.csv');
    await fs.writeFile(filePath, '\ufeffname,reason\nfoo,logging noise\n, empty\n  bar  ,\n', 'utf8');

    expect(await loadIgnoredNamesCsv(filePath)).toEqual(['foo', 'bar']);
  });

  it('yields nothing for a missing file', async () => {
    const dir = await makeTmpDir();
    expect(await loadIgnoredNamesCsv(path.join(dir, 'absent.csv'))).toEqual([]);
  });

  it('reports a malformed file as a configuration error', async () => {
    const dir = await makeTmpDir();
    const filePath = path.join(dir, 'broken.csv');
    await fs.writeFile(filePath, 'name,reason\n"unterminated,x\n', 'utf8');

    await expect(loadIgnoredNamesCsv(filePath)).rejects.toMatchObject({ code: 'CONFIG' });
  });
});
