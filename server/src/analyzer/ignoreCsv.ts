import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';

import { CallTreeError, errorMessage, isNodeErrorCode } from './errors.js';

type IgnoreRow = { name?: string; reason?: string };

function stripBom(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}

function toIgnoreRows(records: unknown): IgnoreRow[] {
  if (!Array.isArray(records)) return [];
  const rows: IgnoreRow[] = [];
  for (const record of records) {
    if (!record || typeof record !== 'object') continue;
    const name: unknown = Reflect.get(record, 'name');
    const reason: unknown = Reflect.get(record, 'reason');
    rows.push({
      name: typeof name === 'string' ? name : undefined,
      reason: typeof reason === 'string' ? reason : undefined,
    });
  }
  return rows;
}

/** Extra blacklisted names from a `name[,reason]` CSV. A missing file means no extra names. */
export async function loadIgnoredNamesCsv(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNodeErrorCode(error, 'ENOENT')) return [];
    throw new CallTreeError('IO', `Fail to read '${filePath}': ${errorMessage(error)}`, { cause: error });
  }

  let records: unknown;
  try {
    records = parse(stripBom(text), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new CallTreeError('CONFIG', `Fail to parse '${filePath}': ${errorMessage(error)}`, { cause: error });
  }

  const names: string[] = [];
  for (const row of toIgnoreRows(records)) {
    const name = row.name?.trim();
    if (name) names.push(name);
  }
  return names;
}
