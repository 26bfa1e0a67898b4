import fs from 'node:fs/promises';
import path from 'node:path';

import { isNodeErrorCode } from './errors.js';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, `${JSON.stringify(data)}\n`, 'utf8');
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf8');
  const data: unknown = JSON.parse(text);
  return data;
}

/** Reads a text file, or null when it does not exist. Other failures propagate. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNodeErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNodeErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}

export async function touchFiles(filePaths: string[]): Promise<void> {
  const now = new Date();
  for (const filePath of filePaths) {
    await fs.utimes(filePath, now, now);
  }
}
