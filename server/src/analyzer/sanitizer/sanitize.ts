import fs from 'node:fs';
import fsp from 'node:fs/promises';

import { DEFAULT_IGNORED_DIR_NAMES } from '../defaults.js';
import { CallTreeError, errorMessage, isNodeErrorCode } from '../errors.js';
import { isRegularFile } from '../io.js';
import { createLogger } from '../logger.js';
import { walkFiles } from '../walk.js';

const log = createLogger('sanitize');

export const BACKUP_SUFFIX = '.saved_by_calltree';
export const TEMP_SUFFIX = '.tmp.created_by_calltree';

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const CHAR_LITERAL = /'\\?.'/g;
const STRING_LITERAL = /"(?:[^"\\]|\\[\s\S])*"/g;
const LINE_COMMENT = /\/\/.*/;
const BRACKET_IN_QUOTES = /'[{}<>()]'/g;
const LEFT_ANGLE_RUN = /<[<=]+/g;
const SPACED_LESS_THAN = /\s+<\s+/g;

const BINARY_SNIFF_BYTES = 8000;

function newlinesOf(text: string): string {
  let count = 0;
  for (const ch of text) if (ch === '\n') count += 1;
  return '\n'.repeat(count);
}

function sanitizeLine(line: string): string {
  return line
    .replace(LINE_COMMENT, '')
    .replace(BRACKET_IN_QUOTES, "'x'")
    .replace(LEFT_ANGLE_RUN, '++')
    .replace(SPACED_LESS_THAN, ' + ');
}

/**
 * Blanks comments, character and string literals, and defuses `<` tokens that are not
 * template brackets. The result always has the same number of lines as the input.
 */
export function sanitizeSource(text: string): string {
  // char literals go before strings so that '"' cannot open a string
  const blanked = text
    .replace(BLOCK_COMMENT, (comment) => newlinesOf(comment))
    .replace(CHAR_LITERAL, "'x'")
    .replace(STRING_LITERAL, (literal) => `""${newlinesOf(literal)}`);

  return blanked.split('\n').map(sanitizeLine).join('\n');
}

function isTextContent(buffer: Buffer): boolean {
  return !buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

export function backupPathOf(filePath: string): string {
  return `${filePath}${BACKUP_SUFFIX}`;
}

export function tempPathOf(filePath: string): string {
  return `${filePath}${TEMP_SUFFIX}`;
}

/**
 * Moves the original aside under its backup name, then puts the sanitized text in its
 * place. Returns false for files that are skipped (missing, not regular, binary).
 */
export async function sanitizeFile(filePath: string): Promise<boolean> {
  try {
    if (!(await isRegularFile(filePath))) return false;
    const original = await fsp.readFile(filePath);
    if (!isTextContent(original)) return false;

    const backupPath = backupPathOf(filePath);
    const tempPath = tempPathOf(filePath);
    await fsp.rename(filePath, backupPath);
    await fsp.writeFile(tempPath, sanitizeSource(original.toString('utf8')), 'utf8');
    await fsp.rename(tempPath, filePath);
    return true;
  } catch (error) {
    throw new CallTreeError('IO', `Fail to sanitize '${filePath}': ${errorMessage(error)}`, { cause: error });
  }
}

/** Puts the backup back over the working file. Silent no-op when there is no backup. */
export async function restoreFile(filePath: string): Promise<boolean> {
  const backupPath = backupPathOf(filePath);
  let restored = false;
  try {
    await fsp.rename(backupPath, filePath);
    restored = true;
  } catch (error) {
    if (!isNodeErrorCode(error, 'ENOENT')) {
      throw new CallTreeError('IO', `Fail to restore '${filePath}': ${errorMessage(error)}`, { cause: error });
    }
  }
  await fsp.rm(tempPathOf(filePath), { force: true });
  return restored;
}

/** Synchronous twin of restoreFile, for signal handlers that must finish before exit. */
export function restoreFileSync(filePath: string): boolean {
  let restored = false;
  try {
    fs.renameSync(backupPathOf(filePath), filePath);
    restored = true;
  } catch (error) {
    if (!isNodeErrorCode(error, 'ENOENT')) throw error;
  }
  fs.rmSync(tempPathOf(filePath), { force: true });
  return restored;
}

type RestoreFailure = { filePath: string; error: unknown };

function restoreFailedError(failures: RestoreFailure[], total: number): CallTreeError {
  const lines = failures.map(({ filePath, error }) => `  ${filePath}: ${errorMessage(error)}`);
  return new CallTreeError('IO', `Fail to restore ${failures.length} of ${total} files:\n${lines.join('\n')}`, {
    cause: new AggregateError(
      failures.map(({ error }) => error),
      'restore failures',
    ),
  });
}

/** Restores every file, then throws one IO error naming each file that could not be restored. */
export async function restoreFiles(filePaths: string[]): Promise<number> {
  let restored = 0;
  const failures: RestoreFailure[] = [];
  for (const filePath of filePaths) {
    try {
      if (await restoreFile(filePath)) restored += 1;
    } catch (error) {
      failures.push({ filePath, error });
    }
  }
  if (failures.length > 0) throw restoreFailedError(failures, filePaths.length);
  return restored;
}

export function restoreFilesSync(filePaths: string[]): number {
  let restored = 0;
  const failures: RestoreFailure[] = [];
  for (const filePath of filePaths) {
    try {
      if (restoreFileSync(filePath)) restored += 1;
    } catch (error) {
      failures.push({ filePath, error });
    }
  }
  if (failures.length > 0) throw restoreFailedError(failures, filePaths.length);
  return restored;
}

/** Crash recovery: restores every backup and removes every temp file left under rootDir. */
export async function restoreLeftovers(rootDir: string): Promise<number> {
  const backups = await walkFiles(rootDir, { suffixes: [BACKUP_SUFFIX], ignoreDirNames: DEFAULT_IGNORED_DIR_NAMES });
  const originals = backups.map((backupPath) => backupPath.slice(0, -BACKUP_SUFFIX.length));
  const restored = await restoreFiles(originals);

  const temps = await walkFiles(rootDir, { suffixes: [TEMP_SUFFIX], ignoreDirNames: DEFAULT_IGNORED_DIR_NAMES });
  for (const tempPath of temps) {
    await fsp.rm(tempPath, { force: true });
  }

  if (restored > 0 || temps.length > 0) {
    log('restored %d leftover backups, removed %d temp files', restored, temps.length);
  }
  return restored;
}
