import fs from 'fs';
import path from 'path';

import { isSupportedFile } from '../config/formats';
import { hasErrorCode } from '../errors';

export interface EnumerateOptions {
  /** Directories that are never descended into, such as an output root nested in the source. */
  exclude?: string[];
  /** Called for a subdirectory that cannot be listed; the walk carries on without it. */
  onUnreadable?: (directory: string) => void;
}

const UNREADABLE_CODES = ['EACCES', 'EPERM'];

async function isRegularFile(entryPath: string, entry: fs.Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }

  if (!entry.isSymbolicLink()) {
    return false;
  }

  try {
    const stats = await fs.promises.stat(entryPath);
    return stats.isFile();
  } catch {
    // dangling link
    return false;
  }
}

async function openDirectory(directory: string, isRoot: boolean, options: EnumerateOptions): Promise<fs.Dir | undefined> {
  try {
    return await fs.promises.opendir(directory);
  } catch (error) {
    if (isRoot || !UNREADABLE_CODES.some((code) => hasErrorCode(error, code))) {
      throw error;
    }
    options.onUnreadable?.(directory);
    return undefined;
  }
}

async function* walk(
  directory: string,
  isRoot: boolean,
  excluded: Set<string>,
  options: EnumerateOptions
): AsyncGenerator<string> {
  const dir = await openDirectory(directory, isRoot, options);
  if (!dir) {
    return;
  }

  for await (const entry of dir) {
    const entryPath = path.join(directory, entry.name);

    if (entry.isDirectory()) {
      if (!excluded.has(entryPath)) {
        yield* walk(entryPath, false, excluded, options);
      }
      continue;
    }

    if (isSupportedFile(entry.name) && (await isRegularFile(entryPath, entry))) {
      yield entryPath;
    }
  }
}

/**
 * Yields the files to convert under `source`. A file source is yielded as-is,
 * whatever its extension.
 */
export async function* enumerateFiles(source: string, options: EnumerateOptions = {}): AsyncGenerator<string> {
  const root = path.resolve(source);
  const stats = await fs.promises.stat(root);

  if (!stats.isDirectory()) {
    yield root;
    return;
  }

  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));
  yield* walk(root, true, excluded, options);
}

export async function collectFiles(source: string, options: EnumerateOptions = {}): Promise<string[]> {
  const files: string[] = [];
  for await (const file of enumerateFiles(source, options)) {
    files.push(file);
  }
  return files;
}
