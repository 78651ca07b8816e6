import fs from 'fs/promises';
import type { Dirent } from 'fs';
import os from 'os';
import path from 'path';
import { compareNames } from './collectionNames';

const sortEntries = (entries: Dirent[]): Dirent[] =>
  [...entries].sort((a, b) => compareNames(a.name, b.name));

/**
 * Reads a directory and returns its entries in ordinal name order. Returns an
 * empty list when the directory cannot be read.
 */
export const readDirectoryEntries = async (dirPath: string): Promise<Dirent[]> => {
  try {
    return sortEntries(await fs.readdir(dirPath, { withFileTypes: true }));
  } catch {
    return [];
  }
};

export const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

export const isDirectory = async (targetPath: string) => {
  try {
    return (await fs.stat(targetPath)).isDirectory();
  } catch {
    return false;
  }
};

export const isFile = async (targetPath: string) => {
  try {
    return (await fs.stat(targetPath)).isFile();
  } catch {
    return false;
  }
};

/** Symlinked entries are followed, so a link to a directory counts as one. */
const entryIsDirectory = async (dirPath: string, entry: Dirent) => {
  if (entry.isDirectory()) {
    return true;
  }
  if (entry.isSymbolicLink()) {
    return isDirectory(path.join(dirPath, entry.name));
  }
  return false;
};

/**
 * Lists child directory names of `dirPath` in ordinal order. Unlike
 * {@link readDirectoryEntries}, read failures propagate to the caller.
 */
export const listChildDirectories = async (dirPath: string): Promise<string[]> => {
  const entries = sortEntries(await fs.readdir(dirPath, { withFileTypes: true }));
  const names: string[] = [];
  for (const entry of entries) {
    if (await entryIsDirectory(dirPath, entry)) {
      names.push(entry.name);
    }
  }
  return names;
};

/**
 * Resolves symlinks in `targetPath`; returns the path unchanged when it cannot
 * be resolved (for example a dangling link).
 */
export const resolveRealPath = async (targetPath: string): Promise<string> => {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return path.resolve(targetPath);
  }
};

/** Expands a leading `~` to the home directory. */
export const expandHome = (input: string) => {
  if (input === '~') return os.homedir();
  if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
};

/** Absolute form of a user-supplied path, with `~` expanded. */
export const resolveUserPath = (input: string) => path.resolve(expandHome(input));

/** True for errors meaning the path (or one of its parents) does not exist. */
export const isMissingPathError = (error: unknown) =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'ENOTDIR');

export const globToRegExp = (pattern: string, flags = '') => {
  const escaped = pattern
    .replace(/[-\\^$+?.()|[\]{}]/g, '\\$&')
    .replace(/\\\?/g, '.')
    .replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`, flags);
};

/**
 * Recursively collects files under `rootPath` whose base name matches `matcher`,
 * visiting directories in ordinal order. Symlinked directories are not entered.
 */
export const findFiles = async (
  rootPath: string,
  matcher: (name: string) => boolean,
): Promise<string[]> => {
  const matches: string[] = [];

  const walk = async (currentPath: string) => {
    const entries = await readDirectoryEntries(currentPath);
    for (const entry of entries) {
      const entryPath = path.join(currentPath, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
        continue;
      }
      if (!matcher(entry.name)) {
        continue;
      }
      if (entry.isFile() || (entry.isSymbolicLink() && (await isFile(entryPath)))) {
        matches.push(entryPath);
      }
    }
  };

  await walk(rootPath);
  return matches;
};
