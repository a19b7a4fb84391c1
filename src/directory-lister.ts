/**
 * Directory Lister
 *
 * Reads the direct children of one directory. Symlinks are reported as
 * `symlink` with the kind of their target; they are never re-listed here.
 */

import type { Dirent, Stats } from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';

import { DEFAULT_CONFIG } from './config.js';
import { toNavigatorError } from './errors.js';
import { isDirectoryLike, type Entry, type EntryKind, type EntrySet, type LinkTarget } from './types.js';

export interface ListOptions {
  /** Stop reading after this many children */
  limit?: number;
  showHidden?: boolean;
}

function kindFromStats(stats: Stats): EntryKind {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

function kindFromDirent(dirent: Dirent): EntryKind {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}

/**
 * Kind of a symlink's target; `broken` when it cannot be followed
 */
export async function resolveLinkTarget(linkPath: string): Promise<LinkTarget> {
  try {
    const target = await fsp.stat(linkPath);
    if (target.isDirectory()) return 'directory';
    if (target.isFile()) return 'file';
    return 'other';
  } catch {
    return 'broken';
  }
}

/**
 * Build an Entry for one child without following it
 */
export async function describeEntry(directory: string, name: string, fallbackKind: EntryKind = 'other'): Promise<Entry> {
  const entryPath = path.join(directory, name);

  let stats: Stats;
  try {
    stats = await fsp.lstat(entryPath);
  } catch {
    // Vanished or unreadable between readdir and lstat
    return { name, path: entryPath, kind: fallbackKind, size: 0, modifiedAt: null };
  }

  const kind = kindFromStats(stats);
  const entry: Entry = {
    name,
    path: entryPath,
    kind,
    size: kind === 'file' ? stats.size : 0,
    modifiedAt: stats.mtime
  };

  if (kind === 'symlink') {
    entry.linkTarget = await resolveLinkTarget(entryPath);
  }

  return entry;
}

/**
 * Directory-like first, then case-insensitive name, then exact name
 */
export function compareEntries(a: Entry, b: Entry): number {
  const aDir = isDirectoryLike(a);
  const bDir = isDirectoryLike(b);
  if (aDir !== bDir) {
    return aDir ? -1 : 1;
  }
  return compareNames(a.name, b.name);
}

export function compareNames(a: string, b: string): number {
  const aLower = a.toLowerCase();
  const bLower = b.toLowerCase();
  if (aLower !== bLower) {
    return aLower < bLower ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * List a directory's direct children, sorted
 *
 * @throws NavigatorError (NotFound, AccessDenied, NotADirectory, IoFailure)
 */
export async function listDirectory(directory: string, options: ListOptions = {}): Promise<EntrySet> {
  const limit = options.limit ?? DEFAULT_CONFIG.listingLimit;
  const showHidden = options.showHidden ?? DEFAULT_CONFIG.showHidden;
  const resolved = path.resolve(directory);

  const dirents: Dirent[] = [];
  let truncated = false;

  try {
    const dir = await fsp.opendir(resolved);
    for await (const dirent of dir) {
      if (!showHidden && dirent.name.startsWith('.')) continue;
      if (dirents.length >= limit) {
        truncated = true;
        break;
      }
      dirents.push(dirent);
    }
  } catch (error) {
    throw toNavigatorError(error, resolved);
  }

  const entries = await Promise.all(
    dirents.map((dirent) => describeEntry(resolved, dirent.name, kindFromDirent(dirent)))
  );
  entries.sort(compareEntries);

  return { directory: resolved, entries, truncated };
}
