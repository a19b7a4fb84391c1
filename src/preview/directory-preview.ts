import type { Dirent } from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';

import { compareNames, resolveLinkTarget } from '../directory-lister.js';
import { toNavigatorError } from '../errors.js';
import type { EntryKind, PreviewChild, PreviewPayload } from '../types.js';

export interface DirectoryPreviewOptions {
  entryLimit: number;
  scanLimit: number;
  showHidden: boolean;
  signal?: AbortSignal;
}

function direntKind(dirent: Dirent): EntryKind {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}

async function describeChild(directory: string, dirent: Dirent): Promise<PreviewChild> {
  const kind = direntKind(dirent);
  if (kind !== 'symlink') {
    return { name: dirent.name, kind };
  }
  return { name: dirent.name, kind, linkTarget: await resolveLinkTarget(path.join(directory, dirent.name)) };
}

function childIsDirectory(child: PreviewChild): boolean {
  return child.kind === 'directory' || child.linkTarget === 'directory';
}

/**
 * Summarise a directory's children: the first `entryLimit` names plus a count
 * of the rest. Only symlinks are stat'ed, to sort them by what they point at.
 *
 * At most `scanLimit` children are read. When more exist the payload is
 * marked truncated and `remaining` is a lower bound.
 */
export async function previewDirectory(directory: string, options: DirectoryPreviewOptions): Promise<PreviewPayload> {
  const dirents: Dirent[] = [];
  let truncated = false;

  try {
    const dir = await fsp.opendir(directory);
    for await (const dirent of dir) {
      if (!options.showHidden && dirent.name.startsWith('.')) continue;
      if (dirents.length >= options.scanLimit) {
        truncated = true;
        break;
      }
      dirents.push(dirent);
      if (dirents.length % 256 === 0) options.signal?.throwIfAborted();
    }
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw toNavigatorError(error, directory);
  }

  const described = await Promise.all(dirents.map((dirent) => describeChild(directory, dirent)));
  options.signal?.throwIfAborted();

  described.sort((a, b) => {
    const aDir = childIsDirectory(a);
    const bDir = childIsDirectory(b);
    if (aDir !== bDir) return aDir ? -1 : 1;
    return compareNames(a.name, b.name);
  });

  const children = described.slice(0, options.entryLimit);
  // The child that stopped the scan is known to exist too
  const remaining = described.length - children.length + (truncated ? 1 : 0);

  return { kind: 'directory', children, remaining, truncated };
}
