/**
 * History Store
 *
 * Recently visited directories, most recent first, capped and de-duplicated.
 * Persisted as JSON Lines (`history.jsonl`) in the data directory.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';

import { DEFAULT_CONFIG } from './config.js';
import { debugLog } from './debug-log.js';
import { NavigatorError } from './errors.js';

export const HISTORY_FILE = 'history.jsonl';

export interface HistoryRecord {
  path: string;
  visits: number;
  lastVisited: string;
}

export interface HistoryStoreOptions {
  limit?: number;
  now?: () => Date;
}

/**
 * Parse one stored line, or null when it is not a usable record
 */
export function parseHistoryLine(line: string): HistoryRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const record: Record<string, unknown> = { ...value };
  if (typeof record.path !== 'string' || !path.isAbsolute(record.path)) {
    return null;
  }

  const visits = typeof record.visits === 'number' && Number.isInteger(record.visits) && record.visits > 0
    ? record.visits
    : 1;
  const lastVisited = typeof record.lastVisited === 'string' ? record.lastVisited : new Date(0).toISOString();

  return { path: record.path, visits, lastVisited };
}

export class HistoryStore {
  private records: HistoryRecord[] = [];
  private readonly limit: number;
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    options: HistoryStoreOptions = {}
  ) {
    this.limit = options.limit ?? DEFAULT_CONFIG.historyLimit;
    this.now = options.now ?? (() => new Date());
  }

  static forDataDir(dataDir: string, options: HistoryStoreOptions = {}): HistoryStore {
    return new HistoryStore(path.join(dataDir, HISTORY_FILE), options);
  }

  get file(): string {
    return this.filePath;
  }

  /**
   * Replace the in-memory list with the file's content
   *
   * A missing or unreadable file yields an empty history. Bad lines,
   * duplicates and lines beyond the limit are skipped.
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await fsp.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        debugLog(`[history] could not read ${this.filePath}: ${String(error)}`);
      }
      this.records = [];
      return;
    }

    const seen = new Set<string>();
    const records: HistoryRecord[] = [];
    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      const record = parseHistoryLine(line);
      if (!record || seen.has(record.path)) continue;
      seen.add(record.path);
      records.push(record);
      if (records.length >= this.limit) break;
    }

    this.records = records;
  }

  /**
   * Write the list through a temp file and rename
   *
   * @throws NavigatorError with code PersistenceFailure
   */
  async save(): Promise<void> {
    const body = this.records.map((record) => JSON.stringify(record)).join('\n');
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fsp.writeFile(tempPath, body === '' ? '' : `${body}\n`, { mode: 0o600 });
      await fsp.rename(tempPath, this.filePath);
    } catch (error) {
      await fsp.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        debugLog(`[history] could not remove ${tempPath}: ${String(cleanupError)}`);
      });
      throw new NavigatorError('PersistenceFailure', `Could not save history: ${String(error)}`, {
        path: this.filePath,
        cause: error
      });
    }
  }

  /**
   * Move `directory` to the front, or insert it there, then apply the cap
   */
  record(directory: string): void {
    const absolute = path.resolve(directory);
    const index = this.records.findIndex((record) => record.path === absolute);
    const visits = index === -1 ? 1 : this.records[index].visits + 1;
    if (index !== -1) {
      this.records.splice(index, 1);
    }

    this.records.unshift({ path: absolute, visits, lastVisited: this.now().toISOString() });
    if (this.records.length > this.limit) {
      this.records.length = this.limit;
    }
  }

  /**
   * Paths, most recent first
   */
  list(): string[] {
    return this.records.map((record) => record.path);
  }

  entries(): readonly HistoryRecord[] {
    return this.records.map((record) => ({ ...record }));
  }
}
