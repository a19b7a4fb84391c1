/**
 * Config Loader
 *
 * Resolves the per-user data directory and loads `config.json` from it.
 * Every key is optional; a missing file, invalid JSON or an out-of-range
 * value falls back to the defaults below.
 */

import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { debugLog } from './debug-log.js';

export const APP_NAME = 'quickhop';

export const APP_VERSION = '0.3.0';

export const DATA_DIR_ENV = 'QUICKHOP_DATA_DIR';

export interface QuickhopConfig {
  /** Maximum number of directories kept in history */
  historyLimit: number;
  /** Lines shown for text and document previews */
  previewLineLimit: number;
  /** Children shown in a directory preview before "+N more" */
  previewEntryLimit: number;
  /** Upper bound on entries read from a single directory */
  listingLimit: number;
  showHidden: boolean;
  maxImageBytes: number;
  maxDocumentBytes: number;
}

export const DEFAULT_CONFIG: Readonly<QuickhopConfig> = {
  historyLimit: 100,
  previewLineLimit: 100,
  previewEntryLimit: 100,
  listingLimit: 10_000,
  showHidden: true,
  maxImageBytes: 16 * 1024 * 1024,
  maxDocumentBytes: 32 * 1024 * 1024
};

const NUMERIC_KEYS = [
  'historyLimit',
  'previewLineLimit',
  'previewEntryLimit',
  'listingLimit',
  'maxImageBytes',
  'maxDocumentBytes'
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Merge a parsed config file over the defaults, keeping only valid values
 */
export function normalizeConfig(raw: unknown): QuickhopConfig {
  const config: QuickhopConfig = { ...DEFAULT_CONFIG };
  if (!isRecord(raw)) {
    return config;
  }

  for (const key of NUMERIC_KEYS) {
    const value = raw[key];
    if (isPositiveInteger(value)) {
      config[key] = value;
    }
  }

  if (typeof raw.showHidden === 'boolean') {
    config.showHidden = raw.showHidden;
  }

  return config;
}

/**
 * Get the data directory for history, config and the debug log
 *
 * `$QUICKHOP_DATA_DIR` wins when set. Otherwise:
 * - Windows: `%APPDATA%\quickhop`
 * - macOS: `~/Library/Application Support/quickhop`
 * - elsewhere: `$XDG_DATA_HOME/quickhop`, or `~/.local/share/quickhop`
 */
export function getDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  const override = env[DATA_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(override);
  }

  if (platform === 'win32') {
    const appData = env.APPDATA?.trim();
    return appData ? path.join(appData, APP_NAME) : path.join(os.tmpdir(), APP_NAME);
  }

  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support', APP_NAME);
  }

  const xdgDataHome = env.XDG_DATA_HOME?.trim();
  if (xdgDataHome && path.isAbsolute(xdgDataHome)) {
    return path.join(xdgDataHome, APP_NAME);
  }
  return path.join(homeDir, '.local', 'share', APP_NAME);
}

/**
 * Ensure the data directory exists
 */
export async function ensureDataDir(dataDir: string): Promise<void> {
  await fsp.mkdir(dataDir, { recursive: true, mode: 0o700 });
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.json');
}

/**
 * Load configuration from `<dataDir>/config.json`
 */
export async function loadConfig(dataDir: string): Promise<QuickhopConfig> {
  try {
    const content = await fsp.readFile(getConfigPath(dataDir), 'utf-8');
    return normalizeConfig(JSON.parse(content));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      debugLog(`Ignoring unreadable config: ${String(error)}`);
    }
    return normalizeConfig(undefined);
  }
}
