/**
 * Debug Logging Utility
 *
 * Provides centralized debug logging that:
 * - Is off unless QUICKHOP_DEBUG=true or `--debug` turns it on
 * - Writes to debug.log in the data directory with 0600 permissions
 * - Strips control characters so a log line stays one line
 * - Never blocks or throws into the caller
 */

import * as fsp from 'fs/promises';
import * as path from 'path';

import { sanitizeLogText } from './content-sanitizer.js';

export const DEBUG_ENV = 'QUICKHOP_DEBUG';

interface DebugLogState {
  enabled: boolean;
  file: string | null;
}

const state: DebugLogState = {
  enabled: process.env[DEBUG_ENV] === 'true',
  file: null
};

/**
 * Point the logger at the data directory (call once during init)
 */
export const configureDebugLog = (dataDir: string, enabled: boolean = state.enabled): void => {
  state.enabled = enabled;
  state.file = path.join(dataDir, 'debug.log');
};

export const isDebugEnabled = (): boolean => state.enabled && state.file !== null;

/**
 * Format a log line; exported for tests
 */
export const formatLogLine = (msg: string, now: Date = new Date()): string =>
  `[${now.toISOString()}] ${sanitizeLogText(msg)}\n`;

/**
 * Debug logger that appends to the log file (non-blocking)
 */
export const debugLog = (msg: string): void => {
  const file = state.file;
  if (!state.enabled || file === null) return;

  // Fire-and-forget: don't block on file writes
  fsp.appendFile(file, formatLogLine(msg), { mode: 0o600 }).catch(() => {
    // Logging must never disturb the UI
    state.enabled = false;
  });
};

/**
 * Get current debug log content (for inspection)
 */
export const getDebugLog = async (): Promise<string | null> => {
  if (state.file === null) return null;

  try {
    return await fsp.readFile(state.file, 'utf-8');
  } catch {
    return null;
  }
};
