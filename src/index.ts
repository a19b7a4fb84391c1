/**
 * quickhop - terminal directory navigator
 *
 * Library entry point: the navigator core without the ink front end. For
 * interactive use run the `quickhop` binary through its shell functions:
 *   eval "$(quickhop --init bash)"
 */

export { parseCliArgs, CliUsageError, USAGE } from './cli-args.js';
export type { CliCommand } from './cli-args.js';

export {
  APP_NAME,
  APP_VERSION,
  DEFAULT_CONFIG,
  getDataDir,
  ensureDataDir,
  loadConfig,
  normalizeConfig
} from './config.js';
export type { QuickhopConfig } from './config.js';

export { configureDebugLog, debugLog } from './debug-log.js';
export { listDirectory, compareEntries } from './directory-lister.js';
export { NavigatorError, describeError, toNavigatorError } from './errors.js';
export type { NavigatorErrorCode } from './errors.js';
export { filterEntries, highlightMatches } from './filter-engine.js';
export { HistoryStore } from './history-store.js';
export type { HistoryRecord } from './history-store.js';
export { toNavigatorKeys } from './key-bindings.js';
export type { NavigatorKey } from './key-bindings.js';
export { Navigator } from './navigator.js';
export type { NavigatorHistory, NavigatorOptions } from './navigator.js';
export { writeHandoff } from './output-handoff.js';
export { PreviewDispatcher, classifyEntry } from './preview/preview-dispatcher.js';
export { PreviewScheduler } from './preview/preview-scheduler.js';
export { projectScreen } from './render-model.js';
export type { ScreenModel, Viewport } from './render-model.js';
export { renderShellInit } from './shell-init.js';
export type { ShellKind } from './shell-init.js';

export type * from './types.js';
export { isDirectoryLike } from './types.js';

export { useNavigator } from './hooks/useNavigator.js';
