#!/usr/bin/env node
/**
 * quickhop - terminal directory navigator
 *
 * Browse, filter and preview, then hand the chosen directory back to the
 * shell. Run through the `qh` / `qhh` functions printed by `--init` so the
 * shell can `cd` into the result.
 */

import { render } from 'ink';
import React from 'react';

import { CliUsageError, USAGE, parseCliArgs, type CliCommand } from '../src/cli-args.js';
import { APP_NAME, APP_VERSION, ensureDataDir, getDataDir, loadConfig } from '../src/config.js';
import { DEBUG_ENV, configureDebugLog, debugLog } from '../src/debug-log.js';
import { describeError } from '../src/errors.js';
import { HistoryStore } from '../src/history-store.js';
import { Navigator } from '../src/navigator.js';
import { writeHandoff } from '../src/output-handoff.js';
import { PreviewDispatcher } from '../src/preview/preview-dispatcher.js';
import { PreviewScheduler } from '../src/preview/preview-scheduler.js';
import { renderShellInit } from '../src/shell-init.js';
import type { Outcome } from '../src/types.js';
import { NavigatorApp } from './tui/components/index.js';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

function fail(message: string): number {
  process.stderr.write(`${APP_NAME}: ${message}\n`);
  return EXIT_FAILURE;
}

async function main(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${APP_NAME}: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.kind) {
    case 'help':
      process.stdout.write(USAGE);
      return EXIT_OK;
    case 'version':
      process.stdout.write(`${APP_NAME} ${APP_VERSION}\n`);
      return EXIT_OK;
    case 'init':
      process.stdout.write(renderShellInit(command.shell));
      return EXIT_OK;
    case 'run':
      break;
  }

  const { stdin, stdout, stderr } = process;
  // The UI draws on stdout, or on stderr when stdout is captured
  const screen = stdout.isTTY ? stdout : stderr;
  if (!stdin.isTTY || !screen.isTTY) {
    return fail('an interactive terminal is required');
  }

  const dataDir = getDataDir();
  try {
    await ensureDataDir(dataDir);
  } catch (error) {
    // History and the debug log are unavailable; browsing still works
    stderr.write(`${APP_NAME}: cannot create ${dataDir}: ${String(error)}\n`);
  }
  configureDebugLog(dataDir, command.debug || process.env[DEBUG_ENV] === 'true');
  debugLog(`[startup] ${APP_NAME} ${APP_VERSION} data dir ${dataDir}`);

  const config = await loadConfig(dataDir);
  const history = HistoryStore.forDataDir(dataDir, { limit: config.historyLimit });
  await history.load();

  const previews = new PreviewScheduler(new PreviewDispatcher(config));

  let navigator: Navigator;
  try {
    navigator = await Navigator.create({
      startDirectory: command.directory ?? process.cwd(),
      startInHistory: command.history,
      history,
      previews,
      listOptions: { limit: config.listingLimit, showHidden: config.showHidden }
    });
  } catch (error) {
    return fail(describeError(error));
  }

  if (stdin.setRawMode) {
    stdin.setRawMode(true);
  }

  let outcome: Outcome;
  try {
    const { waitUntilExit } = render(<NavigatorApp navigator={navigator} />, {
      stdin,
      stdout: screen,
      stderr,
      exitOnCtrlC: false, // Ctrl+C cancels through the navigator
      patchConsole: false
    });
    await waitUntilExit();
    outcome = navigator.getSnapshot().outcome ?? { kind: 'cancelled' };
  } finally {
    navigator.dispose();
    if (stdin.setRawMode) {
      stdin.setRawMode(false);
    }
    // Reset Application Cursor Keys
    screen.write('\x1b[?1l');
  }

  try {
    await writeHandoff(outcome, { outputFile: command.outputFile });
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }

  debugLog(`[exit] ${outcome.kind}`);
  return EXIT_OK;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => process.exit(fail(error instanceof Error ? error.stack ?? error.message : String(error)))
);
