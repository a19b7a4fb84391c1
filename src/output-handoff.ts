/**
 * Output Handoff
 *
 * A TUI process cannot change its parent shell's working directory, so the
 * chosen path is written where the shell wrapper reads it back.
 */

import * as fsp from 'fs/promises';

import { debugLog } from './debug-log.js';
import { NavigatorError } from './errors.js';
import type { Outcome } from './types.js';

export interface HandoffTarget {
  /** File the shell wrapper reads; when absent the path goes to stdout */
  outputFile?: string;
  stdout?: NodeJS.WritableStream;
}

/**
 * Content handed back to the shell: the confirmed path, or nothing
 */
export function handoffContent(outcome: Outcome): string {
  return outcome.kind === 'confirmed' ? outcome.path : '';
}

/**
 * Deliver the outcome. A cancelled session truncates the output file so a
 * stale path from an earlier run is never picked up.
 *
 * @throws NavigatorError with code IoFailure when the write fails
 */
export async function writeHandoff(outcome: Outcome, target: HandoffTarget = {}): Promise<void> {
  const content = handoffContent(outcome);

  if (target.outputFile) {
    try {
      await fsp.writeFile(target.outputFile, content, { encoding: 'utf-8', mode: 0o600 });
    } catch (error) {
      throw new NavigatorError('IoFailure', `Could not write ${target.outputFile}`, {
        path: target.outputFile,
        cause: error
      });
    }
    debugLog(`[handoff] wrote ${outcome.kind} outcome to ${target.outputFile}`);
    return;
  }

  if (content !== '') {
    const stdout = target.stdout ?? process.stdout;
    await new Promise<void>((resolve, reject) => {
      stdout.write(`${content}\n`, (error?: Error | null) => (error ? reject(error) : resolve()));
    });
  }
}
