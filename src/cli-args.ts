/**
 * Command-line argument parsing
 */

import { APP_NAME, DATA_DIR_ENV } from './config.js';
import { DEBUG_ENV } from './debug-log.js';
import { SHELLS, isShellKind, type ShellKind } from './shell-init.js';

export type CliCommand =
  | { kind: 'run'; directory?: string; outputFile?: string; history: boolean; debug: boolean }
  | { kind: 'init'; shell: ShellKind }
  | { kind: 'help' }
  | { kind: 'version' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: ${APP_NAME} [directory] [options]
       ${APP_NAME} --init <${SHELLS.join('|')}>

Browse directories, preview files and hand the chosen directory to your shell.

Options:
  -o, --output-file <path>  Write the chosen path to <path> instead of stdout
      --history             Start in the recent-directories list
      --debug               Log to debug.log in the data directory
      --init <shell>        Print the shell function for ${SHELLS.join(', ')}
  -h, --help                Show this help
  -V, --version             Show the version

Environment:
  ${DATA_DIR_ENV}  Directory for history, config.json and debug.log
  ${DEBUG_ENV}     Set to "true" to enable the debug log
`;

/**
 * Split `--flag=value` into flag and inline value
 */
function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parse arguments (without the node executable and script path)
 *
 * @throws CliUsageError for unknown flags or missing values
 * @example
 * parseCliArgs(['src', '--output-file', '/tmp/out'])
 * // { kind: 'run', directory: 'src', outputFile: '/tmp/out', history: false, debug: false }
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let directory: string | undefined;
  let outputFile: string | undefined;
  let history = false;
  let debug = false;
  let positionalOnly = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (positionalOnly || !arg.startsWith('-') || arg === '-') {
      if (directory !== undefined) {
        throw new CliUsageError(`Unexpected argument: ${arg}`);
      }
      directory = arg;
      continue;
    }

    const [flag, inline] = splitInline(arg);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && next !== '-')) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--':
        positionalOnly = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-V':
      case '--version':
        return { kind: 'version' };
      case '--init': {
        const shell = takeValue();
        if (!isShellKind(shell)) {
          throw new CliUsageError(`Unsupported shell: ${shell} (expected ${SHELLS.join(', ')})`);
        }
        return { kind: 'init', shell };
      }
      case '-o':
      case '--output-file':
        outputFile = takeValue();
        break;
      case '--history':
        history = true;
        break;
      case '--debug':
        debug = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return { kind: 'run', directory, outputFile, history, debug };
}
