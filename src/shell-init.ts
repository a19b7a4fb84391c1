/**
 * Shell integration
 *
 * `quickhop --init <shell>` prints two functions for the user's rc file:
 * `qh` browses from the current directory and `qhh` opens the history list.
 * Both run quickhop with a temp output file and `cd` into what it wrote.
 */

import { APP_NAME } from './config.js';

export const SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;

export type ShellKind = (typeof SHELLS)[number];

export function isShellKind(value: string): value is ShellKind {
  return SHELLS.some((shell) => shell === value);
}

export interface ShellInitOptions {
  /** Command used to start quickhop; defaults to the bare program name */
  command?: string;
  browseName?: string;
  historyName?: string;
}

function posixFunction(name: string, command: string, extraArgs: string): string {
  return `${name}() {
  local tmp_file dest
  tmp_file="$(mktemp)" || return 1
  ${command}${extraArgs} --output-file "$tmp_file" "$@"
  dest="$(cat "$tmp_file")"
  rm -f "$tmp_file"
  if [ -n "$dest" ] && [ -d "$dest" ]; then
    cd -- "$dest" || return 1
  elif [ -n "$dest" ]; then
    echo "${APP_NAME}: not a directory: $dest" >&2
    return 1
  fi
}`;
}

function fishFunction(name: string, command: string, extraArgs: string): string {
  return `function ${name}
    set -l tmp_file (mktemp)
    or return 1
    ${command}${extraArgs} --output-file $tmp_file $argv
    set -l dest (cat $tmp_file)
    rm -f $tmp_file
    if test -n "$dest"; and test -d "$dest"
        cd -- $dest
    else if test -n "$dest"
        echo "${APP_NAME}: not a directory: $dest" >&2
        return 1
    end
end`;
}

function powershellFunction(name: string, command: string, extraArgs: string): string {
  return `function ${name} {
    $tmpFile = [System.IO.Path]::GetTempFileName()
    try {
        & ${command}${extraArgs} --output-file $tmpFile @args
        $dest = (Get-Content -Raw -Path $tmpFile)
        if ($dest) { $dest = $dest.Trim() }
        if ($dest -and (Test-Path -LiteralPath $dest -PathType Container)) {
            Set-Location -LiteralPath $dest
        } elseif ($dest) {
            Write-Error "${APP_NAME}: not a directory: $dest"
        }
    } finally {
        Remove-Item -Force -ErrorAction SilentlyContinue $tmpFile
    }
}`;
}

/**
 * Shell source defining the browse and history functions
 *
 * @example
 * eval "$(quickhop --init bash)"
 */
export function renderShellInit(shell: ShellKind, options: ShellInitOptions = {}): string {
  const command = options.command ?? APP_NAME;
  const browse = options.browseName ?? 'qh';
  const history = options.historyName ?? 'qhh';

  const render = shell === 'fish' ? fishFunction : shell === 'powershell' ? powershellFunction : posixFunction;
  return `${render(browse, command, '')}\n\n${render(history, command, ' --history')}\n`;
}
