/**
 * Content Sanitizer
 *
 * Makes arbitrary file content and file names safe to draw in the terminal:
 * - Terminal escape sequences (CSI, OSC, bare ESC) are removed
 * - Control characters are removed (names get a visible placeholder instead)
 * - Tabs are expanded and over-long lines clipped
 */

/* eslint-disable no-control-regex */
const CSI_SEQUENCE = /\x1b\[[0-?]*[ -/]*[@-~]/g
const OSC_SEQUENCE = /\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g
const OTHER_ESCAPE = /\x1b[@-Z\\-_]?/g
const C1_CONTROL = /[\x80-\x9f]/g
const CONTROL_EXCEPT_TAB = /[\x00-\x08\x0a-\x1f\x7f]/g
const CONTROL_ALL = /[\x00-\x1f\x7f]/g
/* eslint-enable no-control-regex */

export const DEFAULT_TAB_WIDTH = 4

export const DEFAULT_MAX_LINE_WIDTH = 512

/**
 * Remove terminal escape sequences from text
 *
 * @example
 * stripTerminalSequences('\x1b[31mred\x1b[0m') // 'red'
 */
export function stripTerminalSequences(text: string): string {
  return text
    .replace(OSC_SEQUENCE, '')
    .replace(CSI_SEQUENCE, '')
    .replace(OTHER_ESCAPE, '')
    .replace(C1_CONTROL, '')
}

/**
 * Expand tab characters to the next tab stop
 */
export function expandTabs(line: string, tabWidth: number = DEFAULT_TAB_WIDTH): string {
  if (!line.includes('\t')) {
    return line
  }

  let result = ''
  for (const char of line) {
    if (char === '\t') {
      const pad = tabWidth - (result.length % tabWidth)
      result += ' '.repeat(pad)
    } else {
      result += char
    }
  }
  return result
}

/**
 * Prepare one line of previewed file content for display
 */
export function sanitizePreviewLine(line: string, maxWidth: number = DEFAULT_MAX_LINE_WIDTH): string {
  const withoutCr = line.endsWith('\r') ? line.slice(0, -1) : line
  const cleaned = stripTerminalSequences(withoutCr).replace(CONTROL_EXCEPT_TAB, '')
  const expanded = expandTabs(cleaned)
  if (expanded.length <= maxWidth) {
    return expanded
  }
  // Clip by code point so a surrogate pair is never split
  const codePoints = Array.from(expanded)
  return codePoints.length > maxWidth ? codePoints.slice(0, maxWidth).join('') : expanded
}

/**
 * File names may legally contain newlines or escapes; show them as '?'
 */
export function sanitizeName(name: string): string {
  return stripTerminalSequences(name).replace(CONTROL_ALL, '?')
}

/**
 * Collapse text to a single printable line for the debug log
 */
export function sanitizeLogText(text: string): string {
  return stripTerminalSequences(text).replace(/\r?\n/g, ' ').replace(CONTROL_ALL, '')
}
