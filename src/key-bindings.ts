/**
 * Keyboard input utilities
 *
 * Maps ink's raw key events onto the navigator's logical keys. Letter
 * shortcuts (hjkl, v, /) are resolved by the navigator, since their meaning
 * depends on the mode.
 */

import type { Key } from 'ink';

export type NavigatorKey =
  | { kind: 'up' }
  | { kind: 'down' }
  | { kind: 'left' }
  | { kind: 'right' }
  | { kind: 'enter' }
  | { kind: 'escape' }
  | { kind: 'backspace' }
  | { kind: 'confirm' }
  | { kind: 'pageUp' }
  | { kind: 'pageDown' }
  | { kind: 'interrupt' }
  | { kind: 'char'; char: string };

/**
 * Shorthand for building keys in tests and scripted sessions
 */
export function keysFor(text: string): NavigatorKey[] {
  return Array.from(text, (char): NavigatorKey => ({ kind: 'char', char }));
}

function printable(input: string): string | null {
  if (input.length === 0) return null;
  for (const char of input) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 32 || code === 127) return null;
  }
  return input;
}

/**
 * Translate one ink input event; unbound keys yield an empty list
 *
 * Pasted text arrives as one event; it is split into characters.
 */
export function toNavigatorKeys(input: string, key: Key): NavigatorKey[] {
  if ((key.ctrl && input === 'c') || input === '\x03') return [{ kind: 'interrupt' }];
  if (key.upArrow) return [{ kind: 'up' }];
  if (key.downArrow) return [{ kind: 'down' }];
  if (key.leftArrow) return [{ kind: 'left' }];
  if (key.rightArrow) return [{ kind: 'right' }];
  if (key.pageUp) return [{ kind: 'pageUp' }];
  if (key.pageDown) return [{ kind: 'pageDown' }];
  if (key.return) return [{ kind: 'enter' }];
  if (key.escape) return [{ kind: 'escape' }];
  if (key.tab && !key.shift) return [{ kind: 'confirm' }];
  // Most terminals send DEL (0x7f) for Backspace, which ink reports as delete
  if (key.backspace || key.delete) return [{ kind: 'backspace' }];
  if (key.ctrl || key.meta) return [];

  const text = printable(input);
  return text === null ? [] : keysFor(text);
}
