/**
 * Filter Engine
 *
 * Live search over the current entry set: case-insensitive, unanchored
 * substring matching. No scoring; the result keeps the entry set's order.
 */

export interface Named {
  name: string;
}

export interface HighlightSegment {
  text: string;
  match: boolean;
}

/**
 * Indices of entries whose name contains `query`, in original order
 *
 * @example
 * filterEntries([{ name: 'banana' }, { name: 'Apple' }], 'a') // [0, 1]
 * filterEntries([{ name: 'banana' }, { name: 'Apple' }], 'pp') // [1]
 */
export function filterEntries(entries: readonly Named[], query: string): number[] {
  const indices: number[] = [];
  const needle = query.toLowerCase();

  for (let i = 0; i < entries.length; i++) {
    if (needle === '' || entries[i].name.toLowerCase().includes(needle)) {
      indices.push(i);
    }
  }

  return indices;
}

/**
 * Split `text` into plain and matched runs for every occurrence of `query`
 */
export function highlightMatches(text: string, query: string): HighlightSegment[] {
  if (query === '') {
    return [{ text, match: false }];
  }

  const haystack = text.toLowerCase();
  const needle = query.toLowerCase();
  // Lower-casing can change length for a few code points; fall back to no highlight
  if (haystack.length !== text.length) {
    return [{ text, match: false }];
  }

  const segments: HighlightSegment[] = [];
  let cursor = 0;
  let found = haystack.indexOf(needle, cursor);

  while (found !== -1) {
    if (found > cursor) {
      segments.push({ text: text.slice(cursor, found), match: false });
    }
    segments.push({ text: text.slice(found, found + needle.length), match: true });
    cursor = found + needle.length;
    found = haystack.indexOf(needle, cursor);
  }

  if (cursor < text.length) {
    segments.push({ text: text.slice(cursor), match: false });
  }

  return segments;
}
