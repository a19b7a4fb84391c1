/**
 * Bounded text preview
 *
 * Reads only as much of a file as needed to fill the line budget. The first
 * chunk decides between text and binary: a NUL byte or invalid UTF-8 in it
 * means binary.
 */

import * as fsp from 'fs/promises';

import { sanitizePreviewLine } from '../content-sanitizer.js';
import type { NumberedLine, PreviewPayload } from '../types.js';

export interface TextPreviewOptions {
  lineLimit: number;
  /** Bytes inspected for the text/binary decision */
  sniffBytes?: number;
  /** Hard ceiling on bytes read for one preview */
  scanBytes?: number;
  chunkSize?: number;
  signal?: AbortSignal;
}

export interface TextExcerpt {
  lines: NumberedLine[];
  truncated: boolean;
  bytesRead: number;
  size: number;
}

export const DEFAULT_SNIFF_BYTES = 8 * 1024;
export const DEFAULT_SCAN_BYTES = 1024 * 1024;
const DEFAULT_CHUNK_SIZE = 16 * 1024;

/**
 * True when the prefix has no NUL byte and decodes as UTF-8
 *
 * A multi-byte sequence cut off at the end of the prefix is not an error.
 */
export function looksLikeText(prefix: Uint8Array): boolean {
  if (prefix.includes(0)) {
    return false;
  }

  try {
    new TextDecoder('utf-8', { fatal: true }).decode(prefix, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Read up to `lineLimit` lines, or null when the content is binary
 */
export async function readTextExcerpt(filePath: string, options: TextPreviewOptions): Promise<TextExcerpt | null> {
  const sniffBytes = options.sniffBytes ?? DEFAULT_SNIFF_BYTES;
  const scanBytes = Math.max(options.scanBytes ?? DEFAULT_SCAN_BYTES, sniffBytes);
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const { lineLimit, signal } = options;

  const handle = await fsp.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const decoder = new TextDecoder('utf-8');
    const raw: string[] = [];
    let pending = '';
    let bytesRead = 0;
    let eof = false;

    const readChunk = async (length: number): Promise<Uint8Array> => {
      const buffer = new Uint8Array(length);
      const result = await handle.read(buffer, 0, length, bytesRead);
      bytesRead += result.bytesRead;
      if (result.bytesRead < length) {
        eof = true;
      }
      return buffer.subarray(0, result.bytesRead);
    };

    const absorb = (text: string): void => {
      const parts = (pending + text).split('\n');
      pending = parts.pop() ?? '';
      raw.push(...parts);
    };

    const first = await readChunk(sniffBytes);
    if (!looksLikeText(first)) {
      return null;
    }
    absorb(decoder.decode(first, { stream: true }));

    while (!eof && raw.length <= lineLimit && bytesRead < scanBytes) {
      signal?.throwIfAborted();
      const chunk = await readChunk(Math.min(chunkSize, scanBytes - bytesRead));
      absorb(decoder.decode(chunk, { stream: true }));
    }

    if (eof) {
      pending += decoder.decode();
    }
    if (pending !== '') {
      raw.push(pending);
    }

    const moreOnDisk = !eof && bytesRead < size;
    const truncated = raw.length > lineLimit || moreOnDisk;
    const lines = raw.slice(0, lineLimit).map((text, index) => ({
      number: index + 1,
      text: sanitizePreviewLine(text)
    }));

    return { lines, truncated, bytesRead, size };
  } finally {
    await handle.close();
  }
}

/**
 * Text excerpt, or the file size when the content is binary
 */
export async function previewTextOrBinary(filePath: string, options: TextPreviewOptions): Promise<PreviewPayload> {
  const excerpt = await readTextExcerpt(filePath, options);
  if (excerpt === null) {
    const { size } = await fsp.stat(filePath);
    return { kind: 'binary', size };
  }
  return { kind: 'text', lines: excerpt.lines, truncated: excerpt.truncated };
}
