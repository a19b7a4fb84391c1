/**
 * PDF text extraction for the preview pane
 *
 * pdf.js is loaded lazily on the first document preview. Pages are read in
 * order until the line budget is full.
 */

import * as fsp from 'fs/promises';

import { sanitizePreviewLine } from '../content-sanitizer.js';
import { NavigatorError } from '../errors.js';
import type { NumberedLine, PreviewPayload } from '../types.js';

export interface DocumentText {
  lines: NumberedLine[];
  truncated: boolean;
  pages: number;
}

export interface ExtractOptions {
  lineLimit: number;
  signal?: AbortSignal;
}

export type DocumentTextExtractor = (bytes: Uint8Array, options: ExtractOptions) => Promise<DocumentText>;

export interface DocumentPreviewOptions extends ExtractOptions {
  maxBytes: number;
  extractor?: DocumentTextExtractor;
}

export const DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf']);

/**
 * Extract up to `lineLimit` non-blank lines of text with pdf.js
 */
export const extractPdfText: DocumentTextExtractor = async (bytes, { lineLimit, signal }) => {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = getDocument({
    data: bytes,
    isEvalSupported: false,
    useSystemFonts: true,
    verbosity: 0
  });

  try {
    const doc = await loadingTask.promise;
    const collected: string[] = [];
    let current = '';

    for (let pageNumber = 1; pageNumber <= doc.numPages && collected.length <= lineLimit; pageNumber++) {
      signal?.throwIfAborted();
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();

      for (const item of content.items) {
        if (!('str' in item)) continue;
        current += item.str;
        if (item.hasEOL) {
          collected.push(current);
          current = '';
        }
      }
      if (current !== '') {
        collected.push(current);
        current = '';
      }
      page.cleanup();
    }

    const nonBlank = collected.filter((line) => line.trim() !== '');
    const lines = nonBlank.slice(0, lineLimit).map((text, index) => ({
      number: index + 1,
      text: sanitizePreviewLine(text)
    }));

    return { lines, truncated: nonBlank.length > lineLimit, pages: doc.numPages };
  } finally {
    await loadingTask.destroy();
  }
};

/**
 * Read a document file and extract its text
 *
 * @throws NavigatorError with code DecodeFailure when the document cannot be parsed
 */
export async function previewDocument(filePath: string, options: DocumentPreviewOptions): Promise<PreviewPayload> {
  const { size } = await fsp.stat(filePath);
  if (size > options.maxBytes) {
    return { kind: 'binary', size, note: 'Document too large to preview' };
  }

  const bytes = new Uint8Array(await fsp.readFile(filePath));
  options.signal?.throwIfAborted();

  const extractor = options.extractor ?? extractPdfText;
  let text: DocumentText;
  try {
    text = await extractor(bytes, { lineLimit: options.lineLimit, signal: options.signal });
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw new NavigatorError('DecodeFailure', 'Invalid PDF data', { path: filePath, cause: error });
  }

  return { kind: 'document', format: 'pdf', lines: text.lines, truncated: text.truncated, pages: text.pages };
}
