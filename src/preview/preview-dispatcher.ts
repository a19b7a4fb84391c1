/**
 * Preview Dispatcher
 *
 * Classifies the highlighted entry and produces its preview payload. Expected
 * failures never escape: they come back as a binary payload plus a status
 * message. Only an aborted job rejects.
 */

import * as path from 'path';

import { DEFAULT_CONFIG, type QuickhopConfig } from '../config.js';
import { debugLog } from '../debug-log.js';
import { describeError, toNavigatorError } from '../errors.js';
import { isDirectoryLike, type Entry, type PreviewPayload, type PreviewResult } from '../types.js';
import { previewDirectory } from './directory-preview.js';
import { DOCUMENT_EXTENSIONS, previewDocument, type DocumentTextExtractor } from './document-preview.js';
import { IMAGE_EXTENSIONS, previewImage } from './image-preview.js';
import { previewTextOrBinary } from './text-preview.js';

export type PreviewClass = 'directory' | 'document' | 'image' | 'sniff' | 'special';

export type PreviewLimits = Pick<
  QuickhopConfig,
  'previewLineLimit' | 'previewEntryLimit' | 'listingLimit' | 'showHidden' | 'maxImageBytes' | 'maxDocumentBytes'
>;

export interface PreviewDispatcherOptions extends Partial<PreviewLimits> {
  /** Pixel box an image is shrunk into; two pixel rows per terminal row */
  imageMaxWidth?: number;
  imageMaxHeight?: number;
  documentExtractor?: DocumentTextExtractor;
}

export const DEFAULT_IMAGE_MAX_WIDTH = 160;
export const DEFAULT_IMAGE_MAX_HEIGHT = 96;

/**
 * Pick the preview handler for an entry. Unknown extensions fall back to
 * content sniffing.
 */
export function classifyEntry(entry: Entry): PreviewClass {
  if (isDirectoryLike(entry)) {
    return 'directory';
  }
  if (entry.kind === 'other' || (entry.kind === 'symlink' && entry.linkTarget !== 'file')) {
    return 'special';
  }

  const ext = path.extname(entry.name).toLowerCase();
  if (DOCUMENT_EXTENSIONS.has(ext)) return 'document';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  return 'sniff';
}

function specialNote(entry: Entry): string {
  if (entry.kind === 'symlink' && entry.linkTarget === 'broken') {
    return 'Broken symbolic link';
  }
  return 'Special file';
}

export class PreviewDispatcher {
  private readonly limits: PreviewLimits;
  private readonly imageMaxWidth: number;
  private readonly imageMaxHeight: number;
  private readonly documentExtractor?: DocumentTextExtractor;

  constructor(options: PreviewDispatcherOptions = {}) {
    this.limits = {
      previewLineLimit: options.previewLineLimit ?? DEFAULT_CONFIG.previewLineLimit,
      previewEntryLimit: options.previewEntryLimit ?? DEFAULT_CONFIG.previewEntryLimit,
      listingLimit: options.listingLimit ?? DEFAULT_CONFIG.listingLimit,
      showHidden: options.showHidden ?? DEFAULT_CONFIG.showHidden,
      maxImageBytes: options.maxImageBytes ?? DEFAULT_CONFIG.maxImageBytes,
      maxDocumentBytes: options.maxDocumentBytes ?? DEFAULT_CONFIG.maxDocumentBytes
    };
    this.imageMaxWidth = options.imageMaxWidth ?? DEFAULT_IMAGE_MAX_WIDTH;
    this.imageMaxHeight = options.imageMaxHeight ?? DEFAULT_IMAGE_MAX_HEIGHT;
    this.documentExtractor = options.documentExtractor;
  }

  async preview(entry: Entry, signal?: AbortSignal): Promise<PreviewResult> {
    try {
      const payload = await this.render(entry, signal);
      return { payload };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const status = describeError(toNavigatorError(error, entry.path));
      debugLog(`[preview] ${entry.path}: ${status}`);
      return { payload: { kind: 'binary', size: entry.size, note: status }, status };
    }
  }

  private async render(entry: Entry, signal?: AbortSignal): Promise<PreviewPayload> {
    switch (classifyEntry(entry)) {
      case 'directory':
        return previewDirectory(entry.path, {
          entryLimit: this.limits.previewEntryLimit,
          scanLimit: this.limits.listingLimit,
          showHidden: this.limits.showHidden,
          signal
        });
      case 'document':
        return previewDocument(entry.path, {
          lineLimit: this.limits.previewLineLimit,
          maxBytes: this.limits.maxDocumentBytes,
          extractor: this.documentExtractor,
          signal
        });
      case 'image':
        return previewImage(entry.path, {
          maxBytes: this.limits.maxImageBytes,
          maxWidth: this.imageMaxWidth,
          maxHeight: this.imageMaxHeight
        });
      case 'sniff':
        return previewTextOrBinary(entry.path, { lineLimit: this.limits.previewLineLimit, signal });
      case 'special':
        return { kind: 'binary', size: entry.size, note: specialNote(entry) };
    }
  }
}
