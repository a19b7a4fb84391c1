/**
 * Shared data model for the navigator core
 */

export type EntryKind = 'directory' | 'file' | 'symlink' | 'other';

export type LinkTarget = 'directory' | 'file' | 'other' | 'broken';

export interface Entry {
  name: string;
  path: string;
  kind: EntryKind;
  size: number;
  modifiedAt: Date | null;
  linkTarget?: LinkTarget;
}

export interface EntrySet {
  directory: string;
  entries: readonly Entry[];
  truncated: boolean;
}

export type NavigatorMode = 'browsing' | 'searching' | 'history';

/** What the list shows; a search filters whichever is active */
export type ListingSource = 'directory' | 'history';

export type Outcome = { kind: 'confirmed'; path: string } | { kind: 'cancelled' };

export interface PreviewChild {
  name: string;
  kind: EntryKind;
  linkTarget?: LinkTarget;
}

export interface NumberedLine {
  number: number;
  text: string;
}

export type ImageFormat = 'png' | 'jpeg' | 'gif';

export type PreviewPayload =
  | {
      kind: 'directory';
      children: PreviewChild[];
      remaining: number;
      /** The scan stopped early, so `remaining` is a lower bound */
      truncated: boolean;
    }
  | { kind: 'text'; lines: NumberedLine[]; truncated: boolean }
  | {
      kind: 'image';
      format: ImageFormat;
      width: number;
      height: number;
      sourceWidth: number;
      sourceHeight: number;
      pixels: Uint8ClampedArray; // RGBA, width * height * 4
    }
  | { kind: 'document'; format: 'pdf'; lines: NumberedLine[]; truncated: boolean; pages: number }
  | { kind: 'binary'; size: number; note?: string }
  | { kind: 'empty' };

export interface PreviewResult {
  payload: PreviewPayload;
  status?: string;
}

export type PreviewState =
  | { status: 'empty' }
  | { status: 'loading'; path: string }
  | { status: 'ready'; path: string; payload: PreviewPayload };

export interface NavigatorSnapshot {
  mode: NavigatorMode;
  directory: string;
  entrySet: EntrySet;
  listing: ListingSource;
  /** Entries shown in the list; history paths while the history list is active */
  displayed: readonly Entry[];
  /** Indices into `displayed` that pass the query */
  view: readonly number[];
  query: string;
  selection: number | null;
  preview: PreviewState;
  previewScroll: number;
  status: string | null;
  outcome: Outcome | null;
}

/**
 * Directory-like entries sort first and can be descended into
 */
export function isDirectoryLike(entry: Entry): boolean {
  return entry.kind === 'directory' || (entry.kind === 'symlink' && entry.linkTarget === 'directory');
}
