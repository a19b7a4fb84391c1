/**
 * Navigator
 *
 * Owns the current directory, the live query, the selection and the mode, and
 * turns logical key events into state transitions. Keys are handled one at a
 * time: a key that arrives while a listing or history save is pending waits
 * for it, so subscribers only ever see completed transitions.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';

import { listDirectory, type ListOptions } from './directory-lister.js';
import { debugLog } from './debug-log.js';
import { describeError } from './errors.js';
import { filterEntries } from './filter-engine.js';
import type { NavigatorKey } from './key-bindings.js';
import type { PreviewCompletion, PreviewScheduler } from './preview/preview-scheduler.js';
import {
  isDirectoryLike,
  type Entry,
  type EntrySet,
  type ListingSource,
  type NavigatorMode,
  type NavigatorSnapshot,
  type Outcome,
  type PreviewState
} from './types.js';

export const PREVIEW_SCROLL_STEP = 10;

export interface NavigatorHistory {
  record(directory: string): void;
  list(): string[];
  save(): Promise<void>;
}

export type DirectoryListFn = (directory: string, options: ListOptions) => Promise<EntrySet>;

export interface NavigatorOptions {
  startDirectory: string;
  /** Open the history list instead of the directory view */
  startInHistory?: boolean;
  history: NavigatorHistory;
  previews: PreviewScheduler;
  listOptions?: ListOptions;
  lister?: DirectoryListFn;
  isDirectory?: (candidate: string) => Promise<boolean>;
}

export type SnapshotListener = (snapshot: NavigatorSnapshot) => void;

async function directoryExists(candidate: string): Promise<boolean> {
  try {
    return (await fsp.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

function historyEntry(directory: string): Entry {
  return { name: directory, path: directory, kind: 'directory', size: 0, modifiedAt: null };
}

function identityView(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

function truncationNotice(entrySet: EntrySet): string | null {
  return entrySet.truncated ? `Showing the first ${entrySet.entries.length} entries` : null;
}

export class Navigator {
  private mode: NavigatorMode = 'browsing';
  private listing: ListingSource = 'directory';
  private entrySet: EntrySet;
  private historyEntries: Entry[] = [];
  private query = '';
  private view: number[];
  private selection: number | null;
  private preview: PreviewState = { status: 'empty' };
  private previewToken = -1;
  private previewScroll = 0;
  private status: string | null;
  private outcome: Outcome | null = null;

  private snapshot: NavigatorSnapshot;
  private readonly listeners = new Set<SnapshotListener>();
  private queue: Promise<void> = Promise.resolve();
  private disposed = false;
  private handling = false;

  private readonly history: NavigatorHistory;
  private readonly previews: PreviewScheduler;
  private readonly listOptions: ListOptions;
  private readonly lister: DirectoryListFn;
  private readonly isDirectory: (candidate: string) => Promise<boolean>;
  private readonly onPreview = (completion: PreviewCompletion): void => this.acceptPreview(completion);

  private constructor(options: NavigatorOptions, entrySet: EntrySet) {
    this.history = options.history;
    this.previews = options.previews;
    this.listOptions = options.listOptions ?? {};
    this.lister = options.lister ?? listDirectory;
    this.isDirectory = options.isDirectory ?? directoryExists;

    this.entrySet = entrySet;
    this.view = identityView(entrySet.entries.length);
    this.selection = this.view.length > 0 ? 0 : null;
    this.status = truncationNotice(entrySet);
    this.snapshot = this.buildSnapshot();

    this.previews.on('result', this.onPreview);
  }

  /**
   * List the start directory and open a session on it
   *
   * @throws NavigatorError when the start directory cannot be listed
   */
  static async create(options: NavigatorOptions): Promise<Navigator> {
    const lister = options.lister ?? listDirectory;
    const entrySet = await lister(path.resolve(options.startDirectory), options.listOptions ?? {});
    const navigator = new Navigator(options, entrySet);

    if (options.startInHistory) {
      await navigator.enterHistory();
    }
    navigator.refreshPreview(true);
    navigator.publish();
    return navigator;
  }

  getSnapshot(): NavigatorSnapshot {
    return this.snapshot;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queue a key; resolves once it (and every key before it) has been handled
   */
  dispatch(key: NavigatorKey): Promise<void> {
    this.queue = this.queue
      .then(() => this.handle(key))
      .catch((error: unknown) => {
        debugLog(`[navigator] key ${key.kind} failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
        this.status = describeError(error);
        this.publish();
      });
    return this.queue;
  }

  /**
   * Stop listening for previews and abort the job in flight
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.previews.off('result', this.onPreview);
    this.previews.cancel();
    this.listeners.clear();
  }

  private async handle(key: NavigatorKey): Promise<void> {
    if (this.outcome || this.disposed) {
      return;
    }

    this.handling = true;
    try {
      await this.transition(key);
    } finally {
      this.handling = false;
    }

    if (!this.outcome) {
      this.refreshPreview(false);
    }
    this.publish();
  }

  private async transition(key: NavigatorKey): Promise<void> {
    this.status = null;

    if (key.kind === 'interrupt') {
      this.finish({ kind: 'cancelled' });
    } else if (key.kind === 'up' || key.kind === 'down') {
      this.move(key.kind === 'up' ? -1 : 1);
    } else if (key.kind === 'pageUp' || key.kind === 'pageDown') {
      this.scrollPreview(key.kind === 'pageUp' ? -PREVIEW_SCROLL_STEP : PREVIEW_SCROLL_STEP);
    } else if (key.kind === 'confirm') {
      await this.confirm();
    } else {
      switch (this.mode) {
        case 'browsing':
          await this.handleBrowsing(key);
          break;
        case 'searching':
          await this.handleSearching(key);
          break;
        case 'history':
          await this.handleHistory(key);
          break;
      }
    }
  }

  private async handleBrowsing(key: NavigatorKey): Promise<void> {
    switch (key.kind) {
      case 'right':
        await this.descendHighlighted();
        return;
      case 'left':
        await this.ascend();
        return;
      case 'enter':
        await this.enter();
        return;
      case 'escape':
        this.finish({ kind: 'cancelled' });
        return;
      case 'char':
        switch (key.char) {
          case 'j':
            this.move(1);
            return;
          case 'k':
            this.move(-1);
            return;
          case 'l':
            await this.descendHighlighted();
            return;
          case 'h':
            await this.ascend();
            return;
          case '/':
            this.mode = 'searching';
            return;
          case 'v':
            await this.enterHistory();
            return;
        }
        return;
      default:
        return;
    }
  }

  private async handleSearching(key: NavigatorKey): Promise<void> {
    switch (key.kind) {
      case 'char':
        this.setQuery(this.query + key.char);
        return;
      case 'backspace':
        this.setQuery(Array.from(this.query).slice(0, -1).join(''));
        return;
      case 'escape':
        this.leaveSearch();
        return;
      case 'right':
        await this.descendHighlighted();
        return;
      case 'left':
        if (this.listing === 'directory') {
          await this.ascend();
        }
        return;
      case 'enter':
        await this.enter();
        return;
      default:
        return;
    }
  }

  private async handleHistory(key: NavigatorKey): Promise<void> {
    switch (key.kind) {
      case 'escape':
        this.leaveHistory();
        return;
      case 'right':
        await this.descendHighlighted();
        return;
      case 'enter':
        await this.enter();
        return;
      case 'char':
        switch (key.char) {
          case 'v':
            this.leaveHistory();
            return;
          case '/':
            this.mode = 'searching';
            return;
          case 'j':
            this.move(1);
            return;
          case 'k':
            this.move(-1);
            return;
          case 'l':
            await this.descendHighlighted();
            return;
        }
        return;
      default:
        return;
    }
  }

  private displayed(): readonly Entry[] {
    return this.listing === 'history' ? this.historyEntries : this.entrySet.entries;
  }

  private highlighted(): Entry | null {
    if (this.selection === null) return null;
    const index = this.view[this.selection];
    return index === undefined ? null : this.displayed()[index] ?? null;
  }

  private move(delta: number): void {
    if (this.selection === null) return;
    this.selection = Math.min(Math.max(this.selection + delta, 0), this.view.length - 1);
  }

  private clampSelection(): void {
    if (this.view.length === 0) {
      this.selection = null;
    } else {
      this.selection = Math.min(this.selection ?? 0, this.view.length - 1);
    }
  }

  private setQuery(query: string): void {
    this.query = query;
    this.view = filterEntries(this.displayed(), query);
    this.clampSelection();
  }

  /**
   * Drop the query and return to the unfiltered list it was filtering,
   * keeping the highlighted entry
   */
  private leaveSearch(): void {
    const current = this.highlighted();
    const displayed = this.displayed();
    this.mode = this.listing === 'history' ? 'history' : 'browsing';
    this.query = '';
    this.view = identityView(displayed.length);
    const index = current ? displayed.indexOf(current) : -1;
    if (index !== -1) {
      this.selection = index;
    } else {
      this.clampSelection();
    }
  }

  private async enterHistory(): Promise<void> {
    const paths = this.history.list();
    const exists = await Promise.all(paths.map((candidate) => this.isDirectory(candidate)));
    this.historyEntries = paths.filter((_, index) => exists[index]).map(historyEntry);
    this.mode = 'history';
    this.listing = 'history';
    this.query = '';
    this.view = identityView(this.historyEntries.length);
    this.selection = this.view.length > 0 ? 0 : null;
    if (this.historyEntries.length === 0) {
      this.status = 'No history yet';
    }
  }

  private leaveHistory(): void {
    this.mode = 'browsing';
    this.listing = 'directory';
    this.historyEntries = [];
    this.query = '';
    this.view = identityView(this.entrySet.entries.length);
    this.selection = this.view.length > 0 ? 0 : null;
  }

  /**
   * Descend into a highlighted directory or confirm from a highlighted file.
   * With nothing highlighted Enter does nothing; Tab still confirms.
   */
  private async enter(): Promise<void> {
    const entry = this.highlighted();
    if (!entry) {
      return;
    }
    if (isDirectoryLike(entry)) {
      await this.changeDirectory(entry.path, true);
    } else {
      await this.confirm();
    }
  }

  private async descendHighlighted(): Promise<void> {
    const entry = this.highlighted();
    if (entry && isDirectoryLike(entry)) {
      await this.changeDirectory(entry.path, true);
    }
  }

  private async ascend(): Promise<void> {
    const parent = path.dirname(this.entrySet.directory);
    if (parent !== this.entrySet.directory) {
      await this.changeDirectory(parent, false);
    }
  }

  /**
   * Re-list `target` and make it the current directory. On failure the
   * previous listing stays and the error is shown on the status line.
   */
  private async changeDirectory(target: string, recordVisit: boolean): Promise<void> {
    let entrySet: EntrySet;
    try {
      entrySet = await this.lister(target, this.listOptions);
    } catch (error) {
      this.status = describeError(error);
      debugLog(`[navigator] listing ${target} failed: ${this.status}`);
      return;
    }

    this.entrySet = entrySet;
    this.historyEntries = [];
    this.mode = 'browsing';
    this.listing = 'directory';
    this.query = '';
    this.view = identityView(entrySet.entries.length);
    this.selection = this.view.length > 0 ? 0 : null;
    this.status = truncationNotice(entrySet);

    if (recordVisit) {
      await this.remember(entrySet.directory);
    }
  }

  private async remember(directory: string): Promise<void> {
    this.history.record(directory);
    try {
      await this.history.save();
    } catch (error) {
      this.status = describeError(error);
      debugLog(`[history] save failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Hand off the highlighted directory, or the current directory when a file
   * is highlighted or nothing is shown
   */
  private async confirm(): Promise<void> {
    const entry = this.highlighted();
    const target = entry && isDirectoryLike(entry) ? entry.path : this.entrySet.directory;
    await this.remember(target);
    this.finish({ kind: 'confirmed', path: target });
  }

  private finish(outcome: Outcome): void {
    this.outcome = outcome;
    this.previews.cancel();
    debugLog(`[navigator] finished: ${outcome.kind === 'confirmed' ? outcome.path : 'cancelled'}`);
  }

  private scrollPreview(delta: number): void {
    const preview = this.preview;
    let lineCount = 0;
    if (preview.status === 'ready') {
      const payload = preview.payload;
      if (payload.kind === 'text' || payload.kind === 'document') {
        lineCount = payload.lines.length;
      } else if (payload.kind === 'directory') {
        lineCount = payload.children.length;
      }
    }
    this.previewScroll = Math.min(Math.max(this.previewScroll + delta, 0), Math.max(lineCount - 1, 0));
  }

  /**
   * Schedule a preview for the highlighted entry when it changed
   */
  private refreshPreview(force: boolean): void {
    const entry = this.highlighted();
    if (!entry) {
      if (this.preview.status !== 'empty') {
        this.previews.cancel();
        this.previewToken = -1;
        this.preview = { status: 'empty' };
        this.previewScroll = 0;
      }
      return;
    }

    const currentPath = this.preview.status === 'empty' ? null : this.preview.path;
    if (!force && currentPath === entry.path) {
      return;
    }

    this.previewScroll = 0;
    this.preview = { status: 'loading', path: entry.path };
    this.previewToken = this.previews.schedule(entry);
  }

  private acceptPreview(completion: PreviewCompletion): void {
    if (this.disposed || this.outcome || completion.token !== this.previewToken) {
      return;
    }
    this.preview = { status: 'ready', path: completion.path, payload: completion.result.payload };
    if (completion.result.status) {
      this.status = completion.result.status;
    }
    // Mid-transition results are published with the transition
    if (!this.handling) {
      this.publish();
    }
  }

  private buildSnapshot(): NavigatorSnapshot {
    return Object.freeze({
      mode: this.mode,
      listing: this.listing,
      directory: this.entrySet.directory,
      entrySet: this.entrySet,
      displayed: this.displayed(),
      view: [...this.view],
      query: this.query,
      selection: this.selection,
      preview: this.preview,
      previewScroll: this.previewScroll,
      status: this.status,
      outcome: this.outcome
    });
  }

  private publish(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}
