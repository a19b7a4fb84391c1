/**
 * Preview Scheduler
 *
 * Runs at most one preview job. Scheduling a new entry aborts the job in
 * flight; a result is emitted only while its token is still current.
 */

import { EventEmitter } from 'events';

import { debugLog } from '../debug-log.js';
import type { Entry, PreviewResult } from '../types.js';

export interface PreviewSource {
  preview(entry: Entry, signal?: AbortSignal): Promise<PreviewResult>;
}

export interface PreviewCompletion {
  token: number;
  path: string;
  result: PreviewResult;
}

export interface PreviewSchedulerEvents {
  result: PreviewCompletion;
}

export interface PreviewSchedulerEventEmitter {
  on<K extends keyof PreviewSchedulerEvents>(event: K, listener: (data: PreviewSchedulerEvents[K]) => void): this;
  off<K extends keyof PreviewSchedulerEvents>(event: K, listener: (data: PreviewSchedulerEvents[K]) => void): this;
  emit<K extends keyof PreviewSchedulerEvents>(event: K, data: PreviewSchedulerEvents[K]): boolean;
}

export class PreviewScheduler extends EventEmitter implements PreviewSchedulerEventEmitter {
  private token = 0;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly source: PreviewSource) {
    super();
  }

  /**
   * Token of the most recently scheduled job
   */
  get currentToken(): number {
    return this.token;
  }

  /**
   * True while a job is in flight
   */
  get busy(): boolean {
    return this.controller !== null;
  }

  /**
   * Start previewing `entry`, superseding any job in flight
   */
  schedule(entry: Entry): number {
    this.abortCurrent();

    const token = ++this.token;
    const controller = new AbortController();
    this.controller = controller;

    this.running = this.run(entry, token, controller);
    return token;
  }

  /**
   * Abort the job in flight; its result, if any, is dropped
   */
  cancel(): void {
    this.abortCurrent();
    this.token++;
  }

  /**
   * Resolves once the job in flight has settled (used by tests and shutdown)
   */
  async idle(): Promise<void> {
    while (this.running) {
      const running = this.running;
      await running;
      if (this.running === running) {
        this.running = null;
      }
    }
  }

  private abortCurrent(): void {
    if (this.controller) {
      this.controller.abort();
      this.controller = null;
    }
  }

  private async run(entry: Entry, token: number, controller: AbortController): Promise<void> {
    try {
      const result = await this.source.preview(entry, controller.signal);
      if (token === this.token && !controller.signal.aborted) {
        this.controller = null;
        this.emit('result', { token, path: entry.path, result });
      }
    } catch (error) {
      if (controller.signal.aborted) {
        return;
      }
      // Sources report expected failures in the result; anything else is a bug
      debugLog(`[preview] job ${token} failed: ${error instanceof Error ? error.message : String(error)}`);
      if (token === this.token) {
        this.controller = null;
        this.emit('result', {
          token,
          path: entry.path,
          result: { payload: { kind: 'binary', size: entry.size }, status: 'Preview failed' }
        });
      }
    }
  }
}
