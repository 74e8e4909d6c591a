/**
 * Rewrites reports when watched Python files change
 */

import chokidar, { type FSWatcher } from 'chokidar';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { FileReport, ReportRunner } from './index.js';

export interface WatcherEvents {
  reported: { filePath: string; report: FileReport };
  unchanged: { filePath: string };
  removed: { filePath: string };
  /** `filePath` is empty for errors raised by the file system watcher itself */
  error: { filePath: string; error: Error };
  ready: void;
}

export interface WatcherOptions {
  rootDirectory: string;
  include: string[];
  exclude: string[];
  debounceMs?: number;
  ignoreInitial?: boolean;
}

const WRITE_STABILITY = {
  stabilityThreshold: 200,
  pollInterval: 100,
};

export class Watcher extends EventEmitter {
  private fsWatcher: FSWatcher | null = null;
  private readonly pending = new Map<string, NodeJS.Timeout>();
  // one report at a time, so two files never write into the output tree together
  private queue: Promise<void> = Promise.resolve();
  private readonly debounceMs: number;
  private readonly ignoreInitial: boolean;

  constructor(
    private readonly runner: ReportRunner,
    private readonly options: WatcherOptions
  ) {
    super();
    this.debounceMs = options.debounceMs ?? 300;
    this.ignoreInitial = options.ignoreInitial ?? true;
  }

  async start(): Promise<void> {
    const { rootDirectory, include, exclude } = this.options;

    this.fsWatcher = chokidar
      .watch(include.map(pattern => path.join(rootDirectory, pattern)), {
        ignored: exclude,
        persistent: true,
        ignoreInitial: this.ignoreInitial,
        awaitWriteFinish: WRITE_STABILITY,
      })
      .on('add', filePath => this.schedule(filePath))
      .on('change', filePath => this.schedule(filePath))
      .on('unlink', filePath => this.remove(filePath))
      .on('error', (error: unknown) => this.fail('', error))
      .on('ready', () => this.emit('ready'));
  }

  /**
   * Close the file system watcher, drop scheduled reports and wait for the
   * one in progress.
   */
  async stop(): Promise<void> {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();

    if (this.fsWatcher) {
      await this.fsWatcher.close();
      this.fsWatcher = null;
    }

    await this.queue;
  }

  private schedule(filePath: string): void {
    clearTimeout(this.pending.get(filePath));

    const timer = setTimeout(() => {
      this.pending.delete(filePath);
      this.queue = this.queue.then(() => this.report(filePath));
    }, this.debounceMs);

    this.pending.set(filePath, timer);
  }

  private async report(filePath: string): Promise<void> {
    let report: FileReport | null;
    try {
      report = await this.runner.reportFile(filePath);
    } catch (error) {
      this.fail(filePath, error);
      return;
    }

    if (report) {
      this.emit('reported', { filePath, report });
    } else {
      this.emit('unchanged', { filePath });
    }
  }

  private remove(filePath: string): void {
    clearTimeout(this.pending.get(filePath));
    this.pending.delete(filePath);

    this.runner.forget(filePath);
    this.emit('removed', { filePath });
  }

  private fail(filePath: string, error: unknown): void {
    this.emit('error', {
      filePath,
      error: error instanceof Error ? error : new Error(String(error)),
    });
  }

  override on<K extends keyof WatcherEvents>(
    event: K,
    listener: (arg: WatcherEvents[K]) => void
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  override emit<K extends keyof WatcherEvents>(
    event: K,
    arg?: WatcherEvents[K]
  ): boolean {
    // an unhandled "error" event would throw from EventEmitter
    if (event === 'error' && this.listenerCount('error') === 0) {
      return false;
    }

    return super.emit(event, arg);
  }
}
