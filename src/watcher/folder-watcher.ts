/**
 * Chokidar-backed FileEventSource for the watched folder.
 *
 * Non-recursive, and files already present at startup are not reported:
 * those go through the startup selection instead.
 */

import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import { errorMessage } from '../errors.js';
import type { FileEvent, FileEventSource } from './watch-loop.js';

export class FolderWatcher implements FileEventSource {
  private readonly folder: string;
  private watcher: FSWatcher | null = null;

  constructor(folder: string) {
    this.folder = folder;
  }

  async start(onEvent: (event: FileEvent) => void): Promise<void> {
    if (this.watcher) return;

    const watcher = watch(this.folder, { ignoreInitial: true, depth: 0, persistent: true });
    watcher.on('add', (path: string) => onEvent({ type: 'add', path }));
    watcher.on('change', (path: string) => onEvent({ type: 'change', path }));
    watcher.on('unlink', (path: string) => onEvent({ type: 'unlink', path }));
    watcher.on('error', (err: unknown) => {
      console.error('[watcher] Filesystem watcher error', { folder: this.folder, error: errorMessage(err) });
    });

    this.watcher = watcher;
    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
    console.log('[watcher] Watching folder', { folder: this.folder });
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
  }
}
