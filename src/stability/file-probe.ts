/**
 * File Probe: thin filesystem seam for stability checks
 *
 * The stability detector and the watch loop only ever look at a file through
 * this interface, so tests can drive them with scripted size/mtime sequences
 * instead of a real scanner.
 */

import { open, stat } from 'node:fs/promises';

/** The subset of fs.Stats the pipeline cares about */
export interface FileSnapshot {
  size: number;
  mtimeMs: number;
  /** Creation time when the filesystem records one, otherwise the mtime */
  createdAt: Date;
}

export interface FileProbe {
  /** Stat the path. Rejects with ENOENT when it no longer exists. */
  stat(path: string): Promise<FileSnapshot>;
  /** Open the path for reading and read its first bytes, then close it. */
  probeRead(path: string): Promise<void>;
}

const PROBE_BYTES = 1024;

export const nodeFileProbe: FileProbe = {
  async stat(path) {
    const stats = await stat(path);
    // Filesystems without birth time report the epoch
    const createdAt = stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
    return { size: stats.size, mtimeMs: stats.mtimeMs, createdAt };
  },

  async probeRead(path) {
    const handle = await open(path, 'r');
    try {
      await handle.read(Buffer.alloc(PROBE_BYTES), 0, PROBE_BYTES, 0);
    } finally {
      await handle.close();
    }
  },
};
