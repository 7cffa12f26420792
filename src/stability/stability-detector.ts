/**
 * Stability Detector: decides when a scanned file is safe to read
 *
 * Scanners and sync clients write incrementally, and a size that plateaus for
 * one poll is not proof the writer is done. A path is reported stable only
 * after `threshold` consecutive polls observe the same (size, mtime) pair AND
 * the file can be opened and read.
 *
 * Per-path state (StabilityRecord) is owned exclusively by this class:
 * - first observation establishes the baseline (count 0)
 * - any size/mtime change resets the count to 0
 * - a zero-byte file never counts as unchanged
 * - the record is dropped once stability is reported or the path vanishes
 *
 * Never blocks: each check is one stat (plus one short read once the count
 * reaches the threshold). Polling cadence and overall timeout belong to the
 * watch loop.
 */

import { systemErrorCode } from '../errors.js';
import { nodeFileProbe } from './file-probe.js';
import type { FileProbe, FileSnapshot } from './file-probe.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Result of a single poll:
 * - stable: unchanged for `threshold` polls and readable
 * - changing: new, still growing, or not yet unchanged long enough
 * - locked: unchanged but the open/read failed (sharing violation)
 * - vanished: the path no longer exists
 */
export type StabilityStatus = 'stable' | 'changing' | 'locked' | 'vanished';

export interface StabilityRecord {
  size: number;
  mtimeMs: number;
  stableCount: number;
}

export interface StabilityDetectorOptions {
  /** Consecutive unchanged observations required (>= 1) */
  threshold: number;
  probe?: FileProbe;
}

const VANISHED_CODES = new Set(['ENOENT', 'ENOTDIR']);

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export class StabilityDetector {
  private readonly records = new Map<string, StabilityRecord>();
  private readonly threshold: number;
  private readonly probe: FileProbe;

  constructor(options: StabilityDetectorOptions) {
    if (!Number.isInteger(options.threshold) || options.threshold < 1) {
      throw new RangeError(`Stability threshold must be a positive integer, got ${options.threshold}`);
    }
    this.threshold = options.threshold;
    this.probe = options.probe ?? nodeFileProbe;
  }

  /** Poll once; true only when the path has settled and is readable. */
  async isStable(path: string): Promise<boolean> {
    return (await this.check(path)) === 'stable';
  }

  /** Poll once and report why the path is or is not stable. */
  async check(path: string): Promise<StabilityStatus> {
    let snapshot: FileSnapshot;
    try {
      snapshot = await this.probe.stat(path);
    } catch (err) {
      return this.onAccessError(path, err);
    }

    const previous = this.records.get(path);
    if (
      previous === undefined ||
      snapshot.size === 0 ||
      previous.size !== snapshot.size ||
      previous.mtimeMs !== snapshot.mtimeMs
    ) {
      this.records.set(path, { size: snapshot.size, mtimeMs: snapshot.mtimeMs, stableCount: 0 });
      return 'changing';
    }

    const stableCount = previous.stableCount + 1;
    this.records.set(path, { ...previous, stableCount });
    if (stableCount < this.threshold) {
      return 'changing';
    }

    try {
      await this.probe.probeRead(path);
    } catch (err) {
      return this.onAccessError(path, err);
    }

    this.records.delete(path);
    return 'stable';
  }

  /** Discard any record for the path (dropped or handed off elsewhere). */
  forget(path: string): void {
    this.records.delete(path);
  }

  /** Current record for the path, if it is being tracked. */
  recordFor(path: string): StabilityRecord | undefined {
    const record = this.records.get(path);
    return record ? { ...record } : undefined;
  }

  get trackedCount(): number {
    return this.records.size;
  }

  private onAccessError(path: string, err: unknown): StabilityStatus {
    const code = systemErrorCode(err);
    if (code !== undefined && VANISHED_CODES.has(code)) {
      this.records.delete(path);
      return 'vanished';
    }
    // EBUSY / EPERM / EACCES: the writer still holds the file
    return 'locked';
  }
}
