/**
 * Watch Loop: intake, stability polling and the per-file pipeline
 *
 * Every path moves through:
 *   stabilizing -> extracting -> classifying -> naming -> renaming -> done | failed
 * and is removed from the pending set when it vanishes or is dropped as
 * transient.
 *
 * Intake:
 * - enqueue(path): live notifications; ignores unsupported extensions, our
 *   own renamed outputs, and paths that already failed this session
 * - submit(paths): startup selection; also re-accepts previously failed paths
 * - both coalesce a path that is already pending
 *
 * A ticker polls every stabilizing path through the StabilityDetector. Stable
 * paths start a pipeline when a slot is free (maxConcurrentFiles); otherwise
 * they stay stabilizing and are checked again on the next tick. Model
 * failures are retried with exponential backoff; every other failure is
 * terminal for the file, which is left untouched.
 *
 * The pending set is only mutated from synchronous sections of the event
 * loop, so intake callbacks and pipeline completions never interleave.
 */

import { basename, extname, resolve } from 'node:path';
import { buildTargetFilename } from '../classification/naming.js';
import type { Classifier } from '../classification/classifier.js';
import { ScanRenamerError, TransientFileError, errorMessage } from '../errors.js';
import type { PageExtractor } from '../extraction/page-extractor.js';
import { applyRename } from '../filing/rename-executor.js';
import type { RenameOutcome } from '../filing/rename-executor.js';
import type { FileProbe } from '../stability/file-probe.js';
import type { StabilityDetector } from '../stability/stability-detector.js';
import type { WatcherConfig } from '../config.js';
import { defaultSleep, withRetry } from './retry.js';
import type { Sleep } from './retry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PathState = 'stabilizing' | 'extracting' | 'classifying' | 'naming' | 'renaming';

export interface FileEvent {
  type: 'add' | 'change' | 'unlink';
  path: string;
}

/** Source of filesystem notifications (chokidar in production) */
export interface FileEventSource {
  start(onEvent: (event: FileEvent) => void): Promise<void>;
  close(): Promise<void>;
}

export interface ProcessingReport {
  path: string;
  state: 'done' | 'failed' | 'dropped';
  outcome?: RenameOutcome;
  error?: { code: string; message: string };
  /** Classification attempts made (0 when the file never reached the model) */
  attempts: number;
  elapsedMs: number;
}

export type WatchLoopSettings = Pick<
  WatcherConfig,
  | 'supportedExtensions'
  | 'stabilityPollIntervalMs'
  | 'stabilityTimeoutMs'
  | 'classifierMaxAttempts'
  | 'classifierRetryBaseDelayMs'
  | 'maxCollisionAttempts'
  | 'maxFilenameLength'
  | 'maxConcurrentFiles'
>;

export interface WatchLoopDeps {
  settings: WatchLoopSettings;
  detector: StabilityDetector;
  probe: FileProbe;
  extractor: PageExtractor;
  classifier: Pick<Classifier, 'classify'>;
  source?: FileEventSource;
  rename?: typeof applyRename;
  sleep?: Sleep;
  now?: () => number;
  /** How often to log that a model call is still running (default: 30s) */
  progressIntervalMs?: number;
  onSettled?: (report: ProcessingReport) => void;
}

interface PendingEntry {
  path: string;
  state: PathState;
  discoveredAt: number;
  /** Last discovery or stable observation; the stability timeout runs from here */
  lastProgressAt: number;
  attempts: number;
}

export interface WatchLoopState {
  pending: Array<{ path: string; state: PathState; attempts: number }>;
  active: number;
  failed: string[];
  produced: string[];
}

const DEFAULT_PROGRESS_INTERVAL_MS = 30_000;

// ---------------------------------------------------------------------------
// Watch Loop
// ---------------------------------------------------------------------------

export class WatchLoop {
  private readonly settings: WatchLoopSettings;
  private readonly deps: WatchLoopDeps;
  private readonly rename: typeof applyRename;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly progressIntervalMs: number;

  private readonly pending = new Map<string, PendingEntry>();
  private readonly produced = new Set<string>();
  private readonly failed = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly shutdown = new AbortController();
  private idleWaiters: Array<() => void> = [];

  private ticker: NodeJS.Timeout | null = null;
  private currentTick: Promise<void> | null = null;
  private active = 0;
  private stopped = false;

  constructor(deps: WatchLoopDeps) {
    this.deps = deps;
    this.settings = deps.settings;
    this.rename = deps.rename ?? applyRename;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.progressIntervalMs = deps.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Start the stability ticker and the notification source. */
  async start(): Promise<void> {
    if (this.ticker || this.stopped) {
      throw new Error('Watch loop cannot be started twice');
    }
    this.ticker = setInterval(() => {
      this.tick().catch((err: unknown) => {
        console.error('[watcher] Stability poll failed', { error: errorMessage(err) });
      });
    }, this.settings.stabilityPollIntervalMs);

    await this.deps.source?.start((event) => this.handleEvent(event));
  }

  /**
   * Stop intake and polling, drop stabilizing paths, cancel pending retry
   * waits, and wait for in-flight pipelines to finish.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.ticker) clearInterval(this.ticker);
    this.ticker = null;
    this.shutdown.abort();

    await this.deps.source?.close();
    await this.currentTick;

    for (const entry of [...this.pending.values()]) {
      if (entry.state === 'stabilizing') {
        this.deps.detector.forget(entry.path);
        this.pending.delete(entry.path);
      }
    }

    await Promise.all([...this.inflight]);
    this.notifyIfIdle();
  }

  // -------------------------------------------------------------------------
  // Intake
  // -------------------------------------------------------------------------

  /** Live notification for a path. Returns true when the path was queued. */
  enqueue(path: string): boolean {
    const absolute = resolve(path);
    if (this.produced.has(absolute) || this.failed.has(absolute)) return false;
    return this.accept(absolute);
  }

  /** Explicit selection (startup). Re-accepts paths that failed earlier. */
  submit(paths: readonly string[]): number {
    let accepted = 0;
    for (const path of paths) {
      const absolute = resolve(path);
      this.failed.delete(absolute);
      if (!this.produced.has(absolute) && this.accept(absolute)) accepted++;
    }
    return accepted;
  }

  handleEvent(event: FileEvent): void {
    if (event.type === 'unlink') {
      const absolute = resolve(event.path);
      this.produced.delete(absolute);
      this.failed.delete(absolute);
      return;
    }
    this.enqueue(event.path);
  }

  private accept(path: string): boolean {
    if (this.stopped || !this.isSupported(path) || this.pending.has(path)) return false;

    const now = this.now();
    this.pending.set(path, {
      path,
      state: 'stabilizing',
      discoveredAt: now,
      lastProgressAt: now,
      attempts: 0,
    });
    console.log('[watcher] Discovered', { file: basename(path) });
    return true;
  }

  private isSupported(path: string): boolean {
    return this.settings.supportedExtensions.includes(extname(path).toLowerCase());
  }

  // -------------------------------------------------------------------------
  // Stability polling
  // -------------------------------------------------------------------------

  /** Poll every stabilizing path once. Overlapping calls share one run. */
  tick(): Promise<void> {
    if (this.currentTick) return this.currentTick;
    this.currentTick = this.pollStabilizing().finally(() => {
      this.currentTick = null;
    });
    return this.currentTick;
  }

  private async pollStabilizing(): Promise<void> {
    const candidates = [...this.pending.values()].filter((entry) => entry.state === 'stabilizing');

    for (const entry of candidates) {
      if (this.stopped) return;
      if (this.pending.get(entry.path) !== entry) continue;

      if (this.now() - entry.lastProgressAt > this.settings.stabilityTimeoutMs) {
        this.deps.detector.forget(entry.path);
        const seconds = Math.round(this.settings.stabilityTimeoutMs / 1000);
        this.settle(entry, 'dropped', {
          error: describeError(new TransientFileError(entry.path, `File did not settle within ${seconds}s`)),
          elapsedMs: this.now() - entry.discoveredAt,
        });
        continue;
      }

      const status = await this.deps.detector.check(entry.path);
      if (this.stopped || this.pending.get(entry.path) !== entry) continue;

      if (status === 'vanished') {
        this.settle(entry, 'dropped', {
          error: describeError(new TransientFileError(entry.path, 'File disappeared before it settled')),
          elapsedMs: this.now() - entry.discoveredAt,
        });
      } else if (status === 'stable') {
        entry.lastProgressAt = this.now();
        if (this.active < this.settings.maxConcurrentFiles) {
          this.startPipeline(entry);
        }
      }
    }
  }

  // -------------------------------------------------------------------------
  // Pipeline
  // -------------------------------------------------------------------------

  private startPipeline(entry: PendingEntry): void {
    this.active++;
    entry.state = 'extracting';
    const run = this.runPipeline(entry).finally(() => {
      this.active--;
      this.inflight.delete(run);
    });
    this.inflight.add(run);
  }

  private async runPipeline(entry: PendingEntry): Promise<void> {
    const start = this.now();
    const file = basename(entry.path);

    try {
      const payload = await this.deps.extractor.extract(entry.path);

      entry.state = 'classifying';
      const result = await this.withProgress(file, () =>
        withRetry(
          (attempt) => {
            entry.attempts = attempt;
            return this.deps.classifier.classify(payload);
          },
          {
            maxAttempts: this.settings.classifierMaxAttempts,
            baseDelayMs: this.settings.classifierRetryBaseDelayMs,
            isRetryable: (err) => err instanceof ScanRenamerError && err.retryable,
            sleep: this.sleep,
            signal: this.shutdown.signal,
            onRetry: ({ attempt, delayMs, error }) => {
              console.warn('[watcher] Model unavailable, retrying', {
                file,
                attempt,
                delayMs,
                error: errorMessage(error),
              });
            },
          },
        ),
      );

      entry.state = 'naming';
      const { createdAt } = await this.statForNaming(entry.path);
      const target = buildTargetFilename(entry.path, result, {
        createdAt,
        maxLength: this.settings.maxFilenameLength,
      });

      entry.state = 'renaming';
      const outcome = await this.rename(entry.path, target, {
        maxCollisionAttempts: this.settings.maxCollisionAttempts,
      });
      const elapsedMs = this.now() - start;

      if (outcome.status === 'failed') {
        console.error('[watcher] Rename failed, file left in place', {
          file,
          code: outcome.code,
          error: outcome.reason,
        });
        this.settle(entry, 'failed', {
          outcome,
          error: { code: outcome.code, message: outcome.reason },
          elapsedMs,
        });
        return;
      }

      this.produced.add(resolve(outcome.newPath));
      console.log(
        `[watcher] Renamed to: ${basename(outcome.newPath)} (${(elapsedMs / 1000).toFixed(1)}s)`,
        { from: file, attempts: entry.attempts },
      );
      this.settle(entry, 'done', { outcome, elapsedMs });
    } catch (err) {
      const elapsedMs = this.now() - start;
      if (err instanceof TransientFileError) {
        console.warn('[watcher] Dropped', { file, error: err.message });
        this.settle(entry, 'dropped', { error: describeError(err), elapsedMs });
        return;
      }
      console.error('[watcher] Failed, file left in place', {
        file,
        code: err instanceof ScanRenamerError ? err.code : 'UNEXPECTED',
        error: errorMessage(err),
      });
      this.settle(entry, 'failed', { error: describeError(err), elapsedMs });
    }
  }

  /** Run a model call, logging the elapsed time while it is pending. */
  private async withProgress<T>(file: string, fn: () => Promise<T>): Promise<T> {
    const start = this.now();
    const timer = setInterval(() => {
      console.log(`[watcher] Classifying: ${file}... ${Math.round((this.now() - start) / 1000)}s`);
    }, this.progressIntervalMs);
    try {
      return await fn();
    } finally {
      clearInterval(timer);
    }
  }

  private async statForNaming(path: string): Promise<{ createdAt: Date }> {
    try {
      return await this.deps.probe.stat(path);
    } catch (err) {
      throw new TransientFileError(path, `File disappeared before renaming: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  // -------------------------------------------------------------------------
  // Completion
  // -------------------------------------------------------------------------

  private settle(
    entry: PendingEntry,
    state: ProcessingReport['state'],
    details: Pick<ProcessingReport, 'outcome' | 'error' | 'elapsedMs'>,
  ): void {
    this.pending.delete(entry.path);
    if (state === 'failed') this.failed.add(entry.path);

    const report: ProcessingReport = {
      path: entry.path,
      state,
      attempts: entry.attempts,
      elapsedMs: details.elapsedMs,
    };
    if (details.outcome) report.outcome = details.outcome;
    if (details.error) report.error = details.error;

    this.deps.onSettled?.(report);
    this.notifyIfIdle();
  }

  /** Resolves once nothing is pending or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolvePromise) => {
      this.idleWaiters.push(resolvePromise);
    });
  }

  private isIdle(): boolean {
    return this.pending.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) wake();
  }

  getState(): WatchLoopState {
    return {
      pending: [...this.pending.values()].map(({ path, state, attempts }) => ({ path, state, attempts })),
      active: this.active,
      failed: [...this.failed],
      produced: [...this.produced],
    };
  }
}

function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof ScanRenamerError) return { code: err.code, message: err.message };
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return { code: err.code, message: err.message };
  }
  return { code: 'UNEXPECTED', message: errorMessage(err) };
}
