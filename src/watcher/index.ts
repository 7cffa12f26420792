// ============================================================================
// Watcher Module Barrel Export
// ============================================================================

export { WatchLoop } from './watch-loop.js';
export type {
  FileEvent,
  FileEventSource,
  PathState,
  ProcessingReport,
  WatchLoopDeps,
  WatchLoopSettings,
  WatchLoopState,
} from './watch-loop.js';

export { FolderWatcher } from './folder-watcher.js';
export { isAlreadyNamed, listUnprocessedFiles } from './folder-scanner.js';
export { parseSelection, selectStartupFiles } from './startup-selection.js';
export type { Ask, StartupSelectionOptions } from './startup-selection.js';
export { backoffDelay, defaultSleep, withRetry } from './retry.js';
export type { RetryOptions, Sleep } from './retry.js';
