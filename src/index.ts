#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Watches the scanner folder and renames each new document or photo from
 * what a local vision model reads on its first page.
 *
 * Startup:
 * 1. Load and validate configuration (.env + environment)
 * 2. Check the vision model and pdftoppm are available (warnings only)
 * 3. Start the folder watcher and the stability ticker
 * 4. Offer the files already in the folder (STARTUP_SELECTION)
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop intake, cancel retry waits, finish files already being renamed
 * 2. Release the model from memory (UNLOAD_MODEL_ON_EXIT)
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import 'dotenv/config';
import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { OllamaVisionClient, createClassifier } from './classification/index.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createPageExtractor } from './extraction/page-extractor.js';
import { createPopplerRasterizer, isPopplerAvailable } from './extraction/pdf-rasterizer.js';
import { nodeFileProbe } from './stability/file-probe.js';
import { StabilityDetector } from './stability/stability-detector.js';
import { FolderWatcher, WatchLoop, selectStartupFiles } from './watcher/index.js';

async function main() {
  const config = loadConfig();
  const watchFolder = resolve(config.watchFolder);
  await mkdir(watchFolder, { recursive: true });

  console.log('[startup] Scan renamer starting...');
  console.log('[startup] Watch folder:', watchFolder);
  console.log('[startup] Model:', config.model, `(${config.ollamaHost})`);

  const classifier = createClassifier({
    client: new OllamaVisionClient({ host: config.ollamaHost, model: config.model }),
    model: config.model,
    timeoutMs: config.classifierTimeoutMs,
  });

  try {
    if (!(await classifier.isModelAvailable())) {
      console.warn(`[startup] Model ${config.model} is not installed. Run: ollama pull ${config.model}`);
    }
  } catch (err) {
    console.warn('[startup] Could not reach Ollama; files will be retried until it answers', {
      host: config.ollamaHost,
      error: errorMessage(err),
    });
  }

  if (!(await isPopplerAvailable(config.popplerPath))) {
    console.warn('[startup] pdftoppm not found; PDFs will fail until Poppler is installed or POPPLER_PATH is set');
  }

  const extractor = createPageExtractor({
    supportedExtensions: config.supportedExtensions,
    pdfRenderDpi: config.pdfRenderDpi,
    maxImageDimension: config.maxImageDimension,
    rasterizer: createPopplerRasterizer(config.popplerPath),
  });

  const loop = new WatchLoop({
    settings: config,
    detector: new StabilityDetector({ threshold: config.stabilityThreshold, probe: nodeFileProbe }),
    probe: nodeFileProbe,
    extractor,
    classifier,
    source: new FolderWatcher(watchFolder),
  });

  await loop.start();

  const selected = await selectStartupFiles({
    folder: watchFolder,
    supportedExtensions: config.supportedExtensions,
    mode: config.startupSelection,
  });
  if (selected.length > 0) {
    console.log(`[startup] Processing ${loop.submit(selected)} existing file(s)`);
  }
  console.log('[startup] Ready. Press Ctrl+C to stop.');

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    await loop.stop();
    console.log('[shutdown] Watcher stopped');

    if (config.unloadModelOnExit) {
      try {
        await classifier.unloadModel();
        console.log('[shutdown] Model unloaded');
      } catch (err) {
        console.warn('[shutdown] Could not unload model', { error: errorMessage(err) });
      }
    }

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Shutdown failed:', errorMessage(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
