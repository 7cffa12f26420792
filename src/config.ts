/**
 * Application Configuration
 *
 * Centralizes all environment variable access. Values come from the process
 * environment (and a local .env file via dotenv) and are validated with zod
 * before the watch loop starts. Nothing else in the codebase reads
 * process.env: the resulting WatcherConfig is passed down explicitly.
 *
 * Environment variables:
 * - WATCH_FOLDER: Folder the scanner writes into (required)
 * - OLLAMA_HOST: Local Ollama endpoint (default: http://127.0.0.1:11434)
 * - CLASSIFIER_MODEL: Vision model tag (default: qwen3-vl:32b)
 * - SUPPORTED_EXTENSIONS: Comma-separated list (default: .pdf,.jpg,.png)
 * - STABILITY_POLL_INTERVAL_MS / STABILITY_THRESHOLD / STABILITY_TIMEOUT_MS
 * - CLASSIFIER_TIMEOUT_MS / CLASSIFIER_MAX_ATTEMPTS / CLASSIFIER_RETRY_BASE_DELAY_MS
 * - MAX_COLLISION_ATTEMPTS / MAX_FILENAME_LENGTH / MAX_CONCURRENT_FILES
 * - PDF_RENDER_DPI / MAX_IMAGE_DIMENSION / POPPLER_PATH
 * - STARTUP_SELECTION: prompt | all | skip (default: prompt)
 * - UNLOAD_MODEL_ON_EXIT: Release the model from memory on shutdown (default: true)
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const intFrom = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const WatcherConfigSchema = z.object({
  watchFolder: z.string().min(1, 'WATCH_FOLDER is required'),
  ollamaHost: z.string().url().default('http://127.0.0.1:11434'),
  model: z.string().min(1).default('qwen3-vl:32b'),
  supportedExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/, 'extensions look like ".pdf"'))
    .min(1)
    .default(['.pdf', '.jpg', '.png']),
  stabilityPollIntervalMs: intFrom(1000, 50),
  stabilityThreshold: intFrom(2, 1),
  stabilityTimeoutMs: intFrom(120_000, 1000),
  classifierTimeoutMs: intFrom(180_000, 1000),
  classifierMaxAttempts: intFrom(3, 1),
  classifierRetryBaseDelayMs: intFrom(5000, 0),
  maxCollisionAttempts: intFrom(100, 2),
  maxFilenameLength: intFrom(200, 40),
  maxConcurrentFiles: intFrom(1, 1),
  pdfRenderDpi: intFrom(200, 36),
  maxImageDimension: intFrom(2048, 256),
  popplerPath: z.string().min(1).optional(),
  startupSelection: z.enum(['prompt', 'all', 'skip']).default('prompt'),
  unloadModelOnExit: z.boolean().default(true),
});

export type WatcherConfig = z.infer<typeof WatcherConfigSchema>;
export type StartupSelectionMode = WatcherConfig['startupSelection'];

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

/** Empty strings count as unset so `FOO=` in .env falls back to the default */
function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function listEnv(env: Env, key: string): string[] | undefined {
  const value = optionalEnv(env, key);
  if (!value) return undefined;
  return value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

function booleanEnv(env: Env, key: string): boolean | undefined {
  const value = optionalEnv(env, key);
  if (value === undefined) return undefined;
  return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Build and validate the watcher configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): WatcherConfig {
  const raw = {
    watchFolder: optionalEnv(env, 'WATCH_FOLDER') ?? '',
    ollamaHost: optionalEnv(env, 'OLLAMA_HOST'),
    model: optionalEnv(env, 'CLASSIFIER_MODEL'),
    supportedExtensions: listEnv(env, 'SUPPORTED_EXTENSIONS'),
    stabilityPollIntervalMs: optionalEnv(env, 'STABILITY_POLL_INTERVAL_MS'),
    stabilityThreshold: optionalEnv(env, 'STABILITY_THRESHOLD'),
    stabilityTimeoutMs: optionalEnv(env, 'STABILITY_TIMEOUT_MS'),
    classifierTimeoutMs: optionalEnv(env, 'CLASSIFIER_TIMEOUT_MS'),
    classifierMaxAttempts: optionalEnv(env, 'CLASSIFIER_MAX_ATTEMPTS'),
    classifierRetryBaseDelayMs: optionalEnv(env, 'CLASSIFIER_RETRY_BASE_DELAY_MS'),
    maxCollisionAttempts: optionalEnv(env, 'MAX_COLLISION_ATTEMPTS'),
    maxFilenameLength: optionalEnv(env, 'MAX_FILENAME_LENGTH'),
    maxConcurrentFiles: optionalEnv(env, 'MAX_CONCURRENT_FILES'),
    pdfRenderDpi: optionalEnv(env, 'PDF_RENDER_DPI'),
    maxImageDimension: optionalEnv(env, 'MAX_IMAGE_DIMENSION'),
    popplerPath: optionalEnv(env, 'POPPLER_PATH'),
    startupSelection: optionalEnv(env, 'STARTUP_SELECTION')?.toLowerCase(),
    unloadModelOnExit: booleanEnv(env, 'UNLOAD_MODEL_ON_EXIT'),
  };

  const parsed = WatcherConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(
      `Configuration validation failed:\n${issues.join('\n')}\n` +
        'Copy .env.example to .env and fill in the required values.',
    );
  }
  return parsed.data;
}
