/**
 * Startup Selection
 *
 * Lists unprocessed files already in the folder and asks which to process:
 * "all", "skip", or numbers such as "1,3,5" (ranges like "2-4" also work).
 * STARTUP_SELECTION=all|skip answers without asking; without a terminal the
 * prompt is skipped.
 */

import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import type { StartupSelectionMode } from '../config.js';
import { listUnprocessedFiles } from './folder-scanner.js';

export type Ask = (question: string) => Promise<string>;

export interface StartupSelectionOptions {
  folder: string;
  supportedExtensions: readonly string[];
  mode: StartupSelectionMode;
  /** Whether a user can answer (stdin is a TTY) */
  interactive?: boolean;
  ask?: Ask;
}

/**
 * Turn an answer into 0-based indices into a list of `count` files.
 * Unknown tokens and out-of-range numbers are ignored; order is kept and
 * duplicates removed.
 */
export function parseSelection(input: string, count: number): number[] {
  const answer = input.trim().toLowerCase();
  if (answer === 'all') return Array.from({ length: count }, (_, i) => i);
  if (answer === '' || answer === 'skip') return [];

  const picked = new Set<number>();
  for (const token of answer.split(',').map((part) => part.trim())) {
    const range = /^(\d+)\s*-\s*(\d+)$/.exec(token);
    const [from, to] = range
      ? [Number(range[1]), Number(range[2])]
      : /^\d+$/.test(token)
        ? [Number(token), Number(token)]
        : [0, -1];
    for (let n = Math.max(from, 1); n <= Math.min(to, count); n++) {
      picked.add(n - 1);
    }
  }
  return [...picked];
}

const askOnTerminal: Ask = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/**
 * Decide which existing files to hand to the watch loop.
 *
 * @returns Absolute paths, in listing order
 */
export async function selectStartupFiles({
  folder,
  supportedExtensions,
  mode,
  interactive = Boolean(process.stdin.isTTY),
  ask = askOnTerminal,
}: StartupSelectionOptions): Promise<string[]> {
  const files = await listUnprocessedFiles(folder, supportedExtensions);
  if (files.length === 0) return [];

  const toPaths = (indices: number[]) => indices.map((i) => join(folder, files[i]));

  if (mode === 'all') return toPaths(parseSelection('all', files.length));
  if (mode === 'skip') {
    console.log(`[startup] Skipping ${files.length} unprocessed file(s)`);
    return [];
  }
  if (!interactive) {
    console.log(`[startup] No terminal; skipping ${files.length} unprocessed file(s)`);
    return [];
  }

  console.log(`\nFound ${files.length} unprocessed file(s):`);
  files.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));

  const answer = await ask("\nEnter numbers to process (e.g. '1,3,5'), 'all', or 'skip': ");
  return toPaths(parseSelection(answer, files.length));
}
