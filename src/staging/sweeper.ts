/**
 * Periodic sweep of expired staged files.
 *
 * The store also sweeps before every stage(); the timer covers quiet periods
 * where nothing new is staged. The interval is unref'd so it never keeps the
 * process alive on its own.
 */

import type { TempFileStore } from './temp-file-store.js';
import { errorMessage } from '../transfer/errors.js';

/**
 * Starts sweeping `store` every `intervalMs`.
 *
 * @returns A function that stops the timer
 */
export function startSweeper(
  store: TempFileStore,
  intervalMs: number,
  now: () => number = Date.now,
): () => void {
  const timer = setInterval(() => {
    store.sweep(now()).catch((err: unknown) => {
      console.error('[staging] Periodic sweep failed:', errorMessage(err));
    });
  }, intervalMs);
  timer.unref();

  console.log(`[staging] Sweeper started (every ${Math.round(intervalMs / 1000)}s)`);
  return () => clearInterval(timer);
}
