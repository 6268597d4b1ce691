/**
 * Share Cleanup Worker
 *
 * Periodic sweep that reclaims expired and exhausted shares, independent of
 * any request. Eligibility is recomputed from the clock on every run, so a
 * missed or late run is caught up by the next one. One share failing never
 * stops the rest of the sweep, and a sweep never throws.
 */

import type { CleanupSummary, FileShare } from '../types/index.js';
import { reclaimShare } from '../services/share.reclaim.js';
import type { ShareDb, ShareStorage } from '../services/share.service.js';

export const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
export const DEFAULT_CLEANUP_BATCH_SIZE = 500;
/** Staging blobs older than this belong to uploads that died mid-stream */
export const DEFAULT_STAGING_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface ShareCleanupWorker {
  /** Run one sweep now; joins the sweep already running, if any */
  runOnce(): Promise<CleanupSummary>;
  /** Sweep immediately, then every interval */
  start(): void;
  stop(): void;
}

export function createShareCleanupWorker(deps: {
  db: Pick<
    ShareDb,
    'listExpiredOrExhausted' | 'deleteShare' | 'deleteShareIfReclaimable'
  >;
  storage: Pick<ShareStorage, 'delete' | 'removeStaleStaging'>;
  intervalMs?: number;
  batchSize?: number;
  stagingMaxAgeMs?: number;
  now?: () => Date;
  onSweep?: (summary: CleanupSummary) => void;
}): ShareCleanupWorker {
  const { db, storage } = deps;
  const intervalMs = deps.intervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
  const batchSize = deps.batchSize ?? DEFAULT_CLEANUP_BATCH_SIZE;
  const stagingMaxAgeMs = deps.stagingMaxAgeMs ?? DEFAULT_STAGING_MAX_AGE_MS;
  const now = deps.now ?? (() => new Date());

  let timer: NodeJS.Timeout | null = null;
  let running: Promise<CleanupSummary> | null = null;

  async function sweep(): Promise<CleanupSummary> {
    const sweptAt = now();
    const summary: CleanupSummary = {
      scanned: 0,
      reclaimed: 0,
      failed: 0,
      stagingRemoved: 0,
    };

    // Batches repeat until the backlog is drained or a batch makes no progress
    const attempted = new Set<string>();
    while (true) {
      let batch: FileShare[];
      try {
        batch = await db.listExpiredOrExhausted(sweptAt, batchSize);
      } catch (error) {
        console.error('Cleanup sweep could not list shares:', error);
        break;
      }

      let progressed = false;
      for (const share of batch) {
        if (attempted.has(share.id)) {
          continue;
        }
        attempted.add(share.id);
        summary.scanned += 1;

        try {
          const removed = await reclaimShare({ db, storage }, share, {
            now: sweptAt,
          });
          if (removed) {
            summary.reclaimed += 1;
            progressed = true;
          }
        } catch (error) {
          summary.failed += 1;
          console.error(`Cleanup failed for share ${share.id}:`, error);
        }
      }

      if (batch.length < batchSize || !progressed) {
        break;
      }
    }

    try {
      summary.stagingRemoved = await storage.removeStaleStaging(
        new Date(sweptAt.getTime() - stagingMaxAgeMs)
      );
    } catch (error) {
      console.error('Cleanup could not purge staging blobs:', error);
    }

    return summary;
  }

  function runOnce(): Promise<CleanupSummary> {
    if (running === null) {
      running = sweep().finally(() => {
        running = null;
      });
    }
    return running;
  }

  function tick(): void {
    runOnce().then(
      (summary) => {
        deps.onSweep?.(summary);
      },
      (error: unknown) => {
        console.error('Cleanup sweep failed:', error);
      }
    );
  }

  return {
    runOnce,

    start() {
      if (timer !== null) {
        return;
      }
      timer = setInterval(tick, intervalMs);
      timer.unref();
      tick();
    },

    stop() {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
