import type { HistoryStore } from "../db/history.js";
import { logger } from "../logger.js";
import type { JobCoordinator } from "./jobQueue.js";

export interface PurgeSchedulerOptions {
  maxAgeHours: number;
  intervalHours: number;
  /** How often finished jobs are evicted from memory. */
  evictIntervalMs?: number;
  /** Delay before the first history purge. */
  initialDelayMs?: number;
  now?: () => number;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Two housekeeping loops: evict expired jobs from the coordinator, and purge
 * old rows from the history store. Returns a function that stops both.
 */
export function startPurgeScheduler(
  coordinator: JobCoordinator,
  history: HistoryStore,
  options: PurgeSchedulerOptions,
): () => void {
  const now = options.now ?? Date.now;
  let isRunning = false;

  const runPurge = (): void => {
    if (isRunning) {
      logger.debug("Purge already running, skipping this tick");
      return;
    }
    isRunning = true;
    try {
      history.purgeOlderThan(now() - options.maxAgeHours * HOUR_MS);
    } catch (err) {
      logger.error({ err }, "Purge scheduler: unhandled error during purge");
    } finally {
      isRunning = false;
    }
  };

  const runEvict = (): void => {
    try {
      coordinator.evictExpired();
    } catch (err) {
      logger.error({ err }, "Purge scheduler: eviction failed");
    }
  };

  logger.info({ intervalHours: options.intervalHours, maxAgeHours: options.maxAgeHours }, "Purge scheduler started");

  // First purge shortly after startup clears any backlog from a previous run
  const initial = setTimeout(runPurge, options.initialDelayMs ?? 60_000);
  const purgeTimer = setInterval(runPurge, options.intervalHours * HOUR_MS);
  const evictTimer = setInterval(runEvict, options.evictIntervalMs ?? 60_000);
  for (const t of [initial, purgeTimer, evictTimer]) t.unref();

  return () => {
    clearTimeout(initial);
    clearInterval(purgeTimer);
    clearInterval(evictTimer);
  };
}
