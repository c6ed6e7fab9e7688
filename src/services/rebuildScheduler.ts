// src/services/rebuildScheduler.ts
// What: Background scheduler that keeps the vector index in step with the course data file.
// How: Each tick attempts a build only when no build is in flight and the source content hash differs
//      from the published index's hash; trigger() forces a rebuild. Builds publish atomically, so queries
//      keep being served from the previous index while a rebuild runs. Exposes status for /index/status.

import type { Logger } from '../logging.js';
import type { IndexManifest } from './vectorIndex.js';
import { buildIndex, newBuildId, type BuildReport, type IndexBuildDeps } from './indexer.js';

export interface RebuildStatus {
  started: boolean;
  interval_ms: number;
  is_running: boolean;
  last_build_id?: string;
  last_run_start?: string; // ISO
  last_run_end?: string; // ISO
  last_run_duration_ms?: number;
  runs_completed: number;
  last_skipped_reason?: string;
  last_error?: string;
  last_report?: BuildReport;
  next_scheduled_run_at?: string; // ISO, approximated from the last tick
  index?: IndexManifest;
}

export class IndexRebuildScheduler {
  private started = false;
  private isRunning = false;
  private runsCompleted = 0;

  private lastBuildId?: string;
  private lastRunStart?: number;
  private lastRunEnd?: number;
  private lastSkippedReason?: string;
  private lastError?: string;
  private lastReport?: BuildReport;

  private timer: NodeJS.Timeout | null = null;
  private lastTickAt = Date.now();
  private readonly logger: Logger;

  constructor(
    private readonly deps: IndexBuildDeps,
    private readonly intervalMs: number,
  ) {
    this.logger = deps.logger.child({ component: 'rebuild-scheduler' });
  }

  /**
   * Start the periodic timer. An interval of 0 leaves the scheduler manual-only.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    if (this.intervalMs <= 0) {
      this.logger.info('Rebuild scheduler started without a timer');
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    // Do not keep the process alive just for the timer.
    this.timer.unref();
    this.logger.info({ interval_ms: this.intervalMs }, 'Rebuild scheduler started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.started = false;
  }

  /** Force a rebuild regardless of the source hash; resolves when the attempt finishes. */
  trigger(): Promise<void> {
    return this.attemptRunIfIdle(true);
  }

  /** Rebuild only when the course data changed; resolves when the attempt finishes. */
  tick(): Promise<void> {
    this.lastTickAt = Date.now();
    return this.attemptRunIfIdle(false);
  }

  private async attemptRunIfIdle(force: boolean): Promise<void> {
    if (this.isRunning) {
      this.logger.debug('Rebuild already running; skipping attempt');
      return;
    }
    this.isRunning = true;
    this.lastError = undefined;
    this.lastSkippedReason = undefined;
    const buildId = newBuildId();

    try {
      if (!force) {
        const { contentHash } = await this.deps.source.load();
        const published = this.deps.handle.peek()?.manifest.sourceHash;
        if (published === contentHash) {
          this.lastSkippedReason = 'source unchanged';
          this.logger.debug({ contentHash }, 'Course data unchanged; skipping rebuild');
          return;
        }
      }

      this.lastBuildId = buildId;
      this.lastRunStart = Date.now();
      this.logger.info({ buildId, force }, 'Index rebuild starting');
      const report = await buildIndex(this.deps, buildId);
      this.lastReport = report;
      this.logger.info({ buildId, report }, 'Index rebuild finished');
    } catch (err) {
      this.lastError = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, buildId }, 'Index rebuild failed');
    } finally {
      if (this.lastBuildId === buildId) {
        this.lastRunEnd = Date.now();
        this.runsCompleted += 1;
      }
      this.isRunning = false;
    }
  }

  status(): RebuildStatus {
    const manifest = this.deps.handle.peek()?.manifest;
    return {
      started: this.started,
      interval_ms: this.intervalMs,
      is_running: this.isRunning,
      last_build_id: this.lastBuildId,
      last_run_start: this.lastRunStart ? new Date(this.lastRunStart).toISOString() : undefined,
      last_run_end: this.lastRunEnd ? new Date(this.lastRunEnd).toISOString() : undefined,
      last_run_duration_ms:
        this.lastRunStart && this.lastRunEnd ? this.lastRunEnd - this.lastRunStart : undefined,
      runs_completed: this.runsCompleted,
      last_skipped_reason: this.lastSkippedReason,
      last_error: this.lastError,
      last_report: this.lastReport,
      next_scheduled_run_at:
        this.started && this.intervalMs > 0 ? new Date(this.lastTickAt + this.intervalMs).toISOString() : undefined,
      index: manifest ? { ...manifest } : undefined,
    };
  }
}
