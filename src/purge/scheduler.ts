/**
 * Background scheduler for purge jobs.
 * Each job starts at its `runAt` time on an unref'd timer, so pending jobs never
 * keep the process alive. Jobs are held in memory only: whatever has not run
 * when the process exits is lost.
 */

import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { describeError } from '../protocol/errors.js';
import { PurgeJob } from '../protocol/types.js';

export type JobRunner = (job: PurgeJob) => Promise<void>;

/** Longest delay a single Node timer accepts; longer waits are chained. */
const MAX_TIMER_MS = 2_147_483_647;

interface PendingJob {
  job: PurgeJob;
  timer: NodeJS.Timeout | undefined;
  settle: () => void;
}

export class BackgroundScheduler {
  private pending = new Map<string, PendingJob>();
  private running = new Map<string, Promise<void>>();
  private waiting = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /**
   * Queue `job` to run at `job.runAt`. Errors thrown by `run` are logged, never rethrown.
   */
  schedule(job: PurgeJob, run: JobRunner): void {
    if (this.closed) {
      this.logger.warn('Scheduler is shut down; dropping purge job', { jobId: job.id });
      return;
    }

    const delayMs = Math.max(0, job.runAt.getTime() - this.now());
    let settle: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.waiting.add(done);
    void done.then(() => this.waiting.delete(done));

    const entry: PendingJob = { job, timer: undefined, settle };
    this.pending.set(job.id, entry);
    this.arm(entry, run);
    this.logger.debug('Scheduled purge job', { jobId: job.id, delayMs });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.running.size;
  }

  /**
   * Resolves once every scheduled and running job has settled.
   */
  async drain(): Promise<void> {
    while (this.waiting.size > 0) {
      await Promise.all(Array.from(this.waiting));
    }
  }

  /**
   * Cancel jobs that have not started yet and refuse new ones.
   * Jobs already running are left to finish. Returns the number cancelled.
   */
  shutdown(): number {
    this.closed = true;
    const cancelled = this.pending.size;
    for (const { job, timer, settle } of this.pending.values()) {
      clearTimeout(timer);
      settle();
      this.logger.warn('Cancelled pending purge job', { jobId: job.id });
    }
    this.pending.clear();
    return cancelled;
  }

  private arm(entry: PendingJob, run: JobRunner): void {
    const remaining = entry.job.runAt.getTime() - this.now();
    entry.timer = setTimeout(() => {
      if (remaining > MAX_TIMER_MS) {
        this.arm(entry, run);
        return;
      }
      this.start(entry, run);
    }, Math.min(Math.max(0, remaining), MAX_TIMER_MS));
    entry.timer.unref();
  }

  private start({ job, settle }: PendingJob, run: JobRunner): void {
    this.pending.delete(job.id);
    const execution = this.execute(job, run).finally(() => {
      this.running.delete(job.id);
      settle();
    });
    this.running.set(job.id, execution);
  }

  private async execute(job: PurgeJob, run: JobRunner): Promise<void> {
    try {
      await run(job);
    } catch (err) {
      this.logger.error('Background purge job failed', { jobId: job.id, error: describeError(err) });
    }
  }
}
