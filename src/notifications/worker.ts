// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION WORKER — Job Polling and Periodic Maintenance
// ═══════════════════════════════════════════════════════════════════════════════
//
// Handles:
// - Claiming due jobs and routing them by kind
// - Re-scheduling jobs that throw, dropping them after maxJobAttempts
// - Enqueuing digest scans, cleanup and the failed-delivery sweep on a timer
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import type { DigestBatcher } from './digest.js';
import type { NotificationDispatcher } from './dispatcher.js';
import { TemplateLookupError, errorMessage } from './errors.js';
import type { Job, JobQueue } from './queue.js';

const logger = getLogger({ component: 'worker' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface NotificationWorkerDeps {
  queue: JobQueue;
  dispatcher: NotificationDispatcher;
  digest: DigestBatcher;
}

export interface NotificationWorkerOptions {
  pollIntervalMs?: number;
  batchSize?: number;
  maxJobAttempts?: number;
  jobRetryDelayMs?: number;
  digestScanIntervalMs?: number;
  cleanupIntervalMs?: number;
  retrySweepIntervalMs?: number;
}

export interface TickResult {
  completed: number;
  failed: number;
}

type MaintenanceKind = 'digest_scan' | 'cleanup' | 'retry_failed';

// ─────────────────────────────────────────────────────────────────────────────────
// WORKER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class NotificationWorker {
  private running = false;
  private pollInterval: NodeJS.Timeout | null = null;
  private maintenanceIntervals: NodeJS.Timeout[] = [];
  private activeJobs: Map<string, Promise<boolean>> = new Map();
  private polling = false;

  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly maxJobAttempts: number;
  private readonly jobRetryDelayMs: number;
  private readonly schedule: ReadonlyArray<readonly [MaintenanceKind, number]>;

  constructor(
    private readonly deps: NotificationWorkerDeps,
    options: NotificationWorkerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.batchSize = options.batchSize ?? 20;
    this.maxJobAttempts = options.maxJobAttempts ?? 5;
    this.jobRetryDelayMs = options.jobRetryDelayMs ?? 30_000;
    this.schedule = [
      ['digest_scan', options.digestScanIntervalMs ?? 60 * 60_000],
      ['cleanup', options.cleanupIntervalMs ?? 24 * 60 * 60_000],
      ['retry_failed', options.retrySweepIntervalMs ?? 60 * 60_000],
    ];
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════════

  start(): void {
    if (this.running) return;

    this.running = true;
    this.pollInterval = setInterval(() => void this.poll(), this.pollIntervalMs);
    this.maintenanceIntervals = this.schedule.map(([kind, intervalMs]) =>
      setInterval(() => void this.enqueueMaintenance(kind), intervalMs)
    );

    logger.info('Notification worker started', { pollIntervalMs: this.pollIntervalMs });
  }

  /**
   * Stops polling and waits for jobs already running.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
    for (const interval of this.maintenanceIntervals) {
      clearInterval(interval);
    }
    this.maintenanceIntervals = [];

    await Promise.allSettled(this.activeJobs.values());
    logger.info('Notification worker stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): { running: boolean; activeJobs: number } {
    return {
      running: this.running,
      activeJobs: this.activeJobs.size,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PROCESSING
  // ═══════════════════════════════════════════════════════════════════════════════

  private async poll(): Promise<void> {
    if (!this.running || this.polling) return;

    this.polling = true;
    try {
      await this.tick();
    } catch (error) {
      logger.error('Error polling job queue', error);
    } finally {
      this.polling = false;
    }
  }

  /**
   * Claims and runs one batch of due jobs to completion.
   */
  async tick(): Promise<TickResult> {
    const capacity = this.batchSize - this.activeJobs.size;
    if (capacity <= 0) return { completed: 0, failed: 0 };

    const jobs = await this.deps.queue.claimDue(capacity);
    const runs = jobs
      .filter(job => !this.activeJobs.has(job.id))
      .map(job => {
        const run = this.runJob(job).finally(() => {
          this.activeJobs.delete(job.id);
        });
        this.activeJobs.set(job.id, run);
        return run;
      });

    const outcomes = await Promise.all(runs);
    return {
      completed: outcomes.filter(Boolean).length,
      failed: outcomes.filter(outcome => !outcome).length,
    };
  }

  private async runJob(job: Job): Promise<boolean> {
    try {
      await this.handle(job);
      await this.deps.queue.complete(job);
      return true;
    } catch (error) {
      // Retrying cannot register a template
      if (error instanceof TemplateLookupError) {
        await this.deps.queue.complete(job);
        logger.error('Job dropped, no template for notification type', error, { jobId: job.id, kind: job.kind });
        return false;
      }

      const outcome = await this.deps.queue.fail(job, errorMessage(error), this.jobRetryDelayMs, this.maxJobAttempts);
      if (outcome === 'rescheduled') {
        logger.warn('Job failed, rescheduled', { jobId: job.id, kind: job.kind, error: errorMessage(error) });
      }
      return false;
    }
  }

  private async handle(job: Job): Promise<void> {
    switch (job.kind) {
      case 'dispatch':
        await this.deps.dispatcher.dispatch(job.payload.notificationId);
        return;
      case 'dispatch_batch': {
        const result = await this.deps.dispatcher.dispatchBatch(job.payload.notificationIds);
        if (result.failed.length > 0) {
          logger.warn('Batch dispatched with failures', {
            jobId: job.id,
            dispatched: result.dispatched.length,
            failed: result.failed.length,
          });
        }
        return;
      }
      case 'deliver':
        await this.deps.dispatcher.redeliver(job.payload.deliveryId);
        return;
      case 'digest_scan':
        await this.deps.digest.runDigestScan();
        return;
      case 'cleanup':
        await this.deps.dispatcher.cleanupOldNotifications();
        return;
      case 'retry_failed':
        await this.deps.dispatcher.retryFailedDeliveries();
        return;
      default: {
        const unknown: never = job;
        throw new Error(`Unhandled job: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private async enqueueMaintenance(kind: MaintenanceKind): Promise<void> {
    if (!this.running) return;
    try {
      await this.deps.queue.enqueue(kind, {});
    } catch (error) {
      logger.error('Failed to schedule maintenance job', error, { kind });
    }
  }
}
