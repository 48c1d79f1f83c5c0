// ═══════════════════════════════════════════════════════════════════════════════
// JOB QUEUE — At-Least-Once Background Jobs on the Key-Value Store
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each job is a JSON document plus an entry in the pending list. A worker
// claims a due job by taking its lease (SET NX with a TTL). A worker that dies
// mid-job leaves the lease to expire, so the job is claimed again later.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getStore, type KeyValueStore } from '../storage/index.js';
import { getLogger } from '../logging/index.js';
import { parseRecord } from './records.js';
import { generateId } from './store.js';

const logger = getLogger({ component: 'job-queue' });

// ─────────────────────────────────────────────────────────────────────────────────
// JOB TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface JobPayloads {
  dispatch: { notificationId: string };
  dispatch_batch: { notificationIds: string[] };
  deliver: { deliveryId: string };
  digest_scan: Record<string, never>;
  cleanup: Record<string, never>;
  retry_failed: Record<string, never>;
}

export type JobKind = keyof JobPayloads;

interface JobFields {
  id: string;
  attempts: number;
  runAt: string;
  createdAt: string;
  lastError?: string;
}

export type Job = {
  [K in JobKind]: JobFields & { kind: K; payload: JobPayloads[K] };
}[JobKind];

const EmptyPayload = z.object({}).strict().transform((): Record<string, never> => ({}));

const JobFieldsSchema = z.object({
  id: z.string(),
  attempts: z.number().int().nonnegative(),
  runAt: z.string(),
  createdAt: z.string(),
  lastError: z.string().optional(),
});

const JobSchema: z.ZodType<Job, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  JobFieldsSchema.extend({ kind: z.literal('dispatch'), payload: z.object({ notificationId: z.string() }) }),
  JobFieldsSchema.extend({
    kind: z.literal('dispatch_batch'),
    payload: z.object({ notificationIds: z.array(z.string()) }),
  }),
  JobFieldsSchema.extend({ kind: z.literal('deliver'), payload: z.object({ deliveryId: z.string() }) }),
  JobFieldsSchema.extend({ kind: z.literal('digest_scan'), payload: EmptyPayload }),
  JobFieldsSchema.extend({ kind: z.literal('cleanup'), payload: EmptyPayload }),
  JobFieldsSchema.extend({ kind: z.literal('retry_failed'), payload: EmptyPayload }),
]);

export interface EnqueueOptions {
  delayMs?: number;
}

/** What a job's failure led to */
export type FailureOutcome = 'rescheduled' | 'dropped';

// ─────────────────────────────────────────────────────────────────────────────────
// KEYS
// ─────────────────────────────────────────────────────────────────────────────────

function jobKey(id: string): string {
  return `job:${id}`;
}

function leaseKey(id: string): string {
  return `job:lease:${id}`;
}

/** Job ids, newest first */
const PENDING_KEY = 'job:pending';

// ─────────────────────────────────────────────────────────────────────────────────
// QUEUE
// ─────────────────────────────────────────────────────────────────────────────────

export interface JobQueueOptions {
  leaseSeconds?: number;
  clock?: () => Date;
}

export class JobQueue {
  private store: KeyValueStore;
  private readonly leaseSeconds: number;
  private readonly clock: () => Date;

  constructor(store?: KeyValueStore, options: JobQueueOptions = {}) {
    this.store = store ?? getStore();
    this.leaseSeconds = options.leaseSeconds ?? 300;
    this.clock = options.clock ?? (() => new Date());
  }

  async enqueue<K extends JobKind>(kind: K, payload: JobPayloads[K], options: EnqueueOptions = {}): Promise<string> {
    const now = this.clock();
    const id = generateId();
    const job = {
      id,
      kind,
      payload,
      attempts: 0,
      runAt: new Date(now.getTime() + (options.delayMs ?? 0)).toISOString(),
      createdAt: now.toISOString(),
    };

    await this.store.set(jobKey(id), JSON.stringify(job));
    await this.store.lpush(PENDING_KEY, id);

    logger.debug('Job enqueued', { jobId: id, kind, delayMs: options.delayMs ?? 0 });
    return id;
  }

  async get(id: string): Promise<Job | null> {
    return parseRecord(JobSchema, await this.store.get(jobKey(id)));
  }

  /**
   * Claims up to `limit` due jobs, oldest first. A claimed job is invisible to
   * other workers until it completes, fails or its lease expires.
   */
  async claimDue(limit: number): Promise<Job[]> {
    const now = this.clock().getTime();
    const ids = await this.store.lrange(PENDING_KEY, 0, -1);
    const claimed: Job[] = [];

    for (let index = ids.length - 1; index >= 0 && claimed.length < limit; index--) {
      const id = ids[index];
      if (id === undefined) continue;

      const job = await this.get(id);
      if (!job) {
        await this.store.lrem(PENDING_KEY, 0, id);
        continue;
      }
      if (new Date(job.runAt).getTime() > now) continue;

      if (await this.store.setIfAbsent(leaseKey(id), String(now), this.leaseSeconds)) {
        claimed.push(job);
      }
    }

    return claimed;
  }

  async complete(job: Job): Promise<void> {
    await this.store.delete(jobKey(job.id));
    await this.store.lrem(PENDING_KEY, 0, job.id);
    await this.store.delete(leaseKey(job.id));
  }

  /**
   * Reschedules a failed job after `retryDelayMs`, or drops it once it has
   * used `maxAttempts` runs.
   */
  async fail(job: Job, error: string, retryDelayMs: number, maxAttempts: number): Promise<FailureOutcome> {
    const attempts = job.attempts + 1;

    if (attempts >= maxAttempts) {
      await this.complete(job);
      logger.error('Job dropped after repeated failures', undefined, {
        jobId: job.id,
        kind: job.kind,
        attempts,
        error,
      });
      return 'dropped';
    }

    const runAt = new Date(this.clock().getTime() + retryDelayMs).toISOString();
    await this.store.set(jobKey(job.id), JSON.stringify({ ...job, attempts, runAt, lastError: error }));
    await this.store.delete(leaseKey(job.id));
    return 'rescheduled';
  }

  async size(): Promise<number> {
    return this.store.llen(PENDING_KEY);
  }

  async list(): Promise<Job[]> {
    const ids = await this.store.lrange(PENDING_KEY, 0, -1);
    const jobs: Job[] = [];
    for (const id of ids.reverse()) {
      const job = await this.get(id);
      if (job) jobs.push(job);
    }
    return jobs;
  }
}
