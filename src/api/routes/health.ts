// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { JobQueue } from '../../notifications/queue.js';
import type { NotificationWorker } from '../../notifications/worker.js';
import type { KeyValueStore } from '../../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    storage: ComponentHealth;
    worker: ComponentHealth;
  };
  queue: {
    pending: number | null;
  };
}

interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthRouterDeps {
  store: KeyValueStore;
  queue: JobQueue;
  worker: NotificationWorker;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

async function checkStorage(store: KeyValueStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    await store.ping();
    const latency = Date.now() - start;

    if (latency > 1000) {
      return { status: 'degraded', latency, message: 'High latency' };
    }
    return { status: 'up', latency };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

function checkWorker(worker: NotificationWorker): ComponentHealth {
  const stats = worker.getStats();
  return stats.running
    ? { status: 'up', message: `${stats.activeJobs} active jobs` }
    : { status: 'degraded', message: 'Worker not running' };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get('/health', async (_req: Request, res: Response) => {
    const storage = await checkStorage(deps.store);
    const worker = checkWorker(deps.worker);
    const pending = storage.status === 'down' ? null : await deps.queue.size().catch(() => null);

    const health: HealthCheck = {
      status: storage.status === 'down'
        ? 'unhealthy'
        : storage.status === 'up' && worker.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { storage, worker },
      queue: { pending },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', {
        status: health.status,
        storage: storage.status,
        worker: worker.status,
      });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // ─── READINESS CHECK ───
  router.get('/ready', async (_req: Request, res: Response) => {
    const storage = await checkStorage(deps.store);
    const ready = storage.status !== 'down';

    if (!ready) {
      logger.error('Readiness check failed', undefined, { message: storage.message });
    }

    res.status(ready ? 200 : 503).json({
      ready,
      timestamp: new Date().toISOString(),
      checks: { storage: ready },
    });
  });

  return router;
}
