/**
 * BullMQ Queue Client
 *
 * Provides queue and worker factories with shared connection settings.
 * Uses BullMQ's own prefix option, NOT ioredis keyPrefix.
 */

import { Queue, Worker, type Job, type Processor, type WorkerOptions } from 'bullmq';

import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface QueueClientConfig {
  /** Redis connection (must NOT have keyPrefix set, needs maxRetriesPerRequest: null) */
  redis: Redis;
  /** BullMQ queue key prefix */
  prefix: string;
  logger: Logger;
}

export interface CreateWorkerOptions<T, R> {
  /** Queue name */
  name: string;
  processor: Processor<T, R>;
  options?: Partial<WorkerOptions>;
}

export interface QueueClient {
  /** Queue instance for a name, created once; it is closed together with the client */
  getQueue<T>(name: string): Queue<T>;
  /** Create a worker for a queue */
  createWorker<T, R>(options: CreateWorkerOptions<T, R>): Worker<T, R>;
  /** Close all queues and workers */
  close(): Promise<void>;
}

interface Closable {
  name: string;
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a BullMQ queue client.
 */
export const makeQueueClient = (config: QueueClientConfig): QueueClient => {
  const { redis, prefix, logger } = config;
  const log = logger.child({ component: 'QueueClient' });

  const queues = new Map<string, Closable & { queue: unknown }>();
  const workers: Closable[] = [];

  const closeAll = async (items: Closable[], kind: string): Promise<void> => {
    await Promise.all(
      items.map(async (item) => {
        try {
          await item.close();
        } catch (error) {
          log.error({ err: error, name: item.name }, `Error closing ${kind}`);
        }
      })
    );
  };

  log.info({ prefix }, 'Initializing BullMQ queue client');

  return {
    getQueue<T>(name: string): Queue<T> {
      const existing = queues.get(name);
      if (existing !== undefined && existing.queue instanceof Queue) {
        return existing.queue;
      }

      log.debug({ name, prefix }, 'Creating queue');
      const queue = new Queue<T>(name, { connection: redis, prefix });
      queues.set(name, { name, queue, close: () => queue.close() });
      return queue;
    },

    createWorker<T, R>(options: CreateWorkerOptions<T, R>): Worker<T, R> {
      const { name, processor, options: workerOptions = {} } = options;

      log.info({ name, prefix }, 'Creating worker');

      const worker = new Worker<T, R>(name, processor, {
        connection: redis,
        prefix,
        ...workerOptions,
      });

      worker.on('completed', (job: Job<T, R>) => {
        log.debug({ jobId: job.id, jobName: job.name, queue: name }, 'Job completed');
      });

      worker.on('failed', (job: Job<T, R> | undefined, error: Error) => {
        log.error({ jobId: job?.id, queue: name, err: error }, 'Job failed');
      });

      worker.on('error', (error: Error) => {
        log.error({ queue: name, err: error }, 'Worker error');
      });

      workers.push({ name, close: () => worker.close() });
      return worker;
    },

    async close(): Promise<void> {
      log.info('Closing queue client');

      // Workers first so no job starts against a closed queue
      await closeAll(workers, 'worker');
      await closeAll([...queues.values()], 'queue');
      queues.clear();

      log.info('Queue client closed');
    },
  };
};
