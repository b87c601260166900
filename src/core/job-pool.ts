/**
 * Job Pool
 *
 * Bounds how many provisioning jobs drive a browser at once. Each running job
 * holds one slot; further jobs wait in a FIFO queue of fixed size. A job that
 * finds the queue full is rejected immediately, and one that waits longer
 * than `queueTimeoutMs` is rejected with a timeout.
 */

import { ProvisioningError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.pool;

export interface JobPoolLimits {
  /** Jobs allowed to hold a browser at the same time */
  maxConcurrent: number;
  /** Jobs allowed to wait for a slot */
  queueSize: number;
  /** Longest a job may wait for a slot */
  queueTimeoutMs: number;
}

export interface JobPoolStats {
  active: number;
  queued: number;
  totalJobs: number;
  timedOutJobs: number;
  rejectedJobs: number;
}

interface QueuedJob {
  jobId: string;
  resolve: () => void;
  reject: (error: Error) => void;
  enqueuedAt: number;
  timeout: NodeJS.Timeout;
}

export const DEFAULT_POOL_LIMITS: JobPoolLimits = {
  maxConcurrent: 2,
  queueSize: 10,
  queueTimeoutMs: 600_000,
};

export class JobPool {
  private readonly limits: JobPoolLimits;
  private readonly activeJobs = new Set<string>();
  private queue: QueuedJob[] = [];
  private totalJobs = 0;
  private timedOutJobs = 0;
  private rejectedJobs = 0;
  private closed = false;

  constructor(limits: Partial<JobPoolLimits> = {}) {
    this.limits = { ...DEFAULT_POOL_LIMITS, ...limits };
    log.info('JobPool initialized', { ...this.limits });
  }

  /**
   * Acquire a slot. Returns a release function; calling it twice is harmless.
   */
  async acquire(jobId: string): Promise<() => void> {
    if (this.closed) {
      throw new JobPoolClosedError();
    }
    this.totalJobs++;

    // If we have capacity, acquire immediately
    if (this.activeJobs.size < this.limits.maxConcurrent) {
      return this.occupy(jobId);
    }

    if (this.queue.length >= this.limits.queueSize) {
      this.rejectedJobs++;
      log.warn('Job rejected, queue full', { jobId, queued: this.queue.length });
      throw new JobQueueFullError(this.queue.length, this.limits.queueSize);
    }

    return this.waitInQueue(jobId);
  }

  /**
   * Run `task` while holding a slot.
   */
  async run<T>(jobId: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(jobId);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private occupy(jobId: string): () => void {
    this.activeJobs.add(jobId);
    log.debug('Slot acquired', { jobId, active: this.activeJobs.size, queued: this.queue.length });

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.activeJobs.delete(jobId);
      log.debug('Slot released', { jobId, active: this.activeJobs.size });
      this.processQueue();
    };
  }

  private waitInQueue(jobId: string): Promise<() => void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        const index = this.queue.findIndex((entry) => entry.timeout === timeout);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        this.timedOutJobs++;
        log.warn('Job timed out waiting for a slot', { jobId, waitedMs: this.limits.queueTimeoutMs });
        reject(new JobQueueTimeoutError(this.limits.queueTimeoutMs));
      }, this.limits.queueTimeoutMs);

      this.queue.push({
        jobId,
        resolve: () => resolve(this.occupy(jobId)),
        reject,
        enqueuedAt: Date.now(),
        timeout,
      });

      log.debug('Job queued', { jobId, position: this.queue.length, queueSize: this.limits.queueSize });
    });
  }

  private processQueue(): void {
    if (this.queue.length === 0 || this.activeJobs.size >= this.limits.maxConcurrent) {
      return;
    }

    const next = this.queue.shift();
    if (next) {
      clearTimeout(next.timeout);
      log.debug('Dequeued job', { jobId: next.jobId, waitedMs: Date.now() - next.enqueuedAt });
      next.resolve();
    }
  }

  getStats(): JobPoolStats {
    return {
      active: this.activeJobs.size,
      queued: this.queue.length,
      totalJobs: this.totalJobs,
      timedOutJobs: this.timedOutJobs,
      rejectedJobs: this.rejectedJobs,
    };
  }

  /**
   * Reject everything still queued and refuse new jobs. Running jobs finish normally.
   */
  close(): void {
    this.closed = true;
    for (const entry of this.queue) {
      clearTimeout(entry.timeout);
      entry.reject(new JobPoolClosedError());
    }
    this.queue = [];
    log.info('JobPool closed', { active: this.activeJobs.size });
  }
}

// Custom error classes
export class JobQueueFullError extends ProvisioningError {
  constructor(queued: number, queueSize: number) {
    super(`Job queue is full (${queued}/${queueSize})`, 'pool_rejected', true);
    this.name = 'JobQueueFullError';
  }
}

export class JobQueueTimeoutError extends ProvisioningError {
  constructor(timeoutMs: number) {
    super(`Job waited ${timeoutMs}ms for a free slot`, 'pool_rejected', true);
    this.name = 'JobQueueTimeoutError';
  }
}

export class JobPoolClosedError extends ProvisioningError {
  constructor() {
    super('Job pool is shutting down', 'pool_rejected', false);
    this.name = 'JobPoolClosedError';
  }
}
