/**
 * Execution scheduler: a fixed pool of workers over a bounded job queue.
 *
 * - submit() hands the job to an idle worker, else queues it, else rejects it
 *   synchronously with ServiceBusyError. Nothing waits beyond the bound.
 * - Each worker runs one pipeline at a time end to end. It takes the next
 *   queued job (or goes idle) before resolving the finished job's outcome.
 * - Deadlines are cooperative: the pipeline calls checkpoint() between stages
 *   and the job is abandoned there once its time is up. A stage in flight is
 *   never interrupted; the worker is free again as soon as it returns.
 *
 * Workers are asynchronous loops on the event loop. The pixel work itself runs
 * in libvips' native thread pool, so jobs on different workers overlap. The
 * queue is only touched from the event loop and needs no further locking.
 */

import { EventEmitter } from 'events';
import { availableParallelism } from 'os';
import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import {
  InternalError,
  JobTimeoutError,
  SchedulerClosedError,
  ServiceBusyError,
  errorMessage,
  isImageServiceError,
} from '../core/image/errors';
import type { EncodedImage, PipelineRequest } from '../core/image/types';
import type { PipelineProcessor, StageContext } from '../processing/ImagePipeline';
import { createLogger } from '../utils/logger';
import { BoundedQueue } from './BoundedQueue';
import { PipelineJob, type JobOutcome } from './PipelineJob';

export interface SchedulerOptions {
  workers: number;
  queueCapacity: number;
  jobTimeoutMs: number;
}

export interface SubmitOptions {
  /** Overrides the scheduler's default deadline for this job */
  timeoutMs?: number;
}

export interface SchedulerStats {
  workers: number;
  busyWorkers: number;
  queued: number;
  queueCapacity: number;
  submitted: number;
  completed: number;
  failed: number;
  timedOut: number;
  rejected: number;
  closed: boolean;
}

export function defaultSchedulerOptions(): SchedulerOptions {
  const workers = availableParallelism();
  return {
    workers,
    queueCapacity: workers * 4,
    jobTimeoutMs: 30_000,
  };
}

export class PipelineScheduler extends EventEmitter {
  private readonly options: SchedulerOptions;
  private readonly logger: Logger;
  private readonly queue: BoundedQueue<PipelineJob>;
  private readonly idleWorkers: number[];
  private readonly activeJobs = new Map<number, PipelineJob>();
  private readonly loops = new Set<Promise<void>>();
  private closed = false;

  private readonly counters = {
    submitted: 0,
    completed: 0,
    failed: 0,
    timedOut: 0,
    rejected: 0,
  };

  constructor(
    private readonly processor: PipelineProcessor,
    opts: Partial<SchedulerOptions> = {},
    logger?: Logger,
  ) {
    super();
    this.options = { ...defaultSchedulerOptions(), ...opts };
    this.logger = logger ?? createLogger('scheduler');

    const { workers, jobTimeoutMs } = this.options;
    if (!Number.isInteger(workers) || workers < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${workers}`);
    }
    if (!Number.isFinite(jobTimeoutMs) || jobTimeoutMs <= 0) {
      throw new RangeError(`Job timeout must be positive, got ${jobTimeoutMs}`);
    }

    this.queue = new BoundedQueue<PipelineJob>(this.options.queueCapacity);
    this.idleWorkers = Array.from({ length: workers }, (_, index) => index);

    this.logger.info(
      { workers, queueCapacity: this.options.queueCapacity, jobTimeoutMs },
      'Pipeline scheduler started',
    );
  }

  /**
   * Submit a pipeline. Returns the job handle, or throws ServiceBusyError
   * synchronously when every worker is busy and the queue is full.
   */
  submit(request: PipelineRequest, opts: SubmitOptions = {}): PipelineJob {
    if (this.closed) {
      throw new SchedulerClosedError();
    }

    const timeoutMs = opts.timeoutMs ?? this.options.jobTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Job timeout must be positive, got ${timeoutMs}`);
    }

    const job = new PipelineJob(randomUUID(), request, timeoutMs);
    this.counters.submitted++;

    const workerId = this.idleWorkers.shift();
    if (workerId !== undefined) {
      this.startLoop(workerId, job);
      return job;
    }

    if (!this.queue.offer(job)) {
      job.reject();
      this.counters.rejected++;
      this.logger.warn({ job, queueCapacity: this.queue.capacity }, 'Job rejected: queue full');
      this.notify('rejected', job);
      throw new ServiceBusyError(this.queue.capacity);
    }

    this.logger.debug({ job, queued: this.queue.size }, 'Job queued');
    this.notify('queued', job);
    return job;
  }

  /** Submit and wait: resolves with the encoded image or rejects with the job's typed error */
  async execute(request: PipelineRequest, opts: SubmitOptions = {}): Promise<EncodedImage> {
    const outcome = await this.submit(request, opts).outcome;
    if (outcome.status === 'completed') {
      return outcome.output;
    }
    throw outcome.error;
  }

  stats(): SchedulerStats {
    return {
      workers: this.options.workers,
      busyWorkers: this.activeJobs.size,
      queued: this.queue.size,
      queueCapacity: this.queue.capacity,
      ...this.counters,
      closed: this.closed,
    };
  }

  /** Stop accepting jobs and wait until every queued and running job is done */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.logger.info({ queued: this.queue.size, running: this.activeJobs.size }, 'Scheduler closing');
    }
    await this.onIdle();
    this.logger.info(this.counters, 'Scheduler closed');
  }

  /** Resolves once no job is queued or running */
  async onIdle(): Promise<void> {
    while (this.loops.size > 0) {
      await Promise.all([...this.loops]);
    }
  }

  private startLoop(workerId: number, first: PipelineJob): void {
    const loop = this.workerLoop(workerId, first);
    this.loops.add(loop);
    void loop.finally(() => {
      this.loops.delete(loop);
    });
  }

  private async workerLoop(workerId: number, first: PipelineJob): Promise<void> {
    let job: PipelineJob | undefined = first;
    while (job) {
      job = await this.runJob(workerId, job);
    }
  }

  /**
   * Runs one job and returns the worker's next job, if any. The worker is
   * handed its next job, or put back in the idle pool, before the outcome
   * settles, so a caller resubmitting from the outcome sees the free slot.
   */
  private async runJob(workerId: number, job: PipelineJob): Promise<PipelineJob | undefined> {
    job.start(workerId);
    this.activeJobs.set(workerId, job);
    this.logger.debug({ job, workerId }, 'Job running');
    this.notify('active', job);

    const startedAt = job.startedAt ?? Date.now();
    const deadline = startedAt + job.timeoutMs;
    const context: StageContext = {
      checkpoint: (stage: string) => {
        if (Date.now() > deadline) {
          throw new JobTimeoutError(job.id, job.timeoutMs, stage);
        }
      },
    };

    let outcome: JobOutcome;
    try {
      const output = await this.processor.process(job.request, context);
      outcome = { status: 'completed', jobId: job.id, output, durationMs: Date.now() - startedAt };
    } catch (error) {
      outcome = this.toFailure(job, error, Date.now() - startedAt);
    }

    this.activeJobs.delete(workerId);
    const next = this.queue.poll();
    if (next) {
      this.activeJobs.set(workerId, next);
    } else {
      this.idleWorkers.push(workerId);
    }

    job.finish(outcome);
    this.record(job, outcome);
    return next;
  }

  /** Listener errors are logged and never reach the worker loop */
  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.logger.error({ err: error, event }, 'Scheduler event listener threw');
    }
  }

  private toFailure(job: PipelineJob, error: unknown, durationMs: number): JobOutcome {
    if (error instanceof JobTimeoutError) {
      return { status: 'timed_out', jobId: job.id, error, durationMs };
    }
    if (isImageServiceError(error)) {
      return { status: 'failed', jobId: job.id, error, durationMs };
    }

    this.logger.error({ job, err: error }, 'Unexpected pipeline failure');
    return {
      status: 'failed',
      jobId: job.id,
      error: new InternalError(`Pipeline failed: ${errorMessage(error)}`, { jobId: job.id }),
      durationMs,
    };
  }

  private record(job: PipelineJob, outcome: JobOutcome): void {
    switch (outcome.status) {
      case 'completed':
        this.counters.completed++;
        this.logger.debug({ job, durationMs: outcome.durationMs }, 'Job completed');
        this.notify('completed', job, outcome);
        break;
      case 'failed':
        this.counters.failed++;
        this.logger.debug(
          { job, code: outcome.error.code, durationMs: outcome.durationMs },
          `Job failed: ${outcome.error.message}`,
        );
        this.notify('failed', job, outcome);
        break;
      case 'timed_out':
        this.counters.timedOut++;
        this.logger.warn(
          { job, stage: outcome.error.stage, durationMs: outcome.durationMs },
          'Job timed out',
        );
        this.notify('timedOut', job, outcome);
        break;
    }
  }
}
