import { InternalError, type ImageServiceError, type JobTimeoutError } from '../core/image/errors';
import type { EncodedImage, PipelineRequest } from '../core/image/types';

export type JobState = 'queued' | 'running' | 'completed' | 'failed' | 'timed_out' | 'rejected';

export type TerminalState = Extract<JobState, 'completed' | 'failed' | 'timed_out' | 'rejected'>;

export type JobOutcome =
  | { status: 'completed'; jobId: string; output: EncodedImage; durationMs: number }
  | { status: 'failed'; jobId: string; error: ImageServiceError; durationMs: number }
  | { status: 'timed_out'; jobId: string; error: JobTimeoutError; durationMs: number };

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ['running', 'rejected'],
  running: ['completed', 'failed', 'timed_out'],
  completed: [],
  failed: [],
  timed_out: [],
  rejected: [],
};

/**
 * A submitted pipeline request plus its completion handle.
 *
 * `outcome` never rejects: callers get a tagged result for every terminal
 * state except `rejected`, which is reported synchronously by submit().
 */
export class PipelineJob {
  readonly createdAt = Date.now();
  readonly outcome: Promise<JobOutcome>;

  private currentState: JobState = 'queued';
  private pendingRequest: PipelineRequest | undefined;
  private settle: (outcome: JobOutcome) => void = () => undefined;

  startedAt?: number;
  finishedAt?: number;
  workerId?: number;

  constructor(
    readonly id: string,
    request: PipelineRequest,
    readonly timeoutMs: number,
  ) {
    this.pendingRequest = request;
    this.outcome = new Promise<JobOutcome>((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): JobState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.currentState].length === 0;
  }

  /** The request, available until the job reaches a terminal state */
  get request(): PipelineRequest {
    if (!this.pendingRequest) {
      throw new InternalError(`Job ${this.id} has already released its request`, { jobId: this.id });
    }
    return this.pendingRequest;
  }

  get deadline(): number | undefined {
    return this.startedAt === undefined ? undefined : this.startedAt + this.timeoutMs;
  }

  start(workerId: number): void {
    this.transition('running');
    this.workerId = workerId;
    this.startedAt = Date.now();
  }

  reject(): void {
    this.transition('rejected');
    this.finishedAt = Date.now();
    this.pendingRequest = undefined;
  }

  finish(outcome: JobOutcome): void {
    this.transition(outcome.status);
    this.finishedAt = Date.now();
    // Input bytes and any intermediate rasters become unreachable from here
    this.pendingRequest = undefined;
    this.settle(outcome);
  }

  private transition(next: TerminalState | 'running'): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InternalError(`Illegal job transition ${this.currentState} → ${next}`, {
        jobId: this.id,
        from: this.currentState,
        to: next,
      });
    }
    this.currentState = next;
  }
}
