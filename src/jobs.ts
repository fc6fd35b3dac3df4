/**
 * Job store: keeps an append-only event log for each long-running run
 */

import { randomUUID } from 'node:crypto';

export type JobStatus = 'running' | 'completed' | 'failed';

export interface Job<TEvent, TResult> {
  readonly id: string;
  readonly kind: string;
  status: JobStatus;
  readonly createdAt: string;
  finishedAt?: string;
  readonly events: TEvent[];
  result?: TResult;
  error?: string;
}

export interface JobStore<TEvent, TResult> {
  create(kind: string): Job<TEvent, TResult>;
  append(jobId: string, event: TEvent): void;
  complete(jobId: string, result: TResult): void;
  fail(jobId: string, message: string): void;
  get(jobId: string): Job<TEvent, TResult> | undefined;
  list(): Array<Job<TEvent, TResult>>;
}

export class UnknownJobError extends Error {
  constructor(public readonly jobId: string) {
    super(`Unknown job: ${jobId}`);
    this.name = 'UnknownJobError';
  }
}

export class InMemoryJobStore<TEvent, TResult> implements JobStore<TEvent, TResult> {
  private readonly jobs = new Map<string, Job<TEvent, TResult>>();

  constructor(
    private readonly newId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date()
  ) {}

  create(kind: string): Job<TEvent, TResult> {
    const job: Job<TEvent, TResult> = {
      id: this.newId(),
      kind,
      status: 'running',
      createdAt: this.now().toISOString(),
      events: [],
    };
    this.jobs.set(job.id, job);
    return job;
  }

  private running(jobId: string): Job<TEvent, TResult> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new UnknownJobError(jobId);
    }
    if (job.status !== 'running') {
      throw new Error(`Job ${jobId} is already ${job.status}`);
    }
    return job;
  }

  append(jobId: string, event: TEvent): void {
    this.running(jobId).events.push(event);
  }

  complete(jobId: string, result: TResult): void {
    const job = this.running(jobId);
    job.status = 'completed';
    job.result = result;
    job.finishedAt = this.now().toISOString();
  }

  fail(jobId: string, message: string): void {
    const job = this.running(jobId);
    job.status = 'failed';
    job.error = message;
    job.finishedAt = this.now().toISOString();
  }

  get(jobId: string): Job<TEvent, TResult> | undefined {
    return this.jobs.get(jobId);
  }

  list(): Array<Job<TEvent, TResult>> {
    return [...this.jobs.values()];
  }
}
