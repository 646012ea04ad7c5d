import { randomUUID } from 'node:crypto';

import { InvalidJobTransitionError, JobNotFoundError, ResultNotReadyError } from './errors';
import type { GenerationOutput, Job, JobKind, JobResult, JobState, ResolvedPayload, TerminalJobState } from './types';

export interface NewJob {
  id?: string;
  callerId: string;
  kind: JobKind;
  payload: ResolvedPayload;
}

export interface JobFailure {
  /** Caller-safe summary. */
  message: string;
  /** Raw downstream error text. */
  error: string;
}

export interface JobListFilter {
  callerId?: string;
  state?: JobState;
}

interface JobRecord {
  job: Job;
  result: JobResult | null;
  completedAtMs: number | null;
}

const allowedTransitions: Record<JobState, JobState[]> = {
  queued: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class JobStore {
  private readonly records = new Map<string, JobRecord>();

  private readonly now: () => number;

  constructor(dependencies: { now?: () => number } = {}) {
    this.now = dependencies.now ?? (() => Date.now());
  }

  create(input: NewJob): Job {
    const id = input.id ?? randomUUID();
    if (this.records.has(id)) {
      throw new Error(`Job ${id} already exists.`);
    }

    const job: Job = {
      id,
      callerId: input.callerId,
      kind: input.kind,
      payload: input.payload,
      state: 'queued',
      createdAt: new Date(this.now()).toISOString(),
      startedAt: null,
      completedAt: null,
      message: null,
    };

    this.records.set(id, { job, result: null, completedAtMs: null });
    return { ...job };
  }

  has(jobId: string) {
    return this.records.has(jobId);
  }

  getStatus(jobId: string): Job {
    return { ...this.requireRecord(jobId).job };
  }

  getResult(jobId: string): JobResult {
    const record = this.requireRecord(jobId);
    if (!record.result) {
      throw new ResultNotReadyError(jobId, record.job.state);
    }

    return record.result;
  }

  markProcessing(jobId: string): Job {
    const record = this.transition(jobId, 'processing');
    record.job.startedAt = new Date(this.now()).toISOString();
    return { ...record.job };
  }

  complete(jobId: string, output: GenerationOutput): JobResult {
    const record = this.transition(jobId, 'completed');
    return this.finalize(record, 'completed', {
      images: [...output.images],
      info: output.info,
      parameters: output.parameters,
      error: null,
    });
  }

  fail(jobId: string, failure: JobFailure): JobResult {
    const record = this.transition(jobId, 'failed');
    record.job.message = failure.message;
    return this.finalize(record, 'failed', { images: [], info: {}, parameters: {}, error: failure.error });
  }

  list(filter: JobListFilter = {}): Job[] {
    const jobs: Job[] = [];
    for (const { job } of this.records.values()) {
      if (filter.callerId && job.callerId !== filter.callerId) {
        continue;
      }
      if (filter.state && job.state !== filter.state) {
        continue;
      }
      jobs.push({ ...job });
    }

    return jobs;
  }

  /** Drops terminal jobs that finished more than `olderThanMs` ago. */
  prune(olderThanMs: number): number {
    const cutoff = this.now() - olderThanMs;
    let removed = 0;

    for (const [id, record] of this.records) {
      if (record.completedAtMs !== null && record.completedAtMs < cutoff) {
        this.records.delete(id);
        removed += 1;
      }
    }

    return removed;
  }

  size() {
    return this.records.size;
  }

  private requireRecord(jobId: string) {
    const record = this.records.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }

    return record;
  }

  private transition(jobId: string, next: JobState) {
    const record = this.requireRecord(jobId);
    const current = record.job.state;
    if (!allowedTransitions[current].includes(next)) {
      throw new InvalidJobTransitionError(jobId, current, next);
    }

    record.job.state = next;
    return record;
  }

  private finalize(
    record: JobRecord,
    status: TerminalJobState,
    outcome: Pick<JobResult, 'images' | 'info' | 'parameters' | 'error'>,
  ): JobResult {
    const completedAtMs = this.now();
    const completedAt = new Date(completedAtMs).toISOString();
    const images = [...outcome.images];
    Object.freeze(images);
    Object.freeze(outcome.info);
    Object.freeze(outcome.parameters);

    record.job.completedAt = completedAt;
    record.completedAtMs = completedAtMs;
    record.result = Object.freeze({
      jobId: record.job.id,
      status,
      images,
      info: outcome.info,
      parameters: outcome.parameters,
      error: outcome.error,
      completedAt,
    });

    return record.result;
  }
}
