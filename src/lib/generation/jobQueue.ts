import { EventEmitter } from 'node:events';

import type { AdmissionController } from './admission';
import { describeGenerationFailure, rawFailureText } from './errors';
import type { JobStore } from './jobStore';
import type { GenerationExecutor, Job, QueueListener, QueueUpdate } from './types';

export interface EnqueueOptions {
  listener?: QueueListener;
  privileged: boolean;
}

export interface QueueDependencies {
  store: JobStore;
  executor: GenerationExecutor;
  admission: AdmissionController;
  now?: () => number;
}

interface QueueEntry {
  job: Job;
  listener?: QueueListener;
  privileged: boolean;
  /** Set once `generating` has been cleared for this job's caller. */
  unlocked: boolean;
}

/**
 * Strict FIFO with a single consumer: exactly one job is in flight against the
 * downstream service at any time.
 */
export class GenerationQueue {
  private readonly store: JobStore;

  private readonly executor: GenerationExecutor;

  private readonly admission: AdmissionController;

  private readonly now: () => number;

  private readonly pending: QueueEntry[] = [];

  private readonly deliveries = new Set<Promise<void>>();

  private readonly watchers = new EventEmitter();

  private active: QueueEntry | null = null;

  private running = false;

  private loop: Promise<void> | null = null;

  constructor(dependencies: QueueDependencies) {
    this.store = dependencies.store;
    this.executor = dependencies.executor;
    this.admission = dependencies.admission;
    this.now = dependencies.now ?? (() => Date.now());
    this.watchers.setMaxListeners(0);
  }

  /** Adds a job to the tail and returns its 1-based position in the waiting line. */
  enqueue(job: Job, options: EnqueueOptions): number {
    this.pending.push({
      job,
      listener: options.listener,
      privileged: options.privileged,
      unlocked: false,
    });
    const position = this.pending.length;

    this.broadcastPositions();
    this.startConsumer();

    return position;
  }

  positionOf(jobId: string): number | undefined {
    const index = this.pending.findIndex((entry) => entry.job.id === jobId);
    return index === -1 ? undefined : index + 1;
  }

  size() {
    return this.pending.length;
  }

  activeJobId(): string | null {
    return this.active?.job.id ?? null;
  }

  isRunning() {
    return this.running;
  }

  /** Observes every update for one job, independent of the enqueue-time listener. */
  subscribe(jobId: string, handler: (update: QueueUpdate) => void): () => void {
    this.watchers.on(jobId, handler);
    return () => {
      this.watchers.off(jobId, handler);
    };
  }

  /** Resolves once the line is drained and every pending notification has settled. */
  async onIdle(): Promise<void> {
    while (this.loop || this.deliveries.size > 0) {
      await Promise.all([this.loop, ...this.deliveries]);
    }
  }

  private startConsumer() {
    if (this.running) {
      return;
    }

    this.running = true;
    const loop = Promise.resolve()
      .then(() => this.consume())
      .finally(() => {
        if (this.loop === loop) {
          this.loop = null;
        }
      });
    this.loop = loop;
  }

  private async consume() {
    for (;;) {
      const entry = this.pending.shift();
      if (!entry) {
        this.running = false;
        return;
      }

      this.broadcastPositions();

      try {
        await this.process(entry);
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error(`[queue] Unexpected failure while processing job ${entry.job.id}.`, error);
      }
    }
  }

  private async process(entry: QueueEntry) {
    const { job } = entry;
    this.active = entry;

    try {
      this.store.markProcessing(job.id);
      this.deliver([entry], () => ({ jobId: job.id, state: 'processing' }));

      const output = await this.executor.submit(job.payload);
      this.store.complete(job.id, output);
      // eslint-disable-next-line no-console
      console.info(`[queue] Job ${job.id} completed with ${output.images.length} image(s).`);
      this.deliver([entry], () => ({ jobId: job.id, state: 'completed', message: null }));
    } catch (error) {
      const message = describeGenerationFailure(error);
      const raw = rawFailureText(error);
      // eslint-disable-next-line no-console
      console.warn(`[queue] Job ${job.id} failed: ${raw}`);
      this.store.fail(job.id, { message, error: raw });
      this.deliver([entry], () => ({ jobId: job.id, state: 'failed', message }));
    } finally {
      this.active = null;
      this.release(entry, this.now());
    }
  }

  private release(entry: QueueEntry, at: number) {
    const { callerId } = entry.job;

    if (entry.privileged) {
      if (!entry.unlocked) {
        entry.unlocked = true;
        this.admission.unlock(callerId);
      }
      return;
    }

    if (entry.unlocked) {
      // A dropped listener already cleared the lock; the cooldown still starts here.
      this.admission.recordCompletion(callerId, at);
      return;
    }

    entry.unlocked = true;
    this.admission.complete(callerId, at);
  }

  private broadcastPositions() {
    if (this.pending.length === 0) {
      return;
    }

    const waiting = [...this.pending];
    this.deliver(waiting, (entry, index) => ({ jobId: entry.job.id, state: 'queued', position: index + 1 }));
  }

  private deliver(entries: QueueEntry[], build: (entry: QueueEntry, index: number) => QueueUpdate) {
    const targets: { entry: QueueEntry; listener: QueueListener; update: QueueUpdate }[] = [];

    entries.forEach((entry, index) => {
      const update = build(entry, index);
      this.emitToWatchers(update);
      if (entry.listener) {
        targets.push({ entry, listener: entry.listener, update });
      }
    });

    if (targets.length === 0) {
      return;
    }

    const batch = Promise.allSettled(
      targets.map(({ listener, update }) => Promise.resolve().then(() => listener.notify(update))),
    ).then((results) => {
      results.forEach((result, index) => {
        const target = targets[index];
        if (result.status === 'rejected' && target) {
          this.handleDeliveryFailure(target.entry, target.listener, result.reason);
        }
      });
    });

    this.deliveries.add(batch);
    void batch.finally(() => {
      this.deliveries.delete(batch);
    });
  }

  private handleDeliveryFailure(entry: QueueEntry, listener: QueueListener, reason: unknown) {
    if (entry.listener === listener) {
      entry.listener = undefined;
    }

    // eslint-disable-next-line no-console
    console.warn(`[queue] Dropping listener for job ${entry.job.id}.`, reason);

    if (!entry.unlocked) {
      entry.unlocked = true;
      this.admission.unlock(entry.job.callerId);
    }
  }

  private emitToWatchers(update: QueueUpdate) {
    try {
      this.watchers.emit(update.jobId, update);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`[queue] Watcher for job ${update.jobId} threw.`, error);
    }
  }
}
