import type { AdmissionController, AdmissionDecision } from './admission';
import type { GenerationQueue } from './jobQueue';
import type { JobStore } from './jobStore';
import { buildPayload } from './payloadBuilder';
import type { RegionalLayoutFile } from './regionalLayouts';
import type { GenerationRequest, Job, JobKind, JobResult, QueueListener, QueueUpdate, UserSession } from './types';

export type AdmissionRejection = Extract<AdmissionDecision, { accepted: false }>;

export interface SessionSnapshotSource {
  getSnapshot(callerId: string): UserSession;
}

export interface SubmitOptions {
  privileged: boolean;
  listener?: QueueListener;
}

export type SubmitOutcome =
  | { accepted: true; job: Job; position: number }
  | { accepted: false; rejection: AdmissionRejection };

export interface JobStatusView extends Job {
  /** 1-based place in the waiting line; null once the job has left it. */
  position: number | null;
}

export interface PipelineDependencies {
  admission: AdmissionController;
  store: JobStore;
  queue: GenerationQueue;
  sessions: SessionSnapshotSource;
  regionalLayouts?: RegionalLayoutFile;
}

export class GenerationPipeline {
  private readonly admission: AdmissionController;

  private readonly store: JobStore;

  private readonly queue: GenerationQueue;

  private readonly sessions: SessionSnapshotSource;

  private readonly regionalLayouts?: RegionalLayoutFile;

  constructor(dependencies: PipelineDependencies) {
    this.admission = dependencies.admission;
    this.store = dependencies.store;
    this.queue = dependencies.queue;
    this.sessions = dependencies.sessions;
    this.regionalLayouts = dependencies.regionalLayouts;
  }

  /**
   * Admission, session snapshot, payload build, store record and enqueue all
   * run in this one synchronous call.
   */
  submit(kind: JobKind, request: GenerationRequest, options: SubmitOptions): SubmitOutcome {
    const decision = this.admission.tryAdmit(request.callerId, options.privileged);
    if (!decision.accepted) {
      return { accepted: false, rejection: decision };
    }

    try {
      const session = this.sessions.getSnapshot(request.callerId);
      const payload = buildPayload(kind, request, session, { regionalLayouts: this.regionalLayouts });
      const job = this.store.create({ callerId: request.callerId, kind, payload });
      const position = this.queue.enqueue(job, { privileged: options.privileged, listener: options.listener });
      return { accepted: true, job, position };
    } catch (error) {
      this.admission.unlock(request.callerId);
      throw error;
    }
  }

  getStatus(jobId: string): JobStatusView {
    const job = this.store.getStatus(jobId);
    return { ...job, position: this.queue.positionOf(jobId) ?? null };
  }

  getResult(jobId: string): JobResult {
    return this.store.getResult(jobId);
  }

  listJobs(callerId: string): JobStatusView[] {
    return this.store
      .list({ callerId })
      .map((job) => ({ ...job, position: this.queue.positionOf(job.id) ?? null }));
  }

  subscribe(jobId: string, handler: (update: QueueUpdate) => void): () => void {
    return this.queue.subscribe(jobId, handler);
  }

  queueDepth() {
    return this.queue.size();
  }

  activeJobId() {
    return this.queue.activeJobId();
  }

  pruneJobs(olderThanMs: number) {
    return this.store.prune(olderThanMs);
  }

  onIdle() {
    return this.queue.onIdle();
  }
}
