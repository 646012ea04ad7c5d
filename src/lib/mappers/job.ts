import type { AdmissionRejection, JobStatusView } from '../generation/pipeline';
import type { JobResult } from '../generation/types';

export const mapJobView = (job: JobStatusView) => ({
  id: job.id,
  callerId: job.callerId,
  kind: job.kind,
  endpoint: job.payload.endpoint,
  state: job.state,
  position: job.position,
  createdAt: job.createdAt,
  startedAt: job.startedAt,
  completedAt: job.completedAt,
  message: job.message,
});

export type JobView = ReturnType<typeof mapJobView>;

export const mapJobResult = (result: JobResult) => ({
  jobId: result.jobId,
  status: result.status,
  images: result.images,
  info: result.info,
  parameters: result.parameters,
  error: result.error,
  completedAt: result.completedAt,
});

export const mapAdmissionRejection = (rejection: AdmissionRejection) => {
  if (rejection.reason === 'already_generating') {
    return {
      code: 'ALREADY_GENERATING',
      message: 'You already have an image generating. Please wait for it to finish.',
    };
  }

  return {
    code: 'COOLDOWN_ACTIVE',
    message: `Please wait ${rejection.remainingSeconds} more second(s) before generating another image.`,
    remainingSeconds: rejection.remainingSeconds,
    retryAt: new Date(rejection.retryAt).toISOString(),
  };
};

export const queuedMessage = (position: number) =>
  position <= 1 ? 'Your job is next in line.' : `Your job is number ${position} in the queue.`;
