import { Router } from 'express';
import type { Request, Response } from 'express';

import { JobNotFoundError, ResultNotReadyError } from '../lib/generation/errors';
import type { JobStatusView } from '../lib/generation/pipeline';
import type { QueueUpdate } from '../lib/generation/types';
import { mapJobResult, mapJobView } from '../lib/mappers/job';
import { requireAuth } from '../lib/middleware/auth';
import type { AppServices } from '../lib/services';

const HEARTBEAT_INTERVAL_MS = 30000;

const jobNotFound = (res: Response) => {
  res.status(404).json({ code: 'JOB_NOT_FOUND', message: 'Job not found.' });
};

export const createJobsRouter = (services: AppServices) => {
  const jobsRouter = Router();
  const { pipeline } = services;

  // Other callers' jobs answer exactly like unknown ones.
  const findVisibleJob = (req: Request, jobId: string): JobStatusView | null => {
    try {
      const job = pipeline.getStatus(jobId);
      if (!req.caller || (job.callerId !== req.caller.id && req.caller.role !== 'ADMIN')) {
        return null;
      }
      return job;
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        return null;
      }
      throw error;
    }
  };

  jobsRouter.get('/', requireAuth, (req, res) => {
    if (!req.caller) {
      res.status(401).json({ message: 'Authentication required.' });
      return;
    }

    const jobs = pipeline.listJobs(req.caller.id).map(mapJobView);
    res.json({ jobs, queueDepth: pipeline.queueDepth() });
  });

  jobsRouter.get<'/:id'>('/:id', requireAuth, (req, res, next) => {
    try {
      const job = findVisibleJob(req, req.params.id);
      if (!job) {
        jobNotFound(res);
        return;
      }

      res.json({ job: mapJobView(job) });
    } catch (error) {
      next(error);
    }
  });

  jobsRouter.get<'/:id/result'>('/:id/result', requireAuth, (req, res, next) => {
    try {
      const job = findVisibleJob(req, req.params.id);
      if (!job) {
        jobNotFound(res);
        return;
      }

      res.json({ result: mapJobResult(pipeline.getResult(job.id)) });
    } catch (error) {
      if (error instanceof ResultNotReadyError) {
        res.status(409).json({
          code: 'RESULT_NOT_READY',
          message: 'The job has not finished yet.',
          state: error.state,
        });
        return;
      }
      if (error instanceof JobNotFoundError) {
        jobNotFound(res);
        return;
      }
      next(error);
    }
  });

  jobsRouter.get<'/:id/events'>('/:id/events', requireAuth, (req, res, next) => {
    let job: JobStatusView | null;
    try {
      job = findVisibleJob(req, req.params.id);
    } catch (error) {
      next(error);
      return;
    }

    if (!job) {
      jobNotFound(res);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');

    res.flushHeaders?.();

    const sendEvent = (event: string, data: unknown) => {
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    sendEvent('ready', mapJobView(job));

    if (job.state === 'completed' || job.state === 'failed') {
      sendEvent(job.state, { jobId: job.id, state: job.state, message: job.message });
      res.end();
      return;
    }

    let closed = false;
    let keepAlive: NodeJS.Timeout | null = null;
    let unsubscribe: () => void = () => {};

    const close = () => {
      if (closed) {
        return;
      }
      closed = true;
      if (keepAlive) {
        clearInterval(keepAlive);
      }
      unsubscribe();
    };

    unsubscribe = pipeline.subscribe(job.id, (update: QueueUpdate) => {
      sendEvent(update.state, update);
      if (update.state === 'completed' || update.state === 'failed') {
        close();
        res.end();
      }
    });

    keepAlive = setInterval(() => {
      sendEvent('heartbeat', { timestamp: new Date().toISOString() });
    }, HEARTBEAT_INTERVAL_MS);

    req.on('close', close);
  });

  return jobsRouter;
};
