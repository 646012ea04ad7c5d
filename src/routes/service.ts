import { Router } from 'express';
import { z } from 'zod';

import { GenerationClientError } from '../lib/generation/errors';
import { requireAdmin, requireAuth } from '../lib/middleware/auth';
import type { AppServices } from '../lib/services';

const HOUR_MS = 60 * 60 * 1000;

const pruneJobsSchema = z.object({
  olderThanHours: z.coerce.number().min(0).max(24 * 365).optional(),
});

export const createServiceRouter = (services: AppServices, defaults: { jobRetentionHours: number }) => {
  const serviceRouter = Router();

  serviceRouter.get('/status', async (_req, res, next) => {
    try {
      res.json({ service: await services.service.getStatus() });
    } catch (error) {
      next(error);
    }
  });

  serviceRouter.get('/models', requireAuth, async (_req, res, next) => {
    try {
      res.json(await services.service.listResources());
    } catch (error) {
      if (error instanceof GenerationClientError) {
        res.status(502).json({ message: 'Failed to list models from the image service.', details: error.message });
        return;
      }
      next(error);
    }
  });

  serviceRouter.get('/queue', requireAuth, (_req, res) => {
    res.json({
      depth: services.pipeline.queueDepth(),
      activeJobId: services.pipeline.activeJobId(),
    });
  });

  serviceRouter.post('/jobs/prune', requireAuth, requireAdmin, (req, res) => {
    const parsed = pruneJobsSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ message: 'Invalid prune request.', errors: parsed.error.flatten() });
      return;
    }

    const hours = parsed.data.olderThanHours ?? defaults.jobRetentionHours;
    res.json({ removed: services.pipeline.pruneJobs(hours * HOUR_MS) });
  });

  return serviceRouter;
};
