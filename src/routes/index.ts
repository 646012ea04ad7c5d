import { Router } from 'express';

import type { AppConfig } from '../config';
import type { AppServices } from '../lib/services';
import { createGenerationRouter } from './generation';
import { createJobsRouter } from './jobs';
import { createModifiersRouter } from './modifiers';
import { createPresetsRouter } from './presets';
import { createServiceRouter } from './service';
import { createSessionsRouter } from './sessions';

export const createRouter = (services: AppServices, config: AppConfig) => {
  const router = Router();

  router.use('/generate', createGenerationRouter(services));
  router.use('/jobs', createJobsRouter(services));
  router.use('/sessions', createSessionsRouter(services, { staleAfterDays: config.sessions.staleAfterDays }));
  router.use('/presets', createPresetsRouter(services));
  router.use('/modifiers', createModifiersRouter(services));
  router.use('/service', createServiceRouter(services, { jobRetentionHours: config.generation.jobRetentionHours }));

  return router;
};
