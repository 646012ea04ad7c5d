import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import morgan from 'morgan';

import { appConfig, type AppConfig } from './config';
import type { AppServices } from './lib/services';
import { createRouter } from './routes';
import { MAX_SOURCE_IMAGE_BYTES } from './routes/generation';

export const createApp = (services: AppServices, config: AppConfig = appConfig) => {
  const app = express();

  app.disable('etag');

  app.use(cors());
  app.use(express.json({ limit: '25mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(morgan(config.env === 'production' ? 'combined' : 'dev'));

  app.get('/health', async (_req, res, next) => {
    try {
      const service = await services.service.getStatus();
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        environment: config.env,
        service,
        queueDepth: services.pipeline.queueDepth(),
      });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', (_req, res, next) => {
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate');
    res.setHeader('Pragma', 'no-cache');
    res.setHeader('Expires', '0');
    next();
  });

  app.use('/api', createRouter(services, config));

  app.use((req, res) => {
    res.status(404).json({ message: `Route ${req.method} ${req.originalUrl} not found` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      if (err.code === 'LIMIT_FILE_COUNT' || err.code === 'LIMIT_UNEXPECTED_FILE') {
        res.status(400).json({ message: 'Upload a single file in the "image" field.' });
        return;
      }

      if (err.code === 'LIMIT_FILE_SIZE') {
        const maxSizeMb = (MAX_SOURCE_IMAGE_BYTES / (1024 * 1024)).toFixed(0);
        res.status(400).json({ message: `The image exceeds the allowed size limit of ${maxSizeMb} MB.` });
        return;
      }

      res.status(400).json({ message: err.message });
      return;
    }

    // eslint-disable-next-line no-console
    console.error(err);
    res.status(500).json({ message: 'Unexpected server error' });
  });

  return app;
};
