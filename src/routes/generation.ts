import { Router } from 'express';
import type { RequestHandler } from 'express';
import multer from 'multer';

import { ValidationError } from '../lib/generation/errors';
import { generationRequestSchemaFor, toGenerationRequest } from '../lib/generation/requestSchema';
import type { JobKind } from '../lib/generation/types';
import { mapAdmissionRejection, queuedMessage } from '../lib/mappers/job';
import { requireAuth } from '../lib/middleware/auth';
import type { AppServices } from '../lib/services';

export const MAX_SOURCE_IMAGE_BYTES = 20 * 1024 * 1024;

const kindByMode: Record<string, JobKind> = {
  txt2img: 'direct',
  img2img: 'image',
  controlnet: 'structure',
  regional: 'regional',
};

const needsSourceImage = (kind: JobKind) => kind === 'image' || kind === 'structure';

const readRawBody = (body: unknown): Record<string, unknown> =>
  body && typeof body === 'object' && !Array.isArray(body) ? { ...body } : {};

const decodeInlineImage = (value: unknown): Buffer | null => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }

  const base64 = value.replace(/^data:[^;]+;base64,/, '').trim();
  return Buffer.from(base64, 'base64');
};

export const createGenerationRouter = (services: AppServices) => {
  const generationRouter = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_SOURCE_IMAGE_BYTES, files: 1 },
  });

  const submitHandler: RequestHandler = async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const kind = kindByMode[req.params.mode ?? ''];
      if (!kind) {
        res.status(404).json({ message: `Unknown generation mode "${req.params.mode}".` });
        return;
      }

      let raw = readRawBody(req.body);
      if (typeof raw.presetId === 'string' && raw.presetId.trim().length > 0) {
        const preset = await services.sessions.getPreset(req.caller.id, raw.presetId.trim());
        if (!preset) {
          res.status(404).json({ code: 'PRESET_NOT_FOUND', message: 'Preset not found.' });
          return;
        }
        raw = { ...preset.config, ...raw };
      }

      const parsed = generationRequestSchemaFor(kind).safeParse(raw);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid generation request.', errors: parsed.error.flatten() });
        return;
      }

      let sourceImage: string | undefined;
      if (needsSourceImage(kind)) {
        const bytes = req.file?.buffer ?? decodeInlineImage(raw.image);
        if (!bytes) {
          res.status(400).json({ message: 'An image upload is required for this mode.' });
          return;
        }
        sourceImage = (await services.normalizer.normalize(bytes)).base64;
      }

      const outcome = services.pipeline.submit(kind, toGenerationRequest(req.caller.id, parsed.data, sourceImage), {
        privileged: req.caller.privileged,
      });

      if (!outcome.accepted) {
        res.status(429).json(mapAdmissionRejection(outcome.rejection));
        return;
      }

      res.status(202).json({
        jobId: outcome.job.id,
        status: 'queued',
        position: outcome.position,
        message: queuedMessage(outcome.position),
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ message: error.message, errors: { fieldErrors: error.issues } });
        return;
      }
      next(error);
    }
  };

  generationRouter.post('/:mode', requireAuth, upload.single('image'), submitHandler);

  return generationRouter;
};
