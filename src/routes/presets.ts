import { Router } from 'express';
import { z } from 'zod';

import { presetConfigSchema } from '../lib/generation/requestSchema';
import { requireAuth } from '../lib/middleware/auth';
import type { AppServices } from '../lib/services';

const savePresetSchema = z.object({
  name: z.string().trim().min(1).max(120),
  description: z.string().trim().max(500).optional(),
  config: presetConfigSchema,
});

export const createPresetsRouter = (services: AppServices) => {
  const presetsRouter = Router();
  const { sessions } = services;

  presetsRouter.get('/', requireAuth, (req, res) => {
    if (!req.caller) {
      res.status(401).json({ message: 'Authentication required.' });
      return;
    }

    const presets = sessions.listPresets(req.caller.id);
    res.json({ presets, total: presets.length });
  });

  presetsRouter.post('/', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const parsed = savePresetSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid preset payload.', errors: parsed.error.flatten() });
        return;
      }

      // Only the fields the caller actually sent are stored.
      const config = Object.fromEntries(
        Object.entries(parsed.data.config).filter(([, value]) => value !== undefined),
      );

      const preset = await sessions.savePreset(req.caller.id, {
        name: parsed.data.name,
        description: parsed.data.description ?? null,
        config,
      });
      res.status(201).json({ preset });
    } catch (error) {
      next(error);
    }
  });

  presetsRouter.get<'/:id'>('/:id', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const preset = await sessions.getPreset(req.caller.id, req.params.id);
      if (!preset) {
        res.status(404).json({ code: 'PRESET_NOT_FOUND', message: 'Preset not found.' });
        return;
      }

      res.json({ preset });
    } catch (error) {
      next(error);
    }
  });

  presetsRouter.delete<'/:id'>('/:id', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const deleted = await sessions.deletePreset(req.caller.id, req.params.id);
      if (!deleted) {
        res.status(404).json({ code: 'PRESET_NOT_FOUND', message: 'Preset not found.' });
        return;
      }

      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return presetsRouter;
};
