import { Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../lib/generation/errors';
import { generationLimits } from '../lib/generation/limits';
import { controlUnitSchema } from '../lib/generation/requestSchema';
import { requireAdmin, requireAuth } from '../lib/middleware/auth';
import type { AppServices } from '../lib/services';

const addModifierSchema = z.object({
  name: z.string().trim().min(1).max(512),
  weight: z.coerce
    .number()
    .min(generationLimits.modifierWeight.min)
    .max(generationLimits.modifierWeight.max)
    .optional(),
});

const customSettingsSchema = z.object({
  settings: z.record(z.unknown()),
});

const pruneSchema = z.object({
  maxAgeDays: z.coerce.number().int().min(1).max(3650).optional(),
});

export const createSessionsRouter = (services: AppServices, defaults: { staleAfterDays: number }) => {
  const sessionsRouter = Router();
  const { sessions, catalog } = services;

  sessionsRouter.get('/me', requireAuth, (req, res) => {
    if (!req.caller) {
      res.status(401).json({ message: 'Authentication required.' });
      return;
    }

    res.json({
      session: sessions.getSnapshot(req.caller.id),
      stats: sessions.getStats(req.caller.id),
    });
  });

  sessionsRouter.post('/me/modifiers', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const parsed = addModifierSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid modifier payload.', errors: parsed.error.flatten() });
        return;
      }

      const entry = catalog.resolve(parsed.data.name);
      const name = entry?.filename ?? parsed.data.name;
      const weight = parsed.data.weight ?? entry?.defaultWeight ?? generationLimits.modifierWeight.fallback;

      const session = await sessions.addModifier(req.caller.id, name, weight);
      res.json({ session, modifier: { name, weight, catalogName: entry?.name ?? null } });
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ message: error.message, errors: { fieldErrors: error.issues } });
        return;
      }
      next(error);
    }
  });

  sessionsRouter.delete<'/me/modifiers/:name'>('/me/modifiers/:name', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const removed = await sessions.removeModifier(req.caller.id, req.params.name);
      if (!removed) {
        res.status(404).json({ message: 'Modifier is not active in this session.' });
        return;
      }

      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.delete('/me/modifiers', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      res.json({ session: await sessions.clearModifiers(req.caller.id) });
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.patch('/me/settings', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const parsed = customSettingsSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid settings payload.', errors: parsed.error.flatten() });
        return;
      }

      res.json({ session: await sessions.updateCustomSettings(req.caller.id, parsed.data.settings) });
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.post('/me/control-presets', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      const parsed = controlUnitSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid control unit.', errors: parsed.error.flatten() });
        return;
      }

      res.status(201).json({ session: await sessions.addControlPreset(req.caller.id, parsed.data) });
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.delete('/me/control-presets', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      res.json({ session: await sessions.clearControlPresets(req.caller.id) });
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.get('/me/export', requireAuth, (req, res) => {
    if (!req.caller) {
      res.status(401).json({ message: 'Authentication required.' });
      return;
    }

    res.json(sessions.exportCaller(req.caller.id));
  });

  sessionsRouter.post('/me/import', requireAuth, async (req, res, next) => {
    try {
      if (!req.caller) {
        res.status(401).json({ message: 'Authentication required.' });
        return;
      }

      res.json(await sessions.importCaller(req.caller.id, req.body));
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ message: error.message, errors: { fieldErrors: error.issues } });
        return;
      }
      next(error);
    }
  });

  sessionsRouter.post('/prune', requireAuth, requireAdmin, async (req, res, next) => {
    try {
      const parsed = pruneSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid prune request.', errors: parsed.error.flatten() });
        return;
      }

      const removed = await sessions.pruneStale(parsed.data.maxAgeDays ?? defaults.staleAfterDays);
      res.json({ removed });
    } catch (error) {
      next(error);
    }
  });

  return sessionsRouter;
};
