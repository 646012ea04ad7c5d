import { Router } from 'express';
import { z } from 'zod';

import { DEFAULT_SEARCH_LIMIT } from '../lib/sessions/modifierCatalog';
import type { AppServices } from '../lib/services';

const searchQuerySchema = z.object({
  search: z.string().trim().max(120).default(''),
  limit: z.coerce.number().int().min(1).max(100).default(DEFAULT_SEARCH_LIMIT),
});

export const createModifiersRouter = (services: AppServices) => {
  const modifiersRouter = Router();

  modifiersRouter.get('/', (req, res) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: 'Invalid search parameters.', errors: parsed.error.flatten() });
      return;
    }

    const modifiers = services.catalog.search(parsed.data.search, parsed.data.limit);
    res.json({ modifiers, total: modifiers.length });
  });

  return modifiersRouter;
};
