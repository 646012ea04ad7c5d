import { readFile } from 'node:fs/promises';

import { z } from 'zod';

const catalogEntrySchema = z.object({
  filename: z.string().trim().min(1),
  name: z.string().trim().min(1),
  tags: z.array(z.string()).default([]),
  triggerWords: z.array(z.string()).default([]),
  description: z.string().nullable().optional(),
  defaultWeight: z.number().min(0.1).max(2).optional(),
});

const catalogFileSchema = z.object({
  modifiers: z.array(catalogEntrySchema).default([]),
});

export type ModifierCatalogEntry = z.infer<typeof catalogEntrySchema>;

export const DEFAULT_SEARCH_LIMIT = 25;

const scoreEntry = (entry: ModifierCatalogEntry, query: string) => {
  let score = 0;

  if (entry.name.toLowerCase().includes(query)) {
    score += 10;
  }

  for (const tag of entry.tags) {
    if (tag.toLowerCase().includes(query)) {
      score += 5;
    }
  }

  for (const trigger of entry.triggerWords) {
    if (trigger.toLowerCase().includes(query)) {
      score += 3;
    }
  }

  if (entry.filename.toLowerCase().includes(query)) {
    score += 2;
  }

  return score;
};

export class ModifierCatalog {
  constructor(private readonly entries: readonly ModifierCatalogEntry[]) {}

  static fromJson(raw: string, source = 'modifier catalog'): ModifierCatalog {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new Error(`${source} is not valid JSON: ${details}`);
    }

    const parsed = catalogFileSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`${source} is invalid: ${parsed.error.message}`);
    }

    return new ModifierCatalog(parsed.data.modifiers);
  }

  static async load(filePath: string): Promise<ModifierCatalog> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // eslint-disable-next-line no-console
        console.warn(`[modifiers] ${filePath} not found; catalog is empty.`);
        return new ModifierCatalog([]);
      }
      throw error;
    }

    return ModifierCatalog.fromJson(raw, filePath);
  }

  size() {
    return this.entries.length;
  }

  /** Ranked by relevance; ties keep catalog order. An empty query lists the catalog. */
  search(query: string, limit = DEFAULT_SEARCH_LIMIT): ModifierCatalogEntry[] {
    const normalized = query.trim().toLowerCase();
    if (!normalized) {
      return this.entries.slice(0, limit);
    }

    return this.entries
      .map((entry, index) => ({ entry, index, score: scoreEntry(entry, normalized) }))
      .filter((match) => match.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, limit)
      .map((match) => match.entry);
  }

  getByFilename(filename: string): ModifierCatalogEntry | null {
    return this.entries.find((entry) => entry.filename === filename) ?? null;
  }

  /** Exact filename first, then a case-insensitive display-name match. */
  resolve(nameOrFilename: string): ModifierCatalogEntry | null {
    const trimmed = nameOrFilename.trim();
    const byFilename = this.getByFilename(trimmed);
    if (byFilename) {
      return byFilename;
    }

    const lowered = trimmed.toLowerCase();
    return this.entries.find((entry) => entry.name.toLowerCase() === lowered) ?? null;
  }
}
