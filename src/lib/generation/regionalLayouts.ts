import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

import type { RegionalLayout } from './types';

export const regionalLayoutNames = ['vertical', 'horizontal', 'three_columns', 'four_columns', 'quadrants'] as const;

const layoutEntrySchema = z.object({
  splitMode: z.enum(['Vertical', 'Horizontal']),
  ratios: z.string().min(1),
  regions: z.number().int().min(2).max(4),
});

const layoutFileSchema = z.object({
  scriptName: z.string().min(1),
  layouts: z.object({
    vertical: layoutEntrySchema,
    horizontal: layoutEntrySchema,
    three_columns: layoutEntrySchema,
    four_columns: layoutEntrySchema,
    quadrants: layoutEntrySchema,
  }),
  argsTemplate: z.array(z.union([z.string(), z.boolean(), z.number()])),
});

export type RegionalLayoutFile = z.infer<typeof layoutFileSchema>;
export type RegionalScriptArg = string | boolean | number;

export interface RegionalLayoutDefinition {
  scriptName: string;
  regions: number;
  args: RegionalScriptArg[];
}

const defaultLayoutPath = resolve(__dirname, '..', '..', '..', 'config', 'regional-layouts.json');

export const parseRegionalLayoutFile = (raw: string, source: string): RegionalLayoutFile => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new Error(`Regional layout file ${source} is not valid JSON: ${details}`);
  }

  const parsed = layoutFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Regional layout file ${source} is invalid: ${parsed.error.message}`);
  }

  return parsed.data;
};

export const loadRegionalLayouts = (filePath: string = defaultLayoutPath): RegionalLayoutFile =>
  parseRegionalLayoutFile(readFileSync(filePath, 'utf8'), filePath);

let cachedLayouts: RegionalLayoutFile | null = null;

const getLayouts = () => {
  if (!cachedLayouts) {
    cachedLayouts = loadRegionalLayouts();
  }

  return cachedLayouts;
};

export const resolveRegionalLayout = (
  layout: RegionalLayout,
  source: RegionalLayoutFile = getLayouts(),
): RegionalLayoutDefinition => {
  const entry = source.layouts[layout];
  const args = source.argsTemplate.map((value) => {
    if (value === '{splitMode}') {
      return entry.splitMode;
    }
    if (value === '{ratios}') {
      return entry.ratios;
    }
    return value;
  });

  return { scriptName: source.scriptName, regions: entry.regions, args };
};
