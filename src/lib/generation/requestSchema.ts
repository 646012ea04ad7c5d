import { z } from 'zod';

import { DEFAULT_SAMPLER, generationLimits, type NumericBound } from './limits';
import { regionalLayoutNames } from './regionalLayouts';
import type { ControlUnitSettings, GenerationRequest, JobKind } from './types';

const boundedNumber = (bound: NumericBound, fallback: number = bound.fallback) =>
  z.coerce.number().min(bound.min).max(bound.max).default(fallback);

const boundedInteger = (bound: NumericBound, fallback: number = bound.fallback) =>
  z.coerce.number().int().min(bound.min).max(bound.max).default(fallback);

const optionalName = z
  .string()
  .trim()
  .max(256)
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const coerceBoolean = (value: unknown) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false;
    }
  }

  return value;
};

/**
 * Multipart forms carry nested blocks as JSON strings; JSON bodies carry them
 * as objects. Unparseable strings are left for the schema to reject.
 */
export const parseJsonField = (value: unknown): unknown => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  try {
    return JSON.parse(trimmed);
  } catch {
    return value;
  }
};

export const controlUnitSchema = z
  .object({
    enabled: z.preprocess(coerceBoolean, z.boolean()).default(true),
    model: z.string().trim().min(1).max(256),
    module: optionalName,
    weight: boundedNumber(generationLimits.controlWeight),
    guidanceStart: boundedNumber(generationLimits.controlGuidance, 0),
    guidanceEnd: boundedNumber(generationLimits.controlGuidance, 1),
    processorRes: boundedInteger(generationLimits.controlProcessorRes),
    thresholdA: boundedNumber(generationLimits.controlThreshold, 100),
    thresholdB: boundedNumber(generationLimits.controlThreshold, 200),
    controlMode: boundedInteger(generationLimits.controlMode),
    pixelPerfect: z.preprocess(coerceBoolean, z.boolean()).default(false),
  })
  .refine((unit) => unit.guidanceStart <= unit.guidanceEnd, {
    message: 'guidanceStart must not exceed guidanceEnd.',
    path: ['guidanceStart'],
  });

const highResFixSchema = z.object({
  scale: boundedNumber(generationLimits.hrScale),
  upscaler: optionalName,
  secondPassSteps: boundedInteger(generationLimits.hrSecondPassSteps),
  denoisingStrength: boundedNumber(generationLimits.denoisingStrength),
});

const regionText = z.string().trim().max(2000);

const regionalSchema = z.object({
  layout: z.enum(regionalLayoutNames),
  common: regionText.default(''),
  region1: regionText.min(1),
  region2: regionText.min(1),
  region3: regionText.optional(),
  region4: regionText.optional(),
});

export const generationRequestSchema = z.object({
  prompt: z.string().trim().max(4000).default(''),
  negativePrompt: z.string().trim().max(4000).default(''),
  samplerName: z.string().trim().min(1).max(120).default(DEFAULT_SAMPLER),
  steps: boundedInteger(generationLimits.steps),
  cfgScale: boundedNumber(generationLimits.cfgScale),
  width: boundedInteger(generationLimits.dimension),
  height: boundedInteger(generationLimits.dimension),
  batchCount: boundedInteger(generationLimits.batchCount),
  batchSize: boundedInteger(generationLimits.batchSize),
  seed: boundedInteger(generationLimits.seed),
  highResFix: z.preprocess(parseJsonField, highResFixSchema.optional()),
  checkpoint: optionalName,
  vae: optionalName,
  regional: z.preprocess(parseJsonField, regionalSchema.optional()),
  controlUnits: z.preprocess(parseJsonField, z.array(controlUnitSchema).max(4).optional()),
  denoisingStrength: boundedNumber(generationLimits.denoisingStrength),
  resizeMode: boundedInteger(generationLimits.resizeMode),
  presetId: z.string().trim().min(1).max(64).optional(),
});

export type GenerationRequestInput = z.infer<typeof generationRequestSchema>;

/** Preset configs hold any subset of the request fields. */
export const presetConfigSchema = generationRequestSchema.omit({ presetId: true }).partial();

export const generationRequestSchemaFor = (kind: JobKind) =>
  generationRequestSchema.superRefine((value, ctx) => {
    if (kind !== 'regional' && value.prompt.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['prompt'], message: 'Prompt is required.' });
    }
    if (kind === 'regional' && !value.regional) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['regional'], message: 'Regional layout is required.' });
    }
  });

const toControlUnit = (unit: z.infer<typeof controlUnitSchema>): ControlUnitSettings => ({
  enabled: unit.enabled,
  model: unit.model,
  module: unit.module,
  weight: unit.weight,
  guidanceStart: unit.guidanceStart,
  guidanceEnd: unit.guidanceEnd,
  processorRes: unit.processorRes,
  thresholdA: unit.thresholdA,
  thresholdB: unit.thresholdB,
  controlMode: unit.controlMode,
  pixelPerfect: unit.pixelPerfect,
});

export const toGenerationRequest = (
  callerId: string,
  input: GenerationRequestInput,
  sourceImage?: string,
): GenerationRequest => ({
  callerId,
  prompt: input.prompt,
  negativePrompt: input.negativePrompt,
  samplerName: input.samplerName,
  steps: input.steps,
  cfgScale: input.cfgScale,
  width: input.width,
  height: input.height,
  batchCount: input.batchCount,
  batchSize: input.batchSize,
  seed: input.seed,
  highResFix: input.highResFix,
  checkpoint: input.checkpoint,
  vae: input.vae,
  regional: input.regional,
  controlUnits: input.controlUnits?.map(toControlUnit),
  sourceImage,
  denoisingStrength: input.denoisingStrength,
  resizeMode: input.resizeMode,
});
