export interface NumericBound {
  min: number;
  max: number;
  fallback: number;
}

export const generationLimits = {
  steps: { min: 1, max: 150, fallback: 20 },
  cfgScale: { min: 1, max: 30, fallback: 7 },
  dimension: { min: 64, max: 2048, fallback: 512 },
  batchCount: { min: 1, max: 10, fallback: 1 },
  batchSize: { min: 1, max: 4, fallback: 1 },
  seed: { min: -1, max: Number.MAX_SAFE_INTEGER, fallback: -1 },
  hrScale: { min: 1, max: 4, fallback: 2 },
  hrSecondPassSteps: { min: 0, max: 150, fallback: 0 },
  denoisingStrength: { min: 0, max: 1, fallback: 0.7 },
  resizeMode: { min: 0, max: 3, fallback: 0 },
  modifierWeight: { min: 0.1, max: 2, fallback: 0.8 },
  controlWeight: { min: 0, max: 2, fallback: 1 },
  controlGuidance: { min: 0, max: 1, fallback: 0 },
  controlProcessorRes: { min: 64, max: 2048, fallback: 512 },
  controlThreshold: { min: 0, max: 255, fallback: 100 },
  controlMode: { min: 0, max: 2, fallback: 0 },
} satisfies Record<string, NumericBound>;

export const DEFAULT_SAMPLER = 'DPM++ 2M Karras';

export const clampToBound = (value: number, bound: NumericBound): number => {
  if (!Number.isFinite(value)) {
    return bound.fallback;
  }

  return Math.min(bound.max, Math.max(bound.min, value));
};

export const clampInteger = (value: number, bound: NumericBound): number =>
  Math.round(clampToBound(value, bound));

/**
 * Downstream body keys that carry a bounded number. Re-applied after session
 * overrides are merged over a payload body.
 */
export const boundedBodyKeys: Record<string, { bound: NumericBound; integer: boolean }> = {
  steps: { bound: generationLimits.steps, integer: true },
  cfg_scale: { bound: generationLimits.cfgScale, integer: false },
  width: { bound: generationLimits.dimension, integer: true },
  height: { bound: generationLimits.dimension, integer: true },
  n_iter: { bound: generationLimits.batchCount, integer: true },
  batch_size: { bound: generationLimits.batchSize, integer: true },
  seed: { bound: generationLimits.seed, integer: true },
  hr_scale: { bound: generationLimits.hrScale, integer: false },
  hr_second_pass_steps: { bound: generationLimits.hrSecondPassSteps, integer: true },
  denoising_strength: { bound: generationLimits.denoisingStrength, integer: false },
};
