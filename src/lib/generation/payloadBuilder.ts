import { ValidationError } from './errors';
import { boundedBodyKeys, clampInteger, clampToBound, generationLimits } from './limits';
import { resolveRegionalLayout, type RegionalLayoutFile } from './regionalLayouts';
import type {
  ControlUnitSettings,
  GenerationRequest,
  JobKind,
  RegionalSpec,
  ResolvedPayload,
  StyleModifier,
  UserSession,
} from './types';

export const MODIFIER_KEYWORD = 'lora';

const modifierExtensionPattern = /\.(safetensors|ckpt|pt)$/i;

const reservedBodyKeys = new Set([
  'prompt',
  'negative_prompt',
  'init_images',
  'alwayson_scripts',
  'override_settings',
  'override_settings_restore_afterwards',
]);

export interface BuildPayloadOptions {
  /** Overrides the layout table read from config/regional-layouts.json. */
  regionalLayouts?: RegionalLayoutFile;
}

const formatWeight = (weight: number) => String(clampToBound(weight, generationLimits.modifierWeight));

export const buildModifierToken = (modifier: StyleModifier) => {
  const name = modifier.name.trim().replace(modifierExtensionPattern, '');
  return `<${MODIFIER_KEYWORD}:${name}:${formatWeight(modifier.weight)}>`;
};

export const buildModifierTokens = (modifiers: readonly StyleModifier[]) =>
  modifiers
    .filter((modifier) => modifier.name.trim().length > 0)
    .map(buildModifierToken)
    .join(' ');

export const foldModifiers = (prompt: string, modifiers: readonly StyleModifier[]) => {
  const tokens = buildModifierTokens(modifiers);
  if (!tokens) {
    return prompt.trim();
  }

  return `${prompt} ${tokens}`.trim();
};

// Empty strings fall back the same way missing regions do.
const orFallback = (value: string | undefined, fallback: string) => (value ? value : fallback);

export const composeRegionalPrompt = (regional: RegionalSpec) => {
  const parts = [regional.common, 'ADDCOMM', regional.region1];
  const region3 = orFallback(regional.region3, regional.region1);
  const region4 = orFallback(regional.region4, regional.region2);

  switch (regional.layout) {
    case 'vertical':
      parts.push('ADDCOL', regional.region2);
      break;
    case 'horizontal':
      parts.push('ADDROW', regional.region2);
      break;
    case 'three_columns':
      parts.push('ADDCOL', regional.region2, 'ADDCOL', region3);
      break;
    case 'four_columns':
      parts.push('ADDCOL', regional.region2, 'ADDCOL', region3, 'ADDCOL', region4);
      break;
    case 'quadrants':
      parts.push('ADDCOL', regional.region2, 'ADDROW', region3, 'ADDCOL', region4);
      break;
    default:
      throw new ValidationError(`Unsupported regional layout.`);
  }

  return parts.join(' ').trim();
};

const serializeControlUnit = (unit: ControlUnitSettings, index: number, controlImage: string) => {
  const serialized: Record<string, unknown> = {
    enabled: unit.enabled,
    model: unit.model,
    weight: clampToBound(unit.weight, generationLimits.controlWeight),
    guidance_start: clampToBound(unit.guidanceStart, generationLimits.controlGuidance),
    guidance_end: clampToBound(unit.guidanceEnd, generationLimits.controlGuidance),
    processor_res: clampInteger(unit.processorRes, generationLimits.controlProcessorRes),
    threshold_a: clampToBound(unit.thresholdA, generationLimits.controlThreshold),
    threshold_b: clampToBound(unit.thresholdB, generationLimits.controlThreshold),
    control_mode: clampInteger(unit.controlMode, generationLimits.controlMode),
    pixel_perfect: unit.pixelPerfect,
  };

  if (unit.module) {
    serialized.module = unit.module;
  }

  if (index === 0) {
    serialized.input_image = controlImage;
  }

  return serialized;
};

const buildBaseBody = (request: GenerationRequest, prompt: string): Record<string, unknown> => {
  const body: Record<string, unknown> = {
    prompt,
    negative_prompt: request.negativePrompt,
    sampler_name: request.samplerName,
    steps: clampInteger(request.steps, generationLimits.steps),
    cfg_scale: clampToBound(request.cfgScale, generationLimits.cfgScale),
    width: clampInteger(request.width, generationLimits.dimension),
    height: clampInteger(request.height, generationLimits.dimension),
    n_iter: clampInteger(request.batchCount, generationLimits.batchCount),
    batch_size: clampInteger(request.batchSize, generationLimits.batchSize),
    seed: clampInteger(request.seed, generationLimits.seed),
  };

  const highRes = request.highResFix;
  if (highRes) {
    body.enable_hr = true;
    body.hr_scale = clampToBound(highRes.scale, generationLimits.hrScale);
    body.hr_second_pass_steps = clampInteger(highRes.secondPassSteps, generationLimits.hrSecondPassSteps);
    body.denoising_strength = clampToBound(highRes.denoisingStrength, generationLimits.denoisingStrength);
    if (highRes.upscaler) {
      body.hr_upscaler = highRes.upscaler;
    }
  }

  const overrides: Record<string, string> = {};
  if (request.checkpoint) {
    overrides.sd_model_checkpoint = request.checkpoint;
  }
  if (request.vae) {
    overrides.sd_vae = request.vae;
  }
  if (Object.keys(overrides).length > 0) {
    body.override_settings = overrides;
    body.override_settings_restore_afterwards = true;
  }

  return body;
};

const mergeCustomSettings = (body: Record<string, unknown>, customSettings: Record<string, unknown>) => {
  for (const [key, value] of Object.entries(customSettings)) {
    if (reservedBodyKeys.has(key)) {
      continue;
    }

    const bounded = boundedBodyKeys[key];
    if (bounded) {
      if (typeof value !== 'number') {
        continue;
      }
      body[key] = bounded.integer ? clampInteger(value, bounded.bound) : clampToBound(value, bounded.bound);
      continue;
    }

    body[key] = value;
  }
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }

  return value;
};

const requireSourceImage = (request: GenerationRequest, kind: JobKind) => {
  if (!request.sourceImage) {
    throw new ValidationError(`A source image is required for ${kind} jobs.`, { image: ['Required'] });
  }

  return request.sourceImage;
};

/**
 * Turns a validated request and a session snapshot into the frozen body sent
 * downstream. Same inputs always produce a structurally equal payload.
 */
export const buildPayload = (
  kind: JobKind,
  request: GenerationRequest,
  session: UserSession,
  options: BuildPayloadOptions = {},
): ResolvedPayload => {
  let basePrompt = request.prompt;
  if (kind === 'regional') {
    if (!request.regional) {
      throw new ValidationError('Regional jobs need a regional layout.', { regional: ['Required'] });
    }
    basePrompt = composeRegionalPrompt(request.regional);
  }

  const body = buildBaseBody(request, foldModifiers(basePrompt, session.modifiers));
  const scripts: Record<string, unknown> = {};
  let endpoint: ResolvedPayload['endpoint'] = 'txt2img';

  if (kind === 'image') {
    const image = requireSourceImage(request, kind);
    endpoint = 'img2img';
    body.init_images = [image];
    body.denoising_strength = clampToBound(request.denoisingStrength, generationLimits.denoisingStrength);
    body.resize_mode = clampInteger(request.resizeMode, generationLimits.resizeMode);
  }

  if (kind === 'structure') {
    const image = requireSourceImage(request, kind);
    const units =
      request.controlUnits && request.controlUnits.length > 0 ? request.controlUnits : session.controlPresets;
    if (units.length === 0) {
      throw new ValidationError('Structure-conditioned jobs need at least one control unit.', {
        controlUnits: ['Required'],
      });
    }
    scripts.ControlNet = { args: units.map((unit, index) => serializeControlUnit(unit, index, image)) };
  }

  if (kind === 'regional' && request.regional) {
    const layout = resolveRegionalLayout(request.regional.layout, options.regionalLayouts);
    scripts[layout.scriptName] = { args: layout.args };
  }

  mergeCustomSettings(body, session.customSettings);

  if (Object.keys(scripts).length > 0) {
    body.alwayson_scripts = scripts;
  }

  return deepFreeze({ endpoint, body: structuredClone(body) });
};
