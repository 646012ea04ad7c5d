import type { AppConfig } from '../config';
import { AdmissionController } from './generation/admission';
import { GenerationQueue } from './generation/jobQueue';
import { JobStore } from './generation/jobStore';
import { GenerationPipeline } from './generation/pipeline';
import { StableDiffusionClient } from './generation/sdClient';
import type { GenerationExecutor } from './generation/types';
import { ImageNormalizer } from './imageNormalizer';
import { ModifierCatalog } from './sessions/modifierCatalog';
import { SessionStore } from './sessions/sessionStore';

export interface ServiceProbe {
  getStatus(): ReturnType<StableDiffusionClient['getStatus']>;
  listResources(): ReturnType<StableDiffusionClient['listResources']>;
}

export interface AppServices {
  pipeline: GenerationPipeline;
  sessions: SessionStore;
  catalog: ModifierCatalog;
  normalizer: ImageNormalizer;
  service: ServiceProbe;
}

export interface ServiceOverrides {
  executor?: GenerationExecutor & ServiceProbe;
  catalog?: ModifierCatalog;
  now?: () => number;
}

export const createServices = async (config: AppConfig, overrides: ServiceOverrides = {}): Promise<AppServices> => {
  const now = overrides.now ?? (() => Date.now());
  const client =
    overrides.executor ??
    new StableDiffusionClient({
      baseUrl: config.generation.serviceUrl,
      timeoutMs: config.generation.requestTimeoutMs,
    });

  const sessions = new SessionStore({
    sessionsFile: config.storage.sessionsFile,
    presetsFile: config.storage.presetsFile,
    now,
  });
  await sessions.load();

  const catalog = overrides.catalog ?? (await ModifierCatalog.load(config.storage.modifiersFile));

  const admission = new AdmissionController({ cooldownSeconds: config.generation.cooldownSeconds, now });
  const store = new JobStore({ now });
  const queue = new GenerationQueue({ store, executor: client, admission, now });
  const pipeline = new GenerationPipeline({ admission, store, queue, sessions });

  return {
    pipeline,
    sessions,
    catalog,
    normalizer: new ImageNormalizer(config.generation.maxSourcePixels),
    service: client,
  };
};
