import { GenerationClientError } from './errors';
import type { GenerationExecutor, GenerationOutput, ResolvedPayload } from './types';

export interface ServiceStatus {
  status: 'online' | 'error' | 'offline';
  statusCode?: number;
  error?: string;
}

export interface ServiceResources {
  checkpoints: string[];
  vaes: string[];
  samplers: string[];
  upscalers: string[];
  controlModels: string[];
}

export interface StableDiffusionClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const API_PREFIX = '/sdapi/v1';

const FALLBACK_VAES = ['Automatic', 'None'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseInfo = (value: unknown): Record<string, unknown> => {
  if (isRecord(value)) {
    return value;
  }

  if (typeof value !== 'string' || value.trim().length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : { raw: value };
  } catch {
    return { raw: value };
  }
};

const pickNames = (payload: unknown, key: string): string[] => {
  if (!Array.isArray(payload)) {
    return [];
  }

  const names: string[] = [];
  for (const entry of payload) {
    if (isRecord(entry)) {
      const value = entry[key];
      if (typeof value === 'string' && value.length > 0) {
        names.push(value);
      }
    }
  }

  return names;
};

/** Thin client for the AUTOMATIC1111 `/sdapi/v1` HTTP API. */
export class StableDiffusionClient implements GenerationExecutor {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  constructor(options: StableDiffusionClientOptions) {
    const trimmed = options.baseUrl.trim();
    if (!trimmed) {
      throw new Error('Image service base URL must not be empty.');
    }

    const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
    this.baseUrl = withScheme.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private buildUrl(path: string): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    return `${this.baseUrl}${normalizedPath}`;
  }

  private async performRequest(path: string, init: RequestInit): Promise<{ statusCode: number; bodyText: string }> {
    const target = this.buildUrl(path);

    try {
      const response = await this.fetchImpl(target, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
      const bodyText = await response.text();
      return {
        statusCode: response.status,
        bodyText,
      };
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new GenerationClientError(`Failed to reach image service at ${target}.`, 'unreachable', undefined, details);
    }
  }

  private async getJson(path: string): Promise<unknown> {
    const { statusCode, bodyText } = await this.performRequest(path, {
      method: 'GET',
      headers: { accept: 'application/json' },
    });

    if (statusCode < 200 || statusCode >= 300) {
      throw new GenerationClientError(`Image service returned status ${statusCode} for ${path}.`, 'http', statusCode, bodyText);
    }

    try {
      return JSON.parse(bodyText);
    } catch {
      throw new GenerationClientError(`Image service returned invalid JSON for ${path}.`, 'malformed', statusCode, bodyText);
    }
  }

  async submit(payload: ResolvedPayload): Promise<GenerationOutput> {
    const { statusCode, bodyText } = await this.performRequest(`${API_PREFIX}/${payload.endpoint}`, {
      method: 'POST',
      headers: {
        accept: 'application/json',
        'content-type': 'application/json',
      },
      body: JSON.stringify(payload.body),
    });

    if (statusCode < 200 || statusCode >= 300) {
      throw new GenerationClientError(
        `Image service rejected the job with status ${statusCode}.`,
        'http',
        statusCode,
        bodyText,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(bodyText);
    } catch {
      throw new GenerationClientError('Image service returned invalid JSON.', 'malformed', statusCode, bodyText);
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.images)) {
      throw new GenerationClientError('Image service response has no images.', 'malformed', statusCode, bodyText);
    }

    return {
      images: parsed.images.filter((image): image is string => typeof image === 'string'),
      info: parseInfo(parsed.info),
      parameters: isRecord(parsed.parameters) ? parsed.parameters : {},
    };
  }

  async getStatus(): Promise<ServiceStatus> {
    try {
      const { statusCode } = await this.performRequest(`${API_PREFIX}/options`, { method: 'GET' });
      if (statusCode === 200) {
        return { status: 'online' };
      }
      return { status: 'error', statusCode };
    } catch (error) {
      const details = error instanceof GenerationClientError ? (error.responseBody ?? error.message) : String(error);
      return { status: 'offline', error: details };
    }
  }

  async listResources(): Promise<ServiceResources> {
    const checkpoints = pickNames(await this.getJson(`${API_PREFIX}/sd-models`), 'model_name');
    const samplers = pickNames(await this.getJson(`${API_PREFIX}/samplers`), 'name');
    const upscalers = pickNames(await this.getJson(`${API_PREFIX}/upscalers`), 'name');

    let vaes = FALLBACK_VAES;
    try {
      vaes = pickNames(await this.getJson(`${API_PREFIX}/sd-vae`), 'model_name');
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn('[sd-client] VAE listing unavailable, using defaults.', error);
    }

    let controlModels: string[] = [];
    try {
      const payload = await this.getJson('/controlnet/model_list');
      if (isRecord(payload) && Array.isArray(payload.model_list)) {
        controlModels = payload.model_list.filter((entry): entry is string => typeof entry === 'string');
      }
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn('[sd-client] Control model listing unavailable.', error);
    }

    return { checkpoints, vaes: [...vaes], samplers, upscalers, controlModels };
  }
}
