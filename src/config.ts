import path from 'node:path';

import { config } from 'dotenv';

const dotenvPath = process.env.DOTENV_CONFIG_PATH;

if (dotenvPath && dotenvPath.length > 0) {
  config({ path: dotenvPath });
} else {
  config();
}

export const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
};

export const toList = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }

  return Array.from(
    new Set(
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    ),
  );
};

const requireString = (value: string | undefined, key: string, fallback?: string): string => {
  if (value && value.trim().length > 0) {
    return value.trim();
  }

  if (fallback && fallback.length > 0) {
    return fallback;
  }

  throw new Error(`Missing required configuration value for ${key}`);
};

const toExpiresIn = (value: string | undefined, fallback: string | number): string | number => {
  if (!value) {
    return fallback;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return fallback;
  }

  const numeric = Number.parseInt(trimmed, 10);
  if (!Number.isNaN(numeric) && String(numeric) === trimmed && numeric >= 0) {
    return numeric;
  }

  return trimmed;
};

export const sanitizeUrl = (value: string, fallbackProtocol: 'http' | 'https' = 'http') => {
  const trimmed = value.trim().replace(/\/+$/, '');
  if (!trimmed) {
    return '';
  }

  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  return `${fallbackProtocol}://${trimmed}`;
};

const resolveDataDir = () => {
  const explicit = process.env.DATA_DIR?.trim();
  if (explicit && explicit.length > 0) {
    return path.resolve(explicit);
  }

  return path.resolve(process.cwd(), 'data');
};

const dataDir = resolveDataDir();

export const appConfig = {
  env: process.env.NODE_ENV ?? 'development',
  host: process.env.HOST ?? '0.0.0.0',
  port: toNumber(process.env.PORT, 4000),
  auth: {
    jwtSecret: requireString(process.env.AUTH_JWT_SECRET, 'AUTH_JWT_SECRET', 'dream-dispatch-dev-secret-change-me'),
    tokenExpiresIn: toExpiresIn(process.env.AUTH_TOKEN_EXPIRES_IN, '30d'),
  },
  generation: {
    serviceUrl: sanitizeUrl(requireString(process.env.SD_API_URL, 'SD_API_URL', 'http://127.0.0.1:7860')),
    requestTimeoutMs: toNumber(process.env.SD_REQUEST_TIMEOUT_MS, 10 * 60 * 1000),
    // Counted from the moment the previous image finished, not from submission.
    cooldownSeconds: toNumber(process.env.IMAGE_COOLDOWN_SECONDS, 15),
    privilegedCallerIds: toList(process.env.PRIVILEGED_CALLER_IDS),
    maxSourcePixels: toNumber(process.env.MAX_SOURCE_PIXELS, 1216 * 1216),
    jobRetentionHours: toNumber(process.env.JOB_RETENTION_HOURS, 24),
  },
  sessions: {
    staleAfterDays: toNumber(process.env.SESSION_STALE_DAYS, 30),
    pruneOnStartup: toBoolean(process.env.SESSION_PRUNE_ON_STARTUP, false),
  },
  storage: {
    dataDir,
    sessionsFile: path.join(dataDir, process.env.SESSIONS_FILE?.trim() || 'sessions.json'),
    presetsFile: path.join(dataDir, process.env.PRESETS_FILE?.trim() || 'presets.json'),
    modifiersFile: path.join(dataDir, process.env.MODIFIERS_FILE?.trim() || 'modifiers.json'),
  },
};

export type AppConfig = typeof appConfig;
