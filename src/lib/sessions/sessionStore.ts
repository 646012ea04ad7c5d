import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { z } from 'zod';

import { ValidationError } from '../generation/errors';
import { generationLimits } from '../generation/limits';
import { controlUnitSchema } from '../generation/requestSchema';
import type { ControlUnitSettings, StyleModifier, UserSession } from '../generation/types';

export interface Preset {
  presetId: string;
  name: string;
  description: string | null;
  config: Record<string, unknown>;
  createdAt: string;
  lastUsedAt: string | null;
}

export interface NewPreset {
  name: string;
  description?: string | null;
  config: Record<string, unknown>;
}

export interface CallerExport {
  callerId: string;
  session: UserSession;
  presets: Preset[];
  exportedAt: string;
}

export interface SessionStats {
  modifierCount: number;
  controlPresetCount: number;
  customSettingCount: number;
  presetCount: number;
  lastModified: string;
}

export interface SessionStoreOptions {
  sessionsFile: string;
  presetsFile: string;
  now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const modifierSchema = z.object({
  name: z.string().trim().min(1).max(512),
  weight: z.number().min(generationLimits.modifierWeight.min).max(generationLimits.modifierWeight.max),
});

const sessionSchema = z.object({
  callerId: z.string().min(1),
  modifiers: z.array(modifierSchema).default([]),
  controlPresets: z.array(controlUnitSchema).default([]),
  customSettings: z.record(z.unknown()).default({}),
  lastModified: z.string().datetime(),
});

const presetSchema = z.object({
  presetId: z.string().min(1),
  name: z.string().trim().min(1).max(120),
  description: z.string().max(500).nullable().default(null),
  config: z.record(z.unknown()),
  createdAt: z.string().datetime(),
  lastUsedAt: z.string().datetime().nullable().default(null),
});

const sessionsFileSchema = z.record(sessionSchema);
const presetsFileSchema = z.record(z.record(presetSchema));

export const callerExportSchema = z.object({
  callerId: z.string().min(1),
  session: sessionSchema,
  presets: z.array(presetSchema).default([]),
  exportedAt: z.string().optional(),
});

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readFileSafe = async (filePath: string) => {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return '';
    }

    throw error;
  }
};

const parseJsonFile = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string): T | null => {
  if (raw.trim().length === 0) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`[sessions] ${filePath} is not valid JSON; starting empty.`, error);
    return null;
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(`[sessions] ${filePath} failed validation; starting empty.`, parsed.error.flatten());
    return null;
  }

  return parsed.data;
};

const cloneSession = (session: UserSession): UserSession => structuredClone(session);

/**
 * Per-caller generation state and saved presets, cached in memory and written
 * through to two JSON files.
 */
export class SessionStore {
  private readonly sessionsFile: string;

  private readonly presetsFile: string;

  private readonly now: () => number;

  private sessions = new Map<string, UserSession>();

  private presets = new Map<string, Map<string, Preset>>();

  private writes: Promise<void> = Promise.resolve();

  constructor(options: SessionStoreOptions) {
    this.sessionsFile = options.sessionsFile;
    this.presetsFile = options.presetsFile;
    this.now = options.now ?? (() => Date.now());
  }

  async load() {
    const sessions = parseJsonFile(await readFileSafe(this.sessionsFile), sessionsFileSchema, this.sessionsFile);
    const presets = parseJsonFile(await readFileSafe(this.presetsFile), presetsFileSchema, this.presetsFile);

    this.sessions = new Map(Object.entries(sessions ?? {}));
    this.presets = new Map(
      Object.entries(presets ?? {}).map(([callerId, entries]) => [callerId, new Map(Object.entries(entries))]),
    );
  }

  /** Returns an isolated copy; later mutations never reach it. */
  getSnapshot(callerId: string): UserSession {
    return cloneSession(this.ensureSession(callerId));
  }

  async mutate(callerId: string, mutator: (session: UserSession) => void): Promise<UserSession> {
    const draft = cloneSession(this.ensureSession(callerId));
    mutator(draft);
    draft.callerId = callerId;
    draft.lastModified = this.timestamp();
    this.sessions.set(callerId, draft);
    await this.persistSessions();
    return cloneSession(draft);
  }

  addModifier(callerId: string, name: string, weight: number) {
    const parsed = modifierSchema.safeParse({ name, weight });
    if (!parsed.success) {
      throw new ValidationError('Invalid style modifier.', parsed.error.flatten().fieldErrors);
    }

    return this.mutate(callerId, (session) => {
      const existing = session.modifiers.find((modifier) => modifier.name === parsed.data.name);
      if (existing) {
        existing.weight = parsed.data.weight;
        return;
      }
      session.modifiers.push({ name: parsed.data.name, weight: parsed.data.weight });
    });
  }

  async removeModifier(callerId: string, name: string): Promise<boolean> {
    const current = this.sessions.get(callerId);
    if (!current || !current.modifiers.some((modifier) => modifier.name === name)) {
      return false;
    }

    await this.mutate(callerId, (session) => {
      session.modifiers = session.modifiers.filter((modifier) => modifier.name !== name);
    });
    return true;
  }

  clearModifiers(callerId: string) {
    return this.mutate(callerId, (session) => {
      session.modifiers = [];
    });
  }

  updateCustomSettings(callerId: string, settings: Record<string, unknown>) {
    return this.mutate(callerId, (session) => {
      for (const [key, value] of Object.entries(settings)) {
        if (value === null) {
          delete session.customSettings[key];
        } else {
          session.customSettings[key] = value;
        }
      }
    });
  }

  addControlPreset(callerId: string, unit: ControlUnitSettings) {
    return this.mutate(callerId, (session) => {
      session.controlPresets.push({ ...unit });
    });
  }

  clearControlPresets(callerId: string) {
    return this.mutate(callerId, (session) => {
      session.controlPresets = [];
    });
  }

  getStats(callerId: string): SessionStats {
    const session = this.ensureSession(callerId);
    return {
      modifierCount: session.modifiers.length,
      controlPresetCount: session.controlPresets.length,
      customSettingCount: Object.keys(session.customSettings).length,
      presetCount: this.presets.get(callerId)?.size ?? 0,
      lastModified: session.lastModified,
    };
  }

  listPresets(callerId: string): Preset[] {
    const entries = this.presets.get(callerId);
    if (!entries) {
      return [];
    }

    return Array.from(entries.values(), (preset) => ({ ...preset, config: structuredClone(preset.config) }));
  }

  async savePreset(callerId: string, input: NewPreset): Promise<Preset> {
    const preset: Preset = {
      presetId: randomUUID(),
      name: input.name.trim(),
      description: input.description?.trim() || null,
      config: structuredClone(input.config),
      createdAt: this.timestamp(),
      lastUsedAt: null,
    };

    const entries = this.presets.get(callerId) ?? new Map<string, Preset>();
    entries.set(preset.presetId, preset);
    this.presets.set(callerId, entries);
    await this.persistPresets();

    return { ...preset, config: structuredClone(preset.config) };
  }

  /** Looks a preset up and records the use. */
  async getPreset(callerId: string, presetId: string): Promise<Preset | null> {
    const preset = this.presets.get(callerId)?.get(presetId);
    if (!preset) {
      return null;
    }

    preset.lastUsedAt = this.timestamp();
    await this.persistPresets();
    return { ...preset, config: structuredClone(preset.config) };
  }

  async deletePreset(callerId: string, presetId: string): Promise<boolean> {
    const entries = this.presets.get(callerId);
    if (!entries || !entries.delete(presetId)) {
      return false;
    }

    await this.persistPresets();
    return true;
  }

  /** Drops sessions untouched for longer than `maxAgeDays`. Returns how many went. */
  async pruneStale(maxAgeDays: number): Promise<number> {
    const cutoff = this.now() - maxAgeDays * DAY_MS;
    let removed = 0;

    for (const [callerId, session] of this.sessions) {
      if (Date.parse(session.lastModified) < cutoff) {
        this.sessions.delete(callerId);
        removed += 1;
      }
    }

    if (removed > 0) {
      await this.persistSessions();
      // eslint-disable-next-line no-console
      console.info(`[sessions] Pruned ${removed} stale session(s).`);
    }

    return removed;
  }

  exportCaller(callerId: string): CallerExport {
    return {
      callerId,
      session: this.getSnapshot(callerId),
      presets: this.listPresets(callerId),
      exportedAt: this.timestamp(),
    };
  }

  /** Replaces the caller's session and presets with an earlier export. */
  async importCaller(callerId: string, data: unknown): Promise<CallerExport> {
    const parsed = callerExportSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Invalid export document.', parsed.error.flatten().fieldErrors);
    }

    const session: UserSession = {
      ...parsed.data.session,
      callerId,
      lastModified: this.timestamp(),
    };
    this.sessions.set(callerId, session);
    this.presets.set(callerId, new Map(parsed.data.presets.map((preset) => [preset.presetId, preset])));

    await this.persistSessions();
    await this.persistPresets();

    return this.exportCaller(callerId);
  }

  async flush() {
    await this.writes;
  }

  private ensureSession(callerId: string): UserSession {
    let session = this.sessions.get(callerId);
    if (!session) {
      session = {
        callerId,
        modifiers: [],
        controlPresets: [],
        customSettings: {},
        lastModified: this.timestamp(),
      };
      this.sessions.set(callerId, session);
    }

    return session;
  }

  private timestamp() {
    return new Date(this.now()).toISOString();
  }

  private persistSessions() {
    const payload = Object.fromEntries(this.sessions);
    return this.enqueueWrite(this.sessionsFile, payload);
  }

  private persistPresets() {
    const payload = Object.fromEntries(
      Array.from(this.presets, ([callerId, entries]) => [callerId, Object.fromEntries(entries)]),
    );
    return this.enqueueWrite(this.presetsFile, payload);
  }

  // Writes are chained so two mutations never interleave on disk.
  private enqueueWrite(filePath: string, payload: unknown) {
    const content = `${JSON.stringify(payload, null, 2)}\n`;
    const write = this.writes.then(async () => {
      await fs.mkdir(dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf8');
    });
    this.writes = write.catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`[sessions] Failed to write ${filePath}.`, error);
    });
    return write;
  }
}
