import { strict as assert } from 'node:assert';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { ValidationError } from '../src/lib/generation/errors';
import { SessionStore } from '../src/lib/sessions/sessionStore';
import { createClock } from './helpers';

describe('SessionStore', () => {
  let directory: string;
  let sessionsFile: string;
  let presetsFile: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'dream-dispatch-sessions-'));
    sessionsFile = path.join(directory, 'state', 'sessions.json');
    presetsFile = path.join(directory, 'state', 'presets.json');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const createStore = (clock = createClock()) => new SessionStore({ sessionsFile, presetsFile, now: clock.now });

  it('starts empty when no files exist', async () => {
    const store = createStore();
    await store.load();

    assert.deepEqual(store.getSnapshot('alice'), {
      callerId: 'alice',
      modifiers: [],
      controlPresets: [],
      customSettings: {},
      lastModified: '2024-05-01T12:00:00.000Z',
    });
  });

  it('adds modifiers in order and updates the weight of an existing one in place', async () => {
    const store = createStore();
    await store.load();

    await store.addModifier('alice', 'ink_sketch.safetensors', 0.7);
    await store.addModifier('alice', 'neon_noir.safetensors', 0.9);
    const session = await store.addModifier('alice', 'ink_sketch.safetensors', 1.2);

    assert.deepEqual(session.modifiers, [
      { name: 'ink_sketch.safetensors', weight: 1.2 },
      { name: 'neon_noir.safetensors', weight: 0.9 },
    ]);
  });

  it('rejects modifier weights outside the allowed range', async () => {
    const store = createStore();
    await store.load();

    await assert.rejects(async () => store.addModifier('alice', 'ink_sketch', 5), ValidationError);
    assert.deepEqual(store.getSnapshot('alice').modifiers, []);
  });

  it('removes a modifier by name and reports unknown names', async () => {
    const store = createStore();
    await store.load();
    await store.addModifier('alice', 'ink_sketch', 0.7);

    assert.equal(await store.removeModifier('alice', 'missing'), false);
    assert.equal(await store.removeModifier('alice', 'ink_sketch'), true);
    assert.deepEqual(store.getSnapshot('alice').modifiers, []);
  });

  it('hands out snapshots that later mutations do not reach', async () => {
    const store = createStore();
    await store.load();
    await store.addModifier('alice', 'ink_sketch', 0.7);

    const snapshot = store.getSnapshot('alice');
    await store.clearModifiers('alice');
    snapshot.customSettings.tiling = true;

    assert.deepEqual(snapshot.modifiers, [{ name: 'ink_sketch', weight: 0.7 }]);
    assert.deepEqual(store.getSnapshot('alice').customSettings, {});
  });

  it('merges custom settings and deletes keys set to null', async () => {
    const store = createStore();
    await store.load();

    await store.updateCustomSettings('alice', { restore_faces: true, tiling: true });
    const session = await store.updateCustomSettings('alice', { tiling: null, clip_skip: 2 });

    assert.deepEqual(session.customSettings, { restore_faces: true, clip_skip: 2 });
  });

  it('writes through to disk and reloads the same state', async () => {
    const clock = createClock();
    const store = createStore(clock);
    await store.load();
    clock.advance(1000);
    await store.addModifier('alice', 'ink_sketch', 0.7);
    const preset = await store.savePreset('alice', { name: ' Night ', description: '', config: { steps: 30 } });
    await store.flush();

    const raw = await readFile(sessionsFile, 'utf8');
    assert.ok(raw.endsWith('}\n'));

    const reloaded = createStore(clock);
    await reloaded.load();
    assert.deepEqual(reloaded.getSnapshot('alice').modifiers, [{ name: 'ink_sketch', weight: 0.7 }]);
    assert.equal(reloaded.getSnapshot('alice').lastModified, '2024-05-01T12:00:01.000Z');
    assert.deepEqual(reloaded.listPresets('alice'), [
      {
        presetId: preset.presetId,
        name: 'Night',
        description: null,
        config: { steps: 30 },
        createdAt: '2024-05-01T12:00:01.000Z',
        lastUsedAt: null,
      },
    ]);
  });

  it('starts empty when the sessions file is invalid', async () => {
    await mkdir(path.dirname(sessionsFile), { recursive: true });
    await writeFile(sessionsFile, '{"alice": {"callerId": 5}}', 'utf8');
    const store = createStore();
    await store.load();

    assert.deepEqual(store.getSnapshot('alice').modifiers, []);
  });

  it('records preset use and deletes presets', async () => {
    const clock = createClock();
    const store = createStore(clock);
    await store.load();
    const preset = await store.savePreset('alice', { name: 'Portrait', config: { cfgScale: 5 } });

    clock.advance(60_000);
    const used = await store.getPreset('alice', preset.presetId);
    assert.equal(used?.lastUsedAt, '2024-05-01T12:01:00.000Z');
    assert.equal(await store.getPreset('bob', preset.presetId), null);

    assert.equal(await store.deletePreset('alice', preset.presetId), true);
    assert.equal(await store.deletePreset('alice', preset.presetId), false);
    assert.deepEqual(store.listPresets('alice'), []);
  });

  it('prunes sessions untouched for longer than the limit', async () => {
    const clock = createClock();
    const store = createStore(clock);
    await store.load();
    await store.addModifier('old', 'ink_sketch', 0.7);
    clock.advance(20 * 24 * 60 * 60 * 1000);
    await store.addModifier('recent', 'ink_sketch', 0.7);
    clock.advance(11 * 24 * 60 * 60 * 1000);

    assert.equal(await store.pruneStale(30), 1);
    assert.equal(store.getStats('recent').modifierCount, 1);
    assert.equal(store.getStats('old').modifierCount, 0);
  });

  it('round-trips a caller through export and import', async () => {
    const store = createStore();
    await store.load();
    await store.addModifier('alice', 'ink_sketch', 0.7);
    await store.savePreset('alice', { name: 'Portrait', config: { steps: 28 } });

    const exported = store.exportCaller('alice');
    const imported = await store.importCaller('bob', JSON.parse(JSON.stringify(exported)));

    assert.equal(imported.callerId, 'bob');
    assert.deepEqual(imported.session.modifiers, [{ name: 'ink_sketch', weight: 0.7 }]);
    assert.deepEqual(
      imported.presets.map((preset) => preset.name),
      ['Portrait'],
    );
    assert.deepEqual(store.getStats('bob'), {
      modifierCount: 1,
      controlPresetCount: 0,
      customSettingCount: 0,
      presetCount: 1,
      lastModified: '2024-05-01T12:00:00.000Z',
    });
    await assert.rejects(async () => store.importCaller('bob', { callerId: 'x' }), ValidationError);
  });
});

