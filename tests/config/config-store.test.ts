import { promises as fs } from 'fs';
import path from 'path';
import { ConfigChange, ConfigStore } from '../../src/config/config-store';
import { configSecrets, defaultConfiguration } from '../../src/config/schema';
import { PipelineError } from '../../src/domain/errors';
import { makeTempDir, removeDir } from '../helpers';

describe('ConfigStore', () => {
  describe('in memory', () => {
    it('starts at version 1 with defaults', () => {
      const store = new ConfigStore();
      expect(store.version).toBe(1);
      expect(store.get('inference.providerId')).toBe('openai');
      expect(store.get('capture.resolution.0')).toBe(1920);
      expect(store.get('nope.missing')).toBeUndefined();
    });

    it('applies initial overrides', () => {
      const store = new ConfigStore({ initial: { pipeline: { workerLimit: 4 } } });
      expect(store.section('pipeline').workerLimit).toBe(4);
    });

    it('rejects invalid initial settings with ConfigError', () => {
      expect(() => new ConfigStore({ initial: { pipeline: { workerLimit: 0 } } })).toThrow(PipelineError);
    });

    it('set bumps the version and notifies listeners', async () => {
      const store = new ConfigStore();
      const changes: ConfigChange[] = [];
      store.subscribe((change) => changes.push(change));

      const version = await store.set('inference.model', 'gpt-4o-mini');

      expect(version).toBe(2);
      expect(store.get('inference.model')).toBe('gpt-4o-mini');
      expect(changes).toEqual([{ version: 2, section: 'inference', paths: ['inference.model'] }]);
    });

    it('a set that fails validation leaves value and version unchanged', async () => {
      const store = new ConfigStore();
      const before = store.snapshot();

      const err = await store.set('inference.temperature', 5).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PipelineError);
      if (err instanceof PipelineError) {
        expect(err.kind).toBe('ValidationError');
        expect(err.message).toBe('Invalid value for "inference.temperature": Number must be less than or equal to 2');
      }
      expect(store.get('inference.temperature')).toBe(0.2);
      expect(store.version).toBe(1);
      expect(store.snapshot()).toBe(before);
    });

    it('rejects unknown keys and sections', async () => {
      const store = new ConfigStore();
      await expect(store.set('inference.bogus', 1)).rejects.toMatchObject({ kind: 'ValidationError' });
      await expect(store.set('nowhere.key', 1)).rejects.toMatchObject({ kind: 'ValidationError' });
      await expect(store.set('inference', {})).rejects.toMatchObject({ kind: 'ValidationError' });
      expect(store.version).toBe(1);
    });

    it('update merges several keys in one version', async () => {
      const store = new ConfigStore();
      const version = await store.update('recordSystem', { baseUrl: 'https://elab.test/api/v2', teamId: 3 });
      expect(version).toBe(2);
      expect(store.section('recordSystem').baseUrl).toBe('https://elab.test/api/v2');
      expect(store.section('recordSystem').teamId).toBe(3);
    });

    it('an empty update keeps the version', async () => {
      const store = new ConfigStore();
      await expect(store.update('label', {})).resolves.toBe(1);
    });

    it('snapshots are frozen', () => {
      const store = new ConfigStore();
      expect(Object.isFrozen(store.snapshot().config.inference)).toBe(true);
    });

    it('a throwing listener does not fail the write', async () => {
      const store = new ConfigStore();
      store.subscribe(() => {
        throw new Error('listener broke');
      });
      await expect(store.set('label.scale', 4)).resolves.toBe(2);
    });

    it('unsubscribe stops notifications', async () => {
      const store = new ConfigStore();
      const seen: number[] = [];
      const off = store.subscribe((change) => seen.push(change.version));
      await store.set('label.scale', 4);
      off();
      await store.set('label.scale', 5);
      expect(seen).toEqual([2]);
    });

    it('serializes concurrent writes', async () => {
      const store = new ConfigStore();
      const versions = await Promise.all([
        store.set('label.scale', 2),
        store.set('label.scale', 3),
        store.set('label.margin', 1),
      ]);
      expect(versions).toEqual([2, 3, 4]);
      expect(store.section('label')).toMatchObject({ scale: 3, margin: 1 });
    });
  });

  describe('file backed', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('writes defaults when the file is missing', async () => {
      const filePath = path.join(dir, 'config.json');
      const store = new ConfigStore({ filePath });
      await store.load();
      const written: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
      expect(written).toEqual(defaultConfiguration());
      expect(store.version).toBe(2);
    });

    it('loads and persists values', async () => {
      const filePath = path.join(dir, 'config.json');
      await fs.writeFile(filePath, JSON.stringify({ recordSystem: { teamId: 7 } }));
      const store = new ConfigStore({ filePath });
      await store.load();
      expect(store.section('recordSystem').teamId).toBe(7);

      await store.set('storage.labelsDir', './out/labels');
      const reloaded = new ConfigStore({ filePath });
      await reloaded.load();
      expect(reloaded.section('storage').labelsDir).toBe('./out/labels');
      expect(reloaded.section('recordSystem').teamId).toBe(7);
    });

    it('raises ConfigError for malformed JSON', async () => {
      const filePath = path.join(dir, 'config.json');
      await fs.writeFile(filePath, '{ not json');
      await expect(new ConfigStore({ filePath }).load()).rejects.toMatchObject({ kind: 'ConfigError' });
    });

    it('raises ConfigError for schema violations', async () => {
      const filePath = path.join(dir, 'config.json');
      await fs.writeFile(filePath, JSON.stringify({ label: { maxVersion: 99 } }));
      await expect(new ConfigStore({ filePath }).load()).rejects.toMatchObject({ kind: 'ConfigError' });
    });

    it('does not write the file when validation fails', async () => {
      const filePath = path.join(dir, 'config.json');
      const store = new ConfigStore({ filePath });
      await store.load();
      const before = await fs.readFile(filePath, 'utf8');
      await expect(store.set('pipeline.workerLimit', -1)).rejects.toMatchObject({ kind: 'ValidationError' });
      expect(await fs.readFile(filePath, 'utf8')).toBe(before);
    });
  });
});

describe('configSecrets', () => {
  it('returns only configured credentials', () => {
    const config = defaultConfiguration();
    expect(configSecrets(config)).toEqual([]);
    expect(configSecrets({ ...config, inference: { ...config.inference, credential: 'test-secret' } })).toEqual(['test-secret']);
  });
});
