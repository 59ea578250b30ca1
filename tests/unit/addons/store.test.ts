import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonFileAddonStore, MemoryAddonStore, type StoredAddon } from '../../../src/addons/store.js';
import { ConfigError, ConfigErrorCode } from '../../../src/core/errors/index.js';

const entry = (id: string, installOrder: number, enabled = true): StoredAddon => ({
  id,
  source: `builtin:${id}`,
  enabled,
  config: {},
  installOrder,
});

describe('MemoryAddonStore', () => {
  it('should return entries in installation order', async () => {
    const store = new MemoryAddonStore([entry('b', 2), entry('a', 1)]);
    await store.put(entry('c', 3));
    await store.delete('b');
    expect((await store.load()).map((stored) => stored.id)).toEqual(['a', 'c']);
  });

  it('should not share config objects with callers', async () => {
    const store = new MemoryAddonStore();
    const stored = { ...entry('a', 1), config: { level: 1 } };
    await store.put(stored);
    stored.config.level = 2;
    expect((await store.load())[0]?.config).toEqual({ level: 1 });
  });
});

describe('JsonFileAddonStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'addon-store-test-'));
    filePath = path.join(tempDir, 'state', 'addons.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read a missing file as empty', async () => {
    await expect(new JsonFileAddonStore(filePath).load()).resolves.toEqual([]);
  });

  it('should write entries sorted by installation order', async () => {
    const store = new JsonFileAddonStore(filePath);
    await store.put(entry('b', 2));
    await store.put(entry('a', 1, false));
    await store.put({ ...entry('b', 2), config: { hosts: ['x.example'] } });

    const written: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(written).toEqual({
      version: 1,
      addons: [entry('a', 1, false), { ...entry('b', 2), config: { hosts: ['x.example'] } }],
    });
  });

  it('should delete entries', async () => {
    const store = new JsonFileAddonStore(filePath);
    await store.put(entry('a', 1));
    await store.put(entry('b', 2));
    await store.delete('a');
    expect((await store.load()).map((stored) => stored.id)).toEqual(['b']);
  });

  it('should reject a file that is not JSON', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{ nope');

    const error = await new JsonFileAddonStore(filePath).load().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.code).toBe(ConfigErrorCode.INVALID_JSON);
    }
  });

  it('should reject a file with the wrong shape', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ version: 1, addons: [{ id: 'a' }] }));

    await expect(new JsonFileAddonStore(filePath).load()).rejects.toThrow(
      `Addon store ${filePath} is malformed at addons.0.source: Required`,
    );
  });
});
