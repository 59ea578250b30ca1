import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { AddonCatalog } from '../../../src/addons/catalog.js';
import { discoverAddons, loadAddonFromDirectory, readManifest } from '../../../src/addons/loader.js';
import { AddonNotFoundError, InvalidAddonError } from '../../../src/core/errors/index.js';
import { createLogger } from '../../../src/utils/logger.js';
import { trafficEvent } from '../../helpers.js';

const fixtures = fileURLToPath(new URL('../../fixtures/addons', import.meta.url));
const echoDir = path.join(fixtures, 'echo');

describe('readManifest()', () => {
  it('should parse addon.json with defaults', async () => {
    const manifest = await readManifest(echoDir);
    expect(manifest.name).toBe('echo');
    expect(manifest.version).toBe('1.2.0');
    expect(manifest.interceptRules).toEqual(['DOMAIN-SUFFIX,example.com']);
    expect(manifest.config).toEqual({ label: 'default' });
  });

  it('should reject a directory without addon.json', async () => {
    const dir = path.join(fixtures, 'no-manifest');
    await expect(readManifest(dir)).rejects.toThrow(`No addon.json in ${dir}`);
  });

  it('should reject an invalid manifest', async () => {
    const error = await readManifest(path.join(fixtures, 'broken')).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(InvalidAddonError);
    if (error instanceof InvalidAddonError) {
      expect(error.issues.map((issue) => issue.path)).toEqual(['manifest.name']);
    }
  });
});

describe('loadAddonFromDirectory()', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'addon-loader-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load the entry module with its config schema', async () => {
    const module = await loadAddonFromDirectory(echoDir);
    expect(module.manifest.name).toBe('echo');
    expect(module.configSchema?.safeParse({ label: '' }).success).toBe(false);

    const instance = await module.setup({
      addonId: 'echo',
      instanceId: 'echo~1',
      config: { label: 'hello' },
      logger: createLogger('echo'),
    });
    const handler = instance.handlers.tag;
    expect(handler).toBeTypeOf('function');
    const contribution = await handler?.(trafficEvent('request-received', { host: 'example.com' }), {
      addonId: 'echo',
      hookName: 'tag',
      signal: new AbortController().signal,
      config: { label: 'hello' },
      logger: createLogger('echo'),
    });
    expect(contribution).toEqual({ annotations: { echo: 'hello' } });
  });

  it('should reject a missing entry module', async () => {
    await fs.writeFile(
      path.join(tempDir, 'addon.json'),
      JSON.stringify({ name: 'ghost', version: '1.0.0', main: 'missing.js' }),
    );
    await expect(loadAddonFromDirectory(tempDir)).rejects.toThrow(
      `Entry module ${path.join(tempDir, 'missing.js')} of addon "ghost" does not exist`,
    );
  });
});

describe('discoverAddons()', () => {
  it('should list valid addon directories and skip the rest', async () => {
    const found = await discoverAddons([fixtures, path.join(fixtures, 'does-not-exist')]);
    expect(found.map((addon) => [addon.manifest.name, addon.dir])).toEqual([['echo', echoDir]]);
  });
});

describe('AddonCatalog', () => {
  const catalog = new AddonCatalog();

  it('should list the built-in addons', () => {
    expect(catalog.builtinRefs()).toEqual(['builtin:host-blocker', 'builtin:header-injector', 'builtin:request-logger']);
  });

  it('should resolve built-in references', async () => {
    const module = await catalog.resolve('builtin:host-blocker');
    expect(module.manifest.name).toBe('host-blocker');
  });

  it('should reject an unknown built-in', async () => {
    await expect(catalog.resolve('builtin:nope')).rejects.toBeInstanceOf(AddonNotFoundError);
  });

  it('should resolve directories from disk', async () => {
    const module = await catalog.resolve(echoDir);
    expect(module.manifest.version).toBe('1.2.0');
  });

  it('should normalize references', () => {
    expect(catalog.normalize('builtin:host-blocker')).toBe('builtin:host-blocker');
    expect(catalog.normalize('addons/echo')).toBe(path.resolve('addons/echo'));
  });
});
