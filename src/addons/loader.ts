// src/addons/loader.ts

import fs from 'fs-extra';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { InvalidAddonError, errorMessage } from '../core/errors/index.js';
import { formatIssues } from '../core/rules/matcher.js';
import { createLogger } from '../utils/logger.js';
import { AddonManifestSchema, toAddonInstance, type AddonConfig, type AddonModule, type ParsedManifest } from './types.js';

const logger = createLogger('loader');

export const MANIFEST_FILE = 'addon.json';
const DEFAULT_ENTRY = 'index.js';

export interface DiscoveredAddon {
  dir: string;
  manifest: ParsedManifest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and validate `addon.json` in an addon directory
 */
export async function readManifest(addonDir: string): Promise<ParsedManifest> {
  const manifestPath = path.join(addonDir, MANIFEST_FILE);
  if (!(await fs.pathExists(manifestPath))) {
    throw new InvalidAddonError(`No ${MANIFEST_FILE} in ${addonDir}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJSON(manifestPath);
  } catch (error) {
    throw new InvalidAddonError(`${manifestPath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = AddonManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues, 'manifest');
    throw new InvalidAddonError(`Invalid manifest ${manifestPath}: ${issues[0]?.path}: ${issues[0]?.message}`, issues);
  }
  return parsed.data;
}

/**
 * Load an addon from a directory holding `addon.json` and an entry module.
 * The entry exports `setup` (named or as default export's property) and
 * optionally a zod `configSchema`.
 */
export async function loadAddonFromDirectory(addonDir: string): Promise<AddonModule> {
  const dir = path.resolve(addonDir);
  const manifest = await readManifest(dir);
  const entry = path.resolve(dir, manifest.main ?? DEFAULT_ENTRY);
  if (!(await fs.pathExists(entry))) {
    throw new InvalidAddonError(`Entry module ${entry} of addon "${manifest.name}" does not exist`);
  }

  // Module URLs are cached; a fresh query makes every load read the current code
  const url = `${pathToFileURL(entry).href}?instance=${uuidv4()}`;
  let exported: unknown;
  try {
    exported = await import(url);
  } catch (error) {
    throw new InvalidAddonError(`Could not import ${entry}: ${errorMessage(error)}`);
  }
  if (!isRecord(exported)) {
    throw new InvalidAddonError(`Entry module ${entry} exported nothing usable`);
  }

  const source = isRecord(exported.default) && 'setup' in exported.default ? exported.default : exported;
  const setup = source.setup;
  if (typeof setup !== 'function') {
    throw new InvalidAddonError(`Addon "${manifest.name}" must export a setup() function`, [
      { path: 'setup', message: 'Expected a function' },
    ]);
  }

  let configSchema: z.ZodType<AddonConfig, z.ZodTypeDef, unknown> | undefined;
  if (source.configSchema instanceof z.ZodType) {
    configSchema = source.configSchema;
  } else if (source.configSchema !== undefined) {
    throw new InvalidAddonError(`configSchema of addon "${manifest.name}" must be a zod schema`);
  }

  logger.debug(`Loaded ${manifest.name} from ${dir}`);
  return {
    manifest,
    configSchema,
    setup: async (context) => {
      const produced: unknown = await setup(context);
      return toAddonInstance(produced, manifest.name);
    },
  };
}

/**
 * Find addon directories (those holding `addon.json`) directly under each root
 */
export async function discoverAddons(roots: string[]): Promise<DiscoveredAddon[]> {
  const found: DiscoveredAddon[] = [];

  for (const root of roots) {
    if (!(await fs.pathExists(root))) {
      logger.debug(`Addon directory ${root} does not exist`);
      continue;
    }

    const entries = await fs.readdir(root, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const dir = path.join(root, entry.name);
      if (!(await fs.pathExists(path.join(dir, MANIFEST_FILE)))) continue;

      try {
        found.push({ dir, manifest: await readManifest(dir) });
      } catch (error) {
        logger.warn(`Skipping ${dir}: ${errorMessage(error)}`);
      }
    }
  }

  return found;
}
