#!/usr/bin/env node
// src/index.ts is the main entry point to run CLI
import chalk from 'chalk';
import { Command } from 'commander';
import { AddonCatalog, BUILTIN_PREFIX } from './addons/catalog.js';
import { JsonFileAddonStore, MemoryAddonStore } from './addons/store.js';
import { checkManifest, listAddons, simulateRequest, type CommandResult } from './cli/commands.js';
import { loadConfig } from './core/config/loader.js';
import { ConfigError, EngineError, errorMessage } from './core/errors/index.js';
import { HookEngine } from './engine.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function report(result: CommandResult): void {
  console.log(result.output);
  if (!result.success) {
    process.exitCode = 1;
  }
}

function fail(error: unknown): void {
  console.error(chalk.red(errorMessage(error)));
  if ((error instanceof ConfigError || error instanceof EngineError) && error.suggestion) {
    console.error(chalk.dim(error.suggestion));
  }
  process.exitCode = 1;
}

/**
 * Parse repeated `id=<json>` options into per-addon configuration
 */
function parseAddonConfig(pairs: string[]): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`--config expects <addon>=<json>, got "${pair}"`);
    }
    const value: unknown = JSON.parse(pair.slice(eq + 1));
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new Error(`Configuration for ${pair.slice(0, eq)} must be a JSON object`);
    }
    result[pair.slice(0, eq)] = Object.fromEntries(Object.entries(value));
  }
  return result;
}

const program = new Command();

program.name('flowhook').description('Hook routing and addon lifecycle engine for intercepting proxies').version('0.1.0');

program
  .command('check')
  .description('Validate an addon manifest and its hook rules')
  .argument('<file>', 'path to addon.json')
  .action(async (file: string) => {
    try {
      report(await checkManifest(file));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('list')
  .description('List installed and available addons')
  .action(async () => {
    try {
      const config = await loadConfig();
      const store = config.storePath ? new JsonFileAddonStore(config.storePath) : new MemoryAddonStore();
      report(await listAddons(store, config.addonDirs, new AddonCatalog().builtinRefs()));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('simulate')
  .description('Dispatch one request through a set of addons and print the verdict')
  .argument('<url>', 'request URL')
  .option('-m, --method <method>', 'request method', 'GET')
  .option('-H, --header <header>', 'request header as "name: value" (repeatable)', collect, [])
  .option('-a, --addons <dir>', 'directory of addons to install (repeatable)', collect, [])
  .option('-u, --use <name>', 'built-in addon to install (repeatable)', collect, [])
  .option('-c, --config <addon=json>', 'configuration for an addon (repeatable)', collect, [])
  .action(
    async (
      url: string,
      options: { method: string; header: string[]; addons: string[]; use: string[]; config: string[] },
    ) => {
      try {
        const config = await loadConfig();
        const engine = new HookEngine({ config, store: new MemoryAddonStore() });
        const result = await simulateRequest(engine, url, {
          method: options.method,
          headers: options.header,
          addonDirs: options.addons,
          builtins: options.use.map((name) => (name.startsWith(BUILTIN_PREFIX) ? name : `${BUILTIN_PREFIX}${name}`)),
          addonConfig: parseAddonConfig(options.config),
        });
        await engine.stop();
        report(result);
      } catch (error) {
        fail(error);
      }
    },
  );

program.parseAsync(process.argv).catch(fail);
