import chalk from 'chalk';
import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { requestOccurrence } from '../adapter/event-adapter.js';
import type { EngineFlow, EngineRequest } from '../adapter/types.js';
import { BUILTIN_PREFIX } from '../addons/catalog.js';
import { discoverAddons } from '../addons/loader.js';
import type { AddonStore } from '../addons/store.js';
import { AddonManifestSchema } from '../addons/types.js';
import { InvalidRuleError, errorMessage, type ValidationIssue } from '../core/errors/index.js';
import { parseCondition } from '../core/rules/condition-parser.js';
import { DEFAULT_PRIORITY, formatIssues, ruleMatcher } from '../core/rules/matcher.js';
import type { HookEngine } from '../engine.js';
import type { Verdict } from '../hooks/types.js';

export interface CommandResult {
  success: boolean;
  output: string;
}

function formatIssueList(issues: ValidationIssue[]): string[] {
  return issues.map((issue) => `  ${chalk.red('✗')} ${chalk.cyan(issue.path)} ${issue.message}`);
}

/**
 * Validate an addon manifest file: schema, every hook rule and every
 * intercept rule
 */
export async function checkManifest(file: string): Promise<CommandResult> {
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (error) {
    return { success: false, output: chalk.red(`Cannot read ${file}: ${errorMessage(error)}`) };
  }

  const parsed = AddonManifestSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      output: [
        chalk.bold(`${file}: invalid manifest`),
        ...formatIssueList(formatIssues(parsed.error.issues, 'manifest')),
      ].join('\n'),
    };
  }

  const manifest = parsed.data;
  const lines: string[] = [chalk.bold(`${manifest.name} v${manifest.version}`)];
  const issues: ValidationIssue[] = [];

  for (const [hookName, declaration] of Object.entries(manifest.hooks)) {
    try {
      const rule = ruleMatcher.compile(declaration, `hooks.${hookName}`, manifest.order ?? DEFAULT_PRIORITY);
      const flags = rule.shortCircuit ? chalk.yellow(' short-circuit') : '';
      lines.push(
        `  ${chalk.green('✓')} ${hookName} ${chalk.dim(rule.event)} priority ${rule.priority}${flags}`,
      );
    } catch (error) {
      if (!(error instanceof InvalidRuleError)) throw error;
      issues.push(...error.issues);
    }
  }

  manifest.interceptRules.forEach((condition, index) => {
    try {
      parseCondition(condition, `interceptRules[${index}]`);
      lines.push(`  ${chalk.green('✓')} ${chalk.dim('intercept')} ${condition}`);
    } catch (error) {
      if (!(error instanceof InvalidRuleError)) throw error;
      issues.push(...error.issues);
    }
  });

  if (issues.length > 0) {
    lines.push(...formatIssueList(issues));
    lines.push(chalk.red(`${issues.length} problem(s) found`));
    return { success: false, output: lines.join('\n') };
  }
  return { success: true, output: lines.join('\n') };
}

/**
 * Show persisted addons and the addons available on disk
 */
export async function listAddons(store: AddonStore, addonDirs: string[], builtins: string[]): Promise<CommandResult> {
  const lines: string[] = [chalk.bold('Installed Addons:')];
  const installed = await store.load();
  if (installed.length === 0) {
    lines.push(chalk.dim('  (none)'));
  }
  for (const entry of installed) {
    const state = entry.enabled ? chalk.green('enabled') : chalk.yellow('disabled');
    lines.push(`  ${chalk.cyan(entry.id)} ${state} ${chalk.dim(entry.source)}`);
  }

  lines.push('', chalk.bold('Available Addons:'));
  for (const ref of builtins) {
    lines.push(`  ${chalk.cyan(ref)}`);
  }
  for (const found of await discoverAddons(addonDirs)) {
    lines.push(`  ${chalk.cyan(found.manifest.name)} v${found.manifest.version} ${chalk.dim(found.dir)}`);
  }

  return { success: true, output: lines.join('\n') };
}

export interface SimulateOptions {
  method?: string;
  /** `name: value` pairs */
  headers?: string[];
  /** Extra directories holding addons to install for the run */
  addonDirs?: string[];
  /** Built-in addons to install, e.g. `builtin:host-blocker` */
  builtins?: string[];
  /** Per-addon configuration, keyed by addon id */
  addonConfig?: Record<string, Record<string, unknown>>;
}

const SCHEMES: ReadonlyArray<EngineRequest['scheme']> = ['http', 'https', 'ws', 'wss'];

function isScheme(value: string): value is EngineRequest['scheme'] {
  return SCHEMES.some((scheme) => scheme === value);
}

/**
 * Parse a URL and header list into an engine request
 */
export function buildRequest(url: string, method = 'GET', headerPairs: string[] = []): EngineRequest {
  const parsed = new URL(url);
  const scheme = parsed.protocol.replace(/:$/, '');
  if (!isScheme(scheme)) {
    throw new Error(`Unsupported scheme "${scheme}"`);
  }

  const headers: Record<string, string> = { host: parsed.host };
  for (const pair of headerPairs) {
    const colon = pair.indexOf(':');
    if (colon <= 0) {
      throw new Error(`Header "${pair}" must look like "name: value"`);
    }
    headers[pair.slice(0, colon).trim().toLowerCase()] = pair.slice(colon + 1).trim();
  }

  const defaultPort = scheme === 'https' || scheme === 'wss' ? 443 : 80;
  return {
    method: method.toUpperCase(),
    scheme,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : defaultPort,
    path: `${parsed.pathname}${parsed.search}`,
    headers,
  };
}

export function formatVerdict(verdict: Verdict): string[] {
  const lines: string[] = [];
  for (const invocation of verdict.invocations) {
    const mark =
      invocation.outcome === 'ok'
        ? chalk.green('ok')
        : invocation.outcome === 'timeout'
          ? chalk.yellow('timeout')
          : chalk.red('error');
    const detail = invocation.error ? ` ${chalk.dim(invocation.error)}` : '';
    lines.push(`  ${invocation.addonId}/${invocation.hookName} ${mark} ${invocation.durationMs}ms${detail}`);
  }
  if (verdict.invocations.length === 0) {
    lines.push(chalk.dim('  no hook matched'));
  }

  lines.push('', `${chalk.bold('Action:')} ${verdict.action}`);
  if (verdict.block) {
    lines.push(`  ${verdict.block.statusCode} ${verdict.block.reason}`);
  }
  if (verdict.response) {
    lines.push(`  respond ${verdict.response.statusCode}`);
  }
  for (const edit of verdict.headerEdits) {
    lines.push(edit.op === 'set' ? `  set ${edit.name}: ${edit.value}` : `  remove ${edit.name}`);
  }
  if (verdict.terminatedBy) {
    lines.push(chalk.dim(`  ended early by ${verdict.terminatedBy.addonId}/${verdict.terminatedBy.hookName}`));
  }
  for (const [key, value] of Object.entries(verdict.annotations)) {
    lines.push(chalk.dim(`  ${key}=${value}`));
  }
  return lines;
}

/**
 * Install the given addons, enable them, and dispatch one request through them
 */
export async function simulateRequest(engine: HookEngine, url: string, options: SimulateOptions = {}): Promise<CommandResult> {
  const request = buildRequest(url, options.method, options.headers);
  const configFor = (addonId: string) => options.addonConfig?.[addonId] ?? {};

  const sources: Array<{ source: string; addonId: string }> = (options.builtins ?? []).map((ref) => ({
    source: ref,
    addonId: ref.replace(BUILTIN_PREFIX, ''),
  }));
  for (const found of await discoverAddons(options.addonDirs ?? [])) {
    sources.push({ source: found.dir, addonId: found.manifest.name });
  }

  const lines: string[] = [];
  for (const { source, addonId } of sources) {
    try {
      const id = await engine.installAddon(source, configFor(addonId), { enable: false });
      await engine.enableAddon(id);
      lines.push(`${chalk.green('+')} ${id}`);
    } catch (error) {
      lines.push(`${chalk.red('!')} ${source}: ${errorMessage(error)}`);
    }
  }

  const flow: EngineFlow = { id: uuidv4(), request };
  const verdict = await engine.handle(requestOccurrence(flow));

  lines.push('', chalk.bold(`${request.method} ${url}`), ...formatVerdict(verdict));
  return { success: true, output: lines.join('\n') };
}
