/**
 * RuleMatcher
 *
 * Compiles hook declarations into frozen predicate closures and evaluates
 * them against traffic events. Every validation problem surfaces from
 * `compile()`; `matches()` never throws.
 */

import { BlockList, isIP } from 'net';
import { minimatch } from 'minimatch';
import type { ZodIssue } from 'zod';
import { InvalidRuleError, errorMessage, type ValidationIssue } from '../errors/index.js';
import type { TrafficAttributes, TrafficEvent } from '../../hooks/types.js';
import { MAX_DEPTH, parseCondition } from './condition-parser.js';
import {
  ComparisonSchema,
  HookDeclarationSchema,
  HOST_FIELDS,
  IP_FIELDS,
  NUMERIC_FIELDS,
  type ComparisonDeclaration,
  type CompiledPredicate,
  type CompiledRule,
  type RuleField,
} from './types.js';

export const DEFAULT_PRIORITY = 100;

const STRING_OPERATORS = new Set(['prefix', 'suffix', 'contains', 'pattern', 'glob', 'wildcard']);

export function formatIssues(issues: ZodIssue[], base: string): ValidationIssue[] {
  return issues.map((issue) => ({
    path: joinPath(base, issue.path),
    message: issue.message,
  }));
}

function joinPath(base: string, segments: (string | number)[]): string {
  let result = base;
  for (const segment of segments) {
    result += typeof segment === 'number' ? `[${segment}]` : result ? `.${segment}` : segment;
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the attribute a comparison looks at. Headers are looked up by lower-cased name.
 */
function readAttribute(
  attributes: Readonly<TrafficAttributes>,
  field: RuleField,
  name?: string,
): string | number | undefined {
  if (field === 'header') {
    return name ? attributes.headers?.[name.toLowerCase()] : undefined;
  }
  return attributes[field];
}

/**
 * Parse `80`, `8000-8100`, `80,443/8080` into inclusive ranges
 */
export function parsePortRanges(value: string | number): Array<[number, number]> | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? [[value, value]] : null;
  }
  const ranges: Array<[number, number]> = [];
  for (const part of value.split(/[,/]/)) {
    const trimmed = part.trim();
    const match = /^(\d+)(?:\s*-\s*(\d+))?$/.exec(trimmed);
    if (!match) return null;
    const low = Number(match[1]);
    const high = match[2] === undefined ? low : Number(match[2]);
    if (low > high) return null;
    ranges.push([low, high]);
  }
  return ranges.length > 0 ? ranges : null;
}

/**
 * Domain wildcard semantics:
 * - `*.a.com` matches exactly one extra label
 * - `+.a.com` matches `a.com` and any subdomain
 * - `.a.com` matches any subdomain but not `a.com`
 * - anything else is treated as a glob
 */
export function matchDomainWildcard(pattern: string, host: string): boolean {
  if (pattern.startsWith('*.')) {
    const domain = pattern.slice(2);
    if (!host.endsWith(`.${domain}`)) return false;
    const label = host.slice(0, host.length - domain.length - 1);
    return label.length > 0 && !label.includes('.');
  }
  if (pattern.startsWith('+.')) {
    const domain = pattern.slice(2);
    return host === domain || host.endsWith(`.${domain}`);
  }
  if (pattern.startsWith('.')) {
    return host.endsWith(pattern) && host.length > pattern.length;
  }
  return minimatch(host, pattern);
}

function buildBlockList(value: string): BlockList | null {
  const slash = value.indexOf('/');
  const address = slash === -1 ? value : value.slice(0, slash);
  const version = isIP(address);
  if (version === 0) return null;

  const type = version === 4 ? 'ipv4' : 'ipv6';
  const maxPrefix = version === 4 ? 32 : 128;
  const prefix = slash === -1 ? maxPrefix : Number(value.slice(slash + 1));
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) return null;

  const list = new BlockList();
  list.addSubnet(address, prefix, type);
  return list;
}

export class RuleMatcher {
  /**
   * Check whether a compiled rule selects an event.
   * Kind mismatch is decided before any predicate runs.
   */
  matches(rule: CompiledRule, event: TrafficEvent): boolean {
    if (rule.event !== event.kind) {
      return false;
    }
    for (const predicate of rule.predicates) {
      if (!predicate(event.attributes)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Validate and compile one hook declaration
   * @param declaration Raw declaration (parsed JSON or a typed HookDeclaration)
   * @param path Location used in issue paths, e.g. `hooks.blockAds`
   * @param defaultPriority Priority used when the declaration has none
   * @throws InvalidRuleError with every issue found
   */
  compile(declaration: unknown, path: string, defaultPriority = DEFAULT_PRIORITY): CompiledRule {
    const parsed = HookDeclarationSchema.safeParse(declaration);
    if (!parsed.success) {
      throw new InvalidRuleError(formatIssues(parsed.error.issues, path));
    }

    const hook = parsed.data;
    const issues: ValidationIssue[] = [];
    let predicates: CompiledPredicate[] = [];

    if (hook.when !== undefined) {
      const declared = parseCondition(hook.when, `${path}.when`);
      predicates = declared.map((predicate) => this.compilePredicate(predicate, `${path}.when`, 0, issues));
    } else if (hook.match) {
      predicates = hook.match.map((predicate, index) =>
        this.compilePredicate(predicate, `${path}.match[${index}]`, 0, issues),
      );
    }

    if (issues.length > 0) {
      throw new InvalidRuleError(issues);
    }

    return Object.freeze({
      event: hook.event,
      priority: hook.priority ?? defaultPriority,
      shortCircuit: hook.shortCircuit ?? false,
      timeoutMs: hook.timeoutMs,
      predicates: Object.freeze(predicates),
    });
  }

  /**
   * Compile a predicate tree. Problems are collected into `issues`; the
   * returned closure is only used when `issues` stays empty.
   */
  private compilePredicate(raw: unknown, path: string, depth: number, issues: ValidationIssue[]): CompiledPredicate {
    const never: CompiledPredicate = () => false;

    if (depth >= MAX_DEPTH) {
      issues.push({ path, message: `Predicate nesting is deeper than ${MAX_DEPTH} levels` });
      return never;
    }
    if (!isRecord(raw)) {
      issues.push({ path, message: 'Expected a predicate object' });
      return never;
    }

    if ('all' in raw || 'any' in raw) {
      const key = 'all' in raw ? 'all' : 'any';
      const list = raw[key];
      if (Object.keys(raw).length !== 1 || !Array.isArray(list) || list.length === 0) {
        issues.push({ path, message: `"${key}" must be the only key and hold a non-empty list` });
        return never;
      }
      const children = list.map((child: unknown, index: number) =>
        this.compilePredicate(child, `${path}.${key}[${index}]`, depth + 1, issues),
      );
      return key === 'all'
        ? (attributes) => children.every((child) => child(attributes))
        : (attributes) => children.some((child) => child(attributes));
    }

    if ('not' in raw) {
      if (Object.keys(raw).length !== 1) {
        issues.push({ path, message: '"not" must be the only key' });
        return never;
      }
      const inner = this.compilePredicate(raw.not, `${path}.not`, depth + 1, issues);
      return (attributes) => !inner(attributes);
    }

    const comparison = ComparisonSchema.safeParse(raw);
    if (!comparison.success) {
      issues.push(...formatIssues(comparison.error.issues, path));
      return never;
    }
    return this.compileComparison(comparison.data, path, issues);
  }

  private compileComparison(
    comparison: ComparisonDeclaration,
    path: string,
    issues: ValidationIssue[],
  ): CompiledPredicate {
    const { field, op, value, name } = comparison;
    const ignoreCase = (comparison.ignoreCase ?? false) || HOST_FIELDS.has(field);
    const never: CompiledPredicate = () => false;
    const startCount = issues.length;

    if (field === 'header' && !name) {
      issues.push({ path: `${path}.name`, message: 'Header comparisons need a header name' });
    }
    if (field !== 'header' && name !== undefined) {
      issues.push({ path: `${path}.name`, message: `"name" only applies to the header field` });
    }
    if (op === 'exists') {
      if (value !== undefined) {
        issues.push({ path: `${path}.value`, message: 'The exists operator takes no value' });
      }
    } else if (value === undefined) {
      issues.push({ path: `${path}.value`, message: `The ${op} operator needs a value` });
    }
    if (NUMERIC_FIELDS.has(field) && STRING_OPERATORS.has(op)) {
      issues.push({ path: `${path}.op`, message: `Operator ${op} does not apply to numeric field ${field}` });
    }
    if (op === 'range' && !NUMERIC_FIELDS.has(field)) {
      issues.push({ path: `${path}.op`, message: `Operator range only applies to numeric fields, not ${field}` });
    }
    if (op === 'cidr' && !IP_FIELDS.has(field)) {
      issues.push({ path: `${path}.op`, message: `Operator cidr only applies to address fields, not ${field}` });
    }
    if (issues.length > startCount) {
      return never;
    }

    const read = (attributes: Readonly<TrafficAttributes>) => readAttribute(attributes, field, name);

    if (op === 'exists') {
      return (attributes) => read(attributes) !== undefined;
    }
    if (value === undefined) {
      return never;
    }

    if (NUMERIC_FIELDS.has(field)) {
      const ranges = parsePortRanges(value);
      if (!ranges) {
        issues.push({ path: `${path}.value`, message: `"${value}" is not a number or range` });
        return never;
      }
      if (op === 'equals' && (ranges.length !== 1 || ranges[0]?.[0] !== ranges[0]?.[1])) {
        issues.push({ path: `${path}.value`, message: 'equals takes a single number; use range for ranges' });
        return never;
      }
      return (attributes) => {
        const actual = read(attributes);
        return typeof actual === 'number' && ranges.some(([low, high]) => actual >= low && actual <= high);
      };
    }

    const expected = String(value);
    const normalize = (input: string) => (ignoreCase ? input.toLowerCase() : input);
    const wanted = normalize(expected);
    const readString = (attributes: Readonly<TrafficAttributes>): string | undefined => {
      const actual = read(attributes);
      return actual === undefined ? undefined : normalize(String(actual));
    };

    switch (op) {
      case 'equals':
        return (attributes) => readString(attributes) === wanted;
      case 'prefix':
        return (attributes) => readString(attributes)?.startsWith(wanted) ?? false;
      case 'suffix':
        return (attributes) => readString(attributes)?.endsWith(wanted) ?? false;
      case 'contains':
        return (attributes) => readString(attributes)?.includes(wanted) ?? false;
      case 'pattern': {
        let regex: RegExp;
        try {
          regex = new RegExp(expected, ignoreCase ? 'i' : '');
        } catch (error) {
          issues.push({ path: `${path}.value`, message: `Invalid regular expression: ${errorMessage(error)}` });
          return never;
        }
        return (attributes) => {
          const actual = read(attributes);
          return actual !== undefined && regex.test(String(actual));
        };
      }
      case 'glob':
        return (attributes) => {
          const actual = readString(attributes);
          return actual !== undefined && minimatch(actual, wanted, { dot: true });
        };
      case 'wildcard':
        return (attributes) => {
          const actual = readString(attributes);
          return actual !== undefined && matchDomainWildcard(wanted, actual);
        };
      case 'cidr': {
        const list = buildBlockList(expected);
        if (!list) {
          issues.push({ path: `${path}.value`, message: `"${expected}" is not an address or CIDR block` });
          return never;
        }
        return (attributes) => {
          const actual = read(attributes);
          if (typeof actual !== 'string') return false;
          const version = isIP(actual);
          return version !== 0 && list.check(actual, version === 4 ? 'ipv4' : 'ipv6');
        };
      }
      default:
        issues.push({ path: `${path}.op`, message: `Operator ${op} does not apply to field ${field}` });
        return never;
    }
  }
}

export const ruleMatcher = new RuleMatcher();
