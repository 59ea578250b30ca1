/**
 * Condition String Parser
 *
 * Parses routing-rule style condition strings into predicate declarations:
 *
 *   DOMAIN-SUFFIX,example.com
 *   DST-PORT,80/443/8000-8100
 *   AND,((DOMAIN-KEYWORD,ads),(NOT,((DST-PORT,443))))
 *   MATCH
 */

import { InvalidRuleError } from '../errors/index.js';
import type { ComparisonDeclaration, PredicateDeclaration } from './types.js';

export const MAX_DEPTH = 8;

const TRAILING_PARAMS = new Set(['no-resolve', 'src']);

type ConditionType =
  | 'DOMAIN'
  | 'DOMAIN-SUFFIX'
  | 'DOMAIN-KEYWORD'
  | 'DOMAIN-REGEX'
  | 'DOMAIN-WILDCARD'
  | 'DST-PORT'
  | 'SRC-PORT'
  | 'IP-CIDR'
  | 'IP-CIDR6'
  | 'SRC-IP-CIDR';

const COMPARISONS: Record<ConditionType, (payload: string) => ComparisonDeclaration> = {
  DOMAIN: (value) => ({ field: 'host', op: 'equals', value: value.toLowerCase() }),
  'DOMAIN-SUFFIX': (value) => ({ field: 'host', op: 'suffix', value: value.toLowerCase() }),
  'DOMAIN-KEYWORD': (value) => ({ field: 'host', op: 'contains', value: value.toLowerCase() }),
  // anchored at the start only
  'DOMAIN-REGEX': (value) => ({ field: 'host', op: 'pattern', value: `^(?:${value})` }),
  'DOMAIN-WILDCARD': (value) => ({ field: 'host', op: 'wildcard', value: value.toLowerCase() }),
  'DST-PORT': (value) => ({ field: 'port', op: 'range', value }),
  'SRC-PORT': (value) => ({ field: 'clientPort', op: 'range', value }),
  'IP-CIDR': (value) => ({ field: 'serverIp', op: 'cidr', value }),
  'IP-CIDR6': (value) => ({ field: 'serverIp', op: 'cidr', value }),
  'SRC-IP-CIDR': (value) => ({ field: 'clientIp', op: 'cidr', value }),
};

function isConditionType(value: string): value is ConditionType {
  return Object.prototype.hasOwnProperty.call(COMPARISONS, value);
}

/**
 * Parse a condition string into a conjunction of predicates.
 * `MATCH` yields an empty list, which matches everything.
 */
export function parseCondition(text: string, path = 'when'): PredicateDeclaration[] {
  const trimmed = text.trim();
  if (trimmed.toUpperCase() === 'MATCH') {
    return [];
  }
  return [parseExpression(trimmed, path, 0)];
}

function fail(path: string, message: string): never {
  throw new InvalidRuleError([{ path, message }]);
}

function parseExpression(text: string, path: string, depth: number): PredicateDeclaration {
  if (depth >= MAX_DEPTH) {
    fail(path, `Condition nesting is deeper than ${MAX_DEPTH} levels`);
  }

  const comma = text.indexOf(',');
  const head = (comma === -1 ? text : text.slice(0, comma)).trim().toUpperCase();
  const rest = comma === -1 ? '' : text.slice(comma + 1).trim();

  if (head === 'AND' || head === 'OR' || head === 'NOT') {
    const groups = splitGroups(rest, path);
    const children = groups.map((group, index) => parseExpression(group, `${path}.${head}[${index}]`, depth + 1));

    if (head === 'NOT') {
      const [only] = children;
      if (children.length !== 1 || only === undefined) {
        fail(path, 'NOT takes exactly one condition');
      }
      return { not: only };
    }
    if (children.length === 0) {
      fail(path, `${head} needs at least one condition`);
    }
    return head === 'AND' ? { all: children } : { any: children };
  }

  if (head === 'MATCH') {
    fail(path, 'MATCH can only be used on its own');
  }

  if (!isConditionType(head)) {
    fail(path, `Unknown condition type "${head}"`);
  }

  const payload = stripTrailingParams(rest);
  if (!payload) {
    fail(path, `${head} needs a payload`);
  }
  return COMPARISONS[head](payload);
}

function stripTrailingParams(payload: string): string {
  const lastComma = payload.lastIndexOf(',');
  if (lastComma !== -1 && TRAILING_PARAMS.has(payload.slice(lastComma + 1).trim().toLowerCase())) {
    return payload.slice(0, lastComma).trim();
  }
  return payload.trim();
}

/**
 * Split `((a),(b,c))` into `['a', 'b,c']`.
 */
function splitGroups(text: string, path: string): string[] {
  if (!text.startsWith('(') || !text.endsWith(')')) {
    fail(path, 'Logical conditions must be wrapped in parentheses');
  }
  const inner = text.slice(1, -1).trim();
  const groups: string[] = [];
  let balance = 0;
  let start = -1;

  for (let i = 0; i < inner.length; i++) {
    const char = inner[i];
    if (char === '(') {
      if (balance === 0) start = i + 1;
      balance++;
    } else if (char === ')') {
      balance--;
      if (balance < 0) {
        fail(path, 'Mismatched parentheses');
      }
      if (balance === 0) {
        groups.push(inner.slice(start, i).trim());
      }
    } else if (balance === 0 && char !== ',' && char !== ' ') {
      fail(path, `Unexpected "${char}" between conditions`);
    }
  }

  if (balance !== 0) {
    fail(path, 'Mismatched parentheses');
  }
  return groups;
}
