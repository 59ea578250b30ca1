/**
 * Rules Module
 *
 * Declarative hook rules: validation, compilation and matching.
 */

export { RuleMatcher, ruleMatcher, DEFAULT_PRIORITY, matchDomainWildcard, parsePortRanges } from './matcher.js';
export { parseCondition } from './condition-parser.js';
export * from './types.js';
