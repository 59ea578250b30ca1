/**
 * Rule Declaration Types
 *
 * The persisted rule configuration format, and the compiled form the
 * dispatcher evaluates.
 */

import { z } from 'zod';
import { EVENT_KINDS, type EventKind, type TrafficAttributes } from '../../hooks/types.js';

export const FIELDS = [
  'host',
  'path',
  'url',
  'method',
  'scheme',
  'port',
  'header',
  'contentType',
  'statusCode',
  'clientIp',
  'clientPort',
  'serverIp',
  'sniHost',
  'wsDirection',
] as const;

export type RuleField = (typeof FIELDS)[number];

export const NUMERIC_FIELDS: ReadonlySet<RuleField> = new Set(['port', 'statusCode', 'clientPort']);
export const IP_FIELDS: ReadonlySet<RuleField> = new Set(['clientIp', 'serverIp']);
/** Host names arrive lower-cased, so they always compare without case */
export const HOST_FIELDS: ReadonlySet<RuleField> = new Set(['host', 'sniHost']);

/**
 * The closed operator set. Anything else is rejected when the rule is compiled.
 */
export const OPERATORS = [
  'equals',
  'prefix',
  'suffix',
  'contains',
  'pattern',
  'glob',
  'wildcard',
  'range',
  'cidr',
  'exists',
] as const;

export type RuleOperator = (typeof OPERATORS)[number];

export const ComparisonSchema = z
  .object({
    field: z.enum(FIELDS),
    op: z.enum(OPERATORS),
    value: z.union([z.string(), z.number()]).optional(),
    /** Header name, only for the `header` field */
    name: z.string().min(1).optional(),
    ignoreCase: z.boolean().optional(),
  })
  .strict();

export type ComparisonDeclaration = z.infer<typeof ComparisonSchema>;

export type PredicateDeclaration =
  | ComparisonDeclaration
  | { all: PredicateDeclaration[] }
  | { any: PredicateDeclaration[] }
  | { not: PredicateDeclaration };

export const HookDeclarationSchema = z
  .object({
    event: z.enum(EVENT_KINDS),
    /** Conjunction of predicates; empty or absent matches every event of the kind */
    match: z.array(z.unknown()).optional(),
    /** Condition string, e.g. `AND,((DOMAIN-SUFFIX,example.com),(DST-PORT,443))` */
    when: z.string().min(1).optional(),
    priority: z.number().int().optional(),
    shortCircuit: z.boolean().optional(),
    timeoutMs: z.number().int().positive().optional(),
    description: z.string().optional(),
  })
  .strict()
  .refine((hook) => !(hook.match !== undefined && hook.when !== undefined), {
    message: 'Use either "match" or "when", not both',
    path: ['when'],
  });

/**
 * One hook's rule, as an addon author writes it
 */
export interface HookDeclaration {
  event: EventKind;
  match?: PredicateDeclaration[];
  when?: string;
  priority?: number;
  shortCircuit?: boolean;
  timeoutMs?: number;
  description?: string;
}

export type CompiledPredicate = (attributes: Readonly<TrafficAttributes>) => boolean;

/**
 * A validated, frozen rule ready for matching
 */
export interface CompiledRule {
  readonly event: EventKind;
  readonly priority: number;
  readonly shortCircuit: boolean;
  readonly timeoutMs?: number;
  readonly predicates: readonly CompiledPredicate[];
}
