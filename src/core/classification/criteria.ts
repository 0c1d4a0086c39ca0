/**
 * Classification criteria contract.
 *
 * A criterion is an independent, side-effect-free rule that looks at one
 * type through the graph query and either abstains or proposes a kind.
 */
import type { GraphQuery } from '../graph/query.js';
import type { TypeNode } from '../graph/types.js';
import type { ConfidenceLevel, Evidence } from './types.js';

export interface NoMatch {
  matched: false;
}

export interface Match<K extends string> {
  matched: true;
  confidence: ConfidenceLevel;
  justification: string;
  evidence: readonly Evidence[];
  /** Overrides the criterion's target kind for this match */
  kind?: K;
}

export type MatchResult<K extends string> = NoMatch | Match<K>;

const NO_MATCH: NoMatch = { matched: false };

export function noMatch(): NoMatch {
  return NO_MATCH;
}

export function match<K extends string>(
  confidence: ConfidenceLevel,
  justification: string,
  evidence: readonly Evidence[] = [],
  kind?: K
): Match<K> {
  return { matched: true, confidence, justification, evidence, kind };
}

export interface ClassificationCriteria<K extends string> {
  /** Unique, human-readable name; the final tie-breaker between criteria */
  readonly name: string;
  /** Stable id used for priority overrides */
  readonly id?: string;
  /** Default priority, higher wins */
  readonly priority: number;
  readonly targetKind: K;
  readonly description: string;
  /** Precondition; criteria that do not apply are not evaluated */
  appliesTo?(node: TypeNode): boolean;
  evaluate(node: TypeNode, query: GraphQuery): MatchResult<K>;
}

// ---------------------------------------------------------------------------
// Criteria keys
// ---------------------------------------------------------------------------

export const CRITERIA_ID_PATTERN =
  /^(domain|port)\.(explicit|semantic|structural|naming|pattern|relationship|package|signature)\.[a-zA-Z]+$/;

export function isValidCriteriaId(id: string): boolean {
  return CRITERIA_ID_PATTERN.test(id);
}

/**
 * Key under which a criterion's priority can be overridden: its id when it
 * has one, otherwise its name.
 */
export function criteriaKey(criteria: Pick<ClassificationCriteria<string>, 'id' | 'name'>): string {
  return criteria.id ?? criteria.name;
}
