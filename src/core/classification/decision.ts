/**
 * Decision policies: turn a set of contributions into a winner and conflicts.
 */
import type { CompatibilityPolicy } from './compatibility.js';
import type { Contribution } from './contribution.js';
import { compareConfidence } from './evidence.js';
import type { Conflict } from './types.js';

export type DecisionStatus = 'EMPTY' | 'WINNER' | 'CONFLICT';

export interface Decision<K extends string> {
  status: DecisionStatus;
  winner?: Contribution<K>;
  conflicts: Conflict[];
}

export interface DecisionPolicy<K extends string> {
  readonly name: string;
  decide(contributions: readonly Contribution<K>[], compatibility: CompatibilityPolicy<K>): Decision<K>;
}

/**
 * Priority descending, then confidence descending, then criteria name
 * ascending. The name makes the order total.
 */
export function compareContributions<K extends string>(a: Contribution<K>, b: Contribution<K>): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  const byConfidence = compareConfidence(b.confidence, a.confidence);
  if (byConfidence !== 0) {
    return byConfidence;
  }
  return a.criteriaName < b.criteriaName ? -1 : a.criteriaName > b.criteriaName ? 1 : 0;
}

export function rankContributions<K extends string>(contributions: readonly Contribution<K>[]): Contribution<K>[] {
  return [...contributions].sort(compareContributions);
}

function toConflict<K extends string>(
  contribution: Contribution<K>,
  reference: Contribution<K>,
  compatibility: CompatibilityPolicy<K>
): Conflict {
  return {
    competingKind: contribution.kind,
    competingCriteria: contribution.criteriaName,
    competingConfidence: contribution.confidence,
    competingPriority: contribution.priority,
    rationale: `Also matched with ${contribution.criteriaName} (priority ${contribution.priority}, ${contribution.confidence}): ${contribution.justification}`,
    severity: compatibility.areCompatible(reference.kind, contribution.kind) ? 'WARNING' : 'ERROR',
  };
}

function conflictsAgainst<K extends string>(
  ranked: readonly Contribution<K>[],
  reference: Contribution<K>,
  compatibility: CompatibilityPolicy<K>
): Conflict[] {
  return ranked
    .filter((c) => c !== reference && c.kind !== reference.kind)
    .map((c) => toConflict(c, reference, compatibility));
}

export class DefaultDecisionPolicy<K extends string> implements DecisionPolicy<K> {
  readonly name: string = 'default';

  decide(contributions: readonly Contribution<K>[], compatibility: CompatibilityPolicy<K>): Decision<K> {
    const ranked = rankContributions(contributions);
    const winner = ranked[0];
    if (!winner) {
      return { status: 'EMPTY', conflicts: [] };
    }
    return { status: 'WINNER', winner, conflicts: conflictsAgainst(ranked, winner, compatibility) };
  }
}

/**
 * Refuses to pick a winner when incompatible roles tie on both priority and
 * confidence; the name tie-break is not trusted to settle it.
 */
export class StrictDecisionPolicy<K extends string> extends DefaultDecisionPolicy<K> {
  override readonly name: string = 'strict';

  override decide(contributions: readonly Contribution<K>[], compatibility: CompatibilityPolicy<K>): Decision<K> {
    const decision = super.decide(contributions, compatibility);
    const winner = decision.winner;
    if (!winner) {
      return decision;
    }
    const top = rankContributions(contributions).filter(
      (c) => c.priority === winner.priority && c.confidence === winner.confidence
    );
    const tied = top.some((c) => !compatibility.areCompatible(winner.kind, c.kind));
    if (!tied) {
      return decision;
    }
    return {
      status: 'CONFLICT',
      conflicts: top.map((c): Conflict => ({ ...toConflict(c, winner, compatibility), severity: 'ERROR' })),
    };
  }
}

export type DecisionPolicyName = 'default' | 'strict';

export function decisionPolicyFor<K extends string>(name: DecisionPolicyName): DecisionPolicy<K> {
  return name === 'strict' ? new StrictDecisionPolicy<K>() : new DefaultDecisionPolicy<K>();
}
