/**
 * Criteria engine: runs every applicable criterion against a type and hands
 * the resulting contributions to a decision policy.
 */
import type { GraphQuery } from '../graph/query.js';
import type { TypeNode } from '../graph/types.js';
import { logger as rootLogger } from '../../utils/logger.js';
import type { CompatibilityPolicy } from './compatibility.js';
import { Contribution } from './contribution.js';
import type { ClassificationCriteria, Match } from './criteria.js';
import type { Decision, DecisionPolicy } from './decision.js';
import type { CriteriaProfile } from './profile.js';

const logger = rootLogger.child('classify');

/**
 * Turns a criterion's match into a contribution. Classifiers use it to attach
 * metadata such as the port direction.
 */
export type ContributionBuilder<K extends string, C extends ClassificationCriteria<K>> = (
  criteria: C,
  match: Match<K>,
  priority: number
) => Contribution<K>;

export function defaultContributionBuilder<K extends string, C extends ClassificationCriteria<K>>(
  criteria: C,
  match: Match<K>,
  priority: number
): Contribution<K> {
  return Contribution.of(
    match.kind ?? criteria.targetKind,
    criteria.name,
    priority,
    match.confidence,
    match.justification,
    match.evidence
  );
}

export class CriteriaEngine<K extends string, C extends ClassificationCriteria<K> = ClassificationCriteria<K>> {
  private readonly criteria: readonly C[];

  constructor(
    criteria: readonly C[],
    private readonly profile: CriteriaProfile,
    private readonly decisionPolicy: DecisionPolicy<K>,
    private readonly compatibilityPolicy: CompatibilityPolicy<K>,
    private readonly contributionBuilder: ContributionBuilder<K, C> = defaultContributionBuilder
  ) {
    this.criteria = [...criteria];
  }

  evaluate(node: TypeNode, query: GraphQuery): Contribution<K>[] {
    const contributions: Contribution<K>[] = [];
    for (const criteria of this.criteria) {
      if (criteria.appliesTo && !criteria.appliesTo(node)) {
        continue;
      }
      const result = criteria.evaluate(node, query);
      if (!result.matched) {
        continue;
      }
      const priority = this.profile.resolvePriority(criteria);
      contributions.push(this.contributionBuilder(criteria, result, priority));
    }
    if (contributions.length > 0) {
      logger.debug(`${node.qualifiedName}: ${contributions.length} contribution(s)`, {
        criteria: contributions.map((c) => c.criteriaName),
      });
    }
    return contributions;
  }

  classify(node: TypeNode, query: GraphQuery): Decision<K> {
    return this.decisionPolicy.decide(this.evaluate(node, query), this.compatibilityPolicy);
  }

  criteriaList(): readonly C[] {
    return this.criteria;
  }
}
