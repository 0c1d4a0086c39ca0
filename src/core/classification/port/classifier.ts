/**
 * Port classifier: recognises hexagonal ports among interfaces and records
 * their direction.
 */
import type { GraphQuery } from '../../graph/query.js';
import type { TypeNode } from '../../graph/types.js';
import { CompatibilityPolicy } from '../compatibility.js';
import type { Contribution } from '../contribution.js';
import { DefaultDecisionPolicy, type DecisionPolicy } from '../decision.js';
import { CriteriaEngine, defaultContributionBuilder } from '../engine.js';
import { CriteriaProfile } from '../profile.js';
import { classified, conflict, unclassified } from '../result.js';
import type { ClassificationResult } from '../types.js';
import { defaultPortCriteria, isPortCandidate, type PortCriteria } from './criteria.js';
import { DIRECTION_KEY, isPortDirection, type PortDirection, type PortKind } from './kinds.js';

export interface PortClassifierOptions {
  criteria?: readonly PortCriteria[];
  profile?: CriteriaProfile;
  decisionPolicy?: DecisionPolicy<PortKind>;
  compatibility?: CompatibilityPolicy<PortKind>;
}

export function directionOf(contribution: Contribution<PortKind>): PortDirection | undefined {
  const direction = contribution.metadata(DIRECTION_KEY);
  return isPortDirection(direction) ? direction : undefined;
}

export class PortClassifier {
  private readonly engine: CriteriaEngine<PortKind, PortCriteria>;

  constructor(options: PortClassifierOptions = {}) {
    this.engine = new CriteriaEngine<PortKind, PortCriteria>(
      options.criteria ?? PortClassifier.defaultCriteria(),
      options.profile ?? CriteriaProfile.legacy(),
      options.decisionPolicy ?? new DefaultDecisionPolicy<PortKind>(),
      options.compatibility ?? CompatibilityPolicy.portDefault(),
      (criteria, match, priority) =>
        defaultContributionBuilder(criteria, match, priority).withMetadata(DIRECTION_KEY, criteria.direction)
    );
  }

  static defaultCriteria(): PortCriteria[] {
    return defaultPortCriteria();
  }

  classify(node: TypeNode, query: GraphQuery): ClassificationResult {
    if (!isPortCandidate(node)) {
      return unclassified(node.id, 'PORT');
    }
    const decision = this.engine.classify(node, query);
    switch (decision.status) {
      case 'WINNER':
        return decision.winner
          ? classified(node.id, 'PORT', decision.winner, decision.conflicts, directionOf(decision.winner))
          : unclassified(node.id, 'PORT');
      case 'CONFLICT':
        return conflict(node.id, 'PORT', decision.conflicts);
      case 'EMPTY':
        return unclassified(node.id, 'PORT');
    }
  }
}
