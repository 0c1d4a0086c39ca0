/**
 * Domain classifier: assigns a tactical DDD role to a type.
 */
import type { GraphQuery } from '../../graph/query.js';
import type { TypeNode } from '../../graph/types.js';
import { CompatibilityPolicy } from '../compatibility.js';
import { DefaultDecisionPolicy, type DecisionPolicy } from '../decision.js';
import { CriteriaEngine } from '../engine.js';
import { CriteriaProfile } from '../profile.js';
import { classified, conflict, unclassified } from '../result.js';
import type { ClassificationResult } from '../types.js';
import { defaultDomainCriteria, type DomainCriteria } from './criteria.js';
import type { DomainKind } from './kinds.js';

export interface DomainClassifierOptions {
  criteria?: readonly DomainCriteria[];
  profile?: CriteriaProfile;
  decisionPolicy?: DecisionPolicy<DomainKind>;
  compatibility?: CompatibilityPolicy<DomainKind>;
}

export class DomainClassifier {
  private readonly engine: CriteriaEngine<DomainKind, DomainCriteria>;

  constructor(options: DomainClassifierOptions = {}) {
    this.engine = new CriteriaEngine<DomainKind, DomainCriteria>(
      options.criteria ?? DomainClassifier.defaultCriteria(),
      options.profile ?? CriteriaProfile.legacy(),
      options.decisionPolicy ?? new DefaultDecisionPolicy<DomainKind>(),
      options.compatibility ?? CompatibilityPolicy.domainDefault()
    );
  }

  static defaultCriteria(): DomainCriteria[] {
    return defaultDomainCriteria();
  }

  classify(node: TypeNode, query: GraphQuery): ClassificationResult {
    if (node.form === 'ANNOTATION') {
      return unclassified(node.id, 'DOMAIN');
    }
    const decision = this.engine.classify(node, query);
    switch (decision.status) {
      case 'WINNER':
        return decision.winner
          ? classified(node.id, 'DOMAIN', decision.winner, decision.conflicts)
          : unclassified(node.id, 'DOMAIN');
      case 'CONFLICT':
        return conflict(node.id, 'DOMAIN', decision.conflicts);
      case 'EMPTY':
        return unclassified(node.id, 'DOMAIN');
    }
  }
}
