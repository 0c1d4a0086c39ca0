/**
 * Default criteria priorities, keyed by criteria id.
 *
 * Bands:
 *   100  explicit in-source markers
 *   80   strong structural and naming heuristics
 *   65-75  relational and graph-shape heuristics
 *   60   weak fallbacks
 *
 * Profiles override these per id without touching the criteria.
 */
export const CRITERIA_PRIORITIES = {
  // Domain: explicit markers
  'domain.explicit.aggregateRoot': 100,
  'domain.explicit.entity': 100,
  'domain.explicit.valueObject': 100,
  'domain.explicit.identifier': 100,
  'domain.explicit.domainEvent': 100,
  'domain.explicit.domainService': 100,
  'domain.explicit.applicationService': 100,
  'domain.explicit.markerInterface': 100,
  // Domain: heuristics
  'domain.relationship.repositoryDominant': 80,
  'domain.structural.singleIdWrapper': 80,
  'domain.relationship.inherited': 75,
  'domain.relationship.containedEntity': 70,
  'domain.relationship.embeddedValueObject': 70,
  'domain.naming.domainEvent': 68,
  'domain.structural.recordValueObject': 65,
  'domain.relationship.applicationService': 60,

  // Port: explicit markers
  'port.explicit.repository': 100,
  'port.explicit.primaryPort': 100,
  'port.explicit.secondaryPort': 100,
  // Port: heuristics
  'port.naming.repository': 80,
  'port.naming.useCase': 80,
  'port.naming.gateway': 80,
  'port.naming.eventPublisher': 80,
  'port.pattern.command': 75,
  'port.pattern.query': 75,
  'port.relationship.injectedDependency': 75,
  'port.signature.drivenPort': 70,
  'port.package.in': 60,
  'port.package.out': 60,
} as const satisfies Record<string, number>;

export type CriteriaId = keyof typeof CRITERIA_PRIORITIES;

export function defaultPriority(id: CriteriaId): number {
  return CRITERIA_PRIORITIES[id];
}
