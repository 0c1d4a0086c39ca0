/**
 * Domain classification criteria.
 *
 * Explicit markers (annotations, marker interfaces) sit in the top band;
 * everything else is a heuristic over names, structure and relationships.
 */
import type { GraphQuery } from '../../graph/query.js';
import { hasAnyAnnotation, isClass, isEnum, isRecord } from '../../graph/nodes.js';
import { simpleNameOf } from '../../graph/type-ref.js';
import type { TypeNode } from '../../graph/types.js';
import { match, noMatch, type ClassificationCriteria, type MatchResult } from '../criteria.js';
import { annotationEvidence, namingEvidence, relationshipEvidence, structuralEvidence } from '../evidence.js';
import {
  endsWithAny,
  hasIdentityField,
  identityFields,
  instanceFields,
  isImmutable,
  isRepositoryLike,
} from '../heuristics.js';
import { CRITERIA_PRIORITIES, type CriteriaId } from '../priorities.js';
import type { DomainKind } from './kinds.js';

export type DomainCriteria = ClassificationCriteria<DomainKind>;

// ---------------------------------------------------------------------------
// Explicit markers
// ---------------------------------------------------------------------------

/** Annotation simple names -> role, in the order they are checked. */
const ROLE_ANNOTATIONS: ReadonlyArray<readonly [DomainKind, readonly string[]]> = [
  ['AGGREGATE_ROOT', ['AggregateRoot']],
  ['ENTITY', ['Entity']],
  ['VALUE_OBJECT', ['ValueObject']],
  ['IDENTIFIER', ['Identity', 'Identifier']],
  ['DOMAIN_EVENT', ['DomainEvent']],
  ['DOMAIN_SERVICE', ['DomainService']],
  ['APPLICATION_SERVICE', ['ApplicationService']],
];

/** Marker interface simple names -> role. */
const MARKER_INTERFACES: ReadonlyArray<readonly [string, DomainKind]> = [
  ['AggregateRoot', 'AGGREGATE_ROOT'],
  ['Entity', 'ENTITY'],
  ['ValueObject', 'VALUE_OBJECT'],
  ['Identifier', 'IDENTIFIER'],
  ['DomainEvent', 'DOMAIN_EVENT'],
];

function explicitAnnotation(
  name: string,
  id: CriteriaId,
  kind: DomainKind,
  annotations: readonly string[]
): DomainCriteria {
  return {
    name,
    id,
    priority: CRITERIA_PRIORITIES[id],
    targetKind: kind,
    description: `Type annotated with @${annotations.join(' or @')}`,
    evaluate(node) {
      const found = node.annotations.find((a) => annotations.includes(a.simpleName));
      if (!found) {
        return noMatch();
      }
      return match('EXPLICIT', `Annotated with @${found.simpleName}`, [
        annotationEvidence(`@${found.qualifiedName}`, [node.id]),
      ]);
    },
  };
}

export const explicitAggregateRoot = explicitAnnotation(
  'explicit-aggregate-root',
  'domain.explicit.aggregateRoot',
  'AGGREGATE_ROOT',
  ['AggregateRoot']
);

export const explicitEntity = explicitAnnotation('explicit-entity', 'domain.explicit.entity', 'ENTITY', ['Entity']);

export const explicitValueObject = explicitAnnotation(
  'explicit-value-object',
  'domain.explicit.valueObject',
  'VALUE_OBJECT',
  ['ValueObject']
);

export const explicitIdentifier = explicitAnnotation(
  'explicit-identifier',
  'domain.explicit.identifier',
  'IDENTIFIER',
  ['Identity', 'Identifier']
);

export const explicitDomainEvent = explicitAnnotation(
  'explicit-domain-event',
  'domain.explicit.domainEvent',
  'DOMAIN_EVENT',
  ['DomainEvent']
);

export const explicitDomainService = explicitAnnotation(
  'explicit-domain-service',
  'domain.explicit.domainService',
  'DOMAIN_SERVICE',
  ['DomainService']
);

export const explicitApplicationService = explicitAnnotation(
  'explicit-application-service',
  'domain.explicit.applicationService',
  'APPLICATION_SERVICE',
  ['ApplicationService']
);

export const implementsMarkerInterface: DomainCriteria = {
  name: 'implements-marker-interface',
  id: 'domain.explicit.markerInterface',
  priority: CRITERIA_PRIORITIES['domain.explicit.markerInterface'],
  targetKind: 'ENTITY',
  description: 'Implements a DDD marker interface; the role follows the marker',
  evaluate(node) {
    for (const [marker, kind] of MARKER_INTERFACES) {
      const ref = node.interfaces.find((i) => simpleNameOf(i.name) === marker);
      if (ref) {
        return match(
          'EXPLICIT',
          `Implements marker interface ${marker}`,
          [structuralEvidence(`implements ${ref.name}`, [node.id])],
          kind
        );
      }
    }
    return noMatch();
  },
};

// ---------------------------------------------------------------------------
// Heuristics
// ---------------------------------------------------------------------------

export const repositoryDominant: DomainCriteria = {
  name: 'repository-dominant',
  id: 'domain.relationship.repositoryDominant',
  priority: CRITERIA_PRIORITIES['domain.relationship.repositoryDominant'],
  targetKind: 'AGGREGATE_ROOT',
  description: 'Identified type managed through a repository interface',
  appliesTo: (node) => isClass(node) || isRecord(node),
  evaluate(node, query) {
    const repositories = query.usersInSignatureOf(node).filter(isRepositoryLike);
    if (repositories.length === 0 || !hasIdentityField(node, query)) {
      return noMatch();
    }
    return match('HIGH', `Managed by ${repositories.map((r) => r.simpleName).join(', ')} and has identity`, [
      relationshipEvidence(
        `Used in signatures of ${repositories.map((r) => r.simpleName).join(', ')}`,
        repositories.map((r) => r.id)
      ),
      structuralEvidence(
        `Identity field: ${identityFields(node, query)
          .map((f) => f.name)
          .join(', ')}`,
        [node.id]
      ),
    ]);
  },
};

export const singleIdWrapper: DomainCriteria = {
  name: 'single-id-wrapper',
  id: 'domain.structural.singleIdWrapper',
  priority: CRITERIA_PRIORITIES['domain.structural.singleIdWrapper'],
  targetKind: 'IDENTIFIER',
  description: 'Record or class wrapping exactly one value, named *Id',
  appliesTo: (node) => isClass(node) || isRecord(node),
  evaluate(node, query) {
    if (!node.simpleName.endsWith('Id') || node.simpleName === 'Id') {
      return noMatch();
    }
    const fields = instanceFields(node, query);
    if (fields.length !== 1) {
      return noMatch();
    }
    return match('HIGH', `${node.simpleName} wraps a single value`, [
      namingEvidence(`Name ends with "Id"`, [node.id]),
      structuralEvidence(`Single component: ${fields.map((f) => f.name).join(', ')}`, [node.id]),
    ]);
  },
};

/**
 * Walk supertypes and interfaces breadth-first looking for an explicitly
 * annotated ancestor.
 */
function findAnnotatedAncestor(node: TypeNode, query: GraphQuery): [TypeNode, DomainKind] | undefined {
  const visited = new Set<string>([node.id.value]);
  const queue: TypeNode[] = [];
  const enqueueParents = (type: TypeNode): void => {
    const parents = [query.supertypeOf(type), ...query.interfacesOf(type)];
    for (const parent of parents) {
      if (parent && !visited.has(parent.id.value)) {
        visited.add(parent.id.value);
        queue.push(parent);
      }
    }
  };

  enqueueParents(node);
  let current = queue.shift();
  while (current) {
    for (const [kind, annotations] of ROLE_ANNOTATIONS) {
      if (hasAnyAnnotation(current, annotations)) {
        return [current, kind];
      }
    }
    enqueueParents(current);
    current = queue.shift();
  }
  return undefined;
}

export const inheritedClassification: DomainCriteria = {
  name: 'inherited-classification',
  id: 'domain.relationship.inherited',
  priority: CRITERIA_PRIORITIES['domain.relationship.inherited'],
  targetKind: 'ENTITY',
  description: 'Inherits the role of an explicitly annotated supertype or interface',
  evaluate(node, query): MatchResult<DomainKind> {
    const found = findAnnotatedAncestor(node, query);
    if (!found) {
      return noMatch();
    }
    const [ancestor, kind] = found;
    return match(
      'HIGH',
      `Inherits ${kind} from ${ancestor.simpleName}`,
      [relationshipEvidence(`Ancestor ${ancestor.qualifiedName} is annotated`, [ancestor.id])],
      kind
    );
  },
};

export const containedEntity: DomainCriteria = {
  name: 'contained-entity',
  id: 'domain.relationship.containedEntity',
  priority: CRITERIA_PRIORITIES['domain.relationship.containedEntity'],
  targetKind: 'ENTITY',
  description: 'Identified class held by another identified type',
  appliesTo: isClass,
  evaluate(node, query) {
    if (!hasIdentityField(node, query)) {
      return noMatch();
    }
    const owners = query.containersOf(node).filter((c) => hasIdentityField(c, query));
    if (owners.length === 0) {
      return noMatch();
    }
    return match('HIGH', `Has identity and is held by ${owners.map((o) => o.simpleName).join(', ')}`, [
      relationshipEvidence(
        `Contained by ${owners.map((o) => o.simpleName).join(', ')}`,
        owners.map((o) => o.id)
      ),
    ]);
  },
};

export const embeddedValueObject: DomainCriteria = {
  name: 'embedded-value-object',
  id: 'domain.relationship.embeddedValueObject',
  priority: CRITERIA_PRIORITIES['domain.relationship.embeddedValueObject'],
  targetKind: 'VALUE_OBJECT',
  description: 'Identity-less type used as a field of another type',
  appliesTo: (node) => isClass(node) || isRecord(node) || isEnum(node),
  evaluate(node, query) {
    if (hasIdentityField(node, query)) {
      return noMatch();
    }
    const containers = query.containersOf(node);
    if (containers.length === 0) {
      return noMatch();
    }
    const identifiedContainer = containers.some((c) => hasIdentityField(c, query));
    const confidence = isImmutable(node, query) && identifiedContainer ? 'HIGH' : 'MEDIUM';
    return match(confidence, `Embedded in ${containers.map((c) => c.simpleName).join(', ')} without identity`, [
      relationshipEvidence(
        `Field type of ${containers.map((c) => c.simpleName).join(', ')}`,
        containers.map((c) => c.id)
      ),
    ]);
  },
};

export const domainEventNaming: DomainCriteria = {
  name: 'domain-event-naming',
  id: 'domain.naming.domainEvent',
  priority: CRITERIA_PRIORITIES['domain.naming.domainEvent'],
  targetKind: 'DOMAIN_EVENT',
  description: 'Class or record named *Event',
  appliesTo: (node) => isClass(node) || isRecord(node),
  evaluate(node) {
    const name = node.simpleName;
    if (!name.endsWith('Event') || name === 'Event' || name === 'DomainEvent') {
      return noMatch();
    }
    return match('MEDIUM', `${name} is named like an event`, [namingEvidence('Name ends with "Event"', [node.id])]);
  },
};

export const domainRecordValueObject: DomainCriteria = {
  name: 'domain-record-value-object',
  id: 'domain.structural.recordValueObject',
  priority: CRITERIA_PRIORITIES['domain.structural.recordValueObject'],
  targetKind: 'VALUE_OBJECT',
  description: 'Identity-less record referenced by another type',
  appliesTo: isRecord,
  evaluate(node, query) {
    if (endsWithAny(node.simpleName, ['Id', 'Event']) || hasIdentityField(node, query)) {
      return noMatch();
    }
    const containers = query.containersOf(node);
    if (containers.length === 0) {
      return noMatch();
    }
    return match('MEDIUM', `Record referenced by ${containers.map((c) => c.simpleName).join(', ')}`, [
      structuralEvidence('Record without identity', [node.id]),
    ]);
  },
};

function dependsOnRepository(node: TypeNode, query: GraphQuery): TypeNode | undefined {
  const refs = [
    ...query.fieldsOf(node).map((f) => f.type),
    ...query.constructorsOf(node).flatMap((c) => c.parameters.map((p) => p.type)),
  ];
  for (const ref of refs) {
    const type = query.type(ref.name);
    if (type && isRepositoryLike(type)) {
      return type;
    }
  }
  return undefined;
}

export const applicationServiceDependencies: DomainCriteria = {
  name: 'application-service-dependencies',
  id: 'domain.relationship.applicationService',
  priority: CRITERIA_PRIORITIES['domain.relationship.applicationService'],
  targetKind: 'APPLICATION_SERVICE',
  description: 'Service, handler or use case depending on a repository',
  appliesTo: isClass,
  evaluate(node, query) {
    if (!endsWithAny(node.simpleName, ['Service', 'Handler', 'UseCase'])) {
      return noMatch();
    }
    const repository = dependsOnRepository(node, query);
    if (!repository) {
      return noMatch();
    }
    return match('MEDIUM', `${node.simpleName} depends on ${repository.simpleName}`, [
      namingEvidence('Service-like name', [node.id]),
      relationshipEvidence(`Depends on repository ${repository.simpleName}`, [repository.id]),
    ]);
  },
};

/** All domain criteria, explicit markers first. */
export function defaultDomainCriteria(): DomainCriteria[] {
  return [
    explicitAggregateRoot,
    explicitEntity,
    explicitValueObject,
    explicitIdentifier,
    explicitDomainEvent,
    explicitDomainService,
    explicitApplicationService,
    implementsMarkerInterface,
    repositoryDominant,
    singleIdWrapper,
    inheritedClassification,
    containedEntity,
    embeddedValueObject,
    domainEventNaming,
    domainRecordValueObject,
    applicationServiceDependencies,
  ];
}
