/**
 * Port classification criteria. Each criterion fixes the direction of the
 * port it recognises.
 */
import type { GraphQuery } from '../../graph/query.js';
import { hasAnyAnnotation, isInterface } from '../../graph/nodes.js';
import { isVoid, referencedNames, simpleNameOf } from '../../graph/type-ref.js';
import type { MethodNode, TypeNode } from '../../graph/types.js';
import { match, noMatch, type ClassificationCriteria } from '../criteria.js';
import { annotationEvidence, namingEvidence, relationshipEvidence, structuralEvidence } from '../evidence.js';
import { endsWithAny, hasIdentityField, packageSegments } from '../heuristics.js';
import { CRITERIA_PRIORITIES, type CriteriaId } from '../priorities.js';
import type { PortDirection, PortKind } from './kinds.js';

export interface PortCriteria extends ClassificationCriteria<PortKind> {
  readonly direction: PortDirection;
}

const COMMAND_VERBS = [
  'create',
  'update',
  'delete',
  'remove',
  'add',
  'register',
  'cancel',
  'place',
  'submit',
  'execute',
  'process',
  'handle',
  'approve',
  'reject',
  'confirm',
  'assign',
  'change',
  'set',
];
const QUERY_VERBS = ['get', 'find', 'list', 'search', 'count', 'exists'];
const PERSISTENCE_VERBS = ['save', 'find', 'load', 'store', 'delete', 'remove', 'persist', 'update'];

function startsWithAny(name: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => name.startsWith(prefix));
}

function explicitPort(
  name: string,
  id: CriteriaId,
  kind: PortKind,
  direction: PortDirection,
  markers: readonly string[]
): PortCriteria {
  return {
    name,
    id,
    priority: CRITERIA_PRIORITIES[id],
    targetKind: kind,
    direction,
    description: `Interface marked ${markers.join(' or ')}`,
    evaluate(node) {
      if (hasAnyAnnotation(node, markers)) {
        return match('EXPLICIT', `Annotated as ${markers.join('/')}`, [
          annotationEvidence(`Annotation ${markers.join('/')}`, [node.id]),
        ]);
      }
      const parent = node.interfaces.find((ref) => markers.includes(simpleNameOf(ref.name)));
      if (parent) {
        return match('EXPLICIT', `Extends ${simpleNameOf(parent.name)}`, [
          structuralEvidence(`extends ${parent.name}`, [node.id]),
        ]);
      }
      return noMatch();
    },
  };
}

function suffixPort(
  name: string,
  id: CriteriaId,
  kind: PortKind,
  direction: PortDirection,
  suffixes: readonly string[]
): PortCriteria {
  return {
    name,
    id,
    priority: CRITERIA_PRIORITIES[id],
    targetKind: kind,
    direction,
    description: `Interface named *${suffixes.join(', *')}`,
    evaluate(node) {
      const suffix = suffixes.find((s) => node.simpleName.endsWith(s));
      if (!suffix) {
        return noMatch();
      }
      return match('HIGH', `${node.simpleName} ends with ${suffix}`, [
        namingEvidence(`Suffix "${suffix}"`, [node.id]),
      ]);
    },
  };
}

export const explicitRepository = explicitPort(
  'explicit-repository',
  'port.explicit.repository',
  'REPOSITORY',
  'DRIVEN',
  ['Repository']
);

export const explicitPrimaryPort = explicitPort(
  'explicit-primary-port',
  'port.explicit.primaryPort',
  'USE_CASE',
  'DRIVING',
  ['PrimaryPort', 'DrivingPort']
);

export const explicitSecondaryPort = explicitPort(
  'explicit-secondary-port',
  'port.explicit.secondaryPort',
  'GATEWAY',
  'DRIVEN',
  ['SecondaryPort', 'DrivenPort']
);

export const namingRepository = suffixPort('naming-repository', 'port.naming.repository', 'REPOSITORY', 'DRIVEN', [
  'Repository',
  'Repositories',
  'Store',
  'Dao',
]);

export const namingUseCase = suffixPort('naming-use-case', 'port.naming.useCase', 'USE_CASE', 'DRIVING', [
  'UseCase',
  'Service',
  'Facade',
]);

export const namingGateway = suffixPort('naming-gateway', 'port.naming.gateway', 'GATEWAY', 'DRIVEN', [
  'Gateway',
  'Client',
  'Adapter',
  'Provider',
]);

export const eventPublisherNaming = suffixPort(
  'event-publisher-naming',
  'port.naming.eventPublisher',
  'EVENT_PUBLISHER',
  'DRIVEN',
  ['EventPublisher', 'Publisher', 'EventBus']
);

function allMethods(node: TypeNode, query: GraphQuery, predicate: (method: MethodNode) => boolean): boolean {
  const methods = query.methodsOf(node);
  return methods.length > 0 && methods.every(predicate);
}

export const commandPattern: PortCriteria = {
  name: 'command-pattern',
  id: 'port.pattern.command',
  priority: CRITERIA_PRIORITIES['port.pattern.command'],
  targetKind: 'COMMAND',
  direction: 'DRIVING',
  description: 'Command handler: void methods named after state changes',
  evaluate(node, query) {
    if (endsWithAny(node.simpleName, ['CommandHandler', 'Commands'])) {
      return match('MEDIUM', `${node.simpleName} is named like a command port`, [
        namingEvidence('Command suffix', [node.id]),
      ]);
    }
    if (allMethods(node, query, (m) => isVoid(m.returnType) && startsWithAny(m.name, COMMAND_VERBS))) {
      return match('MEDIUM', 'Every method is a void command', [
        structuralEvidence('void methods with command verbs', [node.id]),
      ]);
    }
    return noMatch();
  },
};

export const queryPattern: PortCriteria = {
  name: 'query-pattern',
  id: 'port.pattern.query',
  priority: CRITERIA_PRIORITIES['port.pattern.query'],
  targetKind: 'QUERY',
  direction: 'DRIVING',
  description: 'Query port: value-returning lookup methods',
  evaluate(node, query) {
    if (endsWithAny(node.simpleName, ['QueryHandler', 'Queries'])) {
      return match('MEDIUM', `${node.simpleName} is named like a query port`, [
        namingEvidence('Query suffix', [node.id]),
      ]);
    }
    if (allMethods(node, query, (m) => !isVoid(m.returnType) && startsWithAny(m.name, QUERY_VERBS))) {
      return match('MEDIUM', 'Every method is a value-returning lookup', [
        structuralEvidence('non-void methods with query verbs', [node.id]),
      ]);
    }
    return noMatch();
  },
};

/** Classes holding the interface as a field or constructor parameter. */
function dependents(node: TypeNode, query: GraphQuery): TypeNode[] {
  const found = new Map<string, TypeNode>();
  for (const type of query.classes()) {
    const fieldUse = query.fieldsOf(type).some((f) => f.type.name === node.qualifiedName);
    const ctorUse = query
      .constructorsOf(type)
      .some((c) => c.parameters.some((p) => p.type.name === node.qualifiedName));
    if (fieldUse || ctorUse) {
      found.set(type.id.value, type);
    }
  }
  return Array.from(found.values());
}

export const injectedAsDependency: PortCriteria = {
  name: 'injected-as-dependency',
  id: 'port.relationship.injectedDependency',
  priority: CRITERIA_PRIORITIES['port.relationship.injectedDependency'],
  targetKind: 'GENERIC',
  direction: 'DRIVEN',
  description: 'Unimplemented interface injected into a class',
  evaluate(node, query) {
    if (query.implementorsOf(node).length > 0) {
      return noMatch();
    }
    const users = dependents(node, query);
    if (users.length === 0) {
      return noMatch();
    }
    return match('MEDIUM', `Injected into ${users.map((u) => u.simpleName).join(', ')} with no implementation`, [
      relationshipEvidence(
        `Dependency of ${users.map((u) => u.simpleName).join(', ')}`,
        users.map((u) => u.id)
      ),
    ]);
  },
};

function signatureTypes(node: TypeNode, query: GraphQuery): TypeNode[] {
  const seen = new Map<string, TypeNode>();
  for (const method of query.methodsOf(node)) {
    const refs = [method.returnType, ...method.parameters.map((p) => p.type)];
    for (const name of refs.flatMap(referencedNames)) {
      const type = query.type(name);
      if (type && !type.id.equals(node.id)) {
        seen.set(type.id.value, type);
      }
    }
  }
  return Array.from(seen.values());
}

export const signatureBasedDrivenPort: PortCriteria = {
  name: 'signature-based-driven-port',
  id: 'port.signature.drivenPort',
  priority: CRITERIA_PRIORITIES['port.signature.drivenPort'],
  targetKind: 'REPOSITORY',
  direction: 'DRIVEN',
  description: 'Unimplemented interface persisting identified types',
  evaluate(node, query) {
    if (query.implementorsOf(node).length > 0) {
      return noMatch();
    }
    const identified = signatureTypes(node, query).filter((t) => hasIdentityField(t, query));
    if (identified.length === 0) {
      return noMatch();
    }
    const persistence = query.methodsOf(node).find((m) => startsWithAny(m.name, PERSISTENCE_VERBS));
    if (!persistence) {
      return noMatch();
    }
    return match('MEDIUM', `Persists ${identified.map((t) => t.simpleName).join(', ')} via ${persistence.name}`, [
      relationshipEvidence(
        `Signature uses ${identified.map((t) => t.simpleName).join(', ')}`,
        identified.map((t) => t.id)
      ),
      namingEvidence(`Persistence method ${persistence.name}`, [persistence.id]),
    ]);
  },
};

function packagePort(
  name: string,
  id: CriteriaId,
  kind: PortKind,
  direction: PortDirection,
  segments: readonly string[]
): PortCriteria {
  return {
    name,
    id,
    priority: CRITERIA_PRIORITIES[id],
    targetKind: kind,
    direction,
    description: `Interface in a package segment ${segments.join('/')}`,
    evaluate(node) {
      const segment = packageSegments(node).find((s) => segments.includes(s));
      if (!segment) {
        return noMatch();
      }
      return match('LOW', `Declared in package segment "${segment}"`, [
        structuralEvidence(`Package ${node.packageName}`, [node.id]),
      ]);
    },
  };
}

export const packageIn = packagePort('package-in', 'port.package.in', 'USE_CASE', 'DRIVING', [
  'in',
  'inbound',
  'driving',
  'api',
]);

export const packageOut = packagePort('package-out', 'port.package.out', 'GATEWAY', 'DRIVEN', [
  'out',
  'outbound',
  'driven',
  'spi',
]);

export function defaultPortCriteria(): PortCriteria[] {
  return [
    explicitRepository,
    explicitPrimaryPort,
    explicitSecondaryPort,
    namingRepository,
    namingUseCase,
    namingGateway,
    eventPublisherNaming,
    commandPattern,
    queryPattern,
    injectedAsDependency,
    signatureBasedDrivenPort,
    packageIn,
    packageOut,
  ];
}

export function isPortCandidate(node: TypeNode): boolean {
  return isInterface(node);
}
