/**
 * Aggregate discovery, membership and cohesion.
 *
 * Roots come from classification results when available, otherwise from
 * repository signatures. Members are the types one structural step from the
 * root: the field types (and their type arguments) the root declares, plus
 * collection elements.
 */
import type { ClassificationResults } from '../classification/result.js';
import { isClassified } from '../classification/result.js';
import { hasIdentityField, isImmutable } from '../classification/heuristics.js';
import type { ApplicationGraph } from '../graph/graph.js';
import { isStructuralMemberEdge } from '../graph/edges.js';
import { compareNames, type NodeId } from '../graph/ids.js';
import type { TypeNode } from '../graph/types.js';
import type { AggregateInfo } from './types.js';

function uniqueTypes(types: Iterable<TypeNode>): TypeNode[] {
  const byId = new Map<string, TypeNode>();
  for (const type of types) {
    byId.set(type.id.value, type);
  }
  return [...byId.values()];
}

/** Types directly held by the root. */
export function aggregateCandidates(graph: ApplicationGraph, root: TypeNode): TypeNode[] {
  const targets: NodeId[] = [];
  for (const field of graph.fieldsOf(root)) {
    for (const edge of graph.edgesFrom(field.id)) {
      if (edge.kind === 'FIELD_TYPE' || edge.kind === 'TYPE_ARGUMENT') {
        targets.push(edge.to);
      }
    }
  }
  for (const edge of graph.edgesFrom(root.id)) {
    if (edge.kind === 'USES_AS_COLLECTION_ELEMENT') {
      targets.push(edge.to);
    }
  }
  return uniqueTypes(graph.resolveTypes(targets).filter((t) => !t.id.equals(root.id)));
}

function heuristicRoots(graph: ApplicationGraph): TypeNode[] {
  const roots: TypeNode[] = [];
  for (const repository of graph.typeNodes()) {
    if (repository.form !== 'INTERFACE' || !repository.simpleName.endsWith('Repository')) {
      continue;
    }
    for (const edge of graph.edgesFrom(repository.id)) {
      if (edge.kind !== 'REFERENCES' && edge.kind !== 'USES_IN_SIGNATURE') {
        continue;
      }
      const target = graph.typeNode(edge.to);
      if (target && target.form !== 'INTERFACE') {
        roots.push(target);
      }
    }
  }
  return uniqueTypes(roots).sort((a, b) => compareNames(a.qualifiedName, b.qualifiedName));
}

export function findAggregates(graph: ApplicationGraph, classifications?: ClassificationResults): AggregateInfo[] {
  if (classifications) {
    return classifications
      .ofKind('AGGREGATE_ROOT')
      .map((result) => graph.typeNode(result.nodeId))
      .filter((root): root is TypeNode => root !== undefined)
      .map((root) => classifiedAggregate(graph, root, classifications));
  }

  const query = graph.query();
  const roots = heuristicRoots(graph);
  const rootIds = new Set(roots.map((r) => r.id.value));
  return roots.map((root) => {
    const entities: string[] = [];
    const valueObjects: string[] = [];
    for (const member of aggregateCandidates(graph, root)) {
      if (rootIds.has(member.id.value)) {
        continue;
      }
      if (hasIdentityField(member, query)) {
        entities.push(member.qualifiedName);
      } else if (isImmutable(member, query)) {
        valueObjects.push(member.qualifiedName);
      }
    }
    return { rootType: root.qualifiedName, entities, valueObjects };
  });
}

function classifiedAggregate(
  graph: ApplicationGraph,
  root: TypeNode,
  classifications: ClassificationResults
): AggregateInfo {
  const entities: string[] = [];
  const valueObjects: string[] = [];
  for (const member of aggregateCandidates(graph, root)) {
    const result = classifications.get(member.id);
    if (!isClassified(result)) {
      continue;
    }
    if (result.kind === 'ENTITY') {
      entities.push(member.qualifiedName);
    } else if (result.kind === 'VALUE_OBJECT' || result.kind === 'IDENTIFIER') {
      valueObjects.push(member.qualifiedName);
    }
  }
  return { rootType: root.qualifiedName, entities, valueObjects };
}

export function aggregateMembers(info: AggregateInfo): string[] {
  return [...info.entities, ...info.valueObjects];
}

export function aggregateContains(info: AggregateInfo, qualifiedName: string): boolean {
  return info.rootType === qualifiedName || aggregateMembers(info).includes(qualifiedName);
}

/**
 * Share of linked member pairs. Members are the root, its entities and its
 * value objects; a pair (a, b) counts once when a structural edge leaves a,
 * or one of a's members, towards b. The ratio is against m - 1 links, capped
 * at 1 and rounded to two decimals.
 */
export function aggregateCohesion(graph: ApplicationGraph, info: AggregateInfo): number {
  const members = new Set([info.rootType, ...aggregateMembers(info)]);
  if (members.size <= 1) {
    return 1;
  }

  const pairs = new Set<string>();
  for (const name of members) {
    const type = graph.typeNode(name);
    if (!type) {
      continue;
    }
    const sources: NodeId[] = [type.id, ...graph.membersOf(type).map((m) => m.id)];
    for (const source of sources) {
      for (const edge of graph.edgesFrom(source)) {
        if (!isStructuralMemberEdge(edge)) {
          continue;
        }
        const target = graph.typeNode(edge.to);
        if (target && target.qualifiedName !== name && members.has(target.qualifiedName)) {
          pairs.add(`${name}->${target.qualifiedName}`);
        }
      }
    }
  }

  const cohesion = Math.min(1, pairs.size / Math.max(1, members.size - 1));
  return Math.round(cohesion * 100) / 100;
}
