/**
 * Type-level stability: unstable types should depend on more stable ones.
 */
import type { ApplicationGraph } from '../graph/graph.js';
import type { TypeNode } from '../graph/types.js';
import { referencesFrom, referencesTo } from './dependencies.js';
import type { StabilityViolation } from './types.js';

/** Ce / (Ca + Ce) over distinct REFERENCES neighbours; 0 when isolated. */
export function typeInstability(graph: ApplicationGraph, type: TypeNode): number {
  const ce = referencesFrom(graph, type).size;
  const ca = referencesTo(graph, type).size;
  const total = ca + ce;
  return total === 0 ? 0 : ce / total;
}

export function findStabilityViolations(graph: ApplicationGraph): StabilityViolation[] {
  const cache = new Map<string, number>();
  const instabilityOf = (type: TypeNode): number => {
    let value = cache.get(type.id.value);
    if (value === undefined) {
      value = typeInstability(graph, type);
      cache.set(type.id.value, value);
    }
    return value;
  };

  const violations: StabilityViolation[] = [];
  for (const edge of graph.edges('REFERENCES')) {
    const from = graph.typeNode(edge.from);
    const to = graph.typeNode(edge.to);
    if (!from || !to) {
      continue;
    }
    const fromInstability = instabilityOf(from);
    const toInstability = instabilityOf(to);
    if (fromInstability > toInstability) {
      violations.push({ fromType: from.qualifiedName, toType: to.qualifiedName, fromInstability, toInstability });
    }
  }
  return violations;
}
