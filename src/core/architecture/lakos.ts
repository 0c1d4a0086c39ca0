/**
 * Lakos dependency metrics.
 *
 *   DependsOn(t) = number of types reachable from t over REFERENCES, t excluded
 *   CCD  = sum of DependsOn over the components
 *   ACD  = CCD / n
 *   NCCD = CCD / (n * log2 n)
 *   RACD = ACD / log2 n
 */
import type { ApplicationGraph } from '../graph/graph.js';
import type { NodeId } from '../graph/ids.js';
import type { TypeNode } from '../graph/types.js';
import type { LakosMetrics } from './types.js';

export function emptyLakosMetrics(): LakosMetrics {
  return { componentCount: 0, ccd: 0, acd: 0, nccd: 0, racd: 0 };
}

function reachableCount(graph: ApplicationGraph, start: NodeId): number {
  const visited = new Set<string>([start.value]);
  const stack: NodeId[] = [start];
  let current = stack.pop();
  while (current) {
    for (const edge of graph.edgesFrom(current)) {
      if (edge.kind === 'REFERENCES' && edge.to.isType() && !visited.has(edge.to.value)) {
        visited.add(edge.to.value);
        stack.push(edge.to);
      }
    }
    current = stack.pop();
  }
  return visited.size;
}

/** 0 for unknown types. */
export function dependsOnScore(graph: ApplicationGraph, qualifiedName: string): number {
  const type = graph.typeNode(qualifiedName);
  if (!type) {
    return 0;
  }
  return Math.max(0, reachableCount(graph, type.id) - 1);
}

export function lakosMetricsFor(graph: ApplicationGraph, types: readonly TypeNode[]): LakosMetrics {
  const n = types.length;
  if (n === 0) {
    return emptyLakosMetrics();
  }
  if (n === 1) {
    return { ...emptyLakosMetrics(), componentCount: n };
  }
  const ccd = types.reduce((sum, type) => sum + dependsOnScore(graph, type.qualifiedName), 0);
  const log2n = Math.log2(n);
  const acd = ccd / n;
  return {
    componentCount: n,
    ccd,
    acd,
    nccd: ccd / (n * log2n),
    racd: acd / log2n,
  };
}

/** Unknown names are ignored. */
export function lakosMetricsForNames(graph: ApplicationGraph, qualifiedNames: Iterable<string>): LakosMetrics {
  const types = new Map<string, TypeNode>();
  for (const name of qualifiedNames) {
    const type = graph.typeNode(name);
    if (type) {
      types.set(type.id.value, type);
    }
  }
  return lakosMetricsFor(graph, [...types.values()]);
}
