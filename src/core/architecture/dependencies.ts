/**
 * Adjacency views of the REFERENCES edges at type, package and context level.
 */
import type { ApplicationGraph } from '../graph/graph.js';
import type { TypeNode } from '../graph/types.js';

/** Node name -> sorted, distinct successor names */
export type Adjacency = Map<string, string[]>;

function finish(raw: Map<string, Set<string>>): Adjacency {
  const adjacency: Adjacency = new Map();
  for (const name of [...raw.keys()].sort()) {
    adjacency.set(name, [...(raw.get(name) ?? [])].sort());
  }
  return adjacency;
}

/**
 * Lift REFERENCES edges between types onto groups. Edges inside a group are
 * dropped; types without a group are left out.
 */
export function groupedAdjacency(
  graph: ApplicationGraph,
  groupOf: (type: TypeNode) => string | undefined
): Adjacency {
  const raw = new Map<string, Set<string>>();
  for (const type of graph.typeNodes()) {
    const group = groupOf(type);
    if (group !== undefined && !raw.has(group)) {
      raw.set(group, new Set());
    }
  }
  for (const edge of graph.edges('REFERENCES')) {
    const from = graph.typeNode(edge.from);
    const to = graph.typeNode(edge.to);
    if (!from || !to) {
      continue;
    }
    const fromGroup = groupOf(from);
    const toGroup = groupOf(to);
    if (fromGroup === undefined || toGroup === undefined || fromGroup === toGroup) {
      continue;
    }
    raw.get(fromGroup)?.add(toGroup);
  }
  return finish(raw);
}

export function typeAdjacency(graph: ApplicationGraph): Adjacency {
  return groupedAdjacency(graph, (type) => type.qualifiedName);
}

export function packageAdjacency(graph: ApplicationGraph): Adjacency {
  return groupedAdjacency(graph, (type) => type.packageName);
}

/** Distinct type neighbours over REFERENCES, outgoing and incoming. */
export function referencesFrom(graph: ApplicationGraph, type: TypeNode): Set<string> {
  const targets = new Set<string>();
  for (const edge of graph.edgesFrom(type.id)) {
    if (edge.kind === 'REFERENCES' && edge.to.isType()) {
      targets.add(edge.to.value);
    }
  }
  return targets;
}

export function referencesTo(graph: ApplicationGraph, type: TypeNode): Set<string> {
  const sources = new Set<string>();
  for (const edge of graph.edgesTo(type.id)) {
    if (edge.kind === 'REFERENCES' && edge.from.isType()) {
      sources.add(edge.from.value);
    }
  }
  return sources;
}
