/**
 * Package coupling (Martin metrics) and main-sequence zones.
 */
import type { ApplicationGraph } from '../graph/graph.js';
import { isAbstract, isInterface } from '../graph/nodes.js';
import type { CouplingMetrics, ZoneClassification } from './types.js';

export function analyzePackageCoupling(graph: ApplicationGraph, packageName: string): CouplingMetrics {
  const types = graph.indexes().typesByPackage(packageName);
  if (types.length === 0) {
    return { packageName, afferentCoupling: 0, efferentCoupling: 0, abstractness: 0 };
  }

  const inside = new Set(types.map((t) => t.id.value));
  const afferent = new Set<string>();
  const efferent = new Set<string>();
  for (const edge of graph.edges('REFERENCES')) {
    if (!edge.from.isType() || !edge.to.isType()) {
      continue;
    }
    const fromInside = inside.has(edge.from.value);
    const toInside = inside.has(edge.to.value);
    if (!fromInside && toInside) {
      afferent.add(edge.from.value);
    } else if (fromInside && !toInside) {
      efferent.add(edge.to.value);
    }
  }

  const abstractCount = types.filter((t) => isInterface(t) || isAbstract(t)).length;
  return {
    packageName,
    afferentCoupling: afferent.size,
    efferentCoupling: efferent.size,
    abstractness: abstractCount / types.length,
  };
}

/** Every package of the graph, sorted by name. */
export function analyzeAllPackageCoupling(graph: ApplicationGraph): CouplingMetrics[] {
  return graph
    .indexes()
    .packages()
    .sort()
    .map((pkg) => analyzePackageCoupling(graph, pkg));
}

/** I = Ce / (Ca + Ce); 0 without dependencies either way. */
export function instability(metrics: CouplingMetrics): number {
  const total = metrics.afferentCoupling + metrics.efferentCoupling;
  return total === 0 ? 0 : metrics.efferentCoupling / total;
}

/** D = |A + I - 1| */
export function distanceFromMainSequence(metrics: CouplingMetrics): number {
  return Math.abs(metrics.abstractness + instability(metrics) - 1);
}

export function zoneOf(metrics: CouplingMetrics): ZoneClassification {
  const i = instability(metrics);
  const a = metrics.abstractness;
  if (i < 0.3 && a < 0.3) {
    return 'ZONE_OF_PAIN';
  }
  if (i > 0.7 && a > 0.7) {
    return 'ZONE_OF_USELESSNESS';
  }
  const d = distanceFromMainSequence(metrics);
  if (d < 0.1) {
    return 'MAIN_SEQUENCE';
  }
  if (d < 0.3) {
    return 'NEAR_MAIN_SEQUENCE';
  }
  return 'OFF_MAIN_SEQUENCE';
}

export function isProblematic(metrics: CouplingMetrics): boolean {
  const zone = zoneOf(metrics);
  return zone === 'ZONE_OF_PAIN' || zone === 'ZONE_OF_USELESSNESS';
}
