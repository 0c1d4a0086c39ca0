/**
 * Classification result factories and the per-graph result set.
 */
import type { NodeId } from '../graph/ids.js';
import type { Contribution } from './contribution.js';
import type { PortDirection } from './port/kinds.js';
import type {
  ClassificationKind,
  ClassificationResult,
  ClassificationTarget,
  ClassifiedResult,
  Conflict,
  ConflictResult,
  UnclassifiedResult,
} from './types.js';

export function classified(
  nodeId: NodeId,
  target: ClassificationTarget,
  winner: Contribution<ClassificationKind>,
  conflicts: readonly Conflict[] = [],
  portDirection?: PortDirection
): ClassifiedResult {
  const result: ClassifiedResult = {
    status: 'CLASSIFIED',
    nodeId,
    target,
    kind: winner.kind,
    confidence: winner.confidence,
    criteriaName: winner.criteriaName,
    priority: winner.priority,
    justification: winner.justification,
    evidence: winner.evidence,
    conflicts,
  };
  if (portDirection) {
    result.portDirection = portDirection;
  }
  return result;
}

export function unclassified(nodeId: NodeId, target: ClassificationTarget): UnclassifiedResult {
  return { status: 'UNCLASSIFIED', nodeId, target };
}

export function conflict(nodeId: NodeId, target: ClassificationTarget, conflicts: readonly Conflict[]): ConflictResult {
  return { status: 'CONFLICT', nodeId, target, conflicts };
}

export function isClassified(result: ClassificationResult | undefined): result is ClassifiedResult {
  return result?.status === 'CLASSIFIED';
}

// ---------------------------------------------------------------------------
// Result set
// ---------------------------------------------------------------------------

export interface ClassificationStats {
  total: number;
  classified: number;
  unclassified: number;
  conflicts: number;
  /** kind -> number of classified types */
  byKind: Record<string, number>;
}

/**
 * Results keyed by node id, in the order they were added.
 */
export class ClassificationResults {
  private readonly results = new Map<string, ClassificationResult>();

  constructor(results: Iterable<ClassificationResult> = []) {
    for (const result of results) {
      this.add(result);
    }
  }

  add(result: ClassificationResult): void {
    this.results.set(result.nodeId.value, result);
  }

  get(nodeId: NodeId): ClassificationResult | undefined {
    return this.results.get(nodeId.value);
  }

  classifiedAs(nodeId: NodeId): ClassifiedResult | undefined {
    const result = this.get(nodeId);
    return isClassified(result) ? result : undefined;
  }

  all(): ClassificationResult[] {
    return Array.from(this.results.values());
  }

  domainResults(): ClassificationResult[] {
    return this.all().filter((r) => r.target === 'DOMAIN');
  }

  portResults(): ClassificationResult[] {
    return this.all().filter((r) => r.target === 'PORT');
  }

  ofKind(kind: ClassificationKind): ClassifiedResult[] {
    return this.all().filter((r): r is ClassifiedResult => r.status === 'CLASSIFIED' && r.kind === kind);
  }

  get size(): number {
    return this.results.size;
  }

  stats(): ClassificationStats {
    const stats: ClassificationStats = { total: 0, classified: 0, unclassified: 0, conflicts: 0, byKind: {} };
    for (const result of this.results.values()) {
      stats.total++;
      switch (result.status) {
        case 'CLASSIFIED':
          stats.classified++;
          stats.byKind[result.kind] = (stats.byKind[result.kind] ?? 0) + 1;
          break;
        case 'UNCLASSIFIED':
          stats.unclassified++;
          break;
        case 'CONFLICT':
          stats.conflicts++;
          break;
      }
    }
    return stats;
  }
}
