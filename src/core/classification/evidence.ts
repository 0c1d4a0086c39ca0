/**
 * Evidence and confidence helpers.
 */
import type { NodeId } from '../graph/ids.js';
import type { ConfidenceLevel, Evidence } from './types.js';

const CONFIDENCE_WEIGHTS: Record<ConfidenceLevel, number> = {
  EXPLICIT: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

export function confidenceWeight(level: ConfidenceLevel): number {
  return CONFIDENCE_WEIGHTS[level];
}

/**
 * Negative when `a` is weaker than `b`.
 */
export function compareConfidence(a: ConfidenceLevel, b: ConfidenceLevel): number {
  return CONFIDENCE_WEIGHTS[a] - CONFIDENCE_WEIGHTS[b];
}

export function namingEvidence(description: string, relatedNodes: readonly NodeId[] = []): Evidence {
  return { type: 'NAMING', description, relatedNodes };
}

export function structuralEvidence(description: string, relatedNodes: readonly NodeId[] = []): Evidence {
  return { type: 'STRUCTURAL', description, relatedNodes };
}

export function relationshipEvidence(description: string, relatedNodes: readonly NodeId[] = []): Evidence {
  return { type: 'RELATIONSHIP', description, relatedNodes };
}

export function annotationEvidence(description: string, relatedNodes: readonly NodeId[] = []): Evidence {
  return { type: 'ANNOTATION', description, relatedNodes };
}
