/**
 * Shared classification types.
 */
import type { NodeId } from '../graph/ids.js';
import type { DomainKind } from './domain/kinds.js';
import type { PortDirection, PortKind } from './port/kinds.js';

/** Ordinal strength of a match, strongest first. */
export type ConfidenceLevel = 'EXPLICIT' | 'HIGH' | 'MEDIUM' | 'LOW';

export type EvidenceType = 'NAMING' | 'STRUCTURAL' | 'RELATIONSHIP' | 'ANNOTATION';

/**
 * Why a criterion matched: a message plus the nodes it points at.
 */
export interface Evidence {
  type: EvidenceType;
  description: string;
  relatedNodes: readonly NodeId[];
}

export type ConflictSeverity = 'ERROR' | 'WARNING';

/**
 * A contribution that lost to the winner and named a different kind.
 */
export interface Conflict {
  competingKind: string;
  competingCriteria: string;
  competingConfidence: ConfidenceLevel;
  competingPriority: number;
  rationale: string;
  severity: ConflictSeverity;
}

export type ClassificationTarget = 'DOMAIN' | 'PORT';

export type ClassificationStatus = 'CLASSIFIED' | 'UNCLASSIFIED' | 'CONFLICT';

export type ClassificationKind = DomainKind | PortKind;

export interface ClassifiedResult {
  status: 'CLASSIFIED';
  nodeId: NodeId;
  target: ClassificationTarget;
  kind: ClassificationKind;
  confidence: ConfidenceLevel;
  criteriaName: string;
  priority: number;
  justification: string;
  evidence: readonly Evidence[];
  conflicts: readonly Conflict[];
  /** Set for port classifications only */
  portDirection?: PortDirection;
}

export interface UnclassifiedResult {
  status: 'UNCLASSIFIED';
  nodeId: NodeId;
  target: ClassificationTarget;
}

export interface ConflictResult {
  status: 'CONFLICT';
  nodeId: NodeId;
  target: ClassificationTarget;
  conflicts: readonly Conflict[];
}

export type ClassificationResult = ClassifiedResult | UnclassifiedResult | ConflictResult;
