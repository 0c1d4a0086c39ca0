/**
 * Edge factories and edge-kind groupings.
 */
import type { NodeId } from './ids.js';
import type { DerivedEdge, Edge, EdgeKind, EdgeProof, RawEdge } from './types.js';

export function rawEdge(from: NodeId, to: NodeId, kind: EdgeKind): RawEdge {
  return { from, to, kind, origin: 'RAW' };
}

export function derivedEdge(from: NodeId, to: NodeId, kind: EdgeKind, proof: EdgeProof): DerivedEdge {
  return { from, to, kind, origin: 'DERIVED', proof };
}

/**
 * Identity of an edge for duplicate detection: (from, to, kind).
 */
export function edgeKey(from: NodeId, to: NodeId, kind: EdgeKind): string {
  return `${from.value}|${kind}|${to.value}`;
}

/** Edge kinds that link a type to the types it is built from. */
export const STRUCTURAL_MEMBER_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>([
  'FIELD_TYPE',
  'TYPE_ARGUMENT',
  'RETURN_TYPE',
  'PARAMETER_TYPE',
  'USES_AS_COLLECTION_ELEMENT',
]);

export function isStructuralMemberEdge(edge: Edge): boolean {
  return STRUCTURAL_MEMBER_KINDS.has(edge.kind);
}

export function describeEdge(edge: Edge): string {
  return `${edge.from.value} -[${edge.kind}/${edge.origin}]-> ${edge.to.value}`;
}
