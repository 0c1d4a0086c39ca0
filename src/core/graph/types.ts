/**
 * Node, edge and metadata types of the application graph.
 */
import type { NodeId } from './ids.js';
import type { TypeRef } from './type-ref.js';

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export type TypeForm = 'CLASS' | 'INTERFACE' | 'RECORD' | 'ENUM' | 'ANNOTATION';

export type Modifier =
  | 'public'
  | 'protected'
  | 'private'
  | 'abstract'
  | 'static'
  | 'final'
  | 'default'
  | 'sealed';

export interface Annotation {
  /** Qualified name of the annotation type */
  qualifiedName: string;
  simpleName: string;
  /** Attribute values as reported by the frontend */
  values: Record<string, unknown>;
}

interface NodeBase {
  id: NodeId;
  modifiers: ReadonlySet<Modifier>;
  annotations: readonly Annotation[];
}

export interface TypeNode extends NodeBase {
  kind: 'type';
  qualifiedName: string;
  simpleName: string;
  packageName: string;
  form: TypeForm;
  superType?: TypeRef;
  interfaces: readonly TypeRef[];
  sourceFile?: string;
}

export interface FieldNode extends NodeBase {
  kind: 'field';
  declaringType: NodeId;
  name: string;
  type: TypeRef;
}

export interface Parameter {
  name: string;
  type: TypeRef;
}

export interface MethodNode extends NodeBase {
  kind: 'method';
  declaringType: NodeId;
  name: string;
  returnType: TypeRef;
  parameters: readonly Parameter[];
}

export interface ConstructorNode extends NodeBase {
  kind: 'ctor';
  declaringType: NodeId;
  parameters: readonly Parameter[];
}

export type MemberNode = FieldNode | MethodNode | ConstructorNode;
export type Node = TypeNode | MemberNode;

// ---------------------------------------------------------------------------
// Edges
// ---------------------------------------------------------------------------

export type StructuralEdgeKind =
  | 'EXTENDS'
  | 'IMPLEMENTS'
  | 'DECLARES'
  | 'FIELD_TYPE'
  | 'RETURN_TYPE'
  | 'PARAMETER_TYPE'
  | 'TYPE_ARGUMENT';

export type DerivedEdgeKind = 'USES_IN_SIGNATURE' | 'USES_AS_COLLECTION_ELEMENT';

export type EdgeKind = StructuralEdgeKind | DerivedEdgeKind | 'REFERENCES';

export type EdgeOrigin = 'RAW' | 'DERIVED';

/** Named inference rule that justified a derived edge. */
export type DerivationRule = 'SIGNATURE_USAGE' | 'COLLECTION_UNWRAP' | 'OPTIONAL_UNWRAP';

export interface EdgeProof {
  /** Member the derivation started from */
  sourceId: NodeId;
  /** Short locator inside the member, e.g. 'param:0', 'return', 'field:lines' */
  via: string;
  rule: DerivationRule;
}

export interface RawEdge {
  from: NodeId;
  to: NodeId;
  kind: EdgeKind;
  origin: 'RAW';
  proof?: undefined;
}

export interface DerivedEdge {
  from: NodeId;
  to: NodeId;
  kind: EdgeKind;
  origin: 'DERIVED';
  proof: EdgeProof;
}

export type Edge = RawEdge | DerivedEdge;

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

export type PackageOrganizationStyle =
  | 'HEXAGONAL'
  | 'BY_LAYER'
  | 'CLEAN_ARCHITECTURE'
  | 'ONION'
  | 'UNKNOWN';

export interface GraphMetadata {
  basePackage: string;
  /** Language-version marker reported by the frontend, e.g. '21' */
  languageLevel?: string;
  sourceUnitCount: number;
  style: PackageOrganizationStyle;
  styleConfidence: 'HIGH' | 'MEDIUM' | 'LOW';
  /** Marker pattern -> number of types matching it */
  detectedPatterns: Record<string, number>;
}
