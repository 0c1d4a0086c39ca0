/**
 * The application graph: owner of every node and edge.
 *
 * Insertion enforces the graph contract:
 * - node ids are unique
 * - edge endpoints exist before the edge is added
 * - DERIVED edges carry a proof, RAW edges never do
 *
 * Nodes and edges are never removed or mutated once inserted, and iteration
 * follows insertion order.
 */
import { GraphInvariantError, ErrorCodes } from '../../utils/errors.js';
import { describeEdge, edgeKey } from './edges.js';
import { NodeId } from './ids.js';
import { GraphIndexes } from './indexes.js';
import { DefaultGraphQuery, type GraphQuery } from './query.js';
import type {
  ConstructorNode,
  DerivedEdge,
  Edge,
  EdgeKind,
  FieldNode,
  GraphMetadata,
  MemberNode,
  MethodNode,
  Node,
  RawEdge,
  TypeNode,
} from './types.js';

const EMPTY: readonly never[] = [];

export function defaultMetadata(basePackage = ''): GraphMetadata {
  return {
    basePackage,
    sourceUnitCount: 0,
    style: 'UNKNOWN',
    styleConfidence: 'LOW',
    detectedPatterns: {},
  };
}

export class ApplicationGraph {
  private readonly nodesById = new Map<string, Node>();
  private readonly typesByName = new Map<string, TypeNode>();
  private readonly allEdges: Edge[] = [];
  private readonly outgoing = new Map<string, Edge[]>();
  private readonly incoming = new Map<string, Edge[]>();
  private readonly byKind = new Map<EdgeKind, Edge[]>();
  private readonly edgeKeys = new Set<string>();
  private readonly graphIndexes = new GraphIndexes();
  private graphQuery?: GraphQuery;
  private graphMetadata: GraphMetadata;
  private types = 0;

  constructor(metadata: GraphMetadata = defaultMetadata()) {
    this.graphMetadata = metadata;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  addNode(node: Node): void {
    if (this.nodesById.has(node.id.value)) {
      throw new GraphInvariantError(
        ErrorCodes.DUPLICATE_NODE,
        `Duplicate node id: ${node.id.value}`,
        { nodeId: node.id.value }
      );
    }
    if (node.kind !== 'type' && !this.nodesById.has(node.declaringType.value)) {
      throw new GraphInvariantError(
        ErrorCodes.DANGLING_EDGE,
        `Member ${node.id.value} declared by unknown type ${node.declaringType.value}`,
        { nodeId: node.id.value, declaringType: node.declaringType.value }
      );
    }

    this.nodesById.set(node.id.value, node);
    if (node.kind === 'type') {
      this.typesByName.set(node.qualifiedName, node);
      this.types++;
    }
    this.graphIndexes.indexNode(node);
  }

  addEdge(edge: Edge): void {
    const missing = [edge.from, edge.to].filter((id) => !this.nodesById.has(id.value));
    if (missing.length > 0) {
      throw new GraphInvariantError(
        ErrorCodes.DANGLING_EDGE,
        `Edge ${describeEdge(edge)} references missing node(s): ${missing.map((id) => id.value).join(', ')}`,
        { from: edge.from.value, to: edge.to.value, kind: edge.kind }
      );
    }
    const details = { from: edge.from.value, to: edge.to.value, kind: edge.kind };
    if (edge.origin === 'RAW' && edge.proof !== undefined) {
      throw new GraphInvariantError(
        ErrorCodes.PROOF_MISMATCH,
        `RAW edge ${describeEdge(edge)} must not carry a proof`,
        details
      );
    }
    if (edge.origin === 'DERIVED' && !edge.proof) {
      throw new GraphInvariantError(
        ErrorCodes.PROOF_MISMATCH,
        `DERIVED edge ${describeEdge(edge)} requires a proof`,
        details
      );
    }

    this.allEdges.push(edge);
    appendTo(this.outgoing, edge.from.value, edge);
    appendTo(this.incoming, edge.to.value, edge);
    appendTo(this.byKind, edge.kind, edge);
    this.edgeKeys.add(edgeKey(edge.from, edge.to, edge.kind));
    this.graphIndexes.indexEdge(edge);
  }

  setMetadata(metadata: GraphMetadata): void {
    this.graphMetadata = metadata;
  }

  // ---------------------------------------------------------------------------
  // Node access
  // ---------------------------------------------------------------------------

  get metadata(): GraphMetadata {
    return this.graphMetadata;
  }

  node(id: NodeId): Node | undefined {
    return this.nodesById.get(id.value);
  }

  containsNode(id: NodeId): boolean {
    return this.nodesById.has(id.value);
  }

  /**
   * Look a type up by id or by qualified name.
   */
  typeNode(idOrName: NodeId | string): TypeNode | undefined {
    if (typeof idOrName === 'string') {
      return this.typesByName.get(idOrName);
    }
    const node = this.nodesById.get(idOrName.value);
    return node?.kind === 'type' ? node : undefined;
  }

  fieldNode(id: NodeId): FieldNode | undefined {
    const node = this.nodesById.get(id.value);
    return node?.kind === 'field' ? node : undefined;
  }

  methodNode(id: NodeId): MethodNode | undefined {
    const node = this.nodesById.get(id.value);
    return node?.kind === 'method' ? node : undefined;
  }

  constructorNode(id: NodeId): ConstructorNode | undefined {
    const node = this.nodesById.get(id.value);
    return node?.kind === 'ctor' ? node : undefined;
  }

  nodes(): Node[] {
    return Array.from(this.nodesById.values());
  }

  typeNodes(): TypeNode[] {
    return Array.from(this.typesByName.values());
  }

  memberNodes(): MemberNode[] {
    const members: MemberNode[] = [];
    for (const node of this.nodesById.values()) {
      if (node.kind !== 'type') {
        members.push(node);
      }
    }
    return members;
  }

  membersOf(type: TypeNode | NodeId): readonly MemberNode[] {
    return this.graphIndexes.membersOf(type instanceof NodeId ? type : type.id);
  }

  fieldsOf(type: TypeNode | NodeId): FieldNode[] {
    return this.membersOf(type).filter((m): m is FieldNode => m.kind === 'field');
  }

  methodsOf(type: TypeNode | NodeId): MethodNode[] {
    return this.membersOf(type).filter((m): m is MethodNode => m.kind === 'method');
  }

  constructorsOf(type: TypeNode | NodeId): ConstructorNode[] {
    return this.membersOf(type).filter((m): m is ConstructorNode => m.kind === 'ctor');
  }

  supertypeOf(type: TypeNode): TypeNode | undefined {
    const id = this.graphIndexes.supertypeOf(type.id);
    return id ? this.typeNode(id) : undefined;
  }

  interfacesOf(type: TypeNode): TypeNode[] {
    return this.resolveTypes(this.graphIndexes.interfacesOf(type.id));
  }

  // ---------------------------------------------------------------------------
  // Edge access
  // ---------------------------------------------------------------------------

  edges(kind?: EdgeKind): readonly Edge[] {
    if (kind === undefined) {
      return this.allEdges;
    }
    return this.byKind.get(kind) ?? EMPTY;
  }

  edgesFrom(id: NodeId): readonly Edge[] {
    return this.outgoing.get(id.value) ?? EMPTY;
  }

  edgesTo(id: NodeId): readonly Edge[] {
    return this.incoming.get(id.value) ?? EMPTY;
  }

  rawEdges(): RawEdge[] {
    return this.allEdges.filter((e): e is RawEdge => e.origin === 'RAW');
  }

  derivedEdges(): DerivedEdge[] {
    return this.allEdges.filter((e): e is DerivedEdge => e.origin === 'DERIVED');
  }

  containsEdge(from: NodeId, to: NodeId, kind: EdgeKind): boolean {
    return this.edgeKeys.has(edgeKey(from, to, kind));
  }

  // ---------------------------------------------------------------------------
  // Counts, indexes, query
  // ---------------------------------------------------------------------------

  get nodeCount(): number {
    return this.nodesById.size;
  }

  get typeCount(): number {
    return this.types;
  }

  get memberCount(): number {
    return this.nodesById.size - this.types;
  }

  get edgeCount(): number {
    return this.allEdges.length;
  }

  indexes(): GraphIndexes {
    return this.graphIndexes;
  }

  query(): GraphQuery {
    if (!this.graphQuery) {
      this.graphQuery = new DefaultGraphQuery(this);
    }
    return this.graphQuery;
  }

  /** @internal */
  resolveTypes(ids: readonly NodeId[]): TypeNode[] {
    const result: TypeNode[] = [];
    for (const id of ids) {
      const type = this.typeNode(id);
      if (type) {
        result.push(type);
      }
    }
    return result;
  }
}

function appendTo<K>(map: Map<K, Edge[]>, key: K, edge: Edge): void {
  const list = map.get(key);
  if (list) {
    list.push(edge);
  } else {
    map.set(key, [edge]);
  }
}
