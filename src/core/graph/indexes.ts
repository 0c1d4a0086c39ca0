/**
 * Lookup indexes over the application graph.
 * Kept up to date by ApplicationGraph as nodes and edges are inserted, so
 * every lookup is a map access.
 */
import type { NodeId } from './ids.js';
import type { Edge, MemberNode, Node, TypeForm, TypeNode } from './types.js';

const EMPTY: readonly never[] = [];

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function pushUnique(map: Map<string, NodeId[]>, key: string, value: NodeId): void {
  const list = map.get(key);
  if (!list) {
    map.set(key, [value]);
  } else if (!list.some((existing) => existing.equals(value))) {
    list.push(value);
  }
}

export class GraphIndexes {
  private readonly byPackage = new Map<string, TypeNode[]>();
  private readonly byForm = new Map<TypeForm, TypeNode[]>();
  private readonly byAnnotation = new Map<string, TypeNode[]>();
  private readonly members = new Map<string, MemberNode[]>();
  private readonly declaringTypes = new Map<string, NodeId>();
  private readonly subtypes = new Map<string, NodeId[]>();
  private readonly supertypes = new Map<string, NodeId>();
  private readonly implementors = new Map<string, NodeId[]>();
  private readonly implemented = new Map<string, NodeId[]>();
  private readonly signatureUsers = new Map<string, NodeId[]>();
  private readonly fieldsByType = new Map<string, NodeId[]>();

  /** @internal called by ApplicationGraph */
  indexNode(node: Node): void {
    if (node.kind === 'type') {
      push(this.byPackage, node.packageName, node);
      push(this.byForm, node.form, node);
      for (const a of node.annotations) {
        push(this.byAnnotation, a.simpleName, node);
        if (a.qualifiedName !== a.simpleName) {
          push(this.byAnnotation, a.qualifiedName, node);
        }
      }
      return;
    }
    push(this.members, node.declaringType.value, node);
    this.declaringTypes.set(node.id.value, node.declaringType);
  }

  /** @internal called by ApplicationGraph */
  indexEdge(edge: Edge): void {
    switch (edge.kind) {
      case 'EXTENDS':
        pushUnique(this.subtypes, edge.to.value, edge.from);
        this.supertypes.set(edge.from.value, edge.to);
        break;
      case 'IMPLEMENTS':
        pushUnique(this.implementors, edge.to.value, edge.from);
        pushUnique(this.implemented, edge.from.value, edge.to);
        break;
      case 'USES_IN_SIGNATURE':
        pushUnique(this.signatureUsers, edge.to.value, edge.from);
        break;
      case 'FIELD_TYPE':
      case 'TYPE_ARGUMENT':
        if (edge.from.kind === 'field') {
          pushUnique(this.fieldsByType, edge.to.value, edge.from);
        }
        break;
      default:
        break;
    }
  }

  typesByPackage(packageName: string): readonly TypeNode[] {
    return this.byPackage.get(packageName) ?? EMPTY;
  }

  /** Package names in first-seen order. */
  packages(): string[] {
    return Array.from(this.byPackage.keys());
  }

  typesByForm(form: TypeForm): readonly TypeNode[] {
    return this.byForm.get(form) ?? EMPTY;
  }

  /** Lookup by simple or qualified annotation name. */
  typesByAnnotation(annotationName: string): readonly TypeNode[] {
    return this.byAnnotation.get(annotationName) ?? EMPTY;
  }

  membersOf(typeId: NodeId): readonly MemberNode[] {
    return this.members.get(typeId.value) ?? EMPTY;
  }

  declaringTypeOf(memberId: NodeId): NodeId | undefined {
    return this.declaringTypes.get(memberId.value);
  }

  subtypesOf(typeId: NodeId): readonly NodeId[] {
    return this.subtypes.get(typeId.value) ?? EMPTY;
  }

  supertypeOf(typeId: NodeId): NodeId | undefined {
    return this.supertypes.get(typeId.value);
  }

  implementorsOf(interfaceId: NodeId): readonly NodeId[] {
    return this.implementors.get(interfaceId.value) ?? EMPTY;
  }

  interfacesOf(typeId: NodeId): readonly NodeId[] {
    return this.implemented.get(typeId.value) ?? EMPTY;
  }

  /** Interfaces holding a USES_IN_SIGNATURE edge to the type. */
  interfacesUsingInSignature(typeId: NodeId): readonly NodeId[] {
    return this.signatureUsers.get(typeId.value) ?? EMPTY;
  }

  /** Fields whose declared type, or one of its type arguments, is the type. */
  fieldsOfType(typeId: NodeId): readonly NodeId[] {
    return this.fieldsByType.get(typeId.value) ?? EMPTY;
  }
}
