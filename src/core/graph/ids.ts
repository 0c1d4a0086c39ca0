/**
 * Stable node identifiers.
 *
 * The string form encodes the node kind, the owning type and, for members,
 * a signature:
 *
 *   type:com.acme.order.Order
 *   field:com.acme.order.Order#lines
 *   method:com.acme.order.Order#addLine(com.acme.order.Product,int)
 *   ctor:com.acme.order.Order#<init>(com.acme.order.OrderId)
 */
import { GraphInvariantError, ErrorCodes } from '../../utils/errors.js';

export type NodeIdKind = 'type' | 'field' | 'method' | 'ctor';

const NODE_ID_KINDS: readonly NodeIdKind[] = ['type', 'field', 'method', 'ctor'];

const CONSTRUCTOR_NAME = '<init>';

function isNodeIdKind(value: string): value is NodeIdKind {
  return NODE_ID_KINDS.some((kind) => kind === value);
}

export class NodeId {
  private constructor(
    public readonly kind: NodeIdKind,
    /** Qualified name of the type itself or of the declaring type. */
    public readonly typeName: string,
    /** Member part after '#', empty for types. */
    public readonly member: string,
    public readonly value: string
  ) {}

  static forType(qualifiedName: string): NodeId {
    return new NodeId('type', qualifiedName, '', `type:${qualifiedName}`);
  }

  static forField(declaringType: string, fieldName: string): NodeId {
    return new NodeId('field', declaringType, fieldName, `field:${declaringType}#${fieldName}`);
  }

  static forMethod(declaringType: string, methodName: string, parameterTypes: readonly string[]): NodeId {
    const member = `${methodName}(${parameterTypes.join(',')})`;
    return new NodeId('method', declaringType, member, `method:${declaringType}#${member}`);
  }

  static forConstructor(declaringType: string, parameterTypes: readonly string[]): NodeId {
    const member = `${CONSTRUCTOR_NAME}(${parameterTypes.join(',')})`;
    return new NodeId('ctor', declaringType, member, `ctor:${declaringType}#${member}`);
  }

  /**
   * Parse the string form produced by {@link NodeId.toString}.
   */
  static parse(value: string): NodeId {
    const colon = value.indexOf(':');
    const kind = colon > 0 ? value.slice(0, colon) : '';
    if (!isNodeIdKind(kind)) {
      throw invalid(value, 'unknown node kind');
    }
    const rest = value.slice(colon + 1);
    if (kind === 'type') {
      if (rest.length === 0 || rest.includes('#')) {
        throw invalid(value, 'type ids carry a qualified name only');
      }
      return NodeId.forType(rest);
    }

    const hash = rest.indexOf('#');
    if (hash <= 0 || hash === rest.length - 1) {
      throw invalid(value, 'member ids need <type>#<member>');
    }
    const typeName = rest.slice(0, hash);
    const member = rest.slice(hash + 1);
    if (kind === 'field') {
      return NodeId.forField(typeName, member);
    }

    const open = member.indexOf('(');
    if (open < 0 || !member.endsWith(')')) {
      throw invalid(value, 'method and constructor ids need a parameter list');
    }
    const name = member.slice(0, open);
    const paramList = member.slice(open + 1, -1);
    const params = paramList.length > 0 ? paramList.split(',') : [];
    if (kind === 'ctor') {
      if (name !== CONSTRUCTOR_NAME) {
        throw invalid(value, `constructor ids are named ${CONSTRUCTOR_NAME}`);
      }
      return NodeId.forConstructor(typeName, params);
    }
    return NodeId.forMethod(typeName, name, params);
  }

  isType(): boolean {
    return this.kind === 'type';
  }

  isMember(): boolean {
    return this.kind !== 'type';
  }

  /**
   * Id of the type that owns this node (itself for type ids).
   */
  owner(): NodeId {
    return this.isType() ? this : NodeId.forType(this.typeName);
  }

  equals(other: NodeId): boolean {
    return this.value === other.value;
  }

  compareTo(other: NodeId): number {
    if (this.value < other.value) return -1;
    if (this.value > other.value) return 1;
    return 0;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/**
 * Code-unit order over names, independent of the host locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareNodeIds(a: NodeId, b: NodeId): number {
  return a.compareTo(b);
}

function invalid(value: string, reason: string): GraphInvariantError {
  return new GraphInvariantError(
    ErrorCodes.INVALID_NODE_ID,
    `Invalid node id '${value}': ${reason}`,
    { value }
  );
}
