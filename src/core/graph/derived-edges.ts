/**
 * Derived-edge computation.
 *
 * USES_IN_SIGNATURE: interface -> each known type appearing in a method's
 * parameter or return type, generic arguments included.
 *
 * USES_AS_COLLECTION_ELEMENT: declaring type -> element type of a field
 * typed as a collection or optional wrapper.
 *
 * Every derived edge carries a proof naming the member it came from. An edge
 * already present with the same (from, to, kind) is skipped, so running the
 * computation again adds nothing.
 */
import { logger } from '../../utils/logger.js';
import { derivedEdge } from './edges.js';
import type { ApplicationGraph } from './graph.js';
import type { NodeId } from './ids.js';
import { isInterface } from './nodes.js';
import { isPrimitive, isVoid, referencedNames, type TypeRef } from './type-ref.js';
import type { DerivationRule, EdgeKind, EdgeProof, FieldNode, MethodNode, TypeNode } from './types.js';

export interface ContainerTypes {
  /** Raw names unwrapped with the COLLECTION_UNWRAP rule */
  collections: readonly string[];
  /** Raw names unwrapped with the OPTIONAL_UNWRAP rule */
  optionals: readonly string[];
}

export const DEFAULT_CONTAINER_TYPES: ContainerTypes = {
  collections: [
    'java.util.List',
    'java.util.Set',
    'java.util.Collection',
    'java.lang.Iterable',
    'java.util.SortedSet',
    'java.util.Queue',
    'java.util.Deque',
  ],
  optionals: ['java.util.Optional'],
};

export class DerivedEdgeComputer {
  private readonly log = logger.child('derive');
  private readonly collections: ReadonlySet<string>;
  private readonly optionals: ReadonlySet<string>;

  constructor(containerTypes: Partial<ContainerTypes> = {}) {
    this.collections = new Set(containerTypes.collections ?? DEFAULT_CONTAINER_TYPES.collections);
    this.optionals = new Set(containerTypes.optionals ?? DEFAULT_CONTAINER_TYPES.optionals);
  }

  /**
   * Add derived edges to the graph.
   * @returns number of edges added by this run
   */
  compute(graph: ApplicationGraph): number {
    let added = 0;
    for (const type of graph.typeNodes()) {
      if (isInterface(type)) {
        for (const method of graph.methodsOf(type)) {
          added += this.addSignatureUsages(graph, type, method);
        }
      }
      for (const field of graph.fieldsOf(type)) {
        added += this.addElementUsage(graph, type, field);
      }
    }
    this.log.debug(`Derived ${added} edges`);
    return added;
  }

  private addSignatureUsages(graph: ApplicationGraph, owner: TypeNode, method: MethodNode): number {
    let added = 0;
    method.parameters.forEach((parameter, index) => {
      added += this.addUsages(graph, owner, method, parameter.type, `param:${index}`);
    });
    if (!isVoid(method.returnType)) {
      added += this.addUsages(graph, owner, method, method.returnType, 'return');
    }
    return added;
  }

  private addUsages(
    graph: ApplicationGraph,
    owner: TypeNode,
    method: MethodNode,
    ref: TypeRef,
    via: string
  ): number {
    if (isPrimitive(ref)) {
      return 0;
    }
    let added = 0;
    for (const name of referencedNames(ref)) {
      const target = graph.typeNode(name);
      if (target && !target.id.equals(owner.id)) {
        const proof: EdgeProof = { sourceId: method.id, via, rule: 'SIGNATURE_USAGE' };
        added += addIfAbsent(graph, owner.id, target.id, 'USES_IN_SIGNATURE', proof);
      }
    }
    return added;
  }

  private addElementUsage(graph: ApplicationGraph, owner: TypeNode, field: FieldNode): number {
    const rule = this.unwrapRule(field.type);
    const element = field.type.arguments[0];
    if (!rule || !element) {
      return 0;
    }
    const target = graph.typeNode(element.name);
    if (!target || target.id.equals(owner.id)) {
      return 0;
    }
    const proof: EdgeProof = { sourceId: field.id, via: `field:${field.name}`, rule };
    return addIfAbsent(graph, owner.id, target.id, 'USES_AS_COLLECTION_ELEMENT', proof);
  }

  private unwrapRule(ref: TypeRef): DerivationRule | undefined {
    if (ref.arrayDimensions > 0) return undefined;
    if (this.collections.has(ref.name)) return 'COLLECTION_UNWRAP';
    if (this.optionals.has(ref.name)) return 'OPTIONAL_UNWRAP';
    return undefined;
  }
}

function addIfAbsent(
  graph: ApplicationGraph,
  from: NodeId,
  to: NodeId,
  kind: EdgeKind,
  proof: EdgeProof
): number {
  if (graph.containsEdge(from, to, kind)) {
    return 0;
  }
  graph.addEdge(derivedEdge(from, to, kind, proof));
  return 1;
}
