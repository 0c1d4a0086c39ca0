/**
 * Builds the application graph from a source model.
 *
 * Passes:
 *   1.   type nodes, sorted by qualified name
 *   1.5  package-organization style, stored in the metadata
 *   2.   members and RAW structural edges
 *   2.5  REFERENCES edges between types
 *   3.   DERIVED edges
 *
 * References to types outside the model are dropped without error.
 */
import { logger } from '../../utils/logger.js';
import type { SourceModel, TypeDeclaration } from '../model/schema.js';
import { DerivedEdgeComputer, type ContainerTypes } from './derived-edges.js';
import { rawEdge } from './edges.js';
import { ApplicationGraph } from './graph.js';
import { NodeId, compareNames } from './ids.js';
import {
  createConstructorNode,
  createFieldNode,
  createMethodNode,
  createTypeNode,
} from './nodes.js';
import { StyleDetector } from './style.js';
import { isPrimitive, isVoid, nestedArguments, referencedNames, type TypeRef } from './type-ref.js';
import type { EdgeKind, GraphMetadata, TypeNode } from './types.js';

export interface GraphBuildOptions {
  /** Run the derived-edge pass (default true) */
  computeDerivedEdges?: boolean;
  /** Container types unwrapped by the derived-edge pass */
  containerTypes?: Partial<ContainerTypes>;
}

export class GraphBuilder {
  private readonly log = logger.child('graph');
  private readonly styleDetector = new StyleDetector();

  constructor(private readonly options: GraphBuildOptions = {}) {}

  build(model: SourceModel): ApplicationGraph {
    this.log.info(`Building graph from ${model.types.length} types`);

    const declarations = [...model.types].sort((a, b) => compareNames(a.qualifiedName, b.qualifiedName));
    const graph = new ApplicationGraph();

    // Pass 1: type nodes
    for (const declaration of declarations) {
      graph.addNode(this.createTypeNode(declaration));
    }
    const knownTypes = new Set(declarations.map((d) => d.qualifiedName));
    this.log.debug(`Pass 1 complete: ${graph.typeCount} types`);

    // Pass 1.5: style detection
    const style = this.styleDetector.detect(graph.typeNodes(), model.basePackage);
    const metadata: GraphMetadata = {
      basePackage: model.basePackage,
      languageLevel: model.languageLevel,
      sourceUnitCount: model.sourceUnitCount ?? declarations.length,
      style: style.style,
      styleConfidence: style.confidence,
      detectedPatterns: style.detectedPatterns,
    };
    graph.setMetadata(metadata);
    this.log.debug(`Pass 1.5 complete: detected style ${style.style} with ${style.confidence} confidence`);

    // Pass 2: members and structural edges
    for (const declaration of declarations) {
      this.addMembersAndEdges(graph, declaration, knownTypes);
    }
    this.log.debug(`Pass 2 complete: ${graph.memberCount} members, ${graph.edgeCount} edges`);

    // Pass 2.5: type-level dependencies
    for (const declaration of declarations) {
      this.addReferences(graph, declaration, knownTypes);
    }

    // Pass 3: derived edges
    if (this.options.computeDerivedEdges ?? true) {
      new DerivedEdgeComputer(this.options.containerTypes).compute(graph);
      this.log.debug(`Pass 3 complete: ${graph.edgeCount} total edges`);
    }

    this.log.info(`Graph built: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
    return graph;
  }

  // ---------------------------------------------------------------------------
  // Pass 1
  // ---------------------------------------------------------------------------

  private createTypeNode(declaration: TypeDeclaration): TypeNode {
    return createTypeNode({
      qualifiedName: declaration.qualifiedName,
      form: declaration.form,
      modifiers: declaration.modifiers,
      annotations: declaration.annotations,
      superType: declaration.superType,
      interfaces: declaration.interfaces,
      sourceFile: declaration.sourceFile,
    });
  }

  // ---------------------------------------------------------------------------
  // Pass 2
  // ---------------------------------------------------------------------------

  private addMembersAndEdges(
    graph: ApplicationGraph,
    declaration: TypeDeclaration,
    knownTypes: ReadonlySet<string>
  ): void {
    const owner = declaration.qualifiedName;
    const typeId = NodeId.forType(owner);
    const link = (from: NodeId, ref: TypeRef, kind: EdgeKind): void => {
      if (!isPrimitive(ref) && !isVoid(ref) && knownTypes.has(ref.name)) {
        addEdgeOnce(graph, from, NodeId.forType(ref.name), kind);
      }
    };
    const linkArguments = (from: NodeId, ref: TypeRef): void => {
      for (const arg of nestedArguments(ref)) {
        link(from, arg, 'TYPE_ARGUMENT');
      }
    };

    if (declaration.superType && declaration.superType.name !== owner) {
      link(typeId, declaration.superType, 'EXTENDS');
    }
    for (const iface of declaration.interfaces) {
      link(typeId, iface, 'IMPLEMENTS');
    }

    for (const field of declaration.fields) {
      const node = createFieldNode(owner, field.name, field.type, field.modifiers, field.annotations);
      graph.addNode(node);
      addEdgeOnce(graph, typeId, node.id, 'DECLARES');
      link(node.id, field.type, 'FIELD_TYPE');
      linkArguments(node.id, field.type);
    }

    for (const method of declaration.methods) {
      const node = createMethodNode(
        owner,
        method.name,
        method.returnType,
        method.parameters,
        method.modifiers,
        method.annotations
      );
      graph.addNode(node);
      addEdgeOnce(graph, typeId, node.id, 'DECLARES');
      link(node.id, method.returnType, 'RETURN_TYPE');
      linkArguments(node.id, method.returnType);
      for (const parameter of method.parameters) {
        link(node.id, parameter.type, 'PARAMETER_TYPE');
        linkArguments(node.id, parameter.type);
      }
    }

    for (const ctor of declaration.constructors) {
      const node = createConstructorNode(owner, ctor.parameters, ctor.modifiers, ctor.annotations);
      graph.addNode(node);
      addEdgeOnce(graph, typeId, node.id, 'DECLARES');
      for (const parameter of ctor.parameters) {
        link(node.id, parameter.type, 'PARAMETER_TYPE');
        linkArguments(node.id, parameter.type);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Pass 2.5
  // ---------------------------------------------------------------------------

  private addReferences(
    graph: ApplicationGraph,
    declaration: TypeDeclaration,
    knownTypes: ReadonlySet<string>
  ): void {
    const owner = declaration.qualifiedName;
    const refs: TypeRef[] = [...declaration.interfaces];
    if (declaration.superType) {
      refs.push(declaration.superType);
    }
    for (const field of declaration.fields) {
      refs.push(field.type);
    }
    for (const method of declaration.methods) {
      refs.push(method.returnType, ...method.parameters.map((p) => p.type));
    }
    for (const ctor of declaration.constructors) {
      refs.push(...ctor.parameters.map((p) => p.type));
    }

    const targets = new Set<string>();
    for (const ref of refs) {
      for (const name of referencedNames(ref)) {
        if (name !== owner && knownTypes.has(name)) {
          targets.add(name);
        }
      }
    }

    const from = NodeId.forType(owner);
    for (const target of [...targets].sort(compareNames)) {
      addEdgeOnce(graph, from, NodeId.forType(target), 'REFERENCES');
    }
  }
}

function addEdgeOnce(graph: ApplicationGraph, from: NodeId, to: NodeId, kind: EdgeKind): void {
  if (!graph.containsEdge(from, to, kind)) {
    graph.addEdge(rawEdge(from, to, kind));
  }
}
