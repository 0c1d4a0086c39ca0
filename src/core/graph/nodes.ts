/**
 * Node factories and predicates.
 */
import { NodeId } from './ids.js';
import { packageNameOf, simpleNameOf, type TypeRef } from './type-ref.js';
import type {
  Annotation,
  ConstructorNode,
  FieldNode,
  MethodNode,
  Modifier,
  Node,
  Parameter,
  TypeForm,
  TypeNode,
} from './types.js';

export interface TypeNodeInit {
  qualifiedName: string;
  form: TypeForm;
  modifiers?: Iterable<Modifier>;
  annotations?: readonly Annotation[];
  superType?: TypeRef;
  interfaces?: readonly TypeRef[];
  sourceFile?: string;
}

export function createTypeNode(init: TypeNodeInit): TypeNode {
  return {
    kind: 'type',
    id: NodeId.forType(init.qualifiedName),
    qualifiedName: init.qualifiedName,
    simpleName: simpleNameOf(init.qualifiedName),
    packageName: packageNameOf(init.qualifiedName),
    form: init.form,
    modifiers: new Set(init.modifiers ?? []),
    annotations: init.annotations ?? [],
    superType: init.superType,
    interfaces: init.interfaces ?? [],
    sourceFile: init.sourceFile,
  };
}

export function createFieldNode(
  declaringType: string,
  name: string,
  type: TypeRef,
  modifiers: Iterable<Modifier> = [],
  annotations: readonly Annotation[] = []
): FieldNode {
  return {
    kind: 'field',
    id: NodeId.forField(declaringType, name),
    declaringType: NodeId.forType(declaringType),
    name,
    type,
    modifiers: new Set(modifiers),
    annotations,
  };
}

/**
 * Erased parameter type as it appears in member ids: the raw name plus one
 * `[]` per array dimension. Generic arguments stay out of the id.
 */
export function signatureName(parameter: Parameter): string {
  return parameter.type.name + '[]'.repeat(parameter.type.arrayDimensions);
}

export function createMethodNode(
  declaringType: string,
  name: string,
  returnType: TypeRef,
  parameters: readonly Parameter[],
  modifiers: Iterable<Modifier> = [],
  annotations: readonly Annotation[] = []
): MethodNode {
  return {
    kind: 'method',
    id: NodeId.forMethod(declaringType, name, parameters.map(signatureName)),
    declaringType: NodeId.forType(declaringType),
    name,
    returnType,
    parameters,
    modifiers: new Set(modifiers),
    annotations,
  };
}

export function createConstructorNode(
  declaringType: string,
  parameters: readonly Parameter[],
  modifiers: Iterable<Modifier> = [],
  annotations: readonly Annotation[] = []
): ConstructorNode {
  return {
    kind: 'ctor',
    id: NodeId.forConstructor(declaringType, parameters.map(signatureName)),
    declaringType: NodeId.forType(declaringType),
    parameters,
    modifiers: new Set(modifiers),
    annotations,
  };
}

/**
 * Build an annotation from a qualified or simple name.
 */
export function annotation(qualifiedName: string, values: Record<string, unknown> = {}): Annotation {
  return { qualifiedName, simpleName: simpleNameOf(qualifiedName), values };
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function isTypeNode(node: Node): node is TypeNode {
  return node.kind === 'type';
}

export function isFieldNode(node: Node): node is FieldNode {
  return node.kind === 'field';
}

export function isMethodNode(node: Node): node is MethodNode {
  return node.kind === 'method';
}

export function isConstructorNode(node: Node): node is ConstructorNode {
  return node.kind === 'ctor';
}

export function isInterface(type: TypeNode): boolean {
  return type.form === 'INTERFACE';
}

export function isRecord(type: TypeNode): boolean {
  return type.form === 'RECORD';
}

export function isEnum(type: TypeNode): boolean {
  return type.form === 'ENUM';
}

export function isClass(type: TypeNode): boolean {
  return type.form === 'CLASS';
}

export function isAbstract(type: TypeNode): boolean {
  return type.modifiers.has('abstract');
}

export function isStatic(node: Node): boolean {
  return node.modifiers.has('static');
}

export function isFinal(node: Node): boolean {
  return node.modifiers.has('final');
}

/**
 * Annotations match by simple name: 'Entity' finds both 'ddd.annotation.Entity'
 * and 'persistence.Entity'.
 */
export function hasAnnotation(node: Node, simpleName: string): boolean {
  return node.annotations.some((a) => a.simpleName === simpleName);
}

export function hasAnyAnnotation(node: Node, simpleNames: readonly string[]): boolean {
  return simpleNames.some((name) => hasAnnotation(node, name));
}
