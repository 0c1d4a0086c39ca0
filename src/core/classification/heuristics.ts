/**
 * Structural predicates shared by the domain and port criteria and by the
 * aggregate analysis.
 */
import type { GraphQuery } from '../graph/query.js';
import { hasAnnotation, hasAnyAnnotation, isEnum, isInterface, isRecord, isStatic, isFinal } from '../graph/nodes.js';
import type { FieldNode, TypeNode } from '../graph/types.js';

const IDENTITY_ANNOTATIONS = ['Id', 'Identity', 'EmbeddedId'];
const REPOSITORY_SUFFIXES = ['Repository', 'Repositories', 'Store', 'Storage', 'Dao', 'DAO'];

export function endsWithAny(name: string, suffixes: readonly string[]): boolean {
  return suffixes.some((suffix) => name.endsWith(suffix));
}

export function lowerCamel(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toLowerCase() + name.slice(1);
}

export function instanceFields(type: TypeNode, query: GraphQuery): FieldNode[] {
  return query.fieldsOf(type).filter((field) => !isStatic(field));
}

/**
 * A non-static field named `id` or `<typeName>Id`, or one carrying an
 * identity annotation.
 */
export function isIdentityField(field: FieldNode, owner: TypeNode): boolean {
  if (isStatic(field)) {
    return false;
  }
  return (
    field.name === 'id' ||
    field.name === `${lowerCamel(owner.simpleName)}Id` ||
    hasAnyAnnotation(field, IDENTITY_ANNOTATIONS)
  );
}

export function identityFields(type: TypeNode, query: GraphQuery): FieldNode[] {
  return query.fieldsOf(type).filter((field) => isIdentityField(field, type));
}

export function hasIdentityField(type: TypeNode, query: GraphQuery): boolean {
  return identityFields(type, query).length > 0;
}

export function isRepositoryLike(type: TypeNode): boolean {
  return isInterface(type) && (endsWithAny(type.simpleName, REPOSITORY_SUFFIXES) || hasAnnotation(type, 'Repository'));
}

/** Records, enums, and classes whose instance fields are all final. */
export function isImmutable(type: TypeNode, query: GraphQuery): boolean {
  if (isRecord(type) || isEnum(type)) {
    return true;
  }
  if (isInterface(type)) {
    return false;
  }
  return instanceFields(type, query).every((field) => isFinal(field));
}

/** Dot-separated package segments. */
export function packageSegments(type: TypeNode): string[] {
  return type.packageName.length === 0 ? [] : type.packageName.split('.');
}
