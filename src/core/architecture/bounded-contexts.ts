/**
 * Bounded contexts inferred from package names.
 *
 * With packages shaped like `com.acme.<context>.…`, the context is the third
 * segment. Shorter packages have no known context.
 */
import type { ApplicationGraph } from '../graph/graph.js';
import { compareNames } from '../graph/ids.js';
import type { TypeNode } from '../graph/types.js';
import type { BoundedContextInfo } from './types.js';

const CONTEXT_SEGMENT = 2;

export function boundedContextOf(packageName: string): string | undefined {
  const segments = packageName.split('.');
  if (segments.length <= CONTEXT_SEGMENT) {
    return undefined;
  }
  return segments[CONTEXT_SEGMENT];
}

export function contextRootPackage(packageName: string): string | undefined {
  const segments = packageName.split('.');
  if (segments.length <= CONTEXT_SEGMENT) {
    return undefined;
  }
  return segments.slice(0, CONTEXT_SEGMENT + 1).join('.');
}

export function typeContext(type: TypeNode): string | undefined {
  return boundedContextOf(type.packageName);
}

/**
 * One entry per context, sorted by name. The root package is taken from the
 * first type seen in the context.
 */
export function findBoundedContexts(graph: ApplicationGraph): BoundedContextInfo[] {
  const contexts = new Map<string, BoundedContextInfo>();
  for (const type of graph.typeNodes()) {
    const name = typeContext(type);
    const rootPackage = contextRootPackage(type.packageName);
    if (name === undefined || rootPackage === undefined) {
      continue;
    }
    let info = contexts.get(name);
    if (!info) {
      info = { name, rootPackage, typeNames: [] };
      contexts.set(name, info);
    }
    info.typeNames.push(type.qualifiedName);
  }
  return [...contexts.values()]
    .map((info) => ({ ...info, typeNames: [...info.typeNames].sort() }))
    .sort((a, b) => compareNames(a.name, b.name));
}
