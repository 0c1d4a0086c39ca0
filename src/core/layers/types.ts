/**
 * Types for layer dependency rules.
 */

export type ArchitecturalLayer = 'presentation' | 'application' | 'domain' | 'infrastructure' | 'unknown';

/**
 * Configured layer: package globs plus the layers it may depend on.
 */
export interface LayerDefinition {
  name: string;
  /** Glob patterns over package names, e.g. '*.domain' or '**.domain.**' */
  packages: string[];
  can_depend_on: string[];
}

/**
 * Resolved layer with normalized patterns and dependency rules.
 */
export interface ResolvedLayer {
  name: string;
  patterns: string[];
  canDependOn: Set<string>;
}

/**
 * A REFERENCES edge crossing a forbidden layer boundary.
 */
export interface LayerViolation {
  fromType: string;
  toType: string;
  fromLayer: string;
  toLayer: string;
  message: string;
}
