/**
 * Result types of the architecture queries.
 */

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

export type CycleKind = 'TYPE_LEVEL' | 'PACKAGE_LEVEL' | 'BOUNDED_CONTEXT_LEVEL';

export interface DependencyCycle {
  kind: CycleKind;
  /** Closed path: the first element is repeated at the end */
  path: string[];
}

// ---------------------------------------------------------------------------
// Bounded contexts
// ---------------------------------------------------------------------------

export interface BoundedContextInfo {
  name: string;
  /** First three package segments, e.g. com.acme.orders */
  rootPackage: string;
  typeNames: string[];
}

// ---------------------------------------------------------------------------
// Lakos
// ---------------------------------------------------------------------------

export interface LakosMetrics {
  componentCount: number;
  /** Cumulative component dependency */
  ccd: number;
  /** Average component dependency */
  acd: number;
  /** CCD normalised against a balanced binary tree */
  nccd: number;
  /** ACD relative to log2(n) */
  racd: number;
}

// ---------------------------------------------------------------------------
// Coupling
// ---------------------------------------------------------------------------

export interface CouplingMetrics {
  packageName: string;
  /** Distinct outside types depending on the package (Ca) */
  afferentCoupling: number;
  /** Distinct outside types the package depends on (Ce) */
  efferentCoupling: number;
  /** Share of interfaces and abstract types */
  abstractness: number;
}

export type ZoneClassification =
  | 'ZONE_OF_PAIN'
  | 'ZONE_OF_USELESSNESS'
  | 'MAIN_SEQUENCE'
  | 'NEAR_MAIN_SEQUENCE'
  | 'OFF_MAIN_SEQUENCE';

// ---------------------------------------------------------------------------
// Dependency rules
// ---------------------------------------------------------------------------

export interface StabilityViolation {
  fromType: string;
  toType: string;
  fromInstability: number;
  toInstability: number;
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

export interface AggregateInfo {
  rootType: string;
  entities: string[];
  valueObjects: string[];
}
