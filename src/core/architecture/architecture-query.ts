/**
 * Architecture query: read-only analyses over a built graph, optionally
 * informed by classification results.
 */
import type { ClassificationResults } from '../classification/result.js';
import { isClassified } from '../classification/result.js';
import { isRepositoryLike } from '../classification/heuristics.js';
import type { ApplicationGraph } from '../graph/graph.js';
import type { TypeNode } from '../graph/types.js';
import type { PortDirection } from '../classification/port/kinds.js';
import type { LayerDefinition, LayerViolation } from '../layers/types.js';
import { LayerBoundaryValidator } from '../layers/validator.js';
import { logger as rootLogger } from '../../utils/logger.js';
import {
  aggregateCohesion,
  aggregateContains,
  aggregateMembers,
  findAggregates,
} from './aggregates.js';
import { findBoundedContexts, typeContext } from './bounded-contexts.js';
import { analyzeAllPackageCoupling, analyzePackageCoupling } from './coupling.js';
import { findCycles } from './cycles.js';
import { groupedAdjacency, packageAdjacency, typeAdjacency } from './dependencies.js';
import { dependsOnScore, emptyLakosMetrics, lakosMetricsFor, lakosMetricsForNames } from './lakos.js';
import { findStabilityViolations } from './stability.js';
import type {
  AggregateInfo,
  BoundedContextInfo,
  CouplingMetrics,
  DependencyCycle,
  LakosMetrics,
  StabilityViolation,
} from './types.js';

const logger = rootLogger.child('query');

export interface ArchitectureQuery {
  // Cycles
  findDependencyCycles(): DependencyCycle[];
  findPackageCycles(): DependencyCycle[];
  findBoundedContextCycles(): DependencyCycle[];
  findBoundedContexts(): BoundedContextInfo[];

  // Lakos
  calculateDependsOnScore(qualifiedName: string): number;
  calculateCCD(packageName: string): number;
  calculateNCCD(packageName: string): number;
  calculateLakosMetrics(qualifiedNames: Iterable<string>): LakosMetrics;
  calculateLakosMetricsForPackage(packageName: string): LakosMetrics;
  calculateGlobalLakosMetrics(): LakosMetrics;

  // Aggregates
  findAggregates(): AggregateInfo[];
  findEntitiesInAggregate(rootType: string): string[];
  findContainingAggregate(qualifiedName: string): AggregateInfo | undefined;
  findAggregateMembership(): Map<string, string[]>;
  calculateAggregateCohesion(rootType: string): number | undefined;
  findRepositoryForAggregate(rootType: string): string | undefined;

  // Dependencies
  findLayerViolations(): LayerViolation[];
  findStabilityViolations(): StabilityViolation[];
  analyzePackageCoupling(packageName: string): CouplingMetrics;
  analyzeAllPackageCoupling(): CouplingMetrics[];

  // Ports
  findPortDirection(qualifiedName: string): PortDirection | undefined;
  findImplementors(interfaceName: string): string[];
}

export interface ArchitectureQueryOptions {
  classifications?: ClassificationResults;
  layers?: readonly LayerDefinition[];
}

export class DefaultArchitectureQuery implements ArchitectureQuery {
  private readonly classifications?: ClassificationResults;
  private readonly layerValidator: LayerBoundaryValidator;
  private aggregates?: AggregateInfo[];

  constructor(
    private readonly graph: ApplicationGraph,
    options: ArchitectureQueryOptions = {}
  ) {
    this.classifications = options.classifications;
    this.layerValidator = new LayerBoundaryValidator(options.layers ?? []);
  }

  // ---------------------------------------------------------------------------
  // Cycles
  // ---------------------------------------------------------------------------

  findDependencyCycles(): DependencyCycle[] {
    const cycles = findCycles(typeAdjacency(this.graph), 'TYPE_LEVEL');
    logger.debug(`Found ${cycles.length} type-level cycle(s)`);
    return cycles;
  }

  findPackageCycles(): DependencyCycle[] {
    return findCycles(packageAdjacency(this.graph), 'PACKAGE_LEVEL');
  }

  findBoundedContextCycles(): DependencyCycle[] {
    return findCycles(groupedAdjacency(this.graph, typeContext), 'BOUNDED_CONTEXT_LEVEL');
  }

  findBoundedContexts(): BoundedContextInfo[] {
    return findBoundedContexts(this.graph);
  }

  // ---------------------------------------------------------------------------
  // Lakos
  // ---------------------------------------------------------------------------

  calculateDependsOnScore(qualifiedName: string): number {
    return dependsOnScore(this.graph, qualifiedName);
  }

  calculateCCD(packageName: string): number {
    return this.graph
      .indexes()
      .typesByPackage(packageName)
      .reduce((sum, type) => sum + dependsOnScore(this.graph, type.qualifiedName), 0);
  }

  calculateNCCD(packageName: string): number {
    return this.calculateLakosMetricsForPackage(packageName).nccd;
  }

  calculateLakosMetrics(qualifiedNames: Iterable<string>): LakosMetrics {
    return lakosMetricsForNames(this.graph, qualifiedNames);
  }

  calculateLakosMetricsForPackage(packageName: string): LakosMetrics {
    const types = this.graph.indexes().typesByPackage(packageName);
    return types.length === 0 ? emptyLakosMetrics() : lakosMetricsFor(this.graph, types);
  }

  calculateGlobalLakosMetrics(): LakosMetrics {
    return lakosMetricsFor(this.graph, this.graph.typeNodes());
  }

  // ---------------------------------------------------------------------------
  // Aggregates
  // ---------------------------------------------------------------------------

  findAggregates(): AggregateInfo[] {
    if (!this.aggregates) {
      this.aggregates = findAggregates(this.graph, this.classifications);
      logger.debug(`Found ${this.aggregates.length} aggregate(s)`);
    }
    return this.aggregates;
  }

  findEntitiesInAggregate(rootType: string): string[] {
    return this.aggregateFor(rootType)?.entities ?? [];
  }

  findContainingAggregate(qualifiedName: string): AggregateInfo | undefined {
    return this.findAggregates().find((aggregate) => aggregateContains(aggregate, qualifiedName));
  }

  /** Root -> members, for aggregates with at least one member. */
  findAggregateMembership(): Map<string, string[]> {
    const membership = new Map<string, string[]>();
    for (const aggregate of this.findAggregates()) {
      const members = aggregateMembers(aggregate);
      if (members.length > 0) {
        membership.set(aggregate.rootType, members);
      }
    }
    return membership;
  }

  calculateAggregateCohesion(rootType: string): number | undefined {
    const aggregate = this.aggregateFor(rootType);
    return aggregate ? aggregateCohesion(this.graph, aggregate) : undefined;
  }

  findRepositoryForAggregate(rootType: string): string | undefined {
    const root = this.graph.typeNode(rootType);
    if (!root) {
      return undefined;
    }
    const repositories = this.repositories();
    const query = this.graph.query();

    const managing = repositories.find((repo) =>
      query.usersInSignatureOf(root).some((user) => user.id.equals(repo.id))
    );
    if (managing) {
      return managing.qualifiedName;
    }
    const byName =
      repositories.find((repo) => repo.simpleName.startsWith(root.simpleName)) ??
      repositories.find((repo) => repo.simpleName.includes(root.simpleName));
    return byName?.qualifiedName;
  }

  // ---------------------------------------------------------------------------
  // Dependencies
  // ---------------------------------------------------------------------------

  findLayerViolations(): LayerViolation[] {
    return this.layerValidator.validate(this.graph);
  }

  findStabilityViolations(): StabilityViolation[] {
    return findStabilityViolations(this.graph);
  }

  analyzePackageCoupling(packageName: string): CouplingMetrics {
    return analyzePackageCoupling(this.graph, packageName);
  }

  analyzeAllPackageCoupling(): CouplingMetrics[] {
    return analyzeAllPackageCoupling(this.graph);
  }

  // ---------------------------------------------------------------------------
  // Ports
  // ---------------------------------------------------------------------------

  findPortDirection(qualifiedName: string): PortDirection | undefined {
    const type = this.graph.typeNode(qualifiedName);
    if (!type || !this.classifications) {
      return undefined;
    }
    const result = this.classifications.get(type.id);
    return isClassified(result) && result.target === 'PORT' ? result.portDirection : undefined;
  }

  findImplementors(interfaceName: string): string[] {
    const type = this.graph.typeNode(interfaceName);
    if (!type) {
      return [];
    }
    return this.graph
      .query()
      .implementorsOf(type)
      .map((t) => t.qualifiedName);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private aggregateFor(rootType: string): AggregateInfo | undefined {
    return this.findAggregates().find((aggregate) => aggregate.rootType === rootType);
  }

  /**
   * Repository ports: classified REPOSITORY results, or repository-like
   * interfaces when no classifications were given.
   */
  private repositories(): TypeNode[] {
    const classifications = this.classifications;
    if (classifications) {
      return classifications
        .ofKind('REPOSITORY')
        .map((result) => this.graph.typeNode(result.nodeId))
        .filter((type): type is TypeNode => type !== undefined);
    }
    return this.graph.typeNodes().filter(isRepositoryLike);
  }
}
